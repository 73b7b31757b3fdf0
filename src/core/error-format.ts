/*
Purpose: turn unknown errors into ordered display lines for CLI and log output.
Assumptions: ReqsyncError carries title/hint/exitCode and, after planning, the partial run result.
Usage: formatErrorLines(err, { mode: "short" }), formatErrorMessage(err).
*/

import type { SyncResult } from "../sync/types.js";

import { ReqsyncError, exitCodeName } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "file"
  | "hint"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "green" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  green: [32, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof ReqsyncError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.result) {
      lines.push(...formatFileLines(error.result));
    }
    if (error.hint) {
      lines.push({ kind: "hint", text: error.hint });
    }
    if (options.mode === "debug") {
      const name = exitCodeName(error.exitCode);
      lines.push({ kind: "code", text: name ? `${error.exitCode} (${name})` : String(error.exitCode) });
    }
  } else {
    lines.push({ kind: "title", text: formatErrorMessage(error) });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
    const cause = resolveCause(error);
    if (cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(cause) });
    }
    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

export function resolveColorEnabled(input: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (typeof input.useColor === "boolean") {
    return input.useColor;
  }
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  return Boolean(input.stream.isTTY);
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

// Per-file state of a run that stopped while committing; empty when nothing was attempted.
function formatFileLines(result: SyncResult): ErrorFormatLine[] {
  const failures = new Map(result.writeFailures.map((failure) => [failure.file, failure]));
  const interrupted = result.files.some(
    (file) => file.status === "write-failed" || file.status === "not-written",
  );
  if (!interrupted) {
    return [];
  }

  const lines: ErrorFormatLine[] = [];
  for (const file of result.files) {
    const failure = failures.get(file.file);
    if (failure) {
      const state = failure.restored ? "original intact" : "original NOT restored";
      lines.push({ kind: "file", text: `${file.file}: ${failure.message} (${state})` });
    } else if (file.status === "not-written") {
      lines.push({ kind: "file", text: `${file.file}: not written` });
    } else if (file.status === "rewritten") {
      lines.push({ kind: "file", text: `${file.file}: written` });
    }
  }
  return lines;
}

function resolveCause(error: Error): unknown {
  if (!("cause" in error)) {
    return undefined;
  }
  return error.cause ?? undefined;
}
