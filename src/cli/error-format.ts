/*
Purpose: render a failed reqsync run for stderr, with per-file commit state when a run stopped mid-write.
Assumptions: color follows the stream unless forced; NO_COLOR turns it off.
Usage: writeError(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = { label?: string; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  file: { label: "  -", labelStyles: ["dim"], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  code: { label: "Exit code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"] },
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  const text = format(line.text, style.textStyles);
  if (!style.label) {
    return text;
  }
  const label = format(style.label, style.labelStyles);

  // Stack frames go on their own lines under the label.
  if (line.kind === "stack") {
    return `${label}\n${format(line.text.replace(/^/gm, "  "), style.textStyles)}`;
  }
  return `${label} ${text}`;
}
