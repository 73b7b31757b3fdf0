import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  ts: string;
  type: string;
  level: LogLevel;
  run_id: string;
  message?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  level?: LogLevel;
  message?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export interface EventLogger {
  log(event: LogEventInput): void;
  close(): void;
}

type EventDefaults = {
  runId: string;
};

type LogFailureAction = "write" | "close";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// =============================================================================
// JSONL FILE LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// CONSOLE LOGGER
// =============================================================================

export type ConsoleLoggerOptions = {
  verbosity: number;
  quiet: boolean;
  write?: (line: string) => void;
};

export class ConsoleLogger implements EventLogger {
  private readonly threshold: number;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions) {
    this.threshold = LEVEL_RANK[resolveConsoleLevel(options)];
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log(event: LogEventInput): void {
    const level = event.level ?? "info";
    if (LEVEL_RANK[level] < this.threshold) return;

    const text = event.message ?? event.type;
    this.write(level === "warn" || level === "error" ? `${level}: ${text}` : text);
  }

  close(): void {
    // nothing buffered
  }
}

export function resolveConsoleLevel(options: { verbosity: number; quiet: boolean }): LogLevel {
  if (options.quiet) return "error";
  if (options.verbosity >= 2) return "debug";
  if (options.verbosity === 1) return "info";
  return "warn";
}

// =============================================================================
// COMPOSITION
// =============================================================================

export function createMultiLogger(loggers: EventLogger[]): EventLogger {
  return {
    log(event) {
      for (const logger of loggers) {
        logger.log(event);
      }
    },
    close() {
      for (const logger of loggers) {
        logger.close();
      }
    },
  };
}

export function createSilentLogger(): EventLogger {
  return {
    log: () => undefined,
    close: () => undefined,
  };
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults): LogEvent {
  const { ts, type, level, message, payload } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = {
    ts: normalizedTs,
    type,
    level: level ?? "info",
    run_id: defaults.runId,
  };

  if (message) {
    result.message = message;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}

function resolveLoggerDebugEnabled(): boolean {
  return resolveDebugFlagFromArgv(process.argv) ?? false;
}

export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}
