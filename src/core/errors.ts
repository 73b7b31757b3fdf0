import type { SyncResult, WriteFailure } from "../sync/types.js";

// =============================================================================
// EXIT CODES
// =============================================================================

export const EXIT_CODES = {
  ok: 0,
  generic: 1,
  fileNotFound: 2,
  hashesPresent: 3,
  providerFailed: 4,
  structural: 5,
  venvBlocked: 7,
  dirtyRepoBlocked: 8,
  lockTimeout: 9,
  writeFailedRestored: 10,
  driftDetected: 11,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type ReqsyncErrorOptions = {
  exitCode?: ExitCode;
  title?: string;
  hint?: string;
  cause?: unknown;
  result?: SyncResult;
};

// =============================================================================
// BASE
// =============================================================================

export class ReqsyncError extends Error {
  readonly exitCode: ExitCode;
  readonly title: string;
  readonly hint?: string;
  readonly cause?: unknown;
  // Partial outcome for failures that happen after planning.
  readonly result?: SyncResult;

  constructor(message: string, options: ReqsyncErrorOptions = {}) {
    super(message);
    this.name = "ReqsyncError";
    this.exitCode = options.exitCode ?? EXIT_CODES.generic;
    this.title = options.title ?? "reqsync failed.";
    this.hint = options.hint;
    this.cause = options.cause;
    this.result = options.result;
  }
}

export class ConfigError extends ReqsyncError {
  constructor(message: string, cause?: unknown) {
    super(message, { title: "Invalid configuration.", cause });
    this.name = "ConfigError";
  }
}

// =============================================================================
// STRUCTURAL
// =============================================================================

export type FileReference = {
  file: string;
  lineNumber: number;
};

export class FileNotFoundError extends ReqsyncError {
  constructor(
    public readonly filePath: string,
    public readonly referencedBy: FileReference | null = null,
    cause?: unknown,
  ) {
    const origin = referencedBy
      ? ` (referenced from ${referencedBy.file}:${referencedBy.lineNumber})`
      : "";
    super(`Requirements file not found: ${filePath}${origin}`, {
      exitCode: EXIT_CODES.fileNotFound,
      title: "Requirements file missing.",
      hint: referencedBy ? "Fix the -r/-c directive or create the file." : "Pass --path <file>.",
      cause,
    });
    this.name = "FileNotFoundError";
  }
}

export class CycleDetectedError extends ReqsyncError {
  constructor(public readonly chain: string[]) {
    super(`Requirements include cycle detected: ${chain.join(" -> ")}`, {
      exitCode: EXIT_CODES.structural,
      title: "Include cycle detected.",
      hint: "Remove one of the -r/-c directives that closes the cycle.",
    });
    this.name = "CycleDetectedError";
  }
}

export class UnreadableEncodingError extends ReqsyncError {
  constructor(
    public readonly filePath: string,
    encoding: string,
    cause?: unknown,
  ) {
    super(`Cannot decode ${filePath} as ${encoding}.`, {
      exitCode: EXIT_CODES.structural,
      title: "Unreadable requirements file.",
      hint: "Save the file as UTF-8 (optionally with a BOM) or UTF-16 with a BOM.",
      cause,
    });
    this.name = "UnreadableEncodingError";
  }
}

// =============================================================================
// GUARDS
// =============================================================================

export class HashPinsPresentError extends ReqsyncError {
  constructor(
    public readonly files: string[],
    result?: SyncResult,
  ) {
    super(`Hash-pinned requirements found in: ${files.join(", ")}`, {
      exitCode: EXIT_CODES.hashesPresent,
      title: "Refusing to rewrite hash-pinned files.",
      hint: "Re-run with --allow-hashes to process these files and skip hashed lines.",
      result,
    });
    this.name = "HashPinsPresentError";
  }
}

export class VenvBlockedError extends ReqsyncError {
  constructor() {
    super("Refusing to run outside a virtualenv.", {
      exitCode: EXIT_CODES.venvBlocked,
      title: "No virtualenv active.",
      hint: "Activate a virtualenv, or re-run with --system-ok if you really mean the system interpreter.",
    });
    this.name = "VenvBlockedError";
  }
}

export class DirtyRepoBlockedError extends ReqsyncError {
  constructor(public readonly repoPath: string) {
    super(`Repository has uncommitted changes (cwd=${repoPath}).`, {
      exitCode: EXIT_CODES.dirtyRepoBlocked,
      title: "Dirty repository.",
      hint: "Commit or stash your changes, or re-run with --allow-dirty.",
    });
    this.name = "DirtyRepoBlockedError";
  }
}

// =============================================================================
// PROVIDER
// =============================================================================

export class VersionProviderError extends ReqsyncError {
  constructor(message: string, cause?: unknown) {
    super(message, {
      exitCode: EXIT_CODES.providerFailed,
      title: "Installed version lookup failed.",
      hint: "Check that the interpreter and pip work, or re-run with --no-upgrade.",
      cause,
    });
    this.name = "VersionProviderError";
  }
}

// =============================================================================
// WRITES
// =============================================================================

export class LockTimeoutError extends ReqsyncError {
  constructor(
    public readonly lockPath: string,
    public readonly timeoutSec: number,
    result?: SyncResult,
  ) {
    super(`Unable to acquire lock at ${lockPath} within ${timeoutSec}s.`, {
      exitCode: EXIT_CODES.lockTimeout,
      title: "Lock timeout.",
      hint: "Another reqsync run may hold the lock. Delete the lock file if no run is active.",
      result,
    });
    this.name = "LockTimeoutError";
  }
}

export class WriteRollbackError extends ReqsyncError {
  constructor(failures: readonly WriteFailure[], result?: SyncResult) {
    super(describeWriteFailures(failures), {
      exitCode: EXIT_CODES.writeFailedRestored,
      title: "Write failed.",
      result,
    });
    this.name = "WriteRollbackError";
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function describeWriteFailures(failures: readonly WriteFailure[]): string {
  const lost = failures.filter((failure) => !failure.restored).length;
  const count = `${failures.length} file${failures.length === 1 ? "" : "s"}`;
  if (lost === 0) {
    return `Could not write ${count}; the original content is intact.`;
  }
  return `Could not write ${count}; ${lost} could not be restored.`;
}

export function exitCodeName(code: number): string | undefined {
  return Object.entries(EXIT_CODES).find(([, value]) => value === code)?.[0];
}

export function resolveErrorExitCode(error: unknown): ExitCode {
  if (error instanceof ReqsyncError) {
    return error.exitCode;
  }
  return EXIT_CODES.generic;
}
