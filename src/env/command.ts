import { execa, ExecaError } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type CommandResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  // Why the command did not run to completion (spawn error, timeout, signal); null otherwise.
  failure: string | null;
};

export type CommandOptions = {
  cwd?: string;
  timeoutMs?: number;
};

export type CommandRunner = (
  file: string,
  args: string[],
  options: CommandOptions,
) => Promise<CommandResult>;

// =============================================================================
// PUBLIC API
// =============================================================================

/** Runs a command without a shell; a non-zero exit is a result, not an exception. */
export const runCommand: CommandRunner = async (file, args, options) => {
  try {
    const res = await execa(file, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      stdio: "pipe",
      env: process.env,
    });
    return { exitCode: res.exitCode ?? 0, stdout: toText(res.stdout), stderr: toText(res.stderr), failure: null };
  } catch (error) {
    if (!(error instanceof ExecaError)) {
      throw error;
    }

    const completed = !error.timedOut && error.exitCode !== undefined;
    return {
      exitCode: error.exitCode ?? null,
      stdout: toText(error.stdout),
      stderr: toText(error.stderr),
      failure: completed
        ? null
        : error.timedOut
          ? `timed out after ${options.timeoutMs ?? 0}ms`
          : error.shortMessage,
    };
  }
};

export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].map(quoteArg).join(" ");
}

// =============================================================================
// INTERNALS
// =============================================================================

function toText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'"'"'`)}'`;
}
