#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli, type CliDependencies } from "./cli/index.js";
import { EXIT_CODES, resolveErrorExitCode } from "./core/errors.js";
import { resolveDebugFlagFromArgv } from "./core/logger.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  for (const command of [program, ...program.commands]) {
    command.configureOutput({
      outputError: (_message: string, _write: (chunk: string) => void) => undefined,
    });
    command.exitOverride();
  }
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  return program.getOptionValue("debug") === true;
}

function resolveExitCode(error: unknown): number {
  if (error instanceof CommanderError) {
    // Usage errors (unknown flag, bad choice) are generic failures.
    return error.exitCode === 0 ? 0 : EXIT_CODES.generic;
  }
  return resolveErrorExitCode(error);
}

export async function main(
  argv: string[],
  deps: Omit<CliDependencies, "onExitCode"> & { writeError?: (text: string) => void } = {},
): Promise<number> {
  let exitCode: number = EXIT_CODES.ok;
  const program = buildCli({ ...deps, onExitCode: (code) => (exitCode = code) });
  configureCliErrorHandling(program);
  const writeError = deps.writeError ?? ((text: string) => console.error(text));

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      exitCode = resolveExitCode(error);
    } else {
      const debug = resolveDebugEnabled(argv, program);
      if (error instanceof CommanderError) {
        writeError(error.message);
      } else {
        writeError(renderCliError(error, { debug }));
      }
      const code = resolveExitCode(error);
      exitCode = code === 0 ? EXIT_CODES.generic : code;
    }
  }

  process.exitCode = exitCode;
  return exitCode;
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(entry: string | undefined): boolean {
  if (!entry) return false;
  try {
    // npm links the bin entry, so compare against the resolved file.
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch (error) {
    if (error instanceof Error && "code" in error) return false;
    throw error;
  }
}

// Allow `node dist/src/index.js` direct execution
if (isDirectExecution(process.argv[1])) {
  void main(process.argv);
}
