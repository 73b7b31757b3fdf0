/*
Purpose: installed-version lookup and optional upgrade through `python -m pip`.
Assumptions: the interpreter named by `python` belongs to the target environment.
Usage: createPipVersionProvider({ python: "python", pipArgs: "" }).
*/

import { z } from "zod";

import { VersionProviderError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import type { EventLogger } from "../core/logger.js";
import { normalizeName } from "../requirements/names.js";
import type { InstalledVersionProvider, UpgradeRequest, VersionQuery } from "../sync/ports.js";

import { formatCommand, runCommand, type CommandResult, type CommandRunner } from "./command.js";
import { allowlistPipArgs } from "./pip-args.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipProviderOptions = {
  python: string;
  pipArgs: string;
  cwd?: string;
  run?: CommandRunner;
  logger?: EventLogger;
};

const PipListSchema = z.array(
  z
    .object({
      name: z.string(),
      version: z.string(),
    })
    .passthrough(),
);

// =============================================================================
// PUBLIC API
// =============================================================================

export function createPipVersionProvider(options: PipProviderOptions): InstalledVersionProvider {
  const run = options.run ?? runCommand;

  return {
    async getInstalledVersions(query: VersionQuery): Promise<Map<string, string>> {
      const args = ["-m", "pip", "list", "--format=json"];
      const res = await run(options.python, args, { cwd: options.cwd, timeoutMs: query.timeoutMs });
      assertSucceeded(res, "pip list");
      return parsePipList(res.stdout, query.names);
    },

    async upgrade(request: UpgradeRequest): Promise<void> {
      const args = [
        "-m",
        "pip",
        "install",
        "-U",
        "-r",
        request.requirementsPath,
        ...allowlistPipArgs(options.pipArgs),
      ];
      options.logger?.log({
        type: "provider.command",
        level: "debug",
        message: `Running: ${formatCommand(options.python, args)}`,
        payload: { command: options.python, args },
      });

      const res = await run(options.python, args, { cwd: options.cwd, timeoutMs: request.timeoutMs });
      if (res.stdout.trim()) {
        options.logger?.log({ type: "provider.output", level: "debug", message: res.stdout.trimEnd() });
      }
      assertSucceeded(res, "pip install -U");
    },
  };
}

/** Maps `pip list --format=json` output to normalized name -> version. */
export function parsePipList(stdout: string, names: readonly string[] = []): Map<string, string> {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    throw new VersionProviderError(
      `pip list returned invalid JSON: ${formatErrorMessage(error)}`,
      error,
    );
  }

  const parsed = PipListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new VersionProviderError("pip list returned an unexpected shape.", parsed.error);
  }

  const wanted = names.length > 0 ? new Set(names) : null;
  const versions = new Map<string, string>();
  for (const entry of parsed.data) {
    const name = normalizeName(entry.name);
    if (!name || !entry.version) continue;
    if (wanted && !wanted.has(name)) continue;
    versions.set(name, entry.version);
  }
  return versions;
}

// =============================================================================
// INTERNALS
// =============================================================================

function assertSucceeded(res: CommandResult, label: string): void {
  if (res.failure) {
    throw new VersionProviderError(`${label} failed: ${res.failure}`);
  }
  if (res.exitCode !== 0) {
    const detail = res.stderr.trim() || res.stdout.trim() || "no output";
    throw new VersionProviderError(`${label} exited with code ${res.exitCode ?? "unknown"}: ${detail}`);
  }
}
