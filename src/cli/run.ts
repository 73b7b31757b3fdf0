import path from "node:path";

import { z } from "zod";

import { formatIssues, loadConfig, type LoadedConfig } from "../core/config-loader.js";
import { ConfigError, EXIT_CODES, ReqsyncError, type ExitCode } from "../core/errors.js";
import {
  ConsoleLogger,
  JsonlLogger,
  createMultiLogger,
  type EventLogger,
} from "../core/logger.js";
import {
  CAP_STRATEGIES,
  SYNC_POLICIES,
  mergeOptions,
  type SyncOptions,
  type SyncOptionsInput,
} from "../core/options.js";
import { defaultRunId } from "../core/utils.js";
import { createEnvironmentInspector } from "../env/environment-inspector.js";
import { createPipVersionProvider } from "../env/pip-provider.js";
import { sync } from "../sync/orchestrator.js";
import type { EnvironmentInspector, InstalledVersionProvider } from "../sync/ports.js";
import { resultToJson, writeJsonReport } from "../sync/report.js";

import { OUTPUT_MODES, emitResult, type OutputSink } from "./output.js";

// =============================================================================
// FLAGS
// =============================================================================

// Commander leaves a flag undefined unless it was given, so config values survive.
export const RunFlagsSchema = z.object({
  path: z.string().optional(),
  followIncludes: z.boolean().optional(),
  updateConstraints: z.boolean().optional(),
  policy: z.enum(SYNC_POLICIES).optional(),
  capStrategy: z.enum(CAP_STRATEGIES).optional(),
  allowPrerelease: z.boolean().optional(),
  keepLocal: z.boolean().optional(),
  upgrade: z.boolean().optional(),
  providerTimeout: z.number().optional(),
  pipArgs: z.string().optional(),
  python: z.string().optional(),
  only: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  check: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  showDiff: z.boolean().optional(),
  output: z.enum(OUTPUT_MODES).optional(),
  jsonReport: z.string().optional(),
  backup: z.boolean().optional(),
  backupSuffix: z.string().optional(),
  timestampedBackups: z.boolean().optional(),
  backupKeepLast: z.number().optional(),
  lockTimeout: z.number().optional(),
  logFile: z.string().optional(),
  verbose: z.number().optional(),
  quiet: z.boolean().optional(),
  systemOk: z.boolean().optional(),
  allowHashes: z.boolean().optional(),
  allowDirty: z.boolean().optional(),
  lastWins: z.boolean().optional(),
  config: z.union([z.string(), z.literal(false)]).optional(),
});

export type RunFlags = z.infer<typeof RunFlagsSchema>;

export type RunCommandDeps = {
  cwd?: string;
  provider?: InstalledVersionProvider;
  inspector?: EnvironmentInspector;
  stdout?: OutputSink;
  stderr?: OutputSink;
};

// =============================================================================
// COMMAND
// =============================================================================

/** Runs one sync from CLI flags; returns the exit code for a completed run. */
export async function runSyncCommand(rawFlags: unknown, deps: RunCommandDeps = {}): Promise<ExitCode> {
  const flags = parseRunFlags(rawFlags);
  const cwd = deps.cwd ?? process.cwd();
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));

  const loaded: LoadedConfig =
    flags.config === false
      ? { sources: [], options: {} }
      : loadConfig({ cwd, explicitPath: flags.config });
  const options = mergeOptions(loaded.options, flagsToOptions(flags));

  const logger = createRunLogger(options, cwd, deps.stderr);
  try {
    if (loaded.sources.length > 0) {
      logger.log({
        type: "config.loaded",
        level: "debug",
        message: `Loaded config from ${loaded.sources.join(", ")}`,
        payload: { sources: loaded.sources },
      });
    }

    const provider =
      deps.provider ??
      createPipVersionProvider({ python: options.python, pipArgs: options.pipArgs, cwd, logger });
    const inspector = deps.inspector ?? createEnvironmentInspector({ python: options.python });
    const outputMode = flags.output ?? "human";

    try {
      const result = await sync(options, { provider, inspector, logger, cwd });
      await emitResult(resultToJson(result), options, outputMode, stdout, cwd);
      return result.mode === "check" && result.changed ? EXIT_CODES.driftDetected : EXIT_CODES.ok;
    } catch (error) {
      // Failures after planning still leave a report behind.
      if (error instanceof ReqsyncError && error.result && options.jsonReport) {
        await writeJsonReport(resultToJson(error.result), path.resolve(cwd, options.jsonReport));
      }
      throw error;
    }
  } finally {
    logger.close();
  }
}

export function parseRunFlags(raw: unknown): RunFlags {
  const parsed = RunFlagsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid command-line flags:\n${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

export function flagsToOptions(flags: RunFlags): SyncOptionsInput {
  return {
    path: flags.path,
    followIncludes: flags.followIncludes,
    updateConstraints: flags.updateConstraints,
    policy: flags.policy,
    capStrategy: flags.capStrategy,
    allowPrerelease: flags.allowPrerelease,
    keepLocal: flags.keepLocal,
    noUpgrade: flags.upgrade === undefined ? undefined : !flags.upgrade,
    providerTimeoutSec: flags.providerTimeout,
    pipArgs: flags.pipArgs,
    python: flags.python,
    only: flags.only,
    exclude: flags.exclude,
    check: flags.check,
    dryRun: flags.dryRun,
    showDiff: flags.showDiff,
    jsonReport: flags.jsonReport,
    backup: flags.backup,
    backupSuffix: flags.backupSuffix,
    timestampedBackups: flags.timestampedBackups,
    backupKeepLast: flags.backupKeepLast,
    lockTimeoutSec: flags.lockTimeout,
    logFile: flags.logFile,
    verbosity: flags.verbose,
    quiet: flags.quiet,
    systemOk: flags.systemOk,
    allowHashes: flags.allowHashes,
    allowDirty: flags.allowDirty,
    lastWins: flags.lastWins,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function createRunLogger(options: SyncOptions, cwd: string, stderr?: OutputSink): EventLogger {
  const loggers: EventLogger[] = [
    new ConsoleLogger({ verbosity: options.verbosity, quiet: options.quiet, write: stderr }),
  ];
  if (options.logFile) {
    loggers.push(new JsonlLogger(path.resolve(cwd, options.logFile), { runId: defaultRunId() }));
  }
  return createMultiLogger(loggers);
}
