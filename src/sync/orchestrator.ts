/*
Purpose: run one synchronization pass from guards to result.
Assumptions: options are already merged and validated; provider and inspector are injected.
Usage: await sync(options, { provider, inspector, logger }).
*/

import path from "node:path";

import {
  DirtyRepoBlockedError,
  FileNotFoundError,
  HashPinsPresentError,
  LockTimeoutError,
  VenvBlockedError,
  WriteRollbackError,
} from "../core/errors.js";
import type { EventLogger } from "../core/logger.js";
import { resolveMode, type SyncMode, type SyncOptions } from "../core/options.js";
import { pathExists } from "../core/utils.js";
import { buildGraph } from "../requirements/file-graph.js";
import type { RequirementGraph } from "../requirements/types.js";

import { planSync } from "./change-planner.js";
import type { EnvironmentInspector, InstalledVersionProvider } from "./ports.js";
import { buildPlanDiff } from "./report.js";
import { commitPlan, type CommitOptions, type CommitOutcome } from "./safe-writer.js";
import type { FileOutcome, SyncPlan, SyncResult } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type SyncDependencies = {
  provider: InstalledVersionProvider;
  inspector: EnvironmentInspector;
  logger: EventLogger;
  cwd?: string;
  commit?: Pick<CommitOptions, "lockPollIntervalMs" | "now">;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function sync(options: SyncOptions, deps: SyncDependencies): Promise<SyncResult> {
  const { logger, provider } = deps;
  const mode = resolveMode(options);
  const rootPath = path.resolve(deps.cwd ?? process.cwd(), options.path);

  logger.log({
    type: "sync.start",
    level: "debug",
    message: `Syncing ${rootPath} (${mode}, ${options.policy})`,
    payload: { path: rootPath, mode, policy: options.policy },
  });

  await runGuards(rootPath, options, deps.inspector);

  let graph = await buildGraph(rootPath, { followIncludes: options.followIncludes, logger });
  const timeoutMs = options.providerTimeoutSec * 1000;

  if (mode === "apply" && !options.noUpgrade && provider.upgrade) {
    logger.log({
      type: "provider.upgrade",
      message: "Upgrading environment via pip (may take a while)...",
      payload: { requirements: rootPath },
    });
    await provider.upgrade({ requirementsPath: rootPath, timeoutMs });
    // The upgrade may not touch the files, but re-reading keeps the planned bytes current.
    graph = await buildGraph(rootPath, { followIncludes: options.followIncludes, logger });
  }

  const names = requirementNames(graph);
  const versions = await provider.getInstalledVersions({ names, timeoutMs });
  logger.log({
    type: "versions.loaded",
    level: "debug",
    message: `Loaded ${versions.size} installed version(s)`,
    payload: { count: versions.size },
  });

  const plan = planSync(graph, versions, options);
  for (const entry of plan.skipped) {
    if (entry.reason !== "not-installed") continue;
    logger.log({
      type: "package.not_installed",
      level: "warn",
      message: `Not installed: ${entry.package} (kept)`,
      payload: { package: entry.package, file: entry.file, line: entry.lineNumber },
    });
  }
  logger.log({
    type: "plan.complete",
    level: "debug",
    message: `Planned ${plan.changes.length} change(s) across ${plan.files.length} file(s)`,
    payload: { changes: plan.changes.length, files: plan.files.length, skipped: plan.skipped.length },
  });

  const diff = options.showDiff ? buildPlanDiff(plan.files) : null;

  if (plan.refusedFiles.length > 0) {
    throw new HashPinsPresentError([...plan.refusedFiles], buildResult(mode, plan, diff, null));
  }

  if (mode !== "apply" || !plan.changed) {
    return finish(logger, buildResult(mode, plan, diff, null));
  }

  const outcome = await commitPlan(
    plan,
    {
      backup: options.backup,
      backupSuffix: options.backupSuffix,
      timestampedBackups: options.timestampedBackups,
      backupKeepLast: options.backupKeepLast,
      lockTimeoutSec: options.lockTimeoutSec,
      ...deps.commit,
    },
    logger,
  );
  const result = buildResult(mode, plan, diff, outcome);

  if (outcome.lockTimeout) {
    throw new LockTimeoutError(outcome.lockTimeout.lockPath, outcome.lockTimeout.timeoutSec, result);
  }
  if (outcome.writeFailures.length > 0) {
    throw new WriteRollbackError(outcome.writeFailures, result);
  }

  return finish(logger, result);
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runGuards(
  rootPath: string,
  options: SyncOptions,
  inspector: EnvironmentInspector,
): Promise<void> {
  if (!(await pathExists(rootPath))) {
    throw new FileNotFoundError(rootPath);
  }
  if (!options.systemOk && !(await inspector.isVirtualEnvActive())) {
    throw new VenvBlockedError();
  }
  const repoDir = path.dirname(rootPath);
  if (!options.allowDirty && (await inspector.isRepositoryDirty(repoDir))) {
    throw new DirtyRepoBlockedError(repoDir);
  }
}

function requirementNames(graph: RequirementGraph): string[] {
  const names = new Set<string>();
  for (const file of graph.files) {
    for (const line of file.lines) {
      if (line.kind === "requirement") {
        names.add(line.normalizedName);
      }
    }
  }
  return Array.from(names).sort();
}

function buildResult(
  mode: SyncMode,
  plan: SyncPlan,
  diff: string | null,
  outcome: CommitOutcome | null,
): SyncResult {
  return Object.freeze({
    mode,
    changed: plan.changed,
    files: plan.files.map((file) => fileOutcomeAfterCommit(file.outcome, outcome)),
    changes: plan.changes,
    skipped: plan.skipped,
    backupPaths: outcome ? [...outcome.backupPaths] : [],
    refusedFiles: plan.refusedFiles,
    writeFailures: outcome ? [...outcome.writeFailures] : [],
    diff,
  });
}

function fileOutcomeAfterCommit(planned: FileOutcome, outcome: CommitOutcome | null): FileOutcome {
  if (!outcome || !planned.changed || outcome.written.includes(planned.file)) {
    return planned;
  }
  const failed = outcome.writeFailures.some((failure) => failure.file === planned.file);
  return { ...planned, status: failed ? "write-failed" : "not-written" };
}

function finish(logger: EventLogger, result: SyncResult): SyncResult {
  logger.log({
    type: "sync.complete",
    level: "debug",
    message: result.changed ? "Changes detected" : "Already in sync",
    payload: {
      mode: result.mode,
      changed: result.changed,
      changes: result.changes.length,
      backups: result.backupPaths.length,
    },
  });
  return result;
}
