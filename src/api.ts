/*
Purpose: programmatic entry point for scripts and CI wrappers.
Assumptions: payload keys use the config-file spelling (snake_case); unknown keys are rejected.
Usage: const report = await runSyncPayload({ path: "requirements.txt", dry_run: true });
*/

import { parseConfigMapping } from "./core/config-loader.js";
import { createSilentLogger, type EventLogger } from "./core/logger.js";
import { mergeOptions, type SyncOptions, type SyncOptionsInput } from "./core/options.js";
import { createEnvironmentInspector } from "./env/environment-inspector.js";
import { createPipVersionProvider } from "./env/pip-provider.js";
import { sync } from "./sync/orchestrator.js";
import type { EnvironmentInspector, InstalledVersionProvider } from "./sync/ports.js";
import { resultToJson, type JsonReport } from "./sync/report.js";

export type SyncPayloadDeps = {
  cwd?: string;
  defaultPath?: string;
  provider?: InstalledVersionProvider;
  inspector?: EnvironmentInspector;
  logger?: EventLogger;
};

export function optionsFromMapping(payload: unknown, defaultPath?: string): SyncOptions {
  const base: SyncOptionsInput = defaultPath ? { path: defaultPath } : {};
  return mergeOptions(base, parseConfigMapping(payload ?? {}, "payload"));
}

export async function runSyncPayload(
  payload: unknown,
  deps: SyncPayloadDeps = {},
): Promise<JsonReport> {
  const options = optionsFromMapping(payload, deps.defaultPath);
  const logger = deps.logger ?? createSilentLogger();
  const result = await sync(options, {
    provider:
      deps.provider ??
      createPipVersionProvider({ python: options.python, pipArgs: options.pipArgs, cwd: deps.cwd, logger }),
    inspector: deps.inspector ?? createEnvironmentInspector({ python: options.python }),
    logger,
    cwd: deps.cwd,
  });
  return resultToJson(result);
}

export { sync } from "./sync/orchestrator.js";
export { planSync } from "./sync/change-planner.js";
export { buildGraph } from "./requirements/file-graph.js";
export { decide } from "./sync/policy-engine.js";
export { ReqsyncError, EXIT_CODES } from "./core/errors.js";
export type { SyncOptions, SyncOptionsInput } from "./core/options.js";
export type { SyncResult } from "./sync/types.js";
export type { JsonReport } from "./sync/report.js";
export type { EnvironmentInspector, InstalledVersionProvider } from "./sync/ports.js";
