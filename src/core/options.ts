import { ConfigError } from "./errors.js";

// =============================================================================
// ENUMS
// =============================================================================

export const SYNC_POLICIES = ["lower-bound", "floor-only", "floor-and-cap", "update-in-place"] as const;
export type SyncPolicy = (typeof SYNC_POLICIES)[number];

export const CAP_STRATEGIES = ["next-minor", "next-major"] as const;
export type CapStrategy = (typeof CAP_STRATEGIES)[number];

export type SyncMode = "apply" | "dry-run" | "check";

// =============================================================================
// OPTIONS
// =============================================================================

export type SyncOptions = {
  path: string;
  followIncludes: boolean;
  updateConstraints: boolean;
  policy: SyncPolicy;
  capStrategy: CapStrategy;
  allowPrerelease: boolean;
  keepLocal: boolean;
  noUpgrade: boolean;
  providerTimeoutSec: number;
  pipArgs: string;
  python: string;
  only: string[];
  exclude: string[];
  check: boolean;
  dryRun: boolean;
  showDiff: boolean;
  jsonReport: string | null;
  backup: boolean;
  backupSuffix: string;
  timestampedBackups: boolean;
  backupKeepLast: number;
  lockTimeoutSec: number;
  logFile: string | null;
  verbosity: number;
  quiet: boolean;
  systemOk: boolean;
  allowHashes: boolean;
  allowDirty: boolean;
  lastWins: boolean;
};

export type SyncOptionsInput = Partial<SyncOptions>;

export const DEFAULT_OPTIONS: Readonly<SyncOptions> = Object.freeze({
  path: "requirements.txt",
  followIncludes: true,
  updateConstraints: false,
  policy: "lower-bound",
  capStrategy: "next-minor",
  allowPrerelease: false,
  keepLocal: false,
  noUpgrade: false,
  providerTimeoutSec: 900,
  pipArgs: "",
  python: "python",
  only: [],
  exclude: [],
  check: false,
  dryRun: false,
  showDiff: false,
  jsonReport: null,
  backup: true,
  backupSuffix: ".bak",
  timestampedBackups: true,
  backupKeepLast: 5,
  lockTimeoutSec: 15,
  logFile: null,
  verbosity: 0,
  quiet: false,
  systemOk: false,
  allowHashes: false,
  allowDirty: true,
  lastWins: false,
});

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Layers option sources left to right; later layers win. `undefined` values never
 * override an earlier layer, so partially-filled CLI flag objects can be merged as-is.
 */
export function mergeOptions(...layers: SyncOptionsInput[]): SyncOptions {
  const merged: SyncOptions = { ...DEFAULT_OPTIONS, only: [], exclude: [] };
  for (const layer of layers) {
    assignDefined(merged, layer);
  }
  validateOptions(merged);
  return Object.freeze(merged);
}

export function resolveMode(options: Pick<SyncOptions, "check" | "dryRun">): SyncMode {
  if (options.check) return "check";
  if (options.dryRun) return "dry-run";
  return "apply";
}

export function validateOptions(options: SyncOptions): void {
  const problems: string[] = [];

  if (options.path.trim() === "") {
    problems.push("path: must not be empty");
  }
  if (!Number.isInteger(options.backupKeepLast) || options.backupKeepLast < 0) {
    problems.push("backup_keep_last: must be a non-negative integer");
  }
  if (!(options.lockTimeoutSec > 0)) {
    problems.push("lock_timeout_sec: must be greater than 0");
  }
  if (!(options.providerTimeoutSec > 0)) {
    problems.push("provider_timeout_sec: must be greater than 0");
  }
  if (options.backup && options.backupSuffix === "") {
    problems.push("backup_suffix: must not be empty when backups are enabled");
  }
  if (!Number.isInteger(options.verbosity) || options.verbosity < 0) {
    problems.push("verbosity: must be a non-negative integer");
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid options:\n${problems.join("\n")}`);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function assignDefined(target: SyncOptions, layer: SyncOptionsInput): void {
  const defined = Object.fromEntries(
    Object.entries(layer).filter(([key, value]) => key in DEFAULT_OPTIONS && value !== undefined),
  );
  Object.assign(target, defined);
}
