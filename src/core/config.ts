import { z } from "zod";

import { CAP_STRATEGIES, SYNC_POLICIES, type SyncOptionsInput } from "./options.js";

// Globs may be written as a list or a single comma-separated string.
const GlobListSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (Array.isArray(value) ? value : splitCommaList(value)));

const PositiveSeconds = z.number().positive();

export const SyncConfigSchema = z
  .object({
    path: z.string().min(1).optional(),
    follow_includes: z.boolean().optional(),
    update_constraints: z.boolean().optional(),
    policy: z.enum(SYNC_POLICIES).optional(),
    cap_strategy: z.enum(CAP_STRATEGIES).optional(),
    allow_prerelease: z.boolean().optional(),
    keep_local: z.boolean().optional(),
    no_upgrade: z.boolean().optional(),
    provider_timeout_sec: PositiveSeconds.optional(),
    pip_args: z.string().optional(),
    python: z.string().min(1).optional(),
    only: GlobListSchema.optional(),
    exclude: GlobListSchema.optional(),
    check: z.boolean().optional(),
    dry_run: z.boolean().optional(),
    show_diff: z.boolean().optional(),
    json_report: z.string().min(1).nullable().optional(),
    backup: z.boolean().optional(),
    backup_suffix: z.string().optional(),
    timestamped_backups: z.boolean().optional(),
    backup_keep_last: z.number().int().min(0).optional(),
    lock_timeout_sec: PositiveSeconds.optional(),
    log_file: z.string().min(1).nullable().optional(),
    verbosity: z.number().int().min(0).optional(),
    quiet: z.boolean().optional(),
    system_ok: z.boolean().optional(),
    allow_hashes: z.boolean().optional(),
    allow_dirty: z.boolean().optional(),
    last_wins: z.boolean().optional(),
  })
  .strict();

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

export function configToOptions(config: SyncConfig): SyncOptionsInput {
  return {
    path: config.path,
    followIncludes: config.follow_includes,
    updateConstraints: config.update_constraints,
    policy: config.policy,
    capStrategy: config.cap_strategy,
    allowPrerelease: config.allow_prerelease,
    keepLocal: config.keep_local,
    noUpgrade: config.no_upgrade,
    providerTimeoutSec: config.provider_timeout_sec,
    pipArgs: config.pip_args,
    python: config.python,
    only: config.only,
    exclude: config.exclude,
    check: config.check,
    dryRun: config.dry_run,
    showDiff: config.show_diff,
    jsonReport: config.json_report,
    backup: config.backup,
    backupSuffix: config.backup_suffix,
    timestampedBackups: config.timestamped_backups,
    backupKeepLast: config.backup_keep_last,
    lockTimeoutSec: config.lock_timeout_sec,
    logFile: config.log_file,
    verbosity: config.verbosity,
    quiet: config.quiet,
    systemOk: config.system_ok,
    allowHashes: config.allow_hashes,
    allowDirty: config.allow_dirty,
    lastWins: config.last_wins,
  };
}

export function splitCommaList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
