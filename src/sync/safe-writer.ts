/*
Purpose: commit planned rewrites to disk one file at a time.
Assumptions: the plan was built from bytes read earlier; a file that changed since is left alone.
Usage: commitPlan(plan, options, logger) after planSync in apply mode.
*/

import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { LockTimeoutError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import type { EventLogger } from "../core/logger.js";
import type { SyncOptions } from "../core/options.js";
import { encodeRequirementText } from "../requirements/text-codec.js";

import { createBackup, pruneBackups, type BackupOptions } from "./backups.js";
import { acquireFileLock, type FileLock } from "./file-lock.js";
import type { FilePlan, SyncPlan, WriteFailure } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommitOptions = Pick<
  SyncOptions,
  "backup" | "backupSuffix" | "timestampedBackups" | "backupKeepLast" | "lockTimeoutSec"
> & {
  lockPollIntervalMs?: number;
  now?: () => Date;
};

export type CommitOutcome = {
  written: string[];
  backupPaths: string[];
  writeFailures: WriteFailure[];
  // Set when a lock could not be taken; files after it were not attempted.
  lockTimeout: LockTimeoutError | null;
};

const CHANGED_ON_DISK = "changed on disk since it was read";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function commitPlan(
  plan: SyncPlan,
  options: CommitOptions,
  logger: EventLogger,
): Promise<CommitOutcome> {
  const outcome: CommitOutcome = {
    written: [],
    backupPaths: [],
    writeFailures: [],
    lockTimeout: null,
  };

  for (const file of plan.files) {
    if (!file.outcome.changed) continue;

    let lock: FileLock;
    try {
      lock = await acquireFileLock(file.source.path, {
        timeoutSec: options.lockTimeoutSec,
        pollIntervalMs: options.lockPollIntervalMs,
      });
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        outcome.lockTimeout = error;
        logger.log({
          type: "file.lock_timeout",
          level: "error",
          message: error.message,
          payload: { file: file.source.path, lock_path: error.lockPath },
        });
        break;
      }
      throw error;
    }

    try {
      await commitFile(file, options, logger, outcome);
    } finally {
      await lock.release();
    }
  }

  return outcome;
}

// =============================================================================
// PER FILE
// =============================================================================

async function commitFile(
  file: FilePlan,
  options: CommitOptions,
  logger: EventLogger,
  outcome: CommitOutcome,
): Promise<void> {
  const filePath = file.source.path;

  let current: Buffer;
  try {
    current = await fs.readFile(filePath);
  } catch (error) {
    recordFailure(outcome, logger, { file: filePath, message: formatErrorMessage(error), restored: false });
    return;
  }

  if (!current.equals(file.source.bytes)) {
    recordFailure(outcome, logger, { file: filePath, message: CHANGED_ON_DISK, restored: false });
    return;
  }

  const backupOptions: BackupOptions = {
    suffix: options.backupSuffix,
    timestamped: options.timestampedBackups,
    keepLast: options.backupKeepLast,
  };
  let backupPath: string | null = null;

  try {
    if (options.backup) {
      backupPath = await createBackup(filePath, current, backupOptions, options.now?.());
      outcome.backupPaths.push(backupPath);
      logger.log({
        type: "file.backup",
        level: "debug",
        message: `Backed up ${filePath} to ${backupPath}`,
        payload: { file: filePath, backup: backupPath },
      });

      const pruned = await pruneBackups(filePath, backupOptions);
      if (pruned.length > 0) {
        logger.log({
          type: "backup.pruned",
          level: "debug",
          message: `Pruned ${pruned.length} old backup(s) of ${filePath}`,
          payload: { file: filePath, removed: pruned },
        });
      }
    }

    await replaceDurably(filePath, encodeRequirementText(file.text, file.source.encoding, file.source.bom));

    outcome.written.push(filePath);
    logger.log({
      type: "file.written",
      message: `Updated ${filePath} (${file.outcome.changeCount} change(s))`,
      payload: { file: filePath, changes: file.outcome.changeCount },
    });
  } catch (error) {
    const restored = await restoreOriginal(filePath, backupPath, current, logger);
    recordFailure(outcome, logger, { file: filePath, message: formatErrorMessage(error), restored });
  }
}

/** Temp file beside the target, fsync, original mode, then rename over it. */
async function replaceDurably(filePath: string, bytes: Buffer): Promise<void> {
  const { mode } = await fs.stat(filePath);
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);

  try {
    await writeDurably(tmpPath, bytes, mode);
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fse.remove(tmpPath).catch(() => undefined);
    throw error;
  }
}

async function writeDurably(tmpPath: string, bytes: Buffer, mode: number): Promise<void> {
  const handle = await fs.open(tmpPath, "wx", mode);
  try {
    await handle.writeFile(bytes);
    await handle.sync();
  } finally {
    await handle.close();
  }
  // open() applies the umask; copy the original permission bits explicitly.
  await fs.chmod(tmpPath, mode & 0o7777);
}

// The original is only replaced by a rename, so it is normally still intact here.
// Anything else goes back through the same temp file and rename.
async function restoreOriginal(
  filePath: string,
  backupPath: string | null,
  original: Buffer,
  logger: EventLogger,
): Promise<boolean> {
  try {
    const onDisk = await fs.readFile(filePath);
    if (onDisk.equals(original)) {
      return true;
    }

    const contents = backupPath ? await fs.readFile(backupPath) : original;
    await replaceDurably(filePath, contents);
    logger.log({
      type: "file.restored",
      level: "warn",
      message: `Restored original content of ${filePath}`,
      payload: { file: filePath, source: backupPath ?? "memory" },
    });
    return true;
  } catch (error) {
    logger.log({
      type: "file.restore_failed",
      level: "error",
      message: `Could not restore ${filePath}: ${formatErrorMessage(error)}`,
      payload: { file: filePath },
    });
    return false;
  }
}

function recordFailure(outcome: CommitOutcome, logger: EventLogger, failure: WriteFailure): void {
  outcome.writeFailures.push(failure);
  logger.log({
    type: "file.write_failed",
    level: "error",
    message: `Failed to write ${failure.file}: ${failure.message}`,
    payload: { ...failure },
  });
}
