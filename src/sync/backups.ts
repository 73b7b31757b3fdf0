import fs from "node:fs";
import path from "node:path";

import fg from "fast-glob";

import { backupTimestamp, isFileExistsError, safeUnlink } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type BackupOptions = {
  suffix: string;
  timestamped: boolean;
  // 0 keeps every timestamped backup.
  keepLast: number;
};

const MAX_COLLISION_COUNTER = 99;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Writes `contents` to `<file><suffix>.<YYYYMMDD-HHMMSS-mmm>` (a `-NN` counter is
 * appended on collision), or to `<file><suffix>` when timestamps are off.
 */
export async function createBackup(
  filePath: string,
  contents: Buffer,
  options: BackupOptions,
  now: Date = new Date(),
): Promise<string> {
  const plainPath = `${filePath}${options.suffix}`;
  if (!options.timestamped) {
    await fs.promises.writeFile(plainPath, contents);
    return plainPath;
  }

  const stamped = `${plainPath}.${backupTimestamp(now)}`;
  for (let counter = 0; counter <= MAX_COLLISION_COUNTER; counter += 1) {
    const candidate = counter === 0 ? stamped : `${stamped}-${String(counter).padStart(2, "0")}`;
    try {
      await fs.promises.writeFile(candidate, contents, { flag: "wx" });
      return candidate;
    } catch (error) {
      if (!isFileExistsError(error)) {
        // "wx" means this run created the candidate; drop a partial copy.
        await safeUnlink(candidate);
        throw error;
      }
    }
  }

  throw new Error(`Too many backups for ${filePath} at ${backupTimestamp(now)}.`);
}

export async function listTimestampedBackups(filePath: string, suffix: string): Promise<string[]> {
  const dir = path.dirname(filePath);
  const prefix = `${path.basename(filePath)}${suffix}.`;
  const pattern = new RegExp(`^${escapeRegExp(prefix)}\\d{8}-\\d{6}-\\d{3}(?:-\\d{2})?$`);

  const names = await fg(`${fg.escapePath(prefix)}*`, { cwd: dir, onlyFiles: true, dot: true });
  return names
    .filter((name) => pattern.test(name))
    .sort()
    .map((name) => path.join(dir, name));
}

/** Deletes the oldest timestamped backups beyond `keepLast`; returns what was removed. */
export async function pruneBackups(filePath: string, options: BackupOptions): Promise<string[]> {
  if (!options.timestamped || options.keepLast <= 0) {
    return [];
  }

  const backups = await listTimestampedBackups(filePath, options.suffix);
  const excess = backups.slice(0, Math.max(0, backups.length - options.keepLast));
  for (const backup of excess) {
    await safeUnlink(backup);
  }
  return excess;
}

// =============================================================================
// INTERNALS
// =============================================================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
