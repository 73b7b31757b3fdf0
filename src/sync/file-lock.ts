// Purpose: per-file advisory lock held while a requirement file is rewritten.
// The lock is a sibling file created exclusively; its payload names the holder's pid so a
// crashed holder's lock can be recognized as stale.

import fs from "node:fs";
import path from "node:path";

import { LockTimeoutError } from "../core/errors.js";
import { getErrorCode, isFileExistsError, isoNow, safeUnlink, sleep } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type FileLock = {
  lockPath: string;
  release: () => Promise<void>;
};

export type AcquireLockOptions = {
  timeoutSec: number;
  pollIntervalMs?: number;
  isProcessAlive?: (pid: number) => boolean;
};

type LockPayload = {
  pid: number;
  acquired_at: string;
};

const DEFAULT_POLL_INTERVAL_MS = 100;

// =============================================================================
// PUBLIC API
// =============================================================================

export function lockPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.reqsync.lock`);
}

export async function acquireFileLock(
  filePath: string,
  options: AcquireLockOptions,
): Promise<FileLock> {
  const lockPath = lockPathFor(filePath);
  const deadline = Date.now() + options.timeoutSec * 1000;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const isAlive = options.isProcessAlive ?? isProcessAlive;

  for (;;) {
    const handle = await tryCreateLock(lockPath);
    if (handle) {
      return writeLockPayload(lockPath, handle);
    }

    if (await removeIfStale(lockPath, isAlive)) {
      continue;
    }

    if (Date.now() >= deadline) {
      throw new LockTimeoutError(lockPath, options.timeoutSec);
    }
    await sleep(Math.min(pollIntervalMs, Math.max(0, deadline - Date.now())));
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return getErrorCode(error) === "EPERM";
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function tryCreateLock(lockPath: string): Promise<fs.promises.FileHandle | null> {
  try {
    return await fs.promises.open(lockPath, "wx");
  } catch (error) {
    if (isFileExistsError(error)) {
      return null;
    }
    throw error;
  }
}

async function writeLockPayload(
  lockPath: string,
  handle: fs.promises.FileHandle,
): Promise<FileLock> {
  try {
    const payload: LockPayload = { pid: process.pid, acquired_at: isoNow() };
    await handle.writeFile(JSON.stringify(payload) + "\n", "utf8");
  } catch (error) {
    await handle.close();
    await safeUnlink(lockPath);
    throw error;
  }

  let released = false;
  return {
    lockPath,
    release: async () => {
      if (released) return;
      released = true;
      await handle.close();
      await safeUnlink(lockPath);
    },
  };
}

// A lock whose holder pid is gone is removed; unreadable payloads are left alone.
async function removeIfStale(
  lockPath: string,
  isAlive: (pid: number) => boolean,
): Promise<boolean> {
  const pid = await readLockPid(lockPath);
  if (pid === null || isAlive(pid)) {
    return false;
  }
  await safeUnlink(lockPath);
  return true;
}

async function readLockPid(lockPath: string): Promise<number | null> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(lockPath, "utf8");
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && "pid" in parsed && Number.isInteger(parsed.pid)) {
      return typeof parsed.pid === "number" && parsed.pid > 0 ? parsed.pid : null;
    }
  } catch (error) {
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
  }
  return null;
}
