import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { LockTimeoutError } from "../core/errors.js";

import { acquireFileLock, lockPathFor } from "./file-lock.js";

describe("file lock", () => {
  let tmpDir: string;
  let target: string;

  beforeEach(async () => {
    tmpDir = await fse.mkdtemp(path.join(os.tmpdir(), "reqsync-lock-"));
    target = path.join(tmpDir, "requirements.txt");
    await fse.writeFile(target, "requests>=2.0\n", "utf8");
  });

  afterEach(async () => {
    await fse.remove(tmpDir);
  });

  it("places the lock beside the file", () => {
    expect(lockPathFor("/work/reqs/requirements.txt")).toBe(
      path.join("/work/reqs", ".requirements.txt.reqsync.lock"),
    );
  });

  it("creates a lock holding the current pid and removes it on release", async () => {
    const lock = await acquireFileLock(target, { timeoutSec: 1 });

    const payload = JSON.parse(fs.readFileSync(lock.lockPath, "utf8")) as { pid: number };
    expect(payload.pid).toBe(process.pid);

    await lock.release();
    await lock.release();
    expect(fs.existsSync(lock.lockPath)).toBe(false);
  });

  it("times out while another holder is alive", async () => {
    const held = await acquireFileLock(target, { timeoutSec: 1 });

    await expect(
      acquireFileLock(target, { timeoutSec: 0.2, pollIntervalMs: 20 }),
    ).rejects.toBeInstanceOf(LockTimeoutError);

    await held.release();
  });

  it("can be acquired again after release", async () => {
    const first = await acquireFileLock(target, { timeoutSec: 1 });
    await first.release();

    const second = await acquireFileLock(target, { timeoutSec: 0.2, pollIntervalMs: 20 });
    expect(fs.existsSync(second.lockPath)).toBe(true);
    await second.release();
  });

  it("removes a lock left by a dead process", async () => {
    const lockPath = lockPathFor(target);
    fs.writeFileSync(lockPath, JSON.stringify({ pid: 424242, acquired_at: "2026-01-01T00:00:00Z" }));

    const lock = await acquireFileLock(target, {
      timeoutSec: 0.5,
      pollIntervalMs: 20,
      isProcessAlive: (pid) => pid !== 424242,
    });

    const payload = JSON.parse(fs.readFileSync(lockPath, "utf8")) as { pid: number };
    expect(payload.pid).toBe(process.pid);
    await lock.release();
  });

  it("leaves a lock with an unreadable payload in place", async () => {
    const lockPath = lockPathFor(target);
    fs.writeFileSync(lockPath, "not json");

    await expect(
      acquireFileLock(target, { timeoutSec: 0.1, pollIntervalMs: 20, isProcessAlive: () => false }),
    ).rejects.toBeInstanceOf(LockTimeoutError);
    expect(fs.readFileSync(lockPath, "utf8")).toBe("not json");
  });
});
