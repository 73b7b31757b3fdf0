import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  CycleDetectedError,
  DirtyRepoBlockedError,
  EXIT_CODES,
  FileNotFoundError,
  HashPinsPresentError,
  LockTimeoutError,
  VenvBlockedError,
  VersionProviderError,
  WriteRollbackError,
} from "../core/errors.js";
import { mergeOptions, type SyncOptionsInput } from "../core/options.js";
import { encodeRequirementText } from "../requirements/text-codec.js";
import { acquireFileLock } from "../sync/file-lock.js";
import { sync } from "../sync/orchestrator.js";
import { listTimestampedBackups } from "../sync/backups.js";
import type { SyncResult } from "../sync/types.js";

import {
  FakeEnvironmentInspector,
  FakeVersionProvider,
  RecordingLogger,
  makeTempDir,
  steppingClock,
  writeFiles,
} from "./helpers/fakes.js";

const INSTALLED = {
  requests: "2.31.0",
  flask: "3.0.2",
  django: "5.0.1",
  urllib3: "2.2.1",
  pytest: "8.1.0",
};

describe("sync end to end", () => {
  let tmpDir: string;
  let rootFile: string;
  let provider: FakeVersionProvider;
  let inspector: FakeEnvironmentInspector;
  let logger: RecordingLogger;
  let clock: () => Date;

  beforeEach(async () => {
    tmpDir = await makeTempDir("reqsync-e2e-");
    rootFile = path.join(tmpDir, "requirements.txt");
    provider = new FakeVersionProvider(INSTALLED);
    inspector = new FakeEnvironmentInspector();
    logger = new RecordingLogger();
    clock = steppingClock();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fse.remove(tmpDir);
  });

  function run(overrides: SyncOptionsInput = {}): Promise<SyncResult> {
    const options = mergeOptions({ noUpgrade: true, lockTimeoutSec: 0.2, ...overrides });
    return sync(options, {
      provider,
      inspector,
      logger,
      cwd: tmpDir,
      commit: { lockPollIntervalMs: 20, now: clock },
    });
  }

  async function read(name = "requirements.txt"): Promise<string> {
    return fse.readFile(path.join(tmpDir, name), "utf8");
  }

  // ===========================================================================
  // APPLY
  // ===========================================================================

  it("raises floors to the installed versions and logs the run", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests>=2.0\nflask\nnumpy>=1.0\n" });

    const result = await run();

    expect(await read()).toBe("requests>=2.31.0\nflask>=3.0.2\nnumpy>=1.0\n");
    expect(result.mode).toBe("apply");
    expect(result.changed).toBe(true);
    expect(result.backupPaths).toEqual([`${rootFile}.bak.20260101-000000-000`]);
    expect(result.skipped.map((entry) => [entry.package, entry.reason])).toEqual([["numpy", "not-installed"]]);
    expect(logger.types()).toEqual([
      "sync.start",
      "graph.loaded",
      "versions.loaded",
      "package.not_installed",
      "plan.complete",
      "file.backup",
      "file.written",
      "sync.complete",
    ]);
  });

  it("is idempotent", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests>=2.0\nflask\n" });

    await run();
    const afterFirst = await fs.readFile(rootFile);
    const second = await run();

    expect(second.changed).toBe(false);
    expect(second.backupPaths).toEqual([]);
    expect((await fs.readFile(rootFile)).equals(afterFirst)).toBe(true);
    expect(await listTimestampedBackups(rootFile, ".bak")).toHaveLength(1);
  });

  it("leaves an in-sync file byte for byte untouched", async () => {
    const content = [
      "# runtime deps\r\n",
      "--index-url https://pypi.example/simple\r\n",
      "-e ./local_pkg\r\n",
      "git+https://example.invalid/repo.git#egg=thing\r\n",
      'requests>=2.31.0 ; python_version >= "3.8"  # http\r\n',
      "flask>=3.0.2,\\\r\n",
      "    !=3.0.0\r\n",
      "\r\n",
    ].join("");
    await writeFiles(tmpDir, { "requirements.txt": content });

    const result = await run();

    expect(result.changed).toBe(false);
    expect(await read()).toBe(content);
    expect(await fs.readdir(tmpDir)).toEqual(["requirements.txt"]);
  });

  it("keeps BOM, encoding and line endings when rewriting", async () => {
    const original = encodeRequirementText("django>=4.0\r\n# web\r\n", "utf-8", true);
    await writeFiles(tmpDir, { "requirements.txt": original });

    await run({ backup: false });

    const written = await fs.readFile(rootFile);
    expect(written.equals(encodeRequirementText("django>=5.0.1\r\n# web\r\n", "utf-8", true))).toBe(true);
    expect(written.subarray(0, 3).equals(Buffer.from([0xef, 0xbb, 0xbf]))).toBe(true);
  });

  it("follows includes and rewrites each file in place", async () => {
    await writeFiles(tmpDir, {
      "requirements.txt": "-r dev.txt\nrequests>=2.0\n",
      "dev.txt": "pytest>=7\n",
    });

    const result = await run();

    expect(await read()).toBe("-r dev.txt\nrequests>=2.31.0\n");
    expect(await read("dev.txt")).toBe("pytest>=8.1.0\n");
    expect(result.files.map((file) => [path.basename(file.file), file.role, file.status])).toEqual([
      ["requirements.txt", "root", "rewritten"],
      ["dev.txt", "include", "rewritten"],
    ]);
  });

  it("queries the provider for every requirement name", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "Flask\nrequests\n-c c.txt\n", "c.txt": "urllib3<3\n" });

    await run({ dryRun: true });

    expect(provider.queries).toEqual([{ names: ["flask", "requests", "urllib3"], timeoutMs: 900_000 }]);
  });

  // ===========================================================================
  // POLICIES AND FILTERS
  // ===========================================================================

  it("applies each policy to the same file", async () => {
    const content = "requests>=2.0,<3\nflask\ndjango~=4.2\n";
    const expected: Record<string, string> = {
      "lower-bound": "requests>=2.31.0,<3\nflask>=3.0.2\ndjango>=5.0.1\n",
      "floor-only": "requests>=2.31.0,<3\nflask\ndjango>=5.0.1\n",
      "floor-and-cap": "requests>=2.31.0,<2.32.0\nflask>=3.0.2,<3.1.0\ndjango>=5.0.1,<5.1.0\n",
      "update-in-place": "requests>=2.31.0,<3\nflask\ndjango~=5.0\n",
    };

    for (const [policy, text] of Object.entries(expected)) {
      await writeFiles(tmpDir, { "requirements.txt": content });
      const result = await run({ dryRun: true, policy: policyName(policy) });
      expect(result.changed).toBe(true);

      const applied = await run({ policy: policyName(policy), backup: false });
      expect(applied.changes.length).toBeGreaterThan(0);
      expect(await read()).toBe(text);
    }
  });

  it("only touches selected packages", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests>=2.0\nflask\ndjango>=4\n" });

    await run({ only: ["dj*", "requests"], exclude: ["requests"] });

    expect(await read()).toBe("requests>=2.0\nflask\ndjango>=5.0.1\n");
  });

  it("scans constraint files without rewriting them by default", async () => {
    await writeFiles(tmpDir, {
      "requirements.txt": "-c constraints.txt\nrequests>=2.0\n",
      "constraints.txt": "urllib3>=1.26\n",
    });

    const scanned = await run();
    expect(await read("constraints.txt")).toBe("urllib3>=1.26\n");
    expect(scanned.files.map((file) => file.status)).toEqual(["rewritten", "scanned"]);

    await run({ updateConstraints: true });
    expect(await read("constraints.txt")).toBe("urllib3>=2.2.1\n");
  });

  // ===========================================================================
  // MODES
  // ===========================================================================

  it("reports drift in check mode without writing", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests>=2.0\n" });

    const result = await run({ check: true, noUpgrade: false });

    expect(result.mode).toBe("check");
    expect(result.changed).toBe(true);
    expect(await read()).toBe("requests>=2.0\n");
    expect(provider.upgrades).toEqual([]);
  });

  it("attaches a diff to a dry run", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests>=2.0\n" });

    const result = await run({ dryRun: true, showDiff: true });

    expect(result.diff).toBe(
      [
        `--- ${rootFile} (old)`,
        `+++ ${rootFile} (new)`,
        "@@ -1 +1 @@",
        "-requests>=2.0",
        "+requests>=2.31.0",
        "",
      ].join("\n"),
    );
    expect(await read()).toBe("requests>=2.0\n");
  });

  it("upgrades the environment before an apply unless told not to", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests\n" });

    await run({ noUpgrade: false, providerTimeoutSec: 30 });

    expect(provider.upgrades).toEqual([{ requirementsPath: rootFile, timeoutMs: 30_000 }]);
  });

  // ===========================================================================
  // BACKUPS
  // ===========================================================================

  it("rotates timestamped backups", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests>=1.0\n" });

    for (const version of ["2.0.0", "2.1.0", "2.2.0"]) {
      provider.setVersions({ requests: version });
      await run({ backupKeepLast: 2 });
    }

    const backups = await listTimestampedBackups(rootFile, ".bak");
    expect(backups.map((file) => path.basename(file))).toEqual([
      "requirements.txt.bak.20260101-000001-000",
      "requirements.txt.bak.20260101-000002-000",
    ]);
    expect(await fse.readFile(backups[1] ?? "", "utf8")).toBe("requests>=2.1.0\n");
    expect(await read()).toBe("requests>=2.2.0\n");
  });

  // ===========================================================================
  // GUARDS AND FAILURES
  // ===========================================================================

  it("refuses hash-pinned files in every mode", async () => {
    const content = "requests==2.0 --hash=sha256:abc\nflask\n";
    await writeFiles(tmpDir, { "requirements.txt": content });

    for (const overrides of [{}, { dryRun: true }, { check: true }]) {
      const error = await run(overrides).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(HashPinsPresentError);
      expect(error instanceof HashPinsPresentError && error.exitCode).toBe(EXIT_CODES.hashesPresent);
      expect(error instanceof HashPinsPresentError && error.result?.refusedFiles).toEqual([rootFile]);
    }
    expect(await read()).toBe(content);

    await run({ allowHashes: true });
    expect(await read()).toBe("requests==2.0 --hash=sha256:abc\nflask>=3.0.2\n");
  });

  it("fails on an include cycle", async () => {
    await writeFiles(tmpDir, {
      "requirements.txt": "-r a.txt\n",
      "a.txt": "-r b.txt\n",
      "b.txt": "-r a.txt\n",
    });

    const error = await run().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CycleDetectedError);
    expect(error instanceof CycleDetectedError && error.chain.map((file) => path.basename(file))).toEqual([
      "requirements.txt",
      "a.txt",
      "b.txt",
      "a.txt",
    ]);
  });

  it("fails when the root file is missing", async () => {
    await expect(run({ path: "missing.txt" })).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it("blocks outside a virtualenv unless allowed", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests\n" });
    inspector = new FakeEnvironmentInspector({ venv: false });

    await expect(run()).rejects.toBeInstanceOf(VenvBlockedError);
    expect(provider.queries).toEqual([]);

    await expect(run({ systemOk: true })).resolves.toMatchObject({ changed: true });
  });

  it("blocks a dirty repository only when asked to", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests\n" });
    inspector = new FakeEnvironmentInspector({ dirty: true });

    await expect(run({ dryRun: true })).resolves.toMatchObject({ changed: true });
    await expect(run({ allowDirty: false })).rejects.toBeInstanceOf(DirtyRepoBlockedError);
  });

  it("propagates provider failures", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests\n" });
    provider.failWith(new VersionProviderError("pip list failed: timed out after 10ms"));

    await expect(run()).rejects.toThrow("pip list failed: timed out after 10ms");
  });

  it("restores a file whose replace failed and reports the rest", async () => {
    await writeFiles(tmpDir, {
      "requirements.txt": "-r dev.txt\nrequests>=2.0\n",
      "dev.txt": "pytest>=7\n",
    });
    vi.spyOn(fs, "rename").mockRejectedValueOnce(new Error("disk full"));

    const error = await run().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WriteRollbackError);
    const result = error instanceof WriteRollbackError ? error.result : undefined;
    expect(result?.writeFailures).toEqual([{ file: rootFile, message: "disk full", restored: true }]);
    expect(result?.files.map((file) => file.status)).toEqual(["write-failed", "rewritten"]);
    expect(await read()).toBe("-r dev.txt\nrequests>=2.0\n");
    expect(await read("dev.txt")).toBe("pytest>=8.1.0\n");
  });

  it("stops on a lock held by another run", async () => {
    await writeFiles(tmpDir, { "requirements.txt": "requests>=2.0\n" });
    const held = await acquireFileLock(rootFile, { timeoutSec: 1 });

    try {
      const error = await run().catch((err: unknown) => err);
      expect(error).toBeInstanceOf(LockTimeoutError);
      expect(error instanceof LockTimeoutError && error.result?.files[0]?.status).toBe("not-written");
      expect(await read()).toBe("requests>=2.0\n");
    } finally {
      await held.release();
    }
  });
});

function policyName(value: string): SyncOptionsInput["policy"] {
  switch (value) {
    case "lower-bound":
    case "floor-only":
    case "floor-and-cap":
    case "update-in-place":
      return value;
    default:
      throw new Error(`unknown policy ${value}`);
  }
}
