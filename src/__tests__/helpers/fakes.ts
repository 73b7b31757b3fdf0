/**
 * Sync test fakes.
 * Purpose: in-process stand-ins for pip and the environment inspector.
 * Usage: pass to sync(), runSyncCommand() or runSyncPayload() through their deps.
 */

import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

import type { EventLogger, LogEventInput } from "../../core/logger.js";
import type {
  EnvironmentInspector,
  InstalledVersionProvider,
  UpgradeRequest,
  VersionQuery,
} from "../../sync/ports.js";

// =============================================================================
// VERSION PROVIDER
// =============================================================================

export class FakeVersionProvider implements InstalledVersionProvider {
  readonly queries: VersionQuery[] = [];
  readonly upgrades: UpgradeRequest[] = [];
  private failure: Error | null = null;

  constructor(private versions: Record<string, string>) {}

  setVersions(versions: Record<string, string>): void {
    this.versions = versions;
  }

  failWith(error: Error): void {
    this.failure = error;
  }

  async getInstalledVersions(query: VersionQuery): Promise<Map<string, string>> {
    this.queries.push(query);
    if (this.failure) {
      throw this.failure;
    }
    return new Map(Object.entries(this.versions));
  }

  async upgrade(request: UpgradeRequest): Promise<void> {
    this.upgrades.push(request);
  }
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

export class FakeEnvironmentInspector implements EnvironmentInspector {
  readonly dirtyChecks: string[] = [];

  constructor(private readonly state: { venv?: boolean; dirty?: boolean } = {}) {}

  async isVirtualEnvActive(): Promise<boolean> {
    return this.state.venv ?? true;
  }

  async isRepositoryDirty(dir: string): Promise<boolean> {
    this.dirtyChecks.push(dir);
    return this.state.dirty ?? false;
  }
}

// =============================================================================
// LOGGING
// =============================================================================

export class RecordingLogger implements EventLogger {
  readonly events: LogEventInput[] = [];
  closed = false;

  log(event: LogEventInput): void {
    this.events.push(event);
  }

  close(): void {
    this.closed = true;
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

// =============================================================================
// FILESYSTEM
// =============================================================================

export async function makeTempDir(prefix: string): Promise<string> {
  return fse.realpath(await fse.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function writeFiles(dir: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    await fse.outputFile(path.join(dir, name), content);
  }
}

/** A clock that moves one second per call, for distinct backup names. */
export function steppingClock(start = Date.UTC(2026, 0, 1, 0, 0, 0, 0)): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}
