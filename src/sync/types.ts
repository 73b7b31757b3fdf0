import type { SyncMode, SyncPolicy } from "../core/options.js";
import type { FileRole, RequirementFile } from "../requirements/types.js";

// =============================================================================
// DECISIONS
// =============================================================================

export type NoChangeReason =
  | "up-to-date"
  | "not-installed"
  | "not-selected"
  | "excluded"
  | "duplicate"
  | "hash-pinned"
  | "prerelease-skipped"
  | "invalid-version"
  | "no-specifier"
  | "no-floor"
  | "floor-above-installed";

export type PolicyDecision = {
  package: string;
  installedVersion: string;
  oldSpecifier: string;
  newSpecifier: string;
  policy: SyncPolicy;
  changed: boolean;
  reason: NoChangeReason | null;
};

export type InstalledVersionMap = ReadonlyMap<string, string>;

// =============================================================================
// RESULTS
// =============================================================================

// "write-failed" and "not-written" only appear after an apply whose commit stopped early.
export type FileStatus =
  | "rewritten"
  | "unchanged"
  | "refused-hashes"
  | "scanned"
  | "write-failed"
  | "not-written";

export type FileOutcome = {
  file: string;
  role: FileRole;
  status: FileStatus;
  changed: boolean;
  changeCount: number;
  hashPinned: boolean;
};

export type ChangeEntry = {
  file: string;
  package: string;
  installedVersion: string;
  oldSpecifier: string;
  newSpecifier: string;
  oldLine: string;
  newLine: string;
  lineNumber: number;
};

export type SkippedEntry = {
  file: string;
  package: string;
  lineNumber: number;
  reason: NoChangeReason;
};

export type WriteFailure = {
  file: string;
  message: string;
  restored: boolean;
};

export type SyncResult = {
  mode: SyncMode;
  changed: boolean;
  files: readonly FileOutcome[];
  changes: readonly ChangeEntry[];
  skipped: readonly SkippedEntry[];
  backupPaths: readonly string[];
  refusedFiles: readonly string[];
  writeFailures: readonly WriteFailure[];
  diff: string | null;
};

// =============================================================================
// PLANS
// =============================================================================

export type FilePlan = {
  source: RequirementFile;
  outcome: FileOutcome;
  // Raw text of every line after edits, endings included.
  lines: readonly string[];
  text: string;
};

export type SyncPlan = {
  files: readonly FilePlan[];
  changes: readonly ChangeEntry[];
  skipped: readonly SkippedEntry[];
  refusedFiles: readonly string[];
  changed: boolean;
};
