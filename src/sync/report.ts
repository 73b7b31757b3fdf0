import fs from "node:fs";
import path from "node:path";

import { writeJsonFile } from "../core/utils.js";

import { buildUnifiedDiff } from "./diff.js";
import type { ChangeEntry, FilePlan, SyncResult } from "./types.js";

// =============================================================================
// JSON SHAPES
// =============================================================================

export type JsonFileResult = {
  file: string;
  role: string;
  status: string;
  changed: boolean;
  change_count: number;
  hash_pinned: boolean;
};

export type JsonChange = {
  file: string;
  package: string;
  installed_version: string;
  old_specifier: string;
  new_specifier: string;
  old_line: string;
  new_line: string;
};

export type JsonSkipped = {
  file: string;
  package: string;
  line: number;
  reason: string;
};

export type JsonReport = {
  mode: string;
  changed: boolean;
  files: JsonFileResult[];
  changes: JsonChange[];
  skipped: JsonSkipped[];
  backup_paths: string[];
  refused_files: string[];
  write_failures: Array<{ file: string; message: string; restored: boolean }>;
  diff: string | null;
};

const DEFAULT_REPORT_NAME = "reqsync-report.json";

// =============================================================================
// PUBLIC API
// =============================================================================

export function resultToJson(result: SyncResult): JsonReport {
  return {
    mode: result.mode,
    changed: result.changed,
    files: result.files.map((file) => ({
      file: file.file,
      role: file.role,
      status: file.status,
      changed: file.changed,
      change_count: file.changeCount,
      hash_pinned: file.hashPinned,
    })),
    changes: result.changes.map((change) => ({
      file: change.file,
      package: change.package,
      installed_version: change.installedVersion,
      old_specifier: change.oldSpecifier,
      new_specifier: change.newSpecifier,
      old_line: stripEol(change.oldLine),
      new_line: stripEol(change.newLine),
    })),
    skipped: result.skipped.map((entry) => ({
      file: entry.file,
      package: entry.package,
      line: entry.lineNumber,
      reason: entry.reason,
    })),
    backup_paths: [...result.backupPaths],
    refused_files: [...result.refusedFiles],
    write_failures: result.writeFailures.map((failure) => ({ ...failure })),
    diff: result.diff,
  };
}

/** Writes the report; a directory target gets reqsync-report.json inside it. */
export async function writeJsonReport(report: JsonReport, target: string): Promise<string> {
  let outputPath = path.resolve(target);
  if (target.trim() === "" || target.trim() === ".") {
    outputPath = path.resolve(DEFAULT_REPORT_NAME);
  } else if (await isDirectory(outputPath)) {
    outputPath = path.join(outputPath, DEFAULT_REPORT_NAME);
  }

  await writeJsonFile(outputPath, report);
  return outputPath;
}

/** Unified diff of every changed file, separated by a blank line. */
export function buildPlanDiff(files: readonly FilePlan[]): string | null {
  const chunks = files
    .filter((file) => file.outcome.changed)
    .map((file) =>
      buildUnifiedDiff({
        path: file.source.path,
        before: file.source.lines.map((line) => line.raw).join(""),
        after: file.text,
      }),
    )
    .filter((chunk) => chunk.length > 0);

  return chunks.length > 0 ? chunks.join("\n") : null;
}

export function summarizeChanges(
  changes: ReadonlyArray<Pick<ChangeEntry, "file" | "package" | "oldSpecifier" | "newSpecifier">>,
): string {
  if (changes.length === 0) {
    return "No changes.";
  }

  return changes
    .map((change) => {
      const before = change.oldSpecifier === "" ? "(none)" : change.oldSpecifier;
      return `${change.package}: ${before} -> ${change.newSpecifier} [${path.basename(change.file)}]`;
    })
    .join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function stripEol(line: string): string {
  return line.replace(/[\r\n]+$/, "");
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch {
    return false;
  }
}
