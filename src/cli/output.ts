import path from "node:path";

import type { SyncOptions } from "../core/options.js";
import { summarizeChanges, writeJsonReport, type JsonReport } from "../sync/report.js";

// =============================================================================
// TYPES
// =============================================================================

export const OUTPUT_MODES = ["human", "json", "both"] as const;
export type OutputMode = (typeof OUTPUT_MODES)[number];

export type OutputSink = (text: string) => void;

const PREVIEW_LIMIT = 8;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function emitResult(
  report: JsonReport,
  options: Pick<SyncOptions, "jsonReport">,
  outputMode: OutputMode,
  write: OutputSink,
  cwd: string,
): Promise<string | null> {
  const reportPath = options.jsonReport
    ? await writeJsonReport(report, path.resolve(cwd, options.jsonReport))
    : null;

  if (outputMode === "human" || outputMode === "both") {
    write(renderHumanSummary(report, reportPath));
    if (report.diff) {
      write(report.diff.replace(/\n$/, ""));
    }
  }
  if (outputMode === "json" || outputMode === "both") {
    write(JSON.stringify(report, null, 2));
  }

  return reportPath;
}

export function renderHumanSummary(report: JsonReport, reportPath: string | null): string {
  const filesChanged = report.files.filter((file) => file.changed).length;
  const lines = [
    `reqsync [${report.mode}] -> ${report.changed ? "changes detected" : "already in sync"}`,
    `files scanned: ${report.files.length} | files changed: ${filesChanged} | package updates: ${report.changes.length}`,
  ];

  if (report.changes.length > 0) {
    lines.push("top package updates:");
    const preview = report.changes.slice(0, PREVIEW_LIMIT).map((change) => ({
      file: change.file,
      package: change.package,
      oldSpecifier: change.old_specifier,
      newSpecifier: change.new_specifier,
    }));
    for (const row of summarizeChanges(preview).split("\n")) {
      lines.push(`  - ${row}`);
    }
    if (report.changes.length > PREVIEW_LIMIT) {
      lines.push(`  ... and ${report.changes.length - PREVIEW_LIMIT} more`);
    }
  }

  if (reportPath) {
    lines.push(`json report written: ${reportPath}`);
  }
  return lines.join("\n");
}
