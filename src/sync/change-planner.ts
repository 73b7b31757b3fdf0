import { minimatch } from "minimatch";

import type { SyncOptions } from "../core/options.js";
import { normalizeName } from "../requirements/names.js";
import {
  fileHasHashes,
  type RequirementFile,
  type RequirementGraph,
  type RequirementLine,
} from "../requirements/types.js";

import { decide } from "./policy-engine.js";
import type {
  ChangeEntry,
  FileOutcome,
  FilePlan,
  InstalledVersionMap,
  NoChangeReason,
  SkippedEntry,
  SyncPlan,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlanOptions = Pick<
  SyncOptions,
  | "policy"
  | "capStrategy"
  | "allowPrerelease"
  | "keepLocal"
  | "only"
  | "exclude"
  | "updateConstraints"
  | "allowHashes"
  | "lastWins"
>;

type LineVerdict =
  | { kind: "rewrite"; newRaw: string; change: ChangeEntry }
  | { kind: "keep"; reason: NoChangeReason | null };

type PlanContext = {
  options: PlanOptions;
  versions: InstalledVersionMap;
  writable: ReadonlySet<RequirementLine>;
  only: string[];
  exclude: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** Pure: the same graph, versions and options always give the same plan. */
export function planSync(
  graph: RequirementGraph,
  versions: InstalledVersionMap,
  options: PlanOptions,
): SyncPlan {
  const inRewritePass = (file: RequirementFile): boolean =>
    file.role !== "constraint" || options.updateConstraints;

  const refused = new Set(
    graph.files
      .filter((file) => inRewritePass(file) && !options.allowHashes && fileHasHashes(file))
      .map((file) => file.path),
  );

  const ctx: PlanContext = {
    options,
    versions,
    writable: resolveWritableOccurrences(
      graph.files.filter((file) => inRewritePass(file) && !refused.has(file.path)),
      options.lastWins,
    ),
    only: options.only.map(normalizeName),
    exclude: options.exclude.map(normalizeName),
  };

  const files: FilePlan[] = [];
  const changes: ChangeEntry[] = [];
  const skipped: SkippedEntry[] = [];

  for (const file of graph.files) {
    if (!inRewritePass(file)) {
      files.push(passThrough(file, "scanned"));
      continue;
    }
    if (refused.has(file.path)) {
      files.push(passThrough(file, "refused-hashes"));
      continue;
    }

    const lines: string[] = [];
    const fileChanges: ChangeEntry[] = [];

    for (const line of file.lines) {
      if (line.kind !== "requirement") {
        lines.push(line.raw);
        continue;
      }

      const verdict = planLine(file, line, ctx);
      if (verdict.kind === "rewrite") {
        lines.push(verdict.newRaw);
        fileChanges.push(verdict.change);
        continue;
      }

      lines.push(line.raw);
      if (verdict.reason && verdict.reason !== "up-to-date") {
        skipped.push({
          file: file.path,
          package: line.name,
          lineNumber: line.lineNumber,
          reason: verdict.reason,
        });
      }
    }

    changes.push(...fileChanges);
    const changed = fileChanges.length > 0;
    files.push({
      source: file,
      outcome: {
        file: file.path,
        role: file.role,
        status: changed ? "rewritten" : "unchanged",
        changed,
        changeCount: fileChanges.length,
        hashPinned: fileHasHashes(file),
      },
      lines,
      text: lines.join(""),
    });
  }

  return {
    files,
    changes,
    skipped,
    refusedFiles: Array.from(refused),
    changed: changes.length > 0,
  };
}

/**
 * Renders a requirement around a new specifier. A continued line collapses onto
 * one physical line that keeps the last line ending.
 */
export function renderRequirementLine(line: RequirementLine, newSpecifier: string): string {
  const specifier = line.layout.parenthesized ? `(${newSpecifier})` : newSpecifier;
  return `${line.layout.prefix}${specifier}${line.layout.suffix}${line.eol}`;
}

export function matchesAnyGlob(normalizedName: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(normalizedName, pattern, { nocase: true }));
}

// =============================================================================
// INTERNALS
// =============================================================================

function planLine(file: RequirementFile, line: RequirementLine, ctx: PlanContext): LineVerdict {
  if (line.hashes.length > 0) {
    return { kind: "keep", reason: "hash-pinned" };
  }
  if (ctx.only.length > 0 && !matchesAnyGlob(line.normalizedName, ctx.only)) {
    return { kind: "keep", reason: "not-selected" };
  }
  if (matchesAnyGlob(line.normalizedName, ctx.exclude)) {
    return { kind: "keep", reason: "excluded" };
  }
  if (!ctx.writable.has(line)) {
    return { kind: "keep", reason: "duplicate" };
  }

  const installedVersion = ctx.versions.get(line.normalizedName);
  if (installedVersion === undefined) {
    return { kind: "keep", reason: "not-installed" };
  }

  const decision = decide(line, installedVersion, ctx.options.policy, ctx.options);
  if (!decision.changed) {
    return { kind: "keep", reason: decision.reason };
  }

  const newRaw = renderRequirementLine(line, decision.newSpecifier);
  return {
    kind: "rewrite",
    newRaw,
    change: {
      file: file.path,
      package: line.name,
      installedVersion,
      oldSpecifier: decision.oldSpecifier,
      newSpecifier: decision.newSpecifier,
      oldLine: line.raw,
      newLine: newRaw,
      lineNumber: line.lineNumber,
    },
  };
}

// Occurrences are ranked in traversal order; lastWins picks the last, otherwise the first.
function resolveWritableOccurrences(
  files: readonly RequirementFile[],
  lastWins: boolean,
): Set<RequirementLine> {
  const chosen = new Map<string, RequirementLine>();

  for (const file of files) {
    for (const line of file.lines) {
      if (line.kind !== "requirement") continue;
      if (lastWins || !chosen.has(line.normalizedName)) {
        chosen.set(line.normalizedName, line);
      }
    }
  }

  return new Set(chosen.values());
}

function passThrough(file: RequirementFile, status: "scanned" | "refused-hashes"): FilePlan {
  const lines = file.lines.map((line) => line.raw);
  const outcome: FileOutcome = {
    file: file.path,
    role: file.role,
    status,
    changed: false,
    changeCount: 0,
    hashPinned: fileHasHashes(file),
  };
  return { source: file, outcome, lines, text: lines.join("") };
}
