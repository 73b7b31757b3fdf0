import type { SpecifierClause } from "./specifier.js";
import type { Newline, TextEncoding } from "./text-codec.js";

// =============================================================================
// LINES
// =============================================================================

type LineBase = {
  // Every physical line of the logical line, endings included.
  raw: string;
  lineNumber: number;
  physicalLines: number;
  // Ending of the last physical line ("" at end of file).
  eol: string;
  // Logical text: continuation backslashes removed, endings dropped.
  content: string;
};

export type BlankLine = LineBase & { kind: "blank" };

export type CommentLine = LineBase & { kind: "comment" };

/**
 * Where the specifier sits inside `content`; a rewrite is
 * `prefix + specifier + suffix + eol`.
 */
export type RequirementLayout = {
  prefix: string;
  specifierText: string;
  suffix: string;
  parenthesized: boolean;
};

export type RequirementLine = LineBase & {
  kind: "requirement";
  name: string;
  normalizedName: string;
  extras: string[];
  marker: string | null;
  // Specifier as written, parentheses excluded.
  specifier: string;
  clauses: SpecifierClause[];
  trailer: string;
  hashes: string[];
  layout: RequirementLayout;
};

export type IncludeLine = LineBase & {
  kind: "include";
  target: string;
  resolvedPath: string;
};

export type ConstraintLine = LineBase & {
  kind: "constraint";
  target: string;
  resolvedPath: string;
};

export type VcsOrUrlLine = LineBase & {
  kind: "vcs-or-url";
  locator: string;
  hashes: string[];
};

export type LocalPathLine = LineBase & {
  kind: "local-path";
  location: string;
  hashes: string[];
};

export type EditableLine = LineBase & {
  kind: "editable";
  target: string;
};

export type OptionLine = LineBase & {
  kind: "option";
  option: string;
};

export type UnparsedLine = LineBase & {
  kind: "unparsed";
  hashes: string[];
};

export type Line =
  | BlankLine
  | CommentLine
  | RequirementLine
  | IncludeLine
  | ConstraintLine
  | VcsOrUrlLine
  | LocalPathLine
  | EditableLine
  | OptionLine
  | UnparsedLine;

export type LineKind = Line["kind"];

// =============================================================================
// FILES
// =============================================================================

export type FileRole = "root" | "include" | "constraint";

export type RequirementFile = {
  path: string;
  role: FileRole;
  encoding: TextEncoding;
  // Dominant line ending; informational. Rewrites keep each line's own `eol`.
  newline: Newline;
  bom: boolean;
  bytes: Buffer;
  lines: readonly Line[];
};

export type GraphEdgeKind = "include" | "constraint";

export type GraphEdge = {
  from: string;
  to: string;
  kind: GraphEdgeKind;
  lineNumber: number;
};

export type RequirementGraph = {
  root: string;
  // Depth-first, declaration order; the root is first.
  files: readonly RequirementFile[];
  edges: readonly GraphEdge[];
};

// =============================================================================
// HELPERS
// =============================================================================

/** Hash tokens carried by a line, for any kind that can carry them. */
export function lineHashes(line: Line): readonly string[] {
  switch (line.kind) {
    case "requirement":
    case "vcs-or-url":
    case "local-path":
    case "unparsed":
      return line.hashes;
    case "blank":
    case "comment":
    case "include":
    case "constraint":
    case "editable":
    case "option":
      return [];
  }
}

export function fileHasHashes(file: RequirementFile): boolean {
  return file.lines.some((line) => lineHashes(line).length > 0);
}
