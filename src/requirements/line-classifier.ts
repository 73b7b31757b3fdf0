/*
Purpose: split requirement-file text into logical lines and classify each into a Line variant.
Assumptions: text is already decoded; raw text of every line is kept so unchanged lines
reproduce byte for byte.
Usage: classifyText(text, { baseDir: path.dirname(filePath) }).
*/

import fs from "node:fs";
import path from "node:path";

import { normalizeName } from "./names.js";
import { parseSpecifierClauses } from "./specifier.js";
import type { Line, RequirementLine } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type PhysicalLine = {
  text: string;
  eol: string;
};

export type LogicalLine = {
  raw: string;
  lineNumber: number;
  physicalLines: number;
  eol: string;
  content: string;
};

export type ClassifyContext = {
  baseDir: string;
  pathExists?: (candidate: string) => boolean;
};

type LineBase = LogicalLine;

// =============================================================================
// PATTERNS
// =============================================================================

const INLINE_COMMENT = /(^|\s)#/;
const DIRECTIVE =
  /^(?:(-r|-c)\s*=?\s*|(--requirement|--constraint)(?:\s*=\s*|\s+))(\S.*)$/;
const EDITABLE = /^(?:-e\s*=?\s*|--editable(?:\s*=\s*|\s+|$))(.*)$/;
const VCS_SCHEME = /(?:^|[\s@=])(?:git|hg|svn|bzr)\+/i;
const URL_SCHEME = /[a-z][a-z0-9+.-]*:\/\//i;
const FILE_URL = /(?:^|[\s@=])file:/i;
const PATH_PREFIX = /^(?:\.{1,2}[\\/]|[\\/]|~|[A-Za-z]:[\\/])/;
const ARCHIVE_SUFFIX = /\.(?:whl|tar\.gz|zip|tar\.bz2|tgz)$/i;
const BARE_TOKEN = /^[A-Za-z0-9._-]+$/;
const OPTIONS_START = /\s-{1,2}[A-Za-z]/;
const HASH_TOKEN = /--hash(?:=|\s+)(\S+)/g;
const REQUIREMENT_HEAD =
  /^(\s*)([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)(\s*\[([^\]]*)\])?(\s*)(.*?)\s*$/s;
const EXTRA_NAME = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;

// =============================================================================
// SPLITTING
// =============================================================================

export function splitPhysicalLines(text: string): PhysicalLine[] {
  const lines: PhysicalLine[] = [];
  const lineBreak = /\r\n|\r|\n/g;
  let start = 0;
  let match: RegExpExecArray | null;

  while ((match = lineBreak.exec(text)) !== null) {
    lines.push({ text: text.slice(start, match.index), eol: match[0] });
    start = match.index + match[0].length;
  }
  if (start < text.length) {
    lines.push({ text: text.slice(start), eol: "" });
  }

  return lines;
}

/**
 * Joins backslash continuations. A physical line that carries a comment never
 * continues, matching pip's reader.
 */
export function splitLogicalLines(text: string): LogicalLine[] {
  const physical = splitPhysicalLines(text);
  const logical: LogicalLine[] = [];
  let index = 0;

  while (index < physical.length) {
    const first = index;
    const segments: string[] = [];
    let raw = "";
    let eol = "";

    for (;;) {
      const line = physical[index];
      if (!line) break;
      index += 1;
      raw += line.text + line.eol;
      eol = line.eol;

      const continues = !INLINE_COMMENT.test(line.text) && line.text.endsWith("\\");
      segments.push(continues ? line.text.slice(0, -1) : line.text);
      if (!continues || index >= physical.length) break;
    }

    logical.push({
      raw,
      lineNumber: first + 1,
      physicalLines: index - first,
      eol,
      content: segments.join(""),
    });
  }

  return logical;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

export function classifyText(text: string, ctx: ClassifyContext): Line[] {
  return splitLogicalLines(text).map((logical) => classifyLogicalLine(logical, ctx));
}

export function classifyLogicalLine(logical: LogicalLine, ctx: ClassifyContext): Line {
  const base: LineBase = { ...logical };
  const { content } = logical;

  if (content.trim() === "") {
    return { ...base, kind: "blank" };
  }
  if (/^\s*#/.test(content)) {
    return { ...base, kind: "comment" };
  }

  const { body } = splitTrailer(content);
  const stripped = body.trim();

  const directive = DIRECTIVE.exec(stripped);
  if (directive) {
    const flag = directive[1] ?? directive[2] ?? "";
    const target = unquote((directive[3] ?? "").trim());
    const resolvedPath = path.resolve(ctx.baseDir, target);
    return flag === "-r" || flag === "--requirement"
      ? { ...base, kind: "include", target, resolvedPath }
      : { ...base, kind: "constraint", target, resolvedPath };
  }

  const editable = EDITABLE.exec(stripped);
  if (stripped.startsWith("-") && !editable) {
    return { ...base, kind: "option", option: stripped.split(/[\s=]/)[0] ?? stripped };
  }

  const hashes = extractHashes(body);

  if (VCS_SCHEME.test(stripped) || URL_SCHEME.test(stripped) || FILE_URL.test(stripped)) {
    const locator = stripOptions(editable ? (editable[1] ?? "").trim() : stripped);
    return { ...base, kind: "vcs-or-url", locator, hashes };
  }

  if (editable) {
    return { ...base, kind: "editable", target: unquote((editable[1] ?? "").trim()) };
  }

  const location = stripOptions(stripped).split(/[\s;]/)[0] ?? "";
  if (isLocalPath(location, stripOptions(stripped), ctx)) {
    return { ...base, kind: "local-path", location, hashes };
  }

  return parseRequirement(base, body, hashes) ?? { ...base, kind: "unparsed", hashes };
}

// =============================================================================
// REQUIREMENTS
// =============================================================================

function parseRequirement(
  base: LineBase,
  body: string,
  hashes: string[],
): RequirementLine | null {
  const { content } = base;
  const optionsIndex = body.search(OPTIONS_START);
  const requirementText = optionsIndex >= 0 ? body.slice(0, optionsIndex) : body;

  const markerIndex = requirementText.indexOf(";");
  const head = markerIndex >= 0 ? requirementText.slice(0, markerIndex) : requirementText;
  const marker = markerIndex >= 0 ? requirementText.slice(markerIndex + 1).trim() || null : null;

  const match = REQUIREMENT_HEAD.exec(head);
  if (!match) {
    return null;
  }

  const lead = match[1] ?? "";
  const name = match[2] ?? "";
  const extrasBlock = match[3] ?? "";
  const extrasInner = match[4];
  const gap = match[5] ?? "";
  const specifierRaw = match[6] ?? "";

  const extras = extrasInner === undefined ? [] : parseExtras(extrasInner);
  if (!extras) {
    return null;
  }

  const parenthesized = specifierRaw.startsWith("(") && specifierRaw.endsWith(")");
  const specifier = parenthesized ? specifierRaw.slice(1, -1).trim() : specifierRaw;
  const clauses = parseSpecifierClauses(specifier);
  if (!clauses) {
    return null;
  }

  const nameEnd = lead.length + name.length + extrasBlock.length;
  const specStart = specifierRaw === "" ? nameEnd : nameEnd + gap.length;
  const specEnd = specStart + specifierRaw.length;

  return {
    ...base,
    kind: "requirement",
    name,
    normalizedName: normalizeName(name),
    extras,
    marker,
    specifier,
    clauses,
    trailer: content.slice(body.length),
    hashes,
    layout: {
      prefix: content.slice(0, specStart),
      specifierText: specifierRaw,
      suffix: content.slice(specEnd),
      parenthesized,
    },
  };
}

function parseExtras(inner: string): string[] | null {
  const extras = inner
    .split(",")
    .map((extra) => extra.trim())
    .filter((extra) => extra.length > 0);
  return extras.every((extra) => EXTRA_NAME.test(extra)) ? extras : null;
}

// =============================================================================
// INTERNALS
// =============================================================================

// Trailer is the inline comment plus surrounding whitespace, or trailing whitespace alone.
function splitTrailer(content: string): { body: string; trailer: string } {
  const commentMatch = INLINE_COMMENT.exec(content);
  let cut: number;

  if (commentMatch) {
    cut = content.indexOf("#", commentMatch.index);
    while (cut > 0 && /\s/.test(content.charAt(cut - 1))) {
      cut -= 1;
    }
  } else {
    cut = content.trimEnd().length;
  }

  return { body: content.slice(0, cut), trailer: content.slice(cut) };
}

function extractHashes(body: string): string[] {
  return Array.from(body.matchAll(HASH_TOKEN), (match) => match[1] ?? "").filter(
    (hash) => hash.length > 0,
  );
}

function stripOptions(text: string): string {
  const index = text.search(OPTIONS_START);
  return (index >= 0 ? text.slice(0, index) : text).trim();
}

function unquote(value: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(value);
  return quoted ? (quoted[2] ?? "") : value;
}

function isLocalPath(location: string, requirementText: string, ctx: ClassifyContext): boolean {
  if (location === "") return false;
  if (PATH_PREFIX.test(location)) return true;
  if (location.includes("/") || location.includes("\\")) return true;
  if (ARCHIVE_SUFFIX.test(location)) return true;

  // A bare token with no specifier grammar is a path only when it exists on disk.
  if (!BARE_TOKEN.test(location) || location !== requirementText) return false;
  const exists = ctx.pathExists ?? fs.existsSync;
  return exists(path.resolve(ctx.baseDir, location));
}
