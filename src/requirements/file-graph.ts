import fs from "node:fs";
import path from "node:path";

import { CycleDetectedError, FileNotFoundError, type FileReference } from "../core/errors.js";
import type { EventLogger } from "../core/logger.js";

import { classifyText, type ClassifyContext } from "./line-classifier.js";
import { decodeRequirementBytes, detectNewline } from "./text-codec.js";
import type {
  FileRole,
  GraphEdge,
  GraphEdgeKind,
  Line,
  RequirementFile,
  RequirementGraph,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildGraphOptions = {
  followIncludes: boolean;
  logger?: EventLogger;
  pathExists?: ClassifyContext["pathExists"];
};

type LoadedFile = Omit<RequirementFile, "role">;

const ROLE_RANK: Record<FileRole, number> = { constraint: 0, include: 1, root: 2 };

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Depth-first traversal in declaration order. Cycles are detected against the
 * ancestor chain only, so a file reached from two parents is loaded once.
 */
export async function buildGraph(
  rootPath: string,
  options: BuildGraphOptions,
): Promise<RequirementGraph> {
  const root = await canonicalPath(path.resolve(rootPath), null);
  const loaded = new Map<string, LoadedFile>();
  const edges: GraphEdge[] = [];

  const visit = async (
    filePath: string,
    ancestors: string[],
    referencedBy: FileReference | null,
  ): Promise<void> => {
    const file = await loadFile(filePath, referencedBy, options);
    loaded.set(filePath, file);
    const chain = [...ancestors, filePath];

    for (const line of file.lines) {
      const link = linkOf(line, options.followIncludes);
      if (!link) continue;

      const reference: FileReference = { file: filePath, lineNumber: line.lineNumber };
      const target = await canonicalPath(link.resolvedPath, reference);
      edges.push({ from: filePath, to: target, kind: link.kind, lineNumber: line.lineNumber });

      if (chain.includes(target)) {
        throw new CycleDetectedError([...chain, target]);
      }
      if (!loaded.has(target)) {
        await visit(target, chain, reference);
      }
    }
  };

  await visit(root, [], null);

  const roles = resolveRoles(root, edges);
  const files: RequirementFile[] = Array.from(loaded.entries(), ([filePath, file]) => ({
    ...file,
    role: roles.get(filePath) ?? "constraint",
  }));

  options.logger?.log({
    type: "graph.loaded",
    message: `loaded ${files.length} requirement file(s)`,
    payload: { root, files: files.map((f) => f.path), edges: edges.length },
  });

  return { root, files, edges };
}

// =============================================================================
// INTERNALS
// =============================================================================

/**
 * Each file takes the strongest role any path from the root gives it. A path
 * through a constraint edge or a constraint file only yields "constraint".
 * Ranks only rise, so the loop settles whatever order the directives came in.
 */
function resolveRoles(root: string, edges: readonly GraphEdge[]): Map<string, FileRole> {
  const roles = new Map<string, FileRole>([[root, "root"]]);
  let changed = true;

  while (changed) {
    changed = false;
    for (const edge of edges) {
      const parent = roles.get(edge.from);
      if (parent === undefined) continue;

      const role: FileRole =
        edge.kind === "constraint" || parent === "constraint" ? "constraint" : "include";
      const existing = roles.get(edge.to);
      if (existing === undefined || ROLE_RANK[role] > ROLE_RANK[existing]) {
        roles.set(edge.to, role);
        changed = true;
      }
    }
  }

  return roles;
}

function linkOf(
  line: Line,
  followIncludes: boolean,
): { kind: GraphEdgeKind; resolvedPath: string } | null {
  switch (line.kind) {
    case "include":
      return followIncludes ? { kind: "include", resolvedPath: line.resolvedPath } : null;
    case "constraint":
      return { kind: "constraint", resolvedPath: line.resolvedPath };
    case "blank":
    case "comment":
    case "requirement":
    case "vcs-or-url":
    case "local-path":
    case "editable":
    case "option":
    case "unparsed":
      return null;
  }
}

async function canonicalPath(filePath: string, reference: FileReference | null): Promise<string> {
  try {
    return await fs.promises.realpath(filePath);
  } catch (err) {
    throw new FileNotFoundError(filePath, reference, err);
  }
}

async function loadFile(
  filePath: string,
  reference: FileReference | null,
  options: BuildGraphOptions,
): Promise<LoadedFile> {
  let bytes: Buffer;
  try {
    bytes = await fs.promises.readFile(filePath);
  } catch (err) {
    // Unreadable counts as missing (EISDIR, EACCES).
    throw new FileNotFoundError(filePath, reference, err);
  }

  const decoded = decodeRequirementBytes(bytes, filePath);
  const lines = classifyText(decoded.text, {
    baseDir: path.dirname(filePath),
    pathExists: options.pathExists,
  });

  for (const line of lines) {
    if (line.kind === "unparsed") {
      options.logger?.log({
        type: "line.unparsed",
        level: "warn",
        message: `${filePath}:${line.lineNumber}: cannot parse requirement "${line.content.trim()}"`,
        payload: { file: filePath, line: line.lineNumber },
      });
    }
  }

  return {
    path: filePath,
    encoding: decoded.encoding,
    newline: detectNewline(decoded.text),
    bom: decoded.bom,
    bytes,
    lines,
  };
}
