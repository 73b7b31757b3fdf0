/*
Purpose: decide the new specifier for one requirement under a versioning policy.
Assumptions: clauses come from the line classifier; the installed version is raw provider text.
Usage: decide(line, "2.32.3", "floor-and-cap", { allowPrerelease: false, keepLocal: false, capStrategy: "next-minor" }).
*/

import type { CapStrategy, SyncPolicy } from "../core/options.js";
import {
  CAP_OPERATORS,
  FLOOR_OPERATORS,
  clauseVersion,
  detectClauseSeparator,
  isWildcardClause,
  renderClauses,
  type SpecifierClause,
} from "../requirements/specifier.js";
import type { RequirementLine } from "../requirements/types.js";
import {
  compareVersions,
  formatVersion,
  isPrerelease,
  nextMajor,
  nextMinor,
  parseVersion,
  releaseWithComponents,
  withoutLocal,
  type Version,
} from "../requirements/version.js";

import type { NoChangeReason, PolicyDecision } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type PolicyOptions = {
  allowPrerelease: boolean;
  keepLocal: boolean;
  capStrategy: CapStrategy;
};

export type PolicyInput = Pick<RequirementLine, "name" | "specifier" | "clauses">;

type Target = {
  // Installed version, local segment kept only with keepLocal.
  version: Version;
  text: string;
  installed: Version;
};

type ClausePlan = { clauses: string[] } | { reason: NoChangeReason };

const UPDATE_IN_PLACE_OPERATORS: ReadonlySet<string> = new Set([">=", "~=", "=="]);

// =============================================================================
// PUBLIC API
// =============================================================================

export function decide(
  requirement: PolicyInput,
  installedVersion: string,
  policy: SyncPolicy,
  options: PolicyOptions,
): PolicyDecision {
  const unchanged = (reason: NoChangeReason): PolicyDecision => ({
    package: requirement.name,
    installedVersion,
    oldSpecifier: requirement.specifier,
    newSpecifier: requirement.specifier,
    policy,
    changed: false,
    reason,
  });

  const installed = parseVersion(installedVersion);
  if (!installed) {
    return unchanged("invalid-version");
  }
  if (!options.allowPrerelease && isPrerelease(installed)) {
    return unchanged("prerelease-skipped");
  }

  const version = options.keepLocal ? installed : withoutLocal(installed);
  const target: Target = {
    version,
    text: formatVersion(version, { includeLocal: options.keepLocal }),
    installed,
  };

  const planned = planClauses(requirement.clauses, target, policy, options.capStrategy);
  if ("reason" in planned) {
    return unchanged(planned.reason);
  }

  const newSpecifier = renderClauses(planned.clauses, detectClauseSeparator(requirement.specifier));
  if (newSpecifier === requirement.specifier) {
    return unchanged("up-to-date");
  }

  return {
    package: requirement.name,
    installedVersion,
    oldSpecifier: requirement.specifier,
    newSpecifier,
    policy,
    changed: true,
    reason: null,
  };
}

// =============================================================================
// POLICIES
// =============================================================================

function planClauses(
  clauses: SpecifierClause[],
  target: Target,
  policy: SyncPolicy,
  capStrategy: CapStrategy,
): ClausePlan {
  switch (policy) {
    case "lower-bound":
      return raiseFloor(clauses, target, { requireFloor: false });
    case "floor-only":
      return raiseFloor(clauses, target, { requireFloor: true });
    case "floor-and-cap":
      return floorAndCap(clauses, target, capStrategy);
    case "update-in-place":
      return updateInPlace(clauses, target);
  }
}

// Every floor clause collapses into one ">=" at the position of the first.
function raiseFloor(
  clauses: SpecifierClause[],
  target: Target,
  options: { requireFloor: boolean },
): ClausePlan {
  const floors = clauses.filter(isFloor);
  if (floors.length === 0 && options.requireFloor) {
    return { reason: clauses.length === 0 ? "no-specifier" : "no-floor" };
  }
  if (floorAboveInstalled(floors, target)) {
    return { reason: "floor-above-installed" };
  }

  const floor = existingEqualFloor(floors, target) ?? `>=${target.text}`;
  const out: string[] = [];
  let placed = false;

  for (const clause of clauses) {
    if (!isFloor(clause)) {
      out.push(clause.raw);
    } else if (!placed) {
      out.push(floor);
      placed = true;
    }
  }
  if (!placed) {
    out.unshift(floor);
  }

  return { clauses: out };
}

function floorAndCap(
  clauses: SpecifierClause[],
  target: Target,
  capStrategy: CapStrategy,
): ClausePlan {
  const floors = clauses.filter(isFloor);
  if (floorAboveInstalled(floors, target)) {
    return { reason: "floor-above-installed" };
  }

  const capVersion = capStrategy === "next-major" ? nextMajor(target.installed) : nextMinor(target.installed);
  const caps = clauses.filter(isCap);
  const floor = existingEqualFloor(floors, target) ?? `>=${target.text}`;
  const cap = existingEqualCap(caps, capVersion) ?? `<${formatVersion(capVersion)}`;
  const rest = clauses.filter((clause) => !isFloor(clause) && !isCap(clause)).map((clause) => clause.raw);

  return { clauses: [floor, cap, ...rest] };
}

// Operators stay verbatim; "~=" and "==X.*" keep their number of release components.
function updateInPlace(clauses: SpecifierClause[], target: Target): ClausePlan {
  if (clauses.length === 0) {
    return { reason: "no-specifier" };
  }
  if (!clauses.some((clause) => UPDATE_IN_PLACE_OPERATORS.has(clause.operator))) {
    return { reason: "no-floor" };
  }

  return {
    clauses: clauses.map((clause) =>
      UPDATE_IN_PLACE_OPERATORS.has(clause.operator) ? rewriteInPlace(clause, target) : clause.raw,
    ),
  };
}

function rewriteInPlace(clause: SpecifierClause, target: Target): string {
  if (isWildcardClause(clause)) {
    const components = clause.version.split(".").length - 1;
    return `${clause.operator}${formatVersion(releaseWithComponents(target.installed, components))}.*`;
  }

  if (clause.operator === "~=") {
    const written = parseVersion(clause.version);
    const components = Math.max(2, written?.release.length ?? 2);
    return `~=${formatVersion(releaseWithComponents(target.installed, components))}`;
  }

  const written = clauseVersion(clause);
  if (written && compareVersions(written, target.version) === 0) {
    return clause.raw;
  }
  return `${clause.operator}${target.text}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function isFloor(clause: SpecifierClause): boolean {
  return FLOOR_OPERATORS.has(clause.operator);
}

function isCap(clause: SpecifierClause): boolean {
  return CAP_OPERATORS.has(clause.operator);
}

function floorAboveInstalled(floors: SpecifierClause[], target: Target): boolean {
  return floors.some((clause) => {
    const written = clauseVersion(clause);
    return written !== null && compareVersions(written, target.version) > 0;
  });
}

// A single ">=" already equal to the target is kept as written (">=2.32" vs 2.32.0).
function existingEqualFloor(floors: SpecifierClause[], target: Target): string | null {
  const [only] = floors;
  if (floors.length !== 1 || !only || only.operator !== ">=") return null;
  const written = clauseVersion(only);
  return written && compareVersions(written, target.version) === 0 ? only.raw : null;
}

function existingEqualCap(caps: SpecifierClause[], cap: Version): string | null {
  const [only] = caps;
  if (caps.length !== 1 || !only || only.operator !== "<") return null;
  const written = clauseVersion(only);
  return written && compareVersions(written, cap) === 0 ? only.raw : null;
}
