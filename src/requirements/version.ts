/*
Purpose: PEP 440 version parsing, normalization, ordering and cap computation.
Assumptions: input is a single version token (no operator); legacy non-PEP 440 versions are rejected.
Usage: const v = parseVersion("2.32.3"); if (v) formatVersion(nextMinor(v)) === "2.33.0".
*/

// =============================================================================
// TYPES
// =============================================================================

export type PreReleaseLabel = "a" | "b" | "rc";

export type Version = {
  epoch: number;
  release: number[];
  pre: { label: PreReleaseLabel; number: number } | null;
  post: number | null;
  dev: number | null;
  local: string | null;
};

export type FormatVersionOptions = {
  includeLocal?: boolean;
};

// =============================================================================
// PARSING
// =============================================================================

const VERSION_PATTERN = new RegExp(
  [
    "^\\s*v?",
    "(?:(?<epoch>[0-9]+)!)?",
    "(?<release>[0-9]+(?:\\.[0-9]+)*)",
    "(?<pre>[-_.]?(?<preLabel>alpha|a|beta|b|preview|pre|c|rc)[-_.]?(?<preNumber>[0-9]+)?)?",
    "(?<post>(?:-(?<postImplicit>[0-9]+))|(?:[-_.]?(?:post|rev|r)[-_.]?(?<postNumber>[0-9]+)?))?",
    "(?<dev>[-_.]?dev[-_.]?(?<devNumber>[0-9]+)?)?",
    "(?:\\+(?<local>[a-z0-9]+(?:[-_.][a-z0-9]+)*))?",
    "\\s*$",
  ].join(""),
  "i",
);

const PRE_LABEL_ALIASES: Record<string, PreReleaseLabel> = {
  a: "a",
  alpha: "a",
  b: "b",
  beta: "b",
  c: "rc",
  rc: "rc",
  pre: "rc",
  preview: "rc",
};

export function parseVersion(text: string): Version | null {
  const match = VERSION_PATTERN.exec(text);
  const groups = match?.groups;
  if (!groups || groups.release === undefined) {
    return null;
  }

  const preLabel = groups.preLabel?.toLowerCase();
  const pre =
    groups.pre !== undefined && preLabel !== undefined
      ? { label: PRE_LABEL_ALIASES[preLabel] ?? "rc", number: toInt(groups.preNumber) }
      : null;

  const post =
    groups.post === undefined ? null : toInt(groups.postImplicit ?? groups.postNumber);
  const dev = groups.dev === undefined ? null : toInt(groups.devNumber);

  return {
    epoch: toInt(groups.epoch),
    release: groups.release.split(".").map((part) => Number.parseInt(part, 10)),
    pre,
    post,
    dev,
    local: groups.local === undefined ? null : groups.local.toLowerCase().replace(/[-_]/g, "."),
  };
}

export function isPrerelease(version: Version): boolean {
  return version.pre !== null || version.dev !== null;
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatVersion(version: Version, options: FormatVersionOptions = {}): string {
  let out = version.epoch > 0 ? `${version.epoch}!` : "";
  out += version.release.join(".");
  if (version.pre) out += `${version.pre.label}${version.pre.number}`;
  if (version.post !== null) out += `.post${version.post}`;
  if (version.dev !== null) out += `.dev${version.dev}`;
  if (options.includeLocal && version.local) out += `+${version.local}`;
  return out;
}

export function withoutLocal(version: Version): Version {
  return { ...version, local: null };
}

/** Release-only version truncated or zero-padded to `components` parts. */
export function releaseWithComponents(version: Version, components: number): Version {
  const release = version.release.slice(0, components);
  while (release.length < components) {
    release.push(0);
  }
  return { epoch: version.epoch, release, pre: null, post: null, dev: null, local: null };
}

// =============================================================================
// CAPS
// =============================================================================

export function nextMinor(version: Version): Version {
  const [major = 0, minor = 0] = version.release;
  return { epoch: version.epoch, release: [major, minor + 1, 0], pre: null, post: null, dev: null, local: null };
}

export function nextMajor(version: Version): Version {
  const [major = 0] = version.release;
  return { epoch: version.epoch, release: [major + 1, 0, 0], pre: null, post: null, dev: null, local: null };
}

// =============================================================================
// ORDERING
// =============================================================================

export function compareVersions(left: Version, right: Version): number {
  return (
    compareNumbers(left.epoch, right.epoch) ||
    compareRelease(left.release, right.release) ||
    compareNumbers(preKey(left), preKey(right)) ||
    comparePreNumber(left, right) ||
    compareNumbers(postKey(left), postKey(right)) ||
    compareNumbers(devKey(left), devKey(right)) ||
    compareLocal(left.local, right.local)
  );
}

export function versionsEqual(left: Version, right: Version): boolean {
  return compareVersions(left, right) === 0;
}

// =============================================================================
// INTERNALS
// =============================================================================

const PRE_RANK: Record<PreReleaseLabel, number> = { a: 0, b: 1, rc: 2 };

function toInt(value: string | undefined): number {
  return value === undefined ? 0 : Number.parseInt(value, 10);
}

function compareNumbers(left: number, right: number): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

// Trailing zeros are insignificant: 1.0 == 1.0.0.
function compareRelease(left: number[], right: number[]): number {
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const diff = compareNumbers(left[i] ?? 0, right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

// A dev release of a final version sorts before its pre-releases (1.0.dev0 < 1.0a0).
function preKey(version: Version): number {
  if (version.pre) return PRE_RANK[version.pre.label];
  if (version.post === null && version.dev !== null) return Number.NEGATIVE_INFINITY;
  return Number.POSITIVE_INFINITY;
}

function comparePreNumber(left: Version, right: Version): number {
  if (!left.pre || !right.pre) return 0;
  return compareNumbers(left.pre.number, right.pre.number);
}

function postKey(version: Version): number {
  return version.post ?? Number.NEGATIVE_INFINITY;
}

function devKey(version: Version): number {
  return version.dev ?? Number.POSITIVE_INFINITY;
}

// Numeric segments sort above alphanumeric ones; a longer local sorts above its prefix.
function compareLocal(left: string | null, right: string | null): number {
  if (left === right) return 0;
  if (left === null) return -1;
  if (right === null) return 1;

  const leftParts = left.split(".");
  const rightParts = right.split(".");
  const length = Math.min(leftParts.length, rightParts.length);

  for (let i = 0; i < length; i += 1) {
    const diff = compareLocalPart(leftParts[i] ?? "", rightParts[i] ?? "");
    if (diff !== 0) return diff;
  }

  return compareNumbers(leftParts.length, rightParts.length);
}

function compareLocalPart(left: string, right: string): number {
  const leftNumeric = /^[0-9]+$/.test(left);
  const rightNumeric = /^[0-9]+$/.test(right);

  if (leftNumeric && rightNumeric) {
    return compareNumbers(Number.parseInt(left, 10), Number.parseInt(right, 10));
  }
  if (leftNumeric !== rightNumeric) {
    return leftNumeric ? 1 : -1;
  }
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
