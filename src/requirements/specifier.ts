import { parseVersion, type Version } from "./version.js";

// =============================================================================
// TYPES
// =============================================================================

export const SPECIFIER_OPERATORS = ["===", "~=", "==", "!=", "<=", ">=", "<", ">"] as const;
export type SpecifierOperator = (typeof SPECIFIER_OPERATORS)[number];

export type SpecifierClause = {
  operator: SpecifierOperator;
  // Version token as written, e.g. "2.30.0" or "1.2.*".
  version: string;
  // Clause text as written, trimmed.
  raw: string;
};

export const FLOOR_OPERATORS: ReadonlySet<SpecifierOperator> = new Set([">=", ">", "~=", "=="]);
export const CAP_OPERATORS: ReadonlySet<SpecifierOperator> = new Set(["<", "<="]);

// =============================================================================
// PARSING
// =============================================================================

const CLAUSE_PATTERN = /^(===|~=|==|!=|<=|>=|<|>)\s*([^\s,;()]+)$/;

/**
 * Parses comma-separated clauses. Returns [] for empty text and null when any clause
 * is malformed.
 */
export function parseSpecifierClauses(text: string): SpecifierClause[] | null {
  if (text.trim() === "") {
    return [];
  }

  const clauses: SpecifierClause[] = [];
  for (const part of text.split(",")) {
    const raw = part.trim();
    const match = CLAUSE_PATTERN.exec(raw);
    const operator = match?.[1];
    const version = match?.[2];
    if (!isOperator(operator) || version === undefined) {
      return null;
    }
    clauses.push({ operator, version, raw });
  }

  return clauses;
}

export function isWildcardClause(clause: SpecifierClause): boolean {
  return (clause.operator === "==" || clause.operator === "!=") && clause.version.endsWith(".*");
}

/** The clause's version, or null for wildcards and non-PEP 440 tokens. */
export function clauseVersion(clause: SpecifierClause): Version | null {
  if (isWildcardClause(clause) || clause.operator === "===") {
    return null;
  }
  return parseVersion(clause.version);
}

// =============================================================================
// RENDERING
// =============================================================================

/** Separator between the first two clauses as written; "," when there is only one. */
export function detectClauseSeparator(text: string): string {
  const match = /\s*,\s*/.exec(text);
  return match ? match[0] : ",";
}

export function renderClauses(clauses: string[], separator: string): string {
  return clauses.join(separator);
}

// =============================================================================
// INTERNALS
// =============================================================================

function isOperator(value: string | undefined): value is SpecifierOperator {
  return SPECIFIER_OPERATORS.some((operator) => operator === value);
}
