import { describe, expect, it } from "vitest";

import type { SyncPolicy } from "../core/options.js";
import { parseSpecifierClauses } from "../requirements/specifier.js";

import { decide, type PolicyInput, type PolicyOptions } from "./policy-engine.js";

const defaults: PolicyOptions = { allowPrerelease: false, keepLocal: false, capStrategy: "next-minor" };

function req(specifier: string, name = "requests"): PolicyInput {
  const clauses = parseSpecifierClauses(specifier);
  if (!clauses) throw new Error(`bad test specifier: ${specifier}`);
  return { name, specifier, clauses };
}

function next(
  specifier: string,
  installed: string,
  policy: SyncPolicy,
  options: Partial<PolicyOptions> = {},
): string {
  return decide(req(specifier), installed, policy, { ...defaults, ...options }).newSpecifier;
}

describe("decide", () => {
  it("matches the policy table", () => {
    expect(next(">=2.30.0", "2.32.3", "lower-bound")).toBe(">=2.32.3");
    expect(next(">=2.30.0", "2.32.3", "floor-and-cap")).toBe(">=2.32.3,<2.33.0");
    expect(next("==2.30.0", "2.32.3", "update-in-place")).toBe("==2.32.3");
    expect(next("", "2.32.3", "floor-only")).toBe("");
  });

  it("adds a floor to a bare name under lower-bound", () => {
    const decision = decide(req(""), "2.32.3", "lower-bound", defaults);

    expect(decision).toEqual({
      package: "requests",
      installedVersion: "2.32.3",
      oldSpecifier: "",
      newSpecifier: ">=2.32.3",
      policy: "lower-bound",
      changed: true,
      reason: null,
    });
  });

  it("keeps caps and exclusions under lower-bound", () => {
    expect(next("!=2.31.0, >=2.0, <3", "2.32.3", "lower-bound")).toBe("!=2.31.0, >=2.32.3, <3");
    expect(next("<3", "2.32.3", "lower-bound")).toBe(">=2.32.3,<3");
  });

  it("collapses several floors into one", () => {
    expect(next(">1.0,>=2.0,<3", "2.32.3", "lower-bound")).toBe(">=2.32.3,<3");
  });

  it("leaves lines without a floor alone under floor-only", () => {
    const decision = decide(req("<3"), "2.32.3", "floor-only", defaults);

    expect(decision.changed).toBe(false);
    expect(decision.reason).toBe("no-floor");
    expect(decide(req(""), "2.32.3", "floor-only", defaults).reason).toBe("no-specifier");
  });

  it("replaces caps under floor-and-cap", () => {
    expect(next(">=2.0,<2.31,!=2.30.1", "2.32.3", "floor-and-cap")).toBe(">=2.32.3,<2.33.0,!=2.30.1");
    expect(next("", "2.32.3", "floor-and-cap", { capStrategy: "next-major" })).toBe(">=2.32.3,<3.0.0");
  });

  it("keeps operators and precision under update-in-place", () => {
    expect(next("~=1.2", "1.4.0", "update-in-place")).toBe("~=1.4");
    expect(next("~=1.2.0", "1.4.1", "update-in-place")).toBe("~=1.4.1");
    expect(next("==1.2.*", "1.4.1", "update-in-place")).toBe("==1.4.*");
    expect(next(">=1.0,<2", "1.4.1", "update-in-place")).toBe(">=1.4.1,<2");
    expect(decide(req(""), "1.4.1", "update-in-place", defaults).reason).toBe("no-specifier");
    expect(decide(req("<2"), "1.4.1", "update-in-place", defaults).reason).toBe("no-floor");
  });

  it("reports ties as unchanged", () => {
    expect(decide(req(">=2.32.3"), "2.32.3", "lower-bound", defaults).reason).toBe("up-to-date");
    expect(decide(req(">=2.32"), "2.32.0", "lower-bound", defaults).reason).toBe("up-to-date");
    expect(decide(req(">=2.32.3,<2.33.0"), "2.32.3", "floor-and-cap", defaults).reason).toBe("up-to-date");
  });

  it("never lowers an existing floor", () => {
    const decision = decide(req(">=3.0"), "2.32.3", "lower-bound", defaults);

    expect(decision.changed).toBe(false);
    expect(decision.reason).toBe("floor-above-installed");
  });

  it("skips pre-releases unless allowed", () => {
    expect(decide(req(">=1.0"), "2.0rc1", "lower-bound", defaults).reason).toBe("prerelease-skipped");
    expect(next(">=1.0", "2.0rc1", "lower-bound", { allowPrerelease: true })).toBe(">=2.0rc1");
    expect(decide(req(">=1.0"), "2.0.dev3", "lower-bound", defaults).reason).toBe("prerelease-skipped");
  });

  it("drops local segments unless asked to keep them", () => {
    expect(next(">=1.0", "2.1.0+cpu", "lower-bound")).toBe(">=2.1.0");
    expect(next(">=1.0", "2.1.0+cpu", "lower-bound", { keepLocal: true })).toBe(">=2.1.0+cpu");
    expect(decide(req(">=2.1.0"), "2.1.0+cpu", "lower-bound", defaults).reason).toBe("up-to-date");
  });

  it("normalizes the installed version", () => {
    expect(next(">=1.0", "2.0.0-post1", "lower-bound")).toBe(">=2.0.0.post1");
  });

  it("ignores unparseable installed versions", () => {
    expect(decide(req(">=1.0"), "not-a-version", "lower-bound", defaults).reason).toBe("invalid-version");
  });
});
