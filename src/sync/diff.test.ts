import { describe, expect, it } from "vitest";

import { buildUnifiedDiff } from "./diff.js";

describe("buildUnifiedDiff", () => {
  it("returns an empty string for equal texts", () => {
    expect(buildUnifiedDiff({ path: "requirements.txt", before: "a\nb\n", after: "a\nb\n" })).toBe("");
  });

  it("emits one hunk with three lines of context", () => {
    const before = ["a", "b", "c", "d", "requests>=2.0", "e", "f", "g", "h", ""].join("\n");
    const after = before.replace("requests>=2.0", "requests>=2.32.3");

    expect(buildUnifiedDiff({ path: "requirements.txt", before, after })).toBe(
      [
        "--- requirements.txt (old)",
        "+++ requirements.txt (new)",
        "@@ -2,7 +2,7 @@",
        " b",
        " c",
        " d",
        "-requests>=2.0",
        "+requests>=2.32.3",
        " e",
        " f",
        " g",
        "",
      ].join("\n"),
    );
  });

  it("splits distant changes into separate hunks", () => {
    const before = Array.from({ length: 12 }, (_, i) => `pkg${i}>=1.0`).join("\n") + "\n";
    const after = before.replace("pkg0>=1.0", "pkg0>=2.0").replace("pkg11>=1.0", "pkg11>=2.0");

    const diff = buildUnifiedDiff({ path: "r.txt", before, after });

    expect(diff.split("\n").filter((line) => line.startsWith("@@"))).toEqual(["@@ -1,4 +1,4 @@", "@@ -9,4 +9,4 @@"]);
  });

  it("compares CRLF files line by line", () => {
    const diff = buildUnifiedDiff({ path: "r.txt", before: "flask\r\n", after: "flask>=3.0\r\n" });

    expect(diff).toBe("--- r.txt (old)\n+++ r.txt (new)\n@@ -1 +1 @@\n-flask\n+flask>=3.0\n");
  });
});
