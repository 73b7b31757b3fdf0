import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  classifyLogicalLine,
  classifyText,
  splitLogicalLines,
  splitPhysicalLines,
  type ClassifyContext,
} from "./line-classifier.js";
import { parseSpecifierClauses } from "./specifier.js";
import type { Line, RequirementLine } from "./types.js";

const baseDir = path.resolve("/work/project");
const ctx: ClassifyContext = { baseDir, pathExists: () => false };

function classifyOne(text: string, context: ClassifyContext = ctx): Line {
  const [logical] = splitLogicalLines(text);
  if (!logical) throw new Error("expected one logical line");
  return classifyLogicalLine(logical, context);
}

function requirement(text: string): RequirementLine {
  const line = classifyOne(text);
  if (line.kind !== "requirement") {
    throw new Error(`expected a requirement, got ${line.kind}`);
  }
  return line;
}

describe("splitPhysicalLines", () => {
  it("keeps every line ending", () => {
    expect(splitPhysicalLines("a\r\nb\rc\nd")).toEqual([
      { text: "a", eol: "\r\n" },
      { text: "b", eol: "\r" },
      { text: "c", eol: "\n" },
      { text: "d", eol: "" },
    ]);
  });
});

describe("splitLogicalLines", () => {
  it("joins backslash continuations and keeps the raw text", () => {
    const text = "requests>=2.0 \\\n    --hash=sha256:abc\nflask\n";
    const lines = splitLogicalLines(text);

    expect(lines).toHaveLength(2);
    expect(lines[0]).toEqual({
      raw: "requests>=2.0 \\\n    --hash=sha256:abc\n",
      lineNumber: 1,
      physicalLines: 2,
      eol: "\n",
      content: "requests>=2.0     --hash=sha256:abc",
    });
    expect(lines[1]?.lineNumber).toBe(3);
    expect(lines.map((line) => line.raw).join("")).toBe(text);
  });

  it("does not continue a line that carries a comment", () => {
    const lines = splitLogicalLines("flask  # pinned \\\nrequests\n");

    expect(lines.map((line) => line.content)).toEqual(["flask  # pinned \\", "requests"]);
  });
});

describe("classifyLogicalLine", () => {
  it("classifies blanks and comments", () => {
    expect(classifyOne("   \n").kind).toBe("blank");
    expect(classifyOne("  # note\n").kind).toBe("comment");
  });

  it("parses name, extras, specifier, marker and trailer", () => {
    const line = requirement("Requests_Toolbelt[socks, security] >= 2.30.0 ; python_version >= '3.8'  # http\n");

    expect(line.name).toBe("Requests_Toolbelt");
    expect(line.normalizedName).toBe("requests-toolbelt");
    expect(line.extras).toEqual(["socks", "security"]);
    expect(line.specifier).toBe(">= 2.30.0");
    expect(line.marker).toBe("python_version >= '3.8'");
    expect(line.trailer).toBe("  # http");
    expect(line.layout).toEqual({
      prefix: "Requests_Toolbelt[socks, security] ",
      specifierText: ">= 2.30.0",
      suffix: " ; python_version >= '3.8'  # http",
      parenthesized: false,
    });
  });

  it("places the insertion point of a bare name after its extras", () => {
    const line = requirement("uvicorn[standard]   # server\n");

    expect(line.clauses).toEqual([]);
    expect(line.layout.prefix).toBe("uvicorn[standard]");
    expect(line.layout.suffix).toBe("   # server");
  });

  it("accepts parenthesized specifiers", () => {
    const line = requirement("django (>=4.2,<5)\n");

    expect(line.layout.parenthesized).toBe(true);
    expect(line.specifier).toBe(">=4.2,<5");
    expect(line.clauses.map((clause) => clause.operator)).toEqual([">=", "<"]);
  });

  it("records hash tokens", () => {
    const line = requirement("six==1.16.0 --hash=sha256:aaa --hash sha256:bbb\n");

    expect(line.hashes).toEqual(["sha256:aaa", "sha256:bbb"]);
    expect(line.layout.suffix).toBe(" --hash=sha256:aaa --hash sha256:bbb");
  });

  it("resolves include and constraint targets against the file directory", () => {
    const include = classifyOne("-r base.txt  # shared\n");
    const constraint = classifyOne("--constraint=\"pins/constraints.txt\"\n");
    const attached = classifyOne("-rdev.txt\n");

    expect(include).toMatchObject({ kind: "include", target: "base.txt", resolvedPath: path.join(baseDir, "base.txt") });
    expect(constraint).toMatchObject({
      kind: "constraint",
      target: "pins/constraints.txt",
      resolvedPath: path.join(baseDir, "pins", "constraints.txt"),
    });
    expect(attached).toMatchObject({ kind: "include", target: "dev.txt" });
  });

  it("classifies other pip options", () => {
    expect(classifyOne("--index-url https://pypi.example.test/simple\n")).toMatchObject({
      kind: "option",
      option: "--index-url",
    });
    expect(classifyOne("--no-binary=:all:\n")).toMatchObject({ kind: "option", option: "--no-binary" });
  });

  it("treats VCS and URL references as opaque", () => {
    expect(classifyOne("git+https://example.test/org/pkg.git@v1#egg=pkg\n").kind).toBe("vcs-or-url");
    expect(classifyOne("pkg @ https://example.test/pkg-1.0.tar.gz\n").kind).toBe("vcs-or-url");
    expect(classifyOne("-e git+ssh://git@example.test/org/pkg.git#egg=pkg\n")).toMatchObject({
      kind: "vcs-or-url",
      locator: "git+ssh://git@example.test/org/pkg.git#egg=pkg",
    });
  });

  it("classifies editables", () => {
    expect(classifyOne("-e .\n")).toMatchObject({ kind: "editable", target: "." });
    expect(classifyOne("--editable=./libs/core\n")).toMatchObject({ kind: "editable", target: "./libs/core" });
  });

  it("classifies local paths", () => {
    expect(classifyOne("./vendor/pkg\n")).toMatchObject({ kind: "local-path", location: "./vendor/pkg" });
    expect(classifyOne("dist/pkg-1.0-py3-none-any.whl\n").kind).toBe("local-path");
    expect(classifyOne("pkg-1.0.tar.gz\n").kind).toBe("local-path");
  });

  it("treats a bare token as a path only when it exists", () => {
    const existing: ClassifyContext = {
      baseDir,
      pathExists: (candidate) => candidate === path.join(baseDir, "localpkg"),
    };

    expect(classifyOne("localpkg\n", existing).kind).toBe("local-path");
    expect(classifyOne("requests\n", existing).kind).toBe("requirement");
    expect(classifyOne("localpkg>=1.0\n", existing).kind).toBe("requirement");
  });

  it("keeps text that does not parse", () => {
    const line = classifyOne("requests 2.0\n");

    expect(line.kind).toBe("unparsed");
    expect(line.raw).toBe("requests 2.0\n");
  });
});

describe("classifyText", () => {
  it("reproduces the input byte for byte", () => {
    const text = "# top\r\nrequests>=2.0\r\n\r\n-r other.txt\r\nflask  \r\n";
    const lines = classifyText(text, ctx);

    expect(lines.map((line) => line.raw).join("")).toBe(text);
    expect(lines.map((line) => line.kind)).toEqual(["comment", "requirement", "blank", "include", "requirement"]);
  });
});

describe("parseSpecifierClauses", () => {
  it("parses every operator", () => {
    const clauses = parseSpecifierClauses("~=1.2, ==1.3.*,!=1.3.5,<=2,>=1,<3,>0,===1.0-custom");

    expect(clauses?.map((clause) => clause.operator)).toEqual(["~=", "==", "!=", "<=", ">=", "<", ">", "==="]);
    expect(clauses?.[1]).toEqual({ operator: "==", version: "1.3.*", raw: "==1.3.*" });
  });

  it("rejects malformed clauses", () => {
    expect(parseSpecifierClauses(">=1.0,,<2")).toBeNull();
    expect(parseSpecifierClauses("1.0")).toBeNull();
    expect(parseSpecifierClauses("")).toEqual([]);
  });
});
