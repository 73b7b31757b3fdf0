import { ConfigError } from "../core/errors.js";

// Flag -> whether it takes a value.
const ALLOWED_PIP_FLAGS: ReadonlyMap<string, boolean> = new Map([
  ["--index-url", true],
  ["--extra-index-url", true],
  ["--trusted-host", true],
  ["--find-links", true],
  ["--proxy", true],
  ["--retries", true],
  ["--timeout", true],
  ["--constraint", true],
  ["-c", true],
  ["--requirement", true],
  ["-r", true],
  ["--no-deps", false],
]);

/**
 * Keeps only allowlisted pip flags (and their values). A dropped flag also drops
 * the value that follows it.
 */
export function allowlistPipArgs(extraArgs: string): string[] {
  const tokens = splitShellWords(extraArgs);
  const out: string[] = [];

  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i] ?? "";
    const eq = token.indexOf("=");
    const option = eq >= 0 ? token.slice(0, eq) : token;
    const next = tokens[i + 1];
    const hasDetachedValue = eq < 0 && next !== undefined && !next.startsWith("-");

    const expectsValue = ALLOWED_PIP_FLAGS.get(option);
    if (expectsValue === undefined) {
      if (option.startsWith("-") && hasDetachedValue) {
        i += 1;
      }
      continue;
    }

    out.push(token);
    if (expectsValue && hasDetachedValue && next !== undefined) {
      out.push(next);
      i += 1;
    }
  }

  return out;
}

/** POSIX-style word splitting: quotes group, backslash escapes, no expansion. */
export function splitShellWords(input: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < input.length; i += 1) {
    const ch = input.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && i + 1 < input.length && '"\\$`'.includes(input.charAt(i + 1))) {
        current += input.charAt(i + 1);
        i += 1;
      } else {
        current += ch;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      continue;
    }

    inWord = true;
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === "\\") {
      if (i + 1 >= input.length) {
        throw new ConfigError("pip_args: trailing backslash");
      }
      current += input.charAt(i + 1);
      i += 1;
    } else {
      current += ch;
    }
  }

  if (quote) {
    throw new ConfigError("pip_args: unterminated quote");
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}
