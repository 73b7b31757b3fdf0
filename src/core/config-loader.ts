import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { SyncConfigSchema, configToOptions, type SyncConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import type { SyncOptionsInput } from "./options.js";

// =============================================================================
// CONSTANTS
// =============================================================================

// Merged in this order; later files win.
export const CONFIG_FILE_NAMES = ["reqsync.yaml", ".reqsync.yaml", "reqsync.json"] as const;

// =============================================================================
// TYPES
// =============================================================================

export type LoadedConfig = {
  sources: string[];
  options: SyncOptionsInput;
};

type ExpandContext = {
  file: string;
  trail: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function discoverConfigFiles(cwd: string): string[] {
  return CONFIG_FILE_NAMES.map((name) => path.join(cwd, name)).filter((candidate) =>
    fs.existsSync(candidate),
  );
}

export function loadConfig(args: { cwd: string; explicitPath?: string }): LoadedConfig {
  const files = args.explicitPath
    ? [path.resolve(args.cwd, args.explicitPath)]
    : discoverConfigFiles(args.cwd);

  let options: SyncOptionsInput = {};
  for (const file of files) {
    options = overlayDefined(options, loadConfigFile(file));
  }

  return { sources: files, options };
}

export function loadConfigFile(configPath: string): SyncOptionsInput {
  const absolutePath = path.resolve(configPath);

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
  }

  const doc = parseDocument(raw, absolutePath);
  // An empty YAML file is a valid config with no settings.
  const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

  const parsed = SyncConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid config at ${absolutePath}:\n${details}`, parsed.error);
  }

  return configToOptions(resolveConfigPaths(parsed.data, path.dirname(absolutePath)));
}

export function parseConfigMapping(mapping: unknown, label: string): SyncOptionsInput {
  const parsed = SyncConfigSchema.safeParse(mapping);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid options in ${label}:\n${details}`, parsed.error);
  }
  return configToOptions(parsed.data);
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseDocument(raw: string, absolutePath: string): unknown {
  if (absolutePath.endsWith(".json")) {
    try {
      return JSON.parse(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Failed to parse JSON config at ${absolutePath}: ${detail}`, err);
    }
  }

  try {
    return yaml.load(raw);
  } catch (err) {
    const detail = err instanceof yaml.YAMLException ? err.reason : String(err);
    const location =
      err instanceof yaml.YAMLException
        ? ` (line ${err.mark.line + 1}, column ${err.mark.column + 1})`
        : "";
    throw new ConfigError(
      `Failed to parse YAML config at ${absolutePath}${location}: ${detail}`,
      err,
    );
  }
}

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// Relative paths in a config file are relative to the file, not the cwd.
function resolveConfigPaths(config: SyncConfig, configDir: string): SyncConfig {
  const resolveOptional = (value: string | null | undefined): string | null | undefined =>
    typeof value === "string" ? path.resolve(configDir, value) : value;

  return {
    ...config,
    path: config.path === undefined ? undefined : path.resolve(configDir, config.path),
    json_report: resolveOptional(config.json_report),
    log_file: resolveOptional(config.log_file),
  };
}

function overlayDefined(base: SyncOptionsInput, next: SyncOptionsInput): SyncOptionsInput {
  const defined = Object.fromEntries(
    Object.entries(next).filter(([, value]) => value !== undefined),
  );
  return Object.assign({ ...base }, defined);
}
