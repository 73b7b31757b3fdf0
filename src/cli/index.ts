import { Command, InvalidArgumentError, Option } from "commander";

import { splitCommaList } from "../core/config.js";
import { CAP_STRATEGIES, SYNC_POLICIES } from "../core/options.js";

import { OUTPUT_MODES } from "./output.js";
import { runSyncCommand, type RunCommandDeps } from "./run.js";

export type CliDependencies = RunCommandDeps & {
  onExitCode?: (code: number) => void;
};

export const CLI_VERSION = "0.1.0";

export function buildCli(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name("reqsync")
    .description("Sync requirements.txt specifiers to the versions installed in your environment")
    .version(CLI_VERSION)
    .option("--debug", "Show error names, causes and stacks")
    .option("--no-debug", "Hide debug error details");

  program
    .command("run")
    .description("Rewrite requirement specifiers from installed versions")
    // Target
    .option("--path <file>", "Root requirements file (default: requirements.txt)")
    .option("--follow-includes", "Follow -r includes recursively (default)")
    .option("--no-follow-includes", "Only process the root file and its constraints")
    .option("--update-constraints", "Also rewrite files reached through -c/--constraint")
    .option("--no-update-constraints", "Scan constraint files without rewriting them")
    // Policy
    .addOption(
      new Option("--policy <name>", "Versioning policy (default: lower-bound)").choices(SYNC_POLICIES),
    )
    .addOption(
      new Option("--cap-strategy <name>", "Upper cap for floor-and-cap (default: next-minor)").choices(
        CAP_STRATEGIES,
      ),
    )
    .option("--allow-prerelease", "Adopt installed pre-release and dev versions")
    .option("--keep-local", "Keep local version suffixes such as +cpu")
    // Execution
    .option("--upgrade", "Run pip install -U -r <path> before reading versions (default)")
    .option("--no-upgrade", "Skip the pip upgrade and read the current environment only")
    .option("--provider-timeout <sec>", "Timeout for pip calls in seconds", parsePositiveNumber)
    .option("--pip-args <args>", "Allowlisted extra arguments for pip install")
    .option("--python <exe>", "Interpreter of the target environment (default: python)")
    .option("--check", "Exit 11 when changes would be made; never writes")
    .option("--dry-run", "Preview changes without writing files")
    // Filtering
    .option("--only <globs>", "Comma-separated package globs to include", collectGlobs)
    .option("--exclude <globs>", "Comma-separated package globs to exclude", collectGlobs)
    // Output
    .option("--show-diff", "Print a unified diff of changed files")
    .addOption(new Option("-o, --output <mode>", "Stdout format (default: human)").choices(OUTPUT_MODES))
    .option("--json-report <path>", "Write a JSON report to a file or directory")
    // Write safety
    .option("--backup", "Back up files before rewriting them (default)")
    .option("--no-backup", "Do not back up files before rewriting them")
    .option("--backup-suffix <suffix>", "Backup file suffix (default: .bak)")
    .option("--timestamped-backups", "Use timestamped backup names (default)")
    .option("--no-timestamped-backups", "Use a single <file><suffix> backup")
    .option(
      "--backup-keep-last <n>",
      "Keep the newest N timestamped backups per file (0 keeps all)",
      parseNonNegativeInt,
    )
    .option("--lock-timeout <sec>", "Lock acquisition timeout in seconds", parsePositiveNumber)
    // Safety
    .option("--system-ok", "Allow running outside a virtualenv")
    .option("--allow-hashes", "Skip hash-pinned lines instead of refusing")
    .option("--allow-dirty", "Allow running in a dirty git repository (default)")
    .option("--no-allow-dirty", "Refuse to run in a dirty git repository")
    .option("--last-wins", "For duplicated packages, rewrite only the last occurrence")
    // Logging
    .option("--log-file <path>", "Append JSONL log events to a file")
    .option("-v, --verbose", "Increase verbosity (-vv for debug)", increaseVerbosity)
    .option("-q, --quiet", "Only print errors")
    // Config
    .option("--config <path>", "Config file (default: reqsync.yaml, .reqsync.yaml, reqsync.json)")
    .option("--no-config", "Ignore config files")
    .action(async (opts: unknown) => {
      const code = await runSyncCommand(opts, deps);
      deps.onExitCode?.(code);
    });

  return program;
}

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a number greater than 0.");
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function collectGlobs(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), ...splitCommaList(value)];
}

function increaseVerbosity(_value: string, previous: number | undefined): number {
  return (previous ?? 0) + 1;
}
