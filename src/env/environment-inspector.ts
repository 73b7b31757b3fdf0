import type { EnvironmentInspector } from "../sync/ports.js";

import { runCommand, type CommandRunner } from "./command.js";

export type EnvironmentInspectorOptions = {
  python: string;
  env?: NodeJS.ProcessEnv;
  run?: CommandRunner;
};

const PREFIX_CHECK = "import sys; print(sys.prefix != getattr(sys, 'base_prefix', sys.prefix))";
const INSPECT_TIMEOUT_MS = 30_000;

export function createEnvironmentInspector(options: EnvironmentInspectorOptions): EnvironmentInspector {
  const run = options.run ?? runCommand;
  const env = options.env ?? process.env;

  return {
    async isVirtualEnvActive(): Promise<boolean> {
      if (env.VIRTUAL_ENV?.trim()) {
        return true;
      }
      const res = await run(options.python, ["-c", PREFIX_CHECK], { timeoutMs: INSPECT_TIMEOUT_MS });
      return res.failure === null && res.exitCode === 0 && res.stdout.trim() === "True";
    },

    // Outside a repository (or without git) the directory counts as clean.
    async isRepositoryDirty(dir: string): Promise<boolean> {
      const res = await run("git", ["status", "--porcelain"], {
        cwd: dir,
        timeoutMs: INSPECT_TIMEOUT_MS,
      });
      return res.failure === null && res.exitCode === 0 && res.stdout.trim().length > 0;
    },
  };
}
