import fs from "node:fs";
import path from "node:path";

import type { ReleaseConfig, ReleaseConfigInput, RepositoryDatabase } from "../core/config.js";
import { loadReleaseConfig, loadRepositoryDatabase } from "../core/config-loader.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// Resolution order: --config, then $BOMSMITH_CONFIG, then the nearest
// bomsmith.yaml at or above the working directory.
// =============================================================================

export const CONFIG_FILE_NAME = "bomsmith.yaml";

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  overrides?: Partial<ReleaseConfigInput>;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type CliConfig = {
  config: ReleaseConfig;
  configPath: string;
  database: RepositoryDatabase;
};

export function resolveConfigPath(args: LoadConfigForCliArgs): string {
  const cwd = args.cwd ?? process.cwd();
  const explicit = args.explicitConfigPath ?? (args.env ?? process.env).BOMSMITH_CONFIG;
  if (explicit) {
    return path.resolve(cwd, explicit);
  }

  let dir = path.resolve(cwd);
  for (;;) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) return candidate;

    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  // Not found anywhere; loadReleaseConfig reports the cwd location.
  return path.join(path.resolve(cwd), CONFIG_FILE_NAME);
}

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): CliConfig {
  const configPath = resolveConfigPath(args);
  const config = loadReleaseConfig(configPath, args.overrides);

  try {
    const database = loadRepositoryDatabase(config.repository_database_path);
    return { config, configPath, database };
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Repository database invalid.",
        message: err.message,
        hint: `Check repository_database_path in ${configPath}.`,
        cause: err,
      });
    }
    throw err;
  }
}
