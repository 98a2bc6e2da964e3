import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue, ZodType, ZodTypeDef } from "zod";

import {
  DependenciesSchema,
  ReleaseConfigSchema,
  RepositoryDatabaseSchema,
  type Dependencies,
  type ReleaseConfig,
  type ReleaseConfigInput,
  type RepositoryDatabase,
} from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

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
      Object.entries(value).map(([k, v]) => [
        k,
        expandEnv(v, { ...ctx, trail: [...ctx.trail, k] }),
      ]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Create bomsmith.yaml in the working directory or pass --config <path>.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!error || typeof error !== "object") {
    return null;
  }

  const mark = "mark" in error ? error.mark : undefined;
  if (!mark || typeof mark !== "object") {
    return null;
  }

  const line = "line" in mark ? mark.line : undefined;
  const column = "column" in mark ? mark.column : undefined;

  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

// =============================================================================
// YAML DOCUMENTS
// =============================================================================

/**
 * Reads a YAML file and validates it against `schema`. Every failure surfaces
 * as a ConfigError naming the file (and line/column for syntax errors).
 */
export function loadYamlDocument<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: { label: string; expandEnvironment?: boolean },
): T {
  const absolutePath = path.resolve(filePath);

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read ${options.label} at ${absolutePath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(
      `Failed to parse ${options.label} at ${absolutePath}${locationDetail}: ${detail}`,
      err,
    );
  }

  const expanded = options.expandEnvironment
    ? expandEnv(doc ?? {}, { file: absolutePath, trail: [] })
    : (doc ?? {});

  const parsed = schema.safeParse(expanded);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid ${options.label} at ${absolutePath}:\n${details}`, parsed.error);
  }

  return parsed.data;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Loads bomsmith.yaml. `overrides` (typically CLI flags) win over file values;
 * relative paths are resolved against the config file's directory.
 */
export function loadReleaseConfig(
  configPath: string,
  overrides: Partial<ReleaseConfigInput> = {},
): ReleaseConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Release config missing.",
      message: `Release config not found at ${absolutePath}.`,
      hint: MISSING_CONFIG_HINT,
    });
  }

  try {
    const fileConfig = loadYamlDocument(absolutePath, ReleaseConfigSchema, {
      label: "release config",
      expandEnvironment: true,
    });
    const candidate: Record<string, unknown> = { ...fileConfig };
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) candidate[key] = value;
    }

    const merged = ReleaseConfigSchema.safeParse(candidate);
    if (!merged.success) {
      throw new ConfigError(
        `Invalid command-line overrides:\n${formatIssues(merged.error.issues)}`,
        merged.error,
      );
    }

    return resolveConfigPaths(merged.data, path.dirname(absolutePath));
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Release config invalid.",
        message: `Release config at ${absolutePath} is invalid.`,
        hint: INVALID_CONFIG_HINT,
        cause: err,
      });
    }
    throw err;
  }
}

export function loadRepositoryDatabase(filePath: string): RepositoryDatabase {
  return loadYamlDocument(filePath, RepositoryDatabaseSchema, { label: "repository database" });
}

export function loadDependencies(filePath: string): Dependencies {
  return loadYamlDocument(filePath, DependenciesSchema, { label: "dependencies file" });
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveConfigPaths(config: ReleaseConfig, configDir: string): ReleaseConfig {
  const resolve = (value: string): string => path.resolve(configDir, value);
  const resolveOptional = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : resolve(value);

  return {
    ...config,
    input_dir: resolve(config.input_dir),
    output_dir: resolve(config.output_dir),
    repository_database_path: resolve(config.repository_database_path),
    github_filesystem_root: resolveOptional(config.github_filesystem_root),
    bom_path: resolveOptional(config.bom_path),
    bom_dependencies_path: resolveOptional(config.bom_dependencies_path),
    publishing: {
      ...config.publishing,
      bom_store_dir: resolve(config.publishing.bom_store_dir),
    },
  };
}
