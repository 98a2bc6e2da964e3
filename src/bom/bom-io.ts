/*
Purpose: read and write BOM documents as YAML.
Assumptions: BOMs are small enough to read whole; key order on disk is always sorted.
Usage: const bom = loadBomFile(path); writeBomFile(outPath, bom);
*/

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";

import { formatIssues } from "../core/config-loader.js";
import { ConfigError } from "../core/errors.js";

import { BomSchema, type Bom } from "./bom.js";

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parses BOM YAML. Loaded with the core schema so timestamps stay strings.
 */
export function parseBom(text: string, source = "<inline>"): Bom {
  let doc: unknown;
  try {
    doc = yaml.load(text, { schema: yaml.CORE_SCHEMA });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse BOM ${source}: ${detail}`, err);
  }

  const parsed = BomSchema.safeParse(doc ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid BOM ${source}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  return parsed.data;
}

export function loadBomFile(filePath: string): Bom {
  const absolutePath = path.resolve(filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read BOM at ${absolutePath}`, err);
  }
  return parseBom(raw, absolutePath);
}

// =============================================================================
// SERIALIZATION
// =============================================================================

export function dumpBom(bom: Bom): string {
  return yaml.dump(bom, {
    sortKeys: true,
    lineWidth: -1,
    noRefs: true,
  });
}

export function writeBomFile(filePath: string, bom: Bom): void {
  fse.ensureDirSync(path.dirname(filePath));
  fs.writeFileSync(filePath, dumpBom(bom), "utf8");
}
