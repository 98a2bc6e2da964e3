import { z } from "zod";

import { DependenciesSchema } from "../core/config.js";

// =============================================================================
// SCHEMA
// =============================================================================

// Unknown keys pass through so rebuilding a BOM never drops fields written by other tools.

export const BomServiceSchema = z
  .object({
    commit: z.string().min(1),
    version: z.string().min(1),
    gitPrefix: z.string().min(1).optional(),
  })
  .passthrough();

export const BomArtifactSourcesSchema = z
  .object({
    gitPrefix: z.string().min(1).optional(),
    gitBranch: z.string().min(1).optional(),
    debianRepository: z.string().min(1).optional(),
    dockerRegistry: z.string().min(1).optional(),
    googleImageProject: z.string().min(1).optional(),
  })
  .passthrough();

export const BomSchema = z
  .object({
    version: z.union([z.string().min(1), z.number()]).transform(String),
    timestamp: z.string().optional(),
    artifactSources: BomArtifactSourcesSchema.default({}),
    dependencies: DependenciesSchema.nullable().optional(),
    services: z.record(BomServiceSchema.nullable()).default({}),
  })
  .passthrough();

// =============================================================================
// TYPES
// =============================================================================

export type BomService = z.infer<typeof BomServiceSchema>;
export type BomArtifactSources = z.infer<typeof BomArtifactSourcesSchema>;
export type Bom = z.infer<typeof BomSchema>;

/** The build-number suffix of a service version ("1.2.3-42" -> "42"). */
export function serviceBuildNumber(serviceVersion: string): string | null {
  const dash = serviceVersion.indexOf("-");
  if (dash < 0 || dash === serviceVersion.length - 1) return null;
  return serviceVersion.slice(dash + 1);
}
