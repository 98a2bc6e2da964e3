import { z } from "zod";

// =============================================================================
// RELEASE CONFIG
// =============================================================================

const ArtifactSourcesSchema = z
  .object({
    debian_repository: z.string().min(1).optional(),
    docker_registry: z.string().min(1).optional(),
    google_image_project: z.string().min(1).optional(),
  })
  .strict();

const PublishingSchema = z
  .object({
    bom_store_dir: z.string().min(1).default("bom-store"),
    changelog_base_url: z.string().min(1).optional(),
  })
  .strict();

export const ReleaseConfigSchema = z
  .object({
    input_dir: z.string().min(1).default("source_code"),
    output_dir: z.string().min(1).default("output"),
    repository_database_path: z.string().min(1),

    git_branch: z.string().min(1).optional(),
    git_fallback_branch: z.string().min(1).optional(),

    // "default" / "upstream" mean: whoever owns the repository in the database.
    github_owner: z.string().min(1).default("default"),
    github_filesystem_root: z.string().min(1).optional(),
    github_pull_ssh: z.boolean().default(false),
    github_disable_upstream_push: z.boolean().default(false),

    build_number: z.string().min(1).optional(),

    one_at_a_time: z.boolean().default(false),
    max_parallel: z.number().int().positive().default(8),
    only_repositories: z.array(z.string().min(1)).optional(),

    bom_path: z.string().min(1).optional(),
    bom_dependencies_path: z.string().min(1).optional(),
    tag_prefix: z.string().min(1).default("version"),
    ignore_services: z.array(z.string().min(1)).default([]),

    artifact_sources: ArtifactSourcesSchema.default({}),
    publishing: PublishingSchema.default({}),
  })
  .strict();

export type ReleaseConfig = z.infer<typeof ReleaseConfigSchema>;
export type ReleaseConfigInput = z.input<typeof ReleaseConfigSchema>;
export type ArtifactSourcesConfig = z.infer<typeof ArtifactSourcesSchema>;

// =============================================================================
// REPOSITORY DATABASE
// =============================================================================

const RepositoryEntrySchema = z
  .object({
    owner: z.string().min(1).optional(),
    origin_hostname: z.string().min(1).optional(),
    in_bom: z.boolean().optional(),
    service_name: z.string().min(1).optional(),
  })
  .passthrough();

export const RepositoryDatabaseSchema = z.object({
  default_git_owner: z.string().min(1).optional(),
  default_origin_hostname: z.string().min(1).optional(),
  repositories: z.record(RepositoryEntrySchema.nullable()).default({}),
});

export type RepositoryEntry = z.infer<typeof RepositoryEntrySchema>;
export type RepositoryDatabase = z.infer<typeof RepositoryDatabaseSchema>;

/**
 * A database entry overlaid on the database-wide defaults. This is what entry
 * filters see.
 */
export type MergedRepositoryEntry = RepositoryEntry & {
  owner?: string;
  origin_hostname?: string;
};

export type RepositoryEntryFilter = (name: string, entry: MergedRepositoryEntry) => boolean;

// =============================================================================
// DEPENDENCIES
// =============================================================================

export const DependencySchema = z.object({ version: z.string().min(1) }).passthrough();

export const DependenciesSchema = z.record(DependencySchema);

export type Dependency = z.infer<typeof DependencySchema>;
export type Dependencies = z.infer<typeof DependenciesSchema>;
