/**
 * ReleasePublisher stores BOMs and release records.
 * Purpose: keep the release commands independent of where BOMs are stored.
 * Assumptions: BOM versions are unique keys in the store.
 * Usage: await publisher.publishBom(bom); const bom = await publisher.retrieveBomVersion("master-42").
 */

import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";
import { z } from "zod";

import { parseBom, dumpBom } from "../bom/bom-io.js";
import type { Bom } from "../bom/bom.js";
import { formatIssues } from "../core/config-loader.js";
import { ConfigError } from "../core/errors.js";
import { isoNow } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReleaseRecord = {
  version: string;
  alias: string;
  changelogUri: string | null;
  minDependencyVersion: string | null;
};

export interface ReleasePublisher {
  retrieveBomVersion(version: string): Promise<Bom>;
  publishBom(bom: Bom): Promise<string>;
  publishRelease(release: ReleaseRecord): Promise<void>;
}

const ReleaseEntrySchema = z.object({
  version: z.string(),
  alias: z.string(),
  changelog_uri: z.string().nullable(),
  min_dependency_version: z.string().nullable(),
  published_at: z.string(),
});

const ReleasesFileSchema = z.object({
  releases: z.array(ReleaseEntrySchema).default([]),
});

export type PublishedRelease = z.infer<typeof ReleaseEntrySchema>;

// =============================================================================
// FILESYSTEM STORE
// =============================================================================

/**
 * Stores BOMs under `<storeDir>/bom/<version>.yml` and release records in
 * `<storeDir>/releases.yml`.
 */
export class FilesystemReleasePublisher implements ReleasePublisher {
  constructor(
    public readonly storeDir: string,
    private readonly now: () => string = isoNow,
  ) {}

  bomPath(version: string): string {
    return path.join(this.storeDir, "bom", `${version}.yml`);
  }

  get releasesPath(): string {
    return path.join(this.storeDir, "releases.yml");
  }

  async retrieveBomVersion(version: string): Promise<Bom> {
    const bomPath = this.bomPath(version);
    if (!(await fse.pathExists(bomPath))) {
      throw new ConfigError(`BOM version "${version}" is not in the store at ${this.storeDir}`);
    }
    return parseBom(await fse.readFile(bomPath, "utf8"), bomPath);
  }

  async publishBom(bom: Bom): Promise<string> {
    const bomPath = this.bomPath(bom.version);
    await fse.ensureDir(path.dirname(bomPath));
    await fse.writeFile(bomPath, dumpBom(bom), "utf8");
    return bomPath;
  }

  async publishRelease(release: ReleaseRecord): Promise<void> {
    const releases = await this.listReleases();
    releases.push({
      version: release.version,
      alias: release.alias,
      changelog_uri: release.changelogUri,
      min_dependency_version: release.minDependencyVersion,
      published_at: this.now(),
    });

    await fse.ensureDir(this.storeDir);
    await fse.writeFile(this.releasesPath, yaml.dump({ releases }, { lineWidth: -1 }), "utf8");
  }

  async listReleases(): Promise<PublishedRelease[]> {
    if (!(await fse.pathExists(this.releasesPath))) {
      return [];
    }

    const doc: unknown = yaml.load(await fse.readFile(this.releasesPath, "utf8"));
    const parsed = ReleasesFileSchema.safeParse(doc ?? {});
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid release index at ${this.releasesPath}:\n${formatIssues(parsed.error.issues)}`,
        parsed.error,
      );
    }
    return parsed.data.releases;
  }
}
