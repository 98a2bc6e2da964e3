/*
Purpose: build-bom command; summarize every in-BOM repository and render the BOM.
Assumptions: branch mode; with refreshFromBom the prior BOM seeds services and dependencies.
Usage: const { bom, bomPath } = await buildBom(context, database, { refreshFromBom, publish });
*/

import path from "node:path";

import type { ReleaseContext } from "../app/context.js";
import { AggregatingRepositoryCommand } from "../app/repository-command.js";
import { BomBuilder } from "../bom/bom-builder.js";
import { loadBomFile, writeBomFile } from "../bom/bom-io.js";
import type { Bom } from "../bom/bom.js";
import type { RepositoryDatabase } from "../core/config.js";
import type { RepositoryDescriptor, SourceInfo } from "../core/repository.js";
import { BranchSourceCodeManager } from "../scm/branch-scm.js";
import { inBomFilter } from "../scm/source-code-manager.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildBomOptions = {
  /** Rebuild from this prior BOM instead of starting from defaults. */
  refreshFromBom?: string;
  /** Also store the BOM through the release publisher. */
  publish?: boolean;
};

export type BuildBomResult = {
  bom: Bom;
  bomPath: string;
  publishedAt: string | null;
};

// =============================================================================
// COMMAND
// =============================================================================

export class BuildBomCommand extends AggregatingRepositoryCommand<SourceInfo, Bom> {
  constructor(
    context: ReleaseContext,
    scm: BranchSourceCodeManager,
    private readonly builder: BomBuilder,
  ) {
    super(context, scm, { filter: inBomFilter });
  }

  protected processRepository(repository: RepositoryDescriptor): Promise<SourceInfo> {
    return this.scm.lookupSourceInfo(repository);
  }

  protected postprocess(results: Record<string, SourceInfo>): Bom {
    for (const repository of this.repositories) {
      this.builder.addRepository(repository, results[repository.name]);
    }
    return this.builder.build();
  }
}

export async function buildBom(
  context: ReleaseContext,
  database: RepositoryDatabase,
  options: BuildBomOptions = {},
): Promise<BuildBomResult> {
  const scm = new BranchSourceCodeManager(context, database);
  const builder = options.refreshFromBom
    ? BomBuilder.newFromBom(context, scm, loadBomFile(options.refreshFromBom))
    : new BomBuilder(context, scm);

  const bom = await new BuildBomCommand(context, scm, builder).run();

  const bomPath =
    context.config.bom_path ?? path.join(context.config.output_dir, `${bom.version}.yml`);
  writeBomFile(bomPath, bom);
  context.logger.log({
    type: "bom.written",
    payload: { path: bomPath, version: bom.version, services: Object.keys(bom.services).length },
  });
  console.log(`Wrote BOM ${bom.version} to ${bomPath}`);

  let publishedAt: string | null = null;
  if (options.publish) {
    publishedAt = await context.publisher.publishBom(bom);
    context.logger.log({ type: "bom.published", payload: { version: bom.version, location: publishedAt } });
    console.log(`Published BOM ${bom.version} to ${publishedAt}`);
  }

  return { bom, bomPath, publishedAt };
}
