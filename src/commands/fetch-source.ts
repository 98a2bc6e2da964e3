/*
Purpose: fetch-source command; make sure every selected repository has a local working copy.
Assumptions: branch mode by default; BOM mode pins each repository to the commit a BOM recorded.
Usage: const gitDirs = await fetchSource(context, database, { bomPath });
*/

import type { ReleaseContext } from "../app/context.js";
import { RepositoryCommand } from "../app/repository-command.js";
import { loadBomFile } from "../bom/bom-io.js";
import type { RepositoryDatabase } from "../core/config.js";
import type { RepositoryDescriptor } from "../core/repository.js";
import { BomSourceCodeManager } from "../scm/bom-scm.js";
import { BranchSourceCodeManager } from "../scm/branch-scm.js";
import type { SourceCodeManager } from "../scm/source-code-manager.js";

export type FetchSourceOptions = {
  /** Pin repositories to this BOM instead of tracking git_branch. */
  bomPath?: string;
};

export class FetchSourceCommand extends RepositoryCommand<string> {
  protected async processRepository(repository: RepositoryDescriptor): Promise<string> {
    return repository.gitDir;
  }

  protected override postprocess(results: Record<string, string>): Record<string, string> {
    for (const [name, gitDir] of Object.entries(results)) {
      console.log(`${name}: ${gitDir}`);
    }
    return results;
  }
}

export function sourceCodeManagerFor(
  context: ReleaseContext,
  database: RepositoryDatabase,
  bomPath: string | undefined,
): SourceCodeManager {
  return bomPath
    ? new BomSourceCodeManager(context, database, loadBomFile(bomPath))
    : new BranchSourceCodeManager(context, database);
}

/** Returns the working copy directory of each repository by name. */
export async function fetchSource(
  context: ReleaseContext,
  database: RepositoryDatabase,
  options: FetchSourceOptions = {},
): Promise<Record<string, string>> {
  const scm = sourceCodeManagerFor(context, database, options.bomPath);
  return new FetchSourceCommand(context, scm).run();
}
