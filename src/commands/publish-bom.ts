import type { ReleaseContext } from "../app/context.js";
import { loadBomFile } from "../bom/bom-io.js";

/**
 * Stores an existing BOM file through the release publisher and returns where it went.
 */
export async function publishBom(context: ReleaseContext, bomPath: string): Promise<string> {
  const bom = loadBomFile(bomPath);

  const location = await context.metrics.trackOutcome(
    "command.outcome",
    { command: context.command },
    () => context.publisher.publishBom(bom),
  );

  context.logger.log({ type: "bom.published", payload: { version: bom.version, location } });
  console.log(`Published BOM ${bom.version} to ${location}`);
  return location;
}
