import { buildEventIndex, type BuildIndexResult } from "@promogen/shared";
import { createCliLogging, type CliRuntime } from "../_shared/context.ts";
import { parseBuildArgs } from "./schema.ts";

// Skipped folders are reported but never fail the build; only a missing
// events directory or an unwritable index does.

export async function runBuildCommand(
  argv: readonly string[],
  runtime: CliRuntime,
): Promise<BuildIndexResult> {
  const args = parseBuildArgs(argv);
  const config = runtime.loadConfig({
    eventsDir: args.eventsDir,
    debug: args.verbose,
  });
  const { logger, serviceLogger } = createCliLogging(config);

  logger.debug("Building index", {
    eventsDir: config.eventsDir,
    dryRun: args.dryRun,
  });

  const result = await buildEventIndex(config.eventsDir, {
    indexPath: config.indexPath,
    dryRun: args.dryRun,
    logger: serviceLogger,
  });

  if (result.skipped.length > 0) {
    logger.warn("Some event folders were left out of the index", {
      skipped: result.skipped.map((entry) => entry.folder).join(","),
    });
  }

  return result;
}
