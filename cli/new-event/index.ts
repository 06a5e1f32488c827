import path from "node:path";
import { createEventFolder, type ScaffoldResult } from "@promogen/shared";
import { createCliLogging, type CliRuntime } from "../_shared/context.ts";
import { parseNewEventArgs } from "./schema.ts";

export async function runNewEventCommand(
  argv: readonly string[],
  runtime: CliRuntime,
): Promise<ScaffoldResult> {
  const args = parseNewEventArgs(argv);
  const config = runtime.loadConfig({ eventsDir: args.eventsDir });
  const { logger, serviceLogger } = createCliLogging(config);

  const result = await createEventFolder(args.input, {
    storeRoot: config.eventsDir,
    logger: serviceLogger,
  });

  if (result.cover === "placeholder") {
    logger.warn("No image given, replace the empty cover before publishing", {
      cover: path.join(result.directory, result.metadata.image),
    });
  }

  return result;
}
