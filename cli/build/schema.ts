import { z } from "zod";
import {
  type FlagOptions,
  optionalFlag,
  parseFlags,
  validateFlags,
} from "../_shared/args.ts";

export const BUILD_FLAGS = {
  boolean: ["verbose", "dry-run"],
  string: ["events-dir"],
  alias: { v: "verbose" },
} satisfies FlagOptions;

export const BUILD_USAGE = `Usage: promogen build [options]

Scan the events directory and write events/index.json.

Options:
  -v, --verbose          Log every indexed event
      --dry-run          Scan and report without writing the index
      --events-dir <dir> Events directory (default: ./events)`;

const buildArgsSchema = z
  .object({
    verbose: z.boolean(),
    "dry-run": z.boolean(),
    "events-dir": optionalFlag,
  })
  .transform((flags) => ({
    verbose: flags.verbose,
    dryRun: flags["dry-run"],
    eventsDir: flags["events-dir"],
  }));

export type BuildArgs = z.output<typeof buildArgsSchema>;

export function parseBuildArgs(argv: readonly string[]): BuildArgs {
  return validateFlags(buildArgsSchema, parseFlags(argv, BUILD_FLAGS));
}
