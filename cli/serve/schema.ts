import { z } from "zod";
import {
  type FlagOptions,
  optionalFlag,
  parseFlags,
  validateFlags,
} from "../_shared/args.ts";

export const SERVE_FLAGS = {
  string: ["port", "site-dir", "events-dir"],
  alias: { p: "port" },
} satisfies FlagOptions;

export const SERVE_USAGE = `Usage: promogen serve [options]

Serve the built site and the events directory for local preview.

Options:
  -p, --port <port>        Port to listen on (default: $PORT or 8000)
      --site-dir <dir>     Built site (default: ./web/dist)
      --events-dir <dir>   Events directory, mounted at /events (default: ./events)`;

const MAX_PORT = 65535;

export const portSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, "Port must be a whole number")
  .transform(Number)
  .refine((port) => port <= MAX_PORT, `Port must be at most ${MAX_PORT}`);

export type ServeArgs = {
  port: number;
  siteDir?: string;
  eventsDir?: string;
};

/**
 * @param defaultPort - Used when `--port` is absent, normally from `$PORT`
 */
export function parseServeArgs(
  argv: readonly string[],
  defaultPort: string,
): ServeArgs {
  const serveArgsSchema = z
    .object({
      port: optionalFlag
        .transform((value) => value ?? defaultPort)
        .pipe(portSchema),
      "site-dir": optionalFlag,
      "events-dir": optionalFlag,
    })
    .transform((flags) => ({
      port: flags.port,
      siteDir: flags["site-dir"],
      eventsDir: flags["events-dir"],
    }));

  return validateFlags(serveArgsSchema, parseFlags(argv, SERVE_FLAGS));
}
