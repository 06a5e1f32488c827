import { describeError, InvalidArgumentsError, isPromogenError } from "@promogen/shared";
import { isHelpRequested } from "./_shared/args.ts";
import {
  type CliCommand,
  createCliLogging,
  type CliRuntime,
} from "./_shared/context.ts";
import { runBuildCommand } from "./build/index.ts";
import { BUILD_USAGE } from "./build/schema.ts";
import { runNewEventCommand } from "./new-event/index.ts";
import { NEW_EVENT_USAGE } from "./new-event/schema.ts";
import { runServeCommand } from "./serve/index.ts";
import { SERVE_USAGE } from "./serve/schema.ts";

export const COMMANDS = {
  build: {
    summary: "Scan the events directory and write the index",
    usage: BUILD_USAGE,
    run: runBuildCommand,
  },
  new: {
    summary: "Create a new event folder",
    usage: NEW_EVENT_USAGE,
    run: runNewEventCommand,
  },
  serve: {
    summary: "Preview the built site locally",
    usage: SERVE_USAGE,
    run: runServeCommand,
  },
} satisfies Record<string, CliCommand>;

export type CommandName = keyof typeof COMMANDS;

export function isCommandName(name: string): name is CommandName {
  return Object.hasOwn(COMMANDS, name);
}

export function formatUsage(): string {
  const names = Object.keys(COMMANDS).filter(isCommandName);
  const width = Math.max(...names.map((name) => name.length));
  const lines = names.map((name) =>
    `  ${name.padEnd(width)}  ${COMMANDS[name].summary}`
  );

  return [
    "Usage: promogen <command> [options]",
    "",
    "Commands:",
    ...lines,
    "",
    'Run "promogen <command> --help" for the options of a command.',
  ].join("\n");
}

/**
 * Run one CLI invocation and return its exit code. Every failure is logged
 * here; nothing is thrown to the caller.
 */
export async function runCli(
  argv: readonly string[],
  runtime: CliRuntime,
): Promise<number> {
  const [name, ...rest] = argv;

  if (name === undefined || name === "--help" || name === "-h" || name === "help") {
    console.log(formatUsage());
    return name === undefined ? 1 : 0;
  }

  try {
    if (!isCommandName(name)) {
      throw new InvalidArgumentsError(`Unknown command: ${name}`);
    }

    const command: CliCommand = COMMANDS[name];
    if (isHelpRequested(rest)) {
      console.log(command.usage);
      return 0;
    }

    await command.run(rest, runtime);
    return 0;
  } catch (error) {
    const { logger } = createCliLogging(runtime.loadConfig());

    if (isPromogenError(error)) {
      logger.error(error.message, null, { code: error.code });
      if (error instanceof InvalidArgumentsError) {
        console.error(
          isCommandName(name)
            ? COMMANDS[name].usage
            : formatUsage(),
        );
      }
      return 1;
    }

    logger.critical("Unexpected error", error, {
      command: name,
      type: describeError(error).type,
    });
    return 1;
  }
}
