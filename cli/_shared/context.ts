import {
  createServiceLoggerFromStructuredLogger,
  createStructuredLogger,
  type ServiceLogger,
  type StructuredLogger,
} from "@promogen/shared";
import type {
  StoreConfig,
  StoreConfigOverrides,
} from "@promogen/shared/runtime/base";

/**
 * What a command needs from the process. `main.ts` binds it to process.env and
 * the working directory; tests bind it to a temp directory.
 */
export interface CliRuntime {
  loadConfig(overrides?: StoreConfigOverrides): StoreConfig;
  getPortValue(): string;
}

export interface CliCommand {
  summary: string;
  usage: string;
  run(argv: readonly string[], runtime: CliRuntime): Promise<unknown>;
}

export interface CommandLogging {
  logger: StructuredLogger;
  serviceLogger: Required<ServiceLogger>;
}

export function createCliLogging(
  config: Pick<StoreConfig, "logFormat" | "debug">,
): CommandLogging {
  const logger = createStructuredLogger({
    format: config.logFormat,
    shouldLogDebug: () => config.debug,
  });

  return {
    logger,
    serviceLogger: createServiceLoggerFromStructuredLogger(logger),
  };
}
