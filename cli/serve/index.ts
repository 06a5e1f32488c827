import type { Server } from "node:http";
import express from "express";
import {
  PREVIEW_SERVER,
  pathExists,
  type StructuredLogger,
  StoreRootMissingError,
} from "@promogen/shared";
import { createCliLogging, type CliRuntime } from "../_shared/context.ts";
import { parseServeArgs } from "./schema.ts";

// Local stand-in for GitHub Pages: the built site at / and the events directory
// at /events, which is where the published site finds them too.

export interface PreviewAppOptions {
  siteDir: string;
  eventsDir: string;
  logger: StructuredLogger;
}

export interface PreviewServer {
  url: string;
  port: number;
  server: Server;
  close(): Promise<void>;
}

export function createPreviewApp(options: PreviewAppOptions): express.Express {
  const app = express();

  app.use((req, _res, next) => {
    options.logger.debug("HTTP request received", {
      method: req.method,
      path: req.path,
    });
    next();
  });

  app.use(
    PREVIEW_SERVER.EVENTS_MOUNT,
    express.static(options.eventsDir, { dotfiles: "ignore" }),
  );
  app.use(express.static(options.siteDir));

  return app;
}

/**
 * Startup errors reject; once listening, later errors are logged.
 */
function listen(
  app: express.Express,
  port: number,
  logger: StructuredLogger,
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);

    const onStartupError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onStartupError);
      server.on("error", (error) => {
        logger.error("Preview server error", error);
      });
      resolve(server);
    };

    server.once("listening", onListening);
    server.once("error", onStartupError);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}

/**
 * Start the preview server. Resolves once it is listening.
 */
export async function runServeCommand(
  argv: readonly string[],
  runtime: CliRuntime,
): Promise<PreviewServer> {
  const args = parseServeArgs(argv, runtime.getPortValue());
  const config = runtime.loadConfig({
    eventsDir: args.eventsDir,
    siteDir: args.siteDir,
  });
  const { logger } = createCliLogging(config);

  if (!(await pathExists(config.eventsDir))) {
    throw new StoreRootMissingError(config.eventsDir);
  }
  if (!(await pathExists(config.siteDir))) {
    logger.warn("Site directory not found, run the web build first", {
      siteDir: config.siteDir,
    });
  }

  const server = await listen(
    createPreviewApp({
      siteDir: config.siteDir,
      eventsDir: config.eventsDir,
      logger,
    }),
    args.port,
    logger,
  );

  const address = server.address();
  const port = typeof address === "object" && address !== null
    ? address.port
    : args.port;
  const url = `http://localhost:${port}/`;

  logger.info("Preview server listening", {
    url,
    siteDir: config.siteDir,
    eventsDir: config.eventsDir,
  });

  return { url, port, server, close: () => closeServer(server) };
}
