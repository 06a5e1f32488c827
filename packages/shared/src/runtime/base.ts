import path from "node:path";
import { EVENT_STORE, PREVIEW_SERVER } from "../config/index.ts";
import type { LogFormat } from "../types.ts";

export type EnvGetter = (key: string) => string | undefined;

const DEFAULT_ENVIRONMENT = "development";

const BOOLEAN_TRUE_VALUES = new Set(["true", "1", "yes"]);

const LOG_FORMATS: readonly LogFormat[] = ["json", "text"];

export const ENV_KEYS = {
  EVENTS_DIR: "PROMOGEN_EVENTS_DIR",
  SITE_DIR: "PROMOGEN_SITE_DIR",
  LOG_FORMAT: "PROMOGEN_LOG_FORMAT",
  DEBUG: "PROMOGEN_DEBUG",
  PORT: "PORT",
} as const;

export interface StoreConfig {
  eventsDir: string;
  indexPath: string;
  siteDir: string;
  logFormat: LogFormat;
  debug: boolean;
}

/**
 * Values coming from CLI flags. They win over the environment.
 */
export interface StoreConfigOverrides {
  eventsDir?: string;
  siteDir?: string;
  debug?: boolean;
}

export const stringToBoolean = (value: unknown): boolean => {
  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value !== "string") {
    return false;
  }

  return BOOLEAN_TRUE_VALUES.has(value.toLowerCase());
};

export const resolveEnvValue = (
  getEnv: EnvGetter,
  key: string,
  fallback?: string,
): string | undefined => {
  const value = getEnv(key);
  return value ?? fallback;
};

export const resolveLogFormat = (
  getEnv: EnvGetter,
  fallback: LogFormat = "text",
): LogFormat => {
  const value = resolveEnvValue(getEnv, ENV_KEYS.LOG_FORMAT)?.toLowerCase();
  return LOG_FORMATS.find((format) => format === value) ?? fallback;
};

/**
 * Port for the preview server as a raw string; the serve command validates it.
 */
export const resolvePortValue = (getEnv: EnvGetter): string =>
  resolveEnvValue(getEnv, ENV_KEYS.PORT) ??
    String(PREVIEW_SERVER.DEFAULT_PORT);

export const resolveStoreConfig = (
  getEnv: EnvGetter,
  cwd: string,
  overrides: StoreConfigOverrides = {},
): StoreConfig => {
  const eventsDir = path.resolve(
    cwd,
    overrides.eventsDir ??
      resolveEnvValue(getEnv, ENV_KEYS.EVENTS_DIR, EVENT_STORE.DEFAULT_DIR) ??
      EVENT_STORE.DEFAULT_DIR,
  );

  const siteDir = path.resolve(
    cwd,
    overrides.siteDir ??
      resolveEnvValue(
        getEnv,
        ENV_KEYS.SITE_DIR,
        PREVIEW_SERVER.DEFAULT_SITE_DIR,
      ) ??
      PREVIEW_SERVER.DEFAULT_SITE_DIR,
  );

  // CI runs with ENVIRONMENT=production and wants one JSON object per line
  const isProduction = isProductionEnvironment(getEnv);

  return {
    eventsDir,
    indexPath: path.join(eventsDir, EVENT_STORE.INDEX_FILENAME),
    siteDir,
    logFormat: resolveLogFormat(getEnv, isProduction ? "json" : "text"),
    debug: overrides.debug || stringToBoolean(getEnv(ENV_KEYS.DEBUG)),
  };
};

/**
 * `ENVIRONMENT` wins over `NODE_ENV`; neither set means development.
 */
export const isProductionEnvironment = (getEnv: EnvGetter): boolean => {
  const env =
    resolveEnvValue(getEnv, "ENVIRONMENT") ??
    resolveEnvValue(getEnv, "NODE_ENV") ??
    DEFAULT_ENVIRONMENT;

  return env === "production";
};
