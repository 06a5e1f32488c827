import { EVENT_STORE } from "../config/index.ts";

export interface BrowserEnvLike {
  MODE?: string;
  NODE_ENV?: string;
  VITE_EVENTS_BASE_URL?: string;
}

export interface BrowserRuntimeConfig {
  eventsBaseUrl: string;
  indexUrl: string;
  nodeEnv: string;
  isDevelopment: boolean;
  isProduction: boolean;
}

const DEFAULT_ENVIRONMENT = "development";

// Relative by default so the site works when hosted under a sub-path
// (https://<user>.github.io/<repo>/).
export const createBrowserRuntimeConfig = (
  env: BrowserEnvLike,
): BrowserRuntimeConfig => {
  const nodeEnv = env.MODE ?? env.NODE_ENV ?? DEFAULT_ENVIRONMENT;

  const eventsBaseUrl = (
    (typeof env.VITE_EVENTS_BASE_URL === "string" &&
      env.VITE_EVENTS_BASE_URL.trim()) ||
    EVENT_STORE.DEFAULT_DIR
  ).replace(/\/+$/, "");

  return {
    eventsBaseUrl,
    indexUrl: `${eventsBaseUrl}/${EVENT_STORE.INDEX_FILENAME}`,
    nodeEnv,
    isDevelopment: nodeEnv === "development",
    isProduction: nodeEnv === "production",
  };
};
