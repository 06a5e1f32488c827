/**
 * Frontend configuration constants
 *
 * Environment variables must be prefixed with VITE_ to be visible in the browser.
 */

import { createBrowserRuntimeConfig } from '@promogen/shared/runtime/browser';

const WEB_RUNTIME_CONFIG = createBrowserRuntimeConfig({
  MODE: import.meta.env.MODE,
  VITE_EVENTS_BASE_URL: import.meta.env.VITE_EVENTS_BASE_URL,
});

/**
 * Where the event folders are published, relative to the page by default
 */
export const EVENTS_BASE_URL = WEB_RUNTIME_CONFIG.eventsBaseUrl;

export const INDEX_URL = WEB_RUNTIME_CONFIG.indexUrl;

export const isDevelopment = WEB_RUNTIME_CONFIG.isDevelopment;

export { WEB_RUNTIME_CONFIG };
