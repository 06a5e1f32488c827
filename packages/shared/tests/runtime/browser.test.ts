import { describe, expect, it } from "vitest";
import { createBrowserRuntimeConfig } from "../../src/runtime/browser.ts";

describe("runtime/browser createBrowserRuntimeConfig", () => {
  it("derives runtime flags and uses provided env overrides", () => {
    const config = createBrowserRuntimeConfig({
      MODE: "production",
      VITE_EVENTS_BASE_URL: "https://cdn.example.com/events/",
    });

    expect(config).toEqual({
      eventsBaseUrl: "https://cdn.example.com/events",
      indexUrl: "https://cdn.example.com/events/index.json",
      nodeEnv: "production",
      isDevelopment: false,
      isProduction: true,
    });
  });

  it("falls back to the relative events folder", () => {
    const config = createBrowserRuntimeConfig({
      NODE_ENV: "staging",
      VITE_EVENTS_BASE_URL: "   ",
    });

    expect(config).toEqual({
      eventsBaseUrl: "events",
      indexUrl: "events/index.json",
      nodeEnv: "staging",
      isDevelopment: false,
      isProduction: false,
    });
  });

  it("defaults to development when no mode is given", () => {
    const config = createBrowserRuntimeConfig({});

    expect(config.nodeEnv).toBe("development");
    expect(config.isDevelopment).toBe(true);
  });
});
