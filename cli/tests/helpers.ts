import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import {
  type EnvGetter,
  resolvePortValue,
  resolveStoreConfig,
} from "@promogen/shared/runtime/base";
import type { CliRuntime } from "../_shared/context.ts";

export function createTestRuntime(
  cwd: string,
  env: Record<string, string | undefined> = {},
): CliRuntime {
  const getEnv: EnvGetter = (key) => env[key];
  return {
    loadConfig: (overrides) => resolveStoreConfig(getEnv, cwd, overrides),
    getPortValue: () => resolvePortValue(getEnv),
  };
}

export function captureConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    warn: vi.spyOn(console, "warn").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
    debug: vi.spyOn(console, "debug").mockImplementation(() => undefined),
  };
}

export async function createWorkspace(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), "promogen-cli-"));
}

export async function writeEvent(
  eventsDir: string,
  folder: string,
  meta: Record<string, unknown>,
): Promise<void> {
  const directory = path.join(eventsDir, folder);
  await fs.mkdir(directory, { recursive: true });
  await fs.writeFile(path.join(directory, "meta.json"), JSON.stringify(meta));
  await fs.writeFile(path.join(directory, "cover.jpg"), "jpeg");
}
