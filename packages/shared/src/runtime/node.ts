import "dotenv/config";
import process from "node:process";
import {
  type EnvGetter,
  resolvePortValue,
  resolveStoreConfig,
  type StoreConfig,
  type StoreConfigOverrides,
} from "./base.ts";

export const envGetter: EnvGetter = (key) => process.env[key];

export const loadStoreConfig = (
  overrides: StoreConfigOverrides = {},
): StoreConfig => resolveStoreConfig(envGetter, process.cwd(), overrides);

export const getPortValue = (): string => resolvePortValue(envGetter);
