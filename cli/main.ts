import process from "node:process";
import {
  getPortValue,
  loadStoreConfig,
} from "@promogen/shared/runtime/node";
import { runCli } from "./index.ts";

// exitCode rather than exit(): `serve` keeps the process alive after runCli resolves
process.exitCode = await runCli(process.argv.slice(2), {
  loadConfig: loadStoreConfig,
  getPortValue,
});
