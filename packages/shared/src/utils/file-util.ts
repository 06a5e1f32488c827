import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { JSON_INDENT } from "../config/index.ts";

/**
 * Two-space JSON with a trailing newline. Non-ASCII text is kept as-is.
 */
export function serializeJson(data: unknown): string {
  return `${JSON.stringify(data, null, JSON_INDENT)}\n`;
}

/**
 * Write to a sibling temp file and rename it over the target, so a reader
 * sees either the old content or the new one, never a partial file.
 */
export async function writeFileAtomic(
  filePath: string,
  contents: string,
): Promise<void> {
  const directory = path.dirname(filePath);
  const tempPath = path.join(
    directory,
    `.${path.basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`,
  );

  try {
    await fs.writeFile(tempPath, contents, "utf8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const contents = await fs.readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(contents);
  return parsed;
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
