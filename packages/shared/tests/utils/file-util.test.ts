import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  pathExists,
  readJsonFile,
  serializeJson,
  writeFileAtomic,
} from "../../src/utils/file-util.ts";

describe("file-util", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "promogen-file-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("serializes with two-space indent, unicode intact and a trailing newline", () => {
    expect(serializeJson({ title: "ערב", n: 1 })).toBe(
      '{\n  "title": "ערב",\n  "n": 1\n}\n',
    );
  });

  it("replaces the target and leaves no temp file behind", async () => {
    const target = path.join(dir, "index.json");
    await fs.writeFile(target, "old");

    await writeFileAtomic(target, "new");

    expect(await fs.readFile(target, "utf8")).toBe("new");
    expect(await fs.readdir(dir)).toEqual(["index.json"]);
  });

  it("rejects when the target directory does not exist", async () => {
    await expect(
      writeFileAtomic(path.join(dir, "missing", "index.json"), "x"),
    ).rejects.toThrow();
  });

  it("reads JSON files", async () => {
    const file = path.join(dir, "meta.json");
    await fs.writeFile(file, '{"date":"2026-01-01"}');

    expect(await readJsonFile(file)).toEqual({ date: "2026-01-01" });
  });

  it("reports whether a path exists", async () => {
    expect(await pathExists(dir)).toBe(true);
    expect(await pathExists(path.join(dir, "nope"))).toBe(false);
  });
});
