import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const sharpMock = vi.hoisted(() => ({ toFile: vi.fn() }));

interface SharpPipelineStub {
  flatten(): SharpPipelineStub;
  jpeg(): SharpPipelineStub;
  toFile(destination: string): Promise<unknown>;
}

vi.mock("sharp", () => ({
  default: vi.fn(() => {
    const pipeline: SharpPipelineStub = {
      flatten: () => pipeline,
      jpeg: () => pipeline,
      toFile: (destination) => sharpMock.toFile(destination),
    };
    return pipeline;
  }),
}));

import { runCli } from "../index.ts";
import { runNewEventCommand } from "../new-event/index.ts";
import { parseNewEventArgs } from "../new-event/schema.ts";
import { captureConsole, createTestRuntime, createWorkspace } from "./helpers.ts";

describe("new-event/schema", () => {
  it("maps flags onto event fields", () => {
    expect(
      parseNewEventArgs([
        "--date",
        "2026-03-02",
        "--title",
        "Rooftop Session",
        "--coupon",
        "EARLY10",
        "--ticket",
        "https://tickets.example.com/rooftop",
        "--promoter",
        "https://social.example.com/crew",
        "--image",
        "flyer.png",
        "--events-dir",
        "shows",
      ]),
    ).toEqual({
      input: {
        title: "Rooftop Session",
        date: "2026-03-02",
        coupon_code: "EARLY10",
        ticket_url: "https://tickets.example.com/rooftop",
        promoter_url: "https://social.example.com/crew",
        imagePath: "flyer.png",
      },
      eventsDir: "shows",
    });
  });

  it("requires --date and --title", () => {
    expect(() => parseNewEventArgs(["--time", "21:00"])).toThrow(
      "Invalid arguments: --date: Required; --title: Required",
    );
  });
});

describe("new command", () => {
  let cwd: string;
  let eventsDir: string;
  let output: ReturnType<typeof captureConsole>;

  beforeEach(async () => {
    cwd = await createWorkspace();
    eventsDir = path.join(cwd, "events");
    output = captureConsole();
    sharpMock.toFile.mockReset();
    sharpMock.toFile.mockImplementation(async (destination: string) => {
      await fs.writeFile(destination, "jpeg-bytes");
      return {};
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(cwd, { recursive: true, force: true });
  });

  it("creates the event folder and exits 0", async () => {
    const code = await runCli(
      [
        "new",
        "--date",
        "2026-03-02",
        "--title",
        "Rooftop Session",
        "--time",
        "22:00",
        "--location",
        "Dock 4",
        "--coupon",
        "EARLY10",
      ],
      createTestRuntime(cwd),
    );

    expect(code).toBe(0);
    const directory = path.join(eventsDir, "2026-03-02-rooftop-session");
    const meta = JSON.parse(
      await fs.readFile(path.join(directory, "meta.json"), "utf8"),
    );
    expect(meta).toEqual({
      title: "Rooftop Session",
      date: "2026-03-02",
      time: "22:00",
      location: "Dock 4",
      description: "",
      ticket_url: "",
      promoter_url: "",
      coupon_code: "EARLY10",
      image: "cover.jpg",
    });
    expect(output.warn).toHaveBeenCalledWith(
      `[WARNING] No image given, replace the empty cover before publishing cover=${
        path.join(directory, "cover.jpg")
      }`,
    );
  });

  it("converts the given image into cover.jpg", async () => {
    const imagePath = path.join(cwd, "flyer.png");
    await fs.writeFile(imagePath, "png-bytes");

    const result = await runNewEventCommand(
      ["--date", "2026-04-11", "--title", "Warehouse", "--image", imagePath],
      createTestRuntime(cwd),
    );

    expect(result.cover).toBe("converted");
    expect(sharpMock.toFile).toHaveBeenCalledWith(
      expect.stringMatching(/cover\.jpg$/),
    );
    expect(
      await fs.readFile(path.join(result.directory, "cover.jpg"), "utf8"),
    ).toBe("jpeg-bytes");
  });

  it("refuses to overwrite an existing event", async () => {
    const argv = ["new", "--date", "2026-03-02", "--title", "Rooftop Session"];

    expect(await runCli(argv, createTestRuntime(cwd))).toBe(0);
    expect(await runCli(argv, createTestRuntime(cwd))).toBe(1);

    expect(output.error).toHaveBeenCalledWith(
      `[ERROR] Folder already exists: ${
        path.join(eventsDir, "2026-03-02-rooftop-session")
      } code=SCAFFOLD_COLLISION`,
    );
  });

  it("rejects a malformed date before touching the disk", async () => {
    const code = await runCli(
      ["new", "--date", "03/02/2026", "--title", "Rooftop Session"],
      createTestRuntime(cwd),
    );

    expect(code).toBe(1);
    expect(output.error).toHaveBeenCalledWith(
      '[ERROR] Invalid event details: date: Bad date format: "03/02/2026" (expected YYYY-MM-DD) code=SCAFFOLD_VALIDATION_FAILED',
    );
    await expect(fs.access(eventsDir)).rejects.toThrow();
  });

  it("fails when the image cannot be read", async () => {
    const missing = path.join(cwd, "missing.png");

    const code = await runCli(
      ["new", "--date", "2026-03-02", "--title", "Ghost", "--image", missing],
      createTestRuntime(cwd),
    );

    expect(code).toBe(1);
    expect(output.error).toHaveBeenCalledWith(
      `[ERROR] Could not read or copy image: ${missing} code=IMAGE_COPY_FAILED`,
    );
  });
});
