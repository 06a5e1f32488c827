import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const sharpMock = vi.hoisted(() => ({
  toFile: vi.fn(),
}));

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

import {
  assertImageReadable,
  writeCoverImage,
  writePlaceholderCover,
} from "../../src/services/image-service.ts";
import { ImageCopyError } from "../../src/utils/error-util.ts";

describe("services/image-service", () => {
  let workspace: string;
  let source: string;
  const logger = { warn: vi.fn() };

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), "promogen-image-"));
    source = path.join(workspace, "flyer.webp");
    await fs.writeFile(source, "webp-bytes");
    logger.warn.mockReset();
    sharpMock.toFile.mockReset();
  });

  afterEach(async () => {
    await fs.rm(workspace, { recursive: true, force: true });
  });

  describe("assertImageReadable", () => {
    it("accepts a readable file", async () => {
      await expect(assertImageReadable(source)).resolves.toBeUndefined();
    });

    it("rejects a missing file", async () => {
      await expect(
        assertImageReadable(path.join(workspace, "nope.jpg")),
      ).rejects.toBeInstanceOf(ImageCopyError);
    });

    it("rejects a directory", async () => {
      await expect(assertImageReadable(workspace)).rejects.toMatchObject({
        code: "IMAGE_COPY_FAILED",
        imagePath: workspace,
      });
    });
  });

  describe("writeCoverImage", () => {
    it("re-encodes through sharp when it can", async () => {
      sharpMock.toFile.mockResolvedValue({});
      const destination = path.join(workspace, "cover.jpg");

      await expect(writeCoverImage(source, destination, logger)).resolves.toBe(
        "converted",
      );
      expect(sharpMock.toFile).toHaveBeenCalledWith(destination);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("falls back to a byte copy", async () => {
      sharpMock.toFile.mockRejectedValue(new Error("unsupported"));
      const destination = path.join(workspace, "cover.jpg");

      await expect(writeCoverImage(source, destination, logger)).resolves.toBe(
        "copied",
      );
      expect(await fs.readFile(destination, "utf8")).toBe("webp-bytes");
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it("fails when the copy target cannot be written", async () => {
      sharpMock.toFile.mockRejectedValue(new Error("unsupported"));

      await expect(
        writeCoverImage(
          source,
          path.join(workspace, "missing-dir", "cover.jpg"),
          logger,
        ),
      ).rejects.toBeInstanceOf(ImageCopyError);
    });
  });

  it("writes an empty placeholder", async () => {
    const destination = path.join(workspace, "cover.jpg");

    await expect(writePlaceholderCover(destination)).resolves.toBe(
      "placeholder",
    );
    expect((await fs.stat(destination)).size).toBe(0);
  });
});
