import { describe, expect, it } from "vitest";
import {
  buildEventImagePath,
  createIndexDocument,
  toIndexedEvent,
} from "../../src/utils/event-normalizer-util.ts";
import type { EventMeta } from "../../src/types.ts";

const baseMeta: EventMeta = {
  title: "Open Air",
  date: "2026-06-20",
  time: "18:00",
  image: "cover.jpg",
};

describe("event-normalizer-util", () => {
  it("puts the folder first and keeps the record fields", () => {
    const indexed = toIndexedEvent(baseMeta, "2026-06-20-open-air");

    expect(Object.keys(indexed)).toEqual([
      "folder",
      "title",
      "date",
      "time",
      "image",
    ]);
    expect(indexed.folder).toBe("2026-06-20-open-air");
  });

  it("wraps events in a versioned document without timestamps", () => {
    const doc = createIndexDocument([toIndexedEvent(baseMeta, "a")]);

    expect(doc).toEqual({
      version: 1,
      events: [{ folder: "a", ...baseMeta }],
    });
  });

  it("builds image paths relative to the events base url", () => {
    const event = { folder: "2026-06-20-open air", image: "cover.jpg" };

    expect(buildEventImagePath(event)).toBe(
      "events/2026-06-20-open%20air/cover.jpg",
    );
    expect(buildEventImagePath(event, "https://cdn.example.com/events/")).toBe(
      "https://cdn.example.com/events/2026-06-20-open%20air/cover.jpg",
    );
    expect(buildEventImagePath(event, "")).toBe(
      "2026-06-20-open%20air/cover.jpg",
    );
  });
});
