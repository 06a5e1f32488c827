import { describe, expect, it } from "vitest";
import {
  compareEvents,
  partitionEvents,
  sortEvents,
  toDateKey,
} from "../../src/utils/event-order-util.ts";

const event = (folder: string, date: string, time?: string) => ({
  folder,
  date,
  ...(time !== undefined && { time }),
});

describe("event-order-util", () => {
  describe("sortEvents", () => {
    it("orders by date ascending", () => {
      const sorted = sortEvents([
        event("2026-03-02-spring", "2026-03-02"),
        event("2026-02-10-winter", "2026-02-10"),
      ]);

      expect(sorted.map((e) => e.date)).toEqual(["2026-02-10", "2026-03-02"]);
    });

    it("orders same-date events by time, treating a missing time as 00:00", () => {
      const sorted = sortEvents([
        event("c", "2026-05-01", "22:00"),
        event("b", "2026-05-01"),
        event("a", "2026-05-01", "09:30"),
      ]);

      expect(sorted.map((e) => e.folder)).toEqual(["b", "a", "c"]);
    });

    it("breaks date and time ties by folder name", () => {
      const sorted = sortEvents([
        event("zeta", "2026-05-01", "20:00"),
        event("Alpha", "2026-05-01", "20:00"),
        event("alpha", "2026-05-01", "20:00"),
      ]);

      // code-unit order: uppercase before lowercase
      expect(sorted.map((e) => e.folder)).toEqual(["Alpha", "alpha", "zeta"]);
    });

    it("does not mutate its input", () => {
      const input = [event("b", "2026-02-01"), event("a", "2026-01-01")];

      sortEvents(input);

      expect(input.map((e) => e.folder)).toEqual(["b", "a"]);
    });
  });

  describe("compareEvents", () => {
    it("returns 0 only for identical keys", () => {
      expect(
        compareEvents(event("a", "2026-01-01"), event("a", "2026-01-01", "00:00")),
      ).toBe(0);
      expect(
        compareEvents(event("a", "2026-01-01"), event("b", "2026-01-01")),
      ).toBe(-1);
      expect(
        compareEvents(event("a", "2026-01-02"), event("b", "2026-01-01")),
      ).toBe(1);
    });
  });

  describe("toDateKey", () => {
    it("formats the local calendar date", () => {
      expect(toDateKey(new Date(2026, 0, 1, 23, 59))).toBe("2026-01-01");
      expect(toDateKey(new Date(2025, 11, 31, 0, 0))).toBe("2025-12-31");
    });
  });

  describe("partitionEvents", () => {
    const now = new Date(2026, 0, 1, 12, 0);

    it("classifies today's event as upcoming and yesterday's as past", () => {
      const { upcoming, past } = partitionEvents(
        [event("old", "2025-12-31"), event("today", "2026-01-01")],
        now,
      );

      expect(upcoming.map((e) => e.folder)).toEqual(["today"]);
      expect(past.map((e) => e.folder)).toEqual(["old"]);
    });

    it("keeps today's event upcoming even after its start time", () => {
      const { upcoming } = partitionEvents(
        [event("morning", "2026-01-01", "08:00")],
        now,
      );

      expect(upcoming).toHaveLength(1);
    });

    it("keeps upcoming in index order and lists past most recent first", () => {
      const { upcoming, past } = partitionEvents(
        [
          event("p1", "2025-10-01"),
          event("p2", "2025-11-01"),
          event("p3", "2025-12-01"),
          event("u1", "2026-01-05"),
          event("u2", "2026-02-01"),
        ],
        now,
      );

      expect(upcoming.map((e) => e.folder)).toEqual(["u1", "u2"]);
      expect(past.map((e) => e.folder)).toEqual(["p3", "p2", "p1"]);
    });

    it("returns empty partitions for an empty index", () => {
      expect(partitionEvents([], now)).toEqual({ upcoming: [], past: [] });
    });
  });
});
