/**
 * Snooze window tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { MeetingEvent } from "../lib/meetings.js";
import {
  FALLBACK_SNOOZE_SECONDS,
  beginSnooze,
  clearSnoozePatch,
  findOverlappingMeeting,
  isOverlapping,
  readAnchor,
  readSnooze,
  snoozePatch,
} from "../lib/snooze.js";
import { getDefaultState } from "../lib/state-store.js";

const NOW = new Date("2026-03-02T10:00:00.000Z");

function at(offsetMinutes: number): Date {
  return new Date(NOW.getTime() + offsetMinutes * 60 * 1000);
}

function meeting(
  id: string | null,
  summary: string,
  startOffset: number,
  endOffset: number
): MeetingEvent {
  return { id, summary, start: at(startOffset), end: at(endOffset) };
}

describe("Snooze", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("beginSnooze", () => {
    it("anchors on the ongoing meeting that ends last", () => {
      const window = beginSnooze(
        [meeting("inner", "Inner", -10, 10), meeting("outer", "Outer", -30, 45)],
        NOW
      );

      expect(window.until).toEqual(at(45));
      expect(window.anchor).toEqual({ eventId: "outer", summary: "Outer", start: at(-30) });
    });

    it("snoozes for five minutes when nothing is ongoing", () => {
      const window = beginSnooze([], NOW);

      expect(window.until.getTime() - NOW.getTime()).toBe(FALLBACK_SNOOZE_SECONDS * 1000);
      expect(window.anchor).toEqual({ eventId: null, summary: null, start: null });
    });
  });

  describe("overlap detection", () => {
    const anchor = { eventId: "ended", summary: "Ended early", start: at(-20) };

    it("ignores the anchor meeting itself", () => {
      expect(isOverlapping(meeting("ended", "Ended early", -20, 20), anchor, NOW)).toBe(false);
    });

    it("flags other meetings that are ongoing or start within five minutes", () => {
      expect(isOverlapping(meeting("b", "B", -1, 10), anchor, NOW)).toBe(true);
      expect(isOverlapping(meeting("c", "C", 5, 30), anchor, NOW)).toBe(true);
      expect(isOverlapping(meeting("d", "D", 6, 30), anchor, NOW)).toBe(false);
    });

    it("returns the overlapping meeting that starts first", () => {
      const events = [
        meeting("ended", "Ended early", -20, 20),
        meeting("c", "C", 4, 30),
        meeting("b", "B", 2, 30),
      ];
      expect(findOverlappingMeeting(events, anchor, NOW)?.id).toBe("b");
    });
  });

  describe("persistence", () => {
    it("writes and reads back a snooze window", () => {
      const window = beginSnooze([meeting("m1", "Review", -15, 15)], NOW);
      const state = { ...getDefaultState(), ...snoozePatch(window) };

      expect(state.SNOOZE_UNTIL).toBe("2026-03-02T10:15:00.000Z");
      expect(state.SNOOZE_EVENT_START).toBe("2026-03-02T09:45:00.000Z");
      expect(readSnooze(state)).toEqual(window);
    });

    it("reads no anchor without an id or a summary and start", () => {
      const state = { ...getDefaultState(), SNOOZE_EVENT_SUMMARY: "Review" };
      expect(readAnchor(state)).toBeNull();
    });

    it("reads no snooze from an invalid timestamp", () => {
      const state = { ...getDefaultState(), SNOOZE_UNTIL: "not a date" };
      expect(readSnooze(state)).toBeNull();
    });

    it("clears the window, the anchor and the hold", () => {
      expect(clearSnoozePatch()).toEqual({
        SNOOZE_UNTIL: null,
        SNOOZE_EVENT_ID: null,
        SNOOZE_EVENT_SUMMARY: null,
        SNOOZE_EVENT_START: null,
        SNOOZE_HOLD_UNTIL: null,
      });
    });
  });
});
