/**
 * Snooze Manager
 *
 * "End meeting early" opens a snooze window that keeps the status at
 * "available" until the meeting would have ended, unless a different meeting
 * starts in the meantime.
 */

import {
  OVERLAP_LOOKAHEAD_SECONDS,
  describeMeeting,
  isOngoing,
  matchesAnchor,
  secondsUntilStart,
  type MeetingAnchor,
  type MeetingEvent,
} from "./meetings.js";
import type { PersistedState, StatePatch } from "./state-store.js";

// ============================================================================
// Types
// ============================================================================

export interface SnoozeWindow {
  until: Date;
  anchor: MeetingAnchor;
}

// ============================================================================
// Constants
// ============================================================================

/** Used when nothing is ongoing at the time the user ends the meeting. */
export const FALLBACK_SNOOZE_SECONDS = 5 * 60;

// ============================================================================
// Snooze lifecycle
// ============================================================================

/**
 * Open a snooze window anchored on the ongoing meeting that ends last. With
 * overlapping meetings this is the outer one, not the most recently started.
 */
export function beginSnooze(ongoing: MeetingEvent[], now: Date): SnoozeWindow {
  let latest: MeetingEvent | null = null;
  for (const event of ongoing) {
    if (!latest || event.end > latest.end) {
      latest = event;
    }
  }

  if (!latest) {
    console.log(
      `[Snooze] No ongoing meeting, snoozing for ${FALLBACK_SNOOZE_SECONDS / 60} minutes`
    );
    return {
      until: new Date(now.getTime() + FALLBACK_SNOOZE_SECONDS * 1000),
      anchor: { eventId: null, summary: null, start: null },
    };
  }

  console.log(`[Snooze] Snoozing until end of ${describeMeeting(latest)}`);
  return {
    until: latest.end,
    anchor: {
      eventId: latest.id,
      summary: latest.summary,
      start: latest.start,
    },
  };
}

/**
 * True when the event is a different meeting that is already ongoing or
 * starts within the 5 minute lookahead.
 */
export function isOverlapping(event: MeetingEvent, anchor: MeetingAnchor, now: Date): boolean {
  if (matchesAnchor(event, anchor)) {
    return false;
  }
  if (isOngoing(event, now)) {
    return true;
  }
  const seconds = secondsUntilStart(event, now);
  return seconds >= 0 && seconds <= OVERLAP_LOOKAHEAD_SECONDS;
}

/**
 * The overlapping meeting that starts first, if any.
 */
export function findOverlappingMeeting(
  events: MeetingEvent[],
  anchor: MeetingAnchor,
  now: Date
): MeetingEvent | null {
  let found: MeetingEvent | null = null;
  for (const event of events) {
    if (isOverlapping(event, anchor, now) && (!found || event.start < found.start)) {
      found = event;
    }
  }
  return found;
}

// ============================================================================
// Persistence
// ============================================================================

function parseDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function readAnchor(state: PersistedState): MeetingAnchor | null {
  const anchor: MeetingAnchor = {
    eventId: state.SNOOZE_EVENT_ID,
    summary: state.SNOOZE_EVENT_SUMMARY,
    start: parseDate(state.SNOOZE_EVENT_START),
  };
  if (!anchor.eventId && (anchor.summary === null || anchor.start === null)) {
    return null;
  }
  return anchor;
}

export function readSnooze(state: PersistedState): SnoozeWindow | null {
  const until = parseDate(state.SNOOZE_UNTIL);
  if (!until) return null;
  return {
    until,
    anchor: readAnchor(state) ?? { eventId: null, summary: null, start: null },
  };
}

export function snoozePatch(window: SnoozeWindow): StatePatch {
  return {
    SNOOZE_UNTIL: window.until.toISOString(),
    SNOOZE_EVENT_ID: window.anchor.eventId,
    SNOOZE_EVENT_SUMMARY: window.anchor.summary,
    SNOOZE_EVENT_START: window.anchor.start ? window.anchor.start.toISOString() : null,
  };
}

/**
 * Clears the snooze window, its anchor and any post-snooze hold.
 */
export function clearSnoozePatch(): StatePatch {
  return {
    SNOOZE_UNTIL: null,
    SNOOZE_EVENT_ID: null,
    SNOOZE_EVENT_SUMMARY: null,
    SNOOZE_EVENT_START: null,
    SNOOZE_HOLD_UNTIL: null,
  };
}
