/**
 * Status Resolver
 *
 * Decides which status to display from the current time, the nearest
 * meetings, the manual override and the snooze window. Pure: it returns the
 * status and a StatePatch, and the caller applies the patch.
 *
 * Order of evaluation:
 *   0. corrupted override (no timestamp) is cleared
 *   1. snooze ("meeting_ended_early"): expired, pre-empted, or holding "available"
 *   2. ongoing or imminent meeting -> in_meeting, clears other overrides
 *   3. override expiry (with the post-snooze hold extension)
 *   4. override status
 *   5. calendar status
 */

import type { ColorMap } from "./color-map.js";
import {
  MEETING_ENDED_EARLY,
  clearOverridePatch,
  isOverrideCorrupt,
  isOverrideExpired,
  type ManualOverride,
} from "./manual-override.js";
import {
  IMMINENT_WINDOW_SECONDS,
  describeMeeting,
  isImminent,
  isOngoing,
  secondsUntilStart,
  type MeetingAnchor,
  type MeetingEvent,
} from "./meetings.js";
import { clearSnoozePatch, findOverlappingMeeting, type SnoozeWindow } from "./snooze.js";
import type { StatePatch } from "./state-store.js";

// ============================================================================
// Types
// ============================================================================

export interface ResolveInput {
  now: Date;
  currentMeeting: MeetingEvent | null;
  nextMeeting: MeetingEvent | null;
  override: ManualOverride | null;
  snooze: SnoozeWindow | null;
  colorMap: ColorMap;
  /** Meetings checked for snooze overlap. Defaults to current + next. */
  candidates?: MeetingEvent[];
  /** The meeting a snooze or hold is anchored on, if it is still in the window. */
  anchorMeeting?: MeetingEvent | null;
}

export interface Resolution {
  status: string;
  /** Keyword-derived status of the ongoing meeting, before overrides apply. */
  calendarStatus: string;
  patch: StatePatch;
  reason: string;
}

// ============================================================================
// Constants
// ============================================================================

export const IN_MEETING = "in_meeting";
export const AVAILABLE = "available";

/** Step used when extending the post-snooze hold. */
export const HOLD_STEP_SECONDS = 60;

const NO_ANCHOR: MeetingAnchor = { eventId: null, summary: null, start: null };

// ============================================================================
// Calendar status
// ============================================================================

/**
 * Derive a status from the active event's title: the first color map key
 * (in declaration order) found in the summary, case-insensitively. An active
 * event that matches nothing is a meeting; no event means available.
 *
 * Only reported alongside the resolved status: an ongoing meeting always
 * displays as in_meeting.
 */
export function calendarStatusFor(event: MeetingEvent | null, colorMap: ColorMap): string {
  if (!event) return AVAILABLE;
  const summary = event.summary.toLowerCase();
  for (const key of colorMap.keys()) {
    if (summary.includes(key.toLowerCase())) {
      return key;
    }
  }
  return IN_MEETING;
}

function anchorOf(event: MeetingEvent): MeetingAnchor {
  return { eventId: event.id, summary: event.summary, start: event.start };
}

/**
 * A meeting other than the anchor that has started or starts within 60 seconds.
 */
function findInterveningMeeting(
  candidates: MeetingEvent[],
  anchor: MeetingAnchor,
  now: Date
): MeetingEvent | null {
  const overlap = findOverlappingMeeting(candidates, anchor, now);
  if (!overlap) return null;
  if (isOngoing(overlap, now) || secondsUntilStart(overlap, now) <= IMMINENT_WINDOW_SECONDS) {
    return overlap;
  }
  return null;
}

function holdDeadline(now: Date, meetingEnd: Date): Date {
  return new Date(Math.min(now.getTime() + HOLD_STEP_SECONDS * 1000, meetingEnd.getTime()));
}

// ============================================================================
// Resolver
// ============================================================================

export function resolveStatus(input: ResolveInput): Resolution {
  const { now, currentMeeting, nextMeeting, colorMap } = input;
  const anchorMeeting = input.anchorMeeting ?? null;
  const candidates =
    input.candidates ??
    [currentMeeting, nextMeeting].filter((e): e is MeetingEvent => e !== null);

  const active = currentMeeting && isOngoing(currentMeeting, now) ? currentMeeting : null;
  const calendarStatus = calendarStatusFor(active, colorMap);
  const patch: StatePatch = {};
  let override = input.override;
  let snooze = input.snooze;

  const clearAll = () => {
    Object.assign(patch, clearOverridePatch(), clearSnoozePatch());
    override = null;
    snooze = null;
  };

  // 0. A non-snooze override without a timestamp is a partial write.
  if (override && isOverrideCorrupt(override)) {
    console.warn(`[Resolver] Clearing override "${override.status}" with no timestamp`);
    clearAll();
  }

  // 1. Snooze window.
  if (override && override.status === MEETING_ENDED_EARLY) {
    const anchor = snooze?.anchor ?? (anchorMeeting ? anchorOf(anchorMeeting) : NO_ANCHOR);

    if (!snooze || now >= snooze.until) {
      const intervening = findInterveningMeeting(candidates, anchor, now);
      if (anchorMeeting && isOngoing(anchorMeeting, now) && !intervening) {
        const holdUntil = holdDeadline(now, anchorMeeting.end);
        console.log(
          `[Resolver] Snooze expired while ${describeMeeting(anchorMeeting)} is still ongoing, holding available until ${holdUntil.toISOString()}`
        );
        Object.assign(patch, {
          CURRENT_STATUS: AVAILABLE,
          MANUAL_STATUS_TIMESTAMP: now.getTime() / 1000,
          SNOOZE_UNTIL: null,
          SNOOZE_HOLD_UNTIL: holdUntil.toISOString(),
        });
        override = { status: AVAILABLE, setAt: now, expirySeconds: override.expirySeconds, holdUntil };
        snooze = null;
      } else {
        console.log("[Resolver] Snooze expired, returning to calendar status");
        clearAll();
      }
    } else {
      const overlap = findOverlappingMeeting(candidates, anchor, now);
      if (
        overlap &&
        (isOngoing(overlap, now) || secondsUntilStart(overlap, now) <= IMMINENT_WINDOW_SECONDS)
      ) {
        console.log(`[Resolver] Ending snooze, ${describeMeeting(overlap)} starts now`);
        clearAll();
      } else {
        if (overlap) {
          console.log(
            `[Resolver] Snoozed; ${describeMeeting(overlap)} starts in ${Math.round(secondsUntilStart(overlap, now))}s`
          );
        }
        return { status: AVAILABLE, calendarStatus, patch, reason: "snoozed" };
      }
    }
  }

  // 2. Ongoing or imminent meeting.
  const imminent = nextMeeting && isImminent(nextMeeting, now) ? nextMeeting : null;
  const preempting = active ?? imminent;
  if (preempting) {
    if (override && override.status !== IN_MEETING) {
      console.log(`[Resolver] ${describeMeeting(preempting)} pre-empts override "${override.status}"`);
      clearAll();
    }
    return {
      status: IN_MEETING,
      calendarStatus,
      patch,
      reason: `${active ? "ongoing" : "imminent"} ${describeMeeting(preempting)}`,
    };
  }

  // 3. Override expiry.
  if (override && isOverrideExpired(override, now)) {
    const anchor = snooze?.anchor ?? (anchorMeeting ? anchorOf(anchorMeeting) : NO_ANCHOR);
    if (
      override.holdUntil !== null &&
      override.status === AVAILABLE &&
      anchorMeeting &&
      isOngoing(anchorMeeting, now) &&
      !findInterveningMeeting(candidates, anchor, now)
    ) {
      const holdUntil = holdDeadline(now, anchorMeeting.end);
      console.log(`[Resolver] Extending available hold until ${holdUntil.toISOString()}`);
      patch.SNOOZE_HOLD_UNTIL = holdUntil.toISOString();
      override = { ...override, holdUntil };
    } else {
      console.log(`[Resolver] Override "${override.status}" expired`);
      clearAll();
    }
  }

  // 4. Manual override.
  if (override) {
    return { status: override.status, calendarStatus, patch, reason: "manual override" };
  }

  // 5. Calendar.
  return { status: calendarStatus, calendarStatus, patch, reason: "calendar" };
}

