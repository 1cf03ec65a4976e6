/**
 * Meeting Events
 *
 * The calendar snapshot the resolver works from, plus the timing helpers
 * shared by the snooze and resolver logic.
 */

// ============================================================================
// Types
// ============================================================================

export interface MeetingEvent {
  id: string | null; // recurring instances sometimes come back without one
  summary: string;
  start: Date;
  end: Date;
}

/**
 * Identity of a meeting the user ended early. Matched by id, or by
 * summary + start when the id is missing.
 */
export interface MeetingAnchor {
  eventId: string | null;
  summary: string | null;
  start: Date | null;
}

export interface MeetingSelection {
  currentMeeting: MeetingEvent | null;
  nextMeeting: MeetingEvent | null;
  anchorMeeting: MeetingEvent | null;
}

// ============================================================================
// Constants
// ============================================================================

export const IMMINENT_WINDOW_SECONDS = 60;
export const OVERLAP_LOOKAHEAD_SECONDS = 5 * 60;

// ============================================================================
// Timing helpers
// ============================================================================

export function isOngoing(event: MeetingEvent, now: Date): boolean {
  const t = now.getTime();
  return event.start.getTime() <= t && t <= event.end.getTime();
}

export function secondsUntilStart(event: MeetingEvent, now: Date): number {
  return (event.start.getTime() - now.getTime()) / 1000;
}

/**
 * Starts within the next 60 seconds. A meeting that has already started is
 * not imminent; it is ongoing.
 */
export function isImminent(event: MeetingEvent, now: Date): boolean {
  const seconds = secondsUntilStart(event, now);
  return seconds >= 0 && seconds <= IMMINENT_WINDOW_SECONDS;
}

export function describeMeeting(event: MeetingEvent): string {
  return `"${event.summary}" (${event.start.toISOString()} - ${event.end.toISOString()})`;
}

export function matchesAnchor(event: MeetingEvent, anchor: MeetingAnchor): boolean {
  if (anchor.eventId && event.id) {
    return anchor.eventId === event.id;
  }
  if (anchor.summary !== null && anchor.start !== null) {
    return event.summary === anchor.summary && event.start.getTime() === anchor.start.getTime();
  }
  return false;
}

// ============================================================================
// Selection
// ============================================================================

/**
 * Pick the meetings the resolver looks at:
 * - current: the ongoing meeting that ends last
 * - next: the earliest meeting that has not started yet
 * - anchor: the meeting the user ended early, if it is still in the window
 *
 * The anchor is left out of current/next so a meeting the user ended early
 * does not turn the light back on.
 */
export function selectMeetings(
  events: MeetingEvent[],
  now: Date,
  anchor: MeetingAnchor | null = null
): MeetingSelection {
  let currentMeeting: MeetingEvent | null = null;
  let nextMeeting: MeetingEvent | null = null;
  let anchorMeeting: MeetingEvent | null = null;

  for (const event of events) {
    if (anchor && matchesAnchor(event, anchor)) {
      anchorMeeting = anchorMeeting ?? event;
      continue;
    }
    if (isOngoing(event, now)) {
      if (!currentMeeting || event.end > currentMeeting.end) {
        currentMeeting = event;
      }
    } else if (event.start > now) {
      if (!nextMeeting || event.start < nextMeeting.start) {
        nextMeeting = event;
      }
    }
  }

  return { currentMeeting, nextMeeting, anchorMeeting };
}

export function ongoingMeetings(events: MeetingEvent[], now: Date): MeetingEvent[] {
  return events.filter((event) => isOngoing(event, now));
}
