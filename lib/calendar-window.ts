/**
 * Calendar Window Fetcher
 *
 * Reads the meetings in a time window from one Google calendar. Results are
 * not cached; every status cycle asks again.
 */

import { calendar_v3 } from "googleapis";
import {
  CalendarAuthError,
  DEFAULT_ACCOUNT,
  getCalendarClient,
  loadAuthorizedClient,
} from "./google-auth.js";
import type { MeetingEvent } from "./meetings.js";

// ============================================================================
// Types
// ============================================================================

export interface CalendarSource {
  fetch(calendarId: string, timeMin: Date, timeMax: Date): Promise<MeetingEvent[]>;
  listCalendars(): Promise<CalendarSummary[]>;
  /** Drop any cached client so the next call authorizes again. */
  reset(): void;
}

export interface CalendarSummary {
  id: string;
  summary: string;
  primary: boolean;
}

/**
 * The two Calendar API calls we make, narrowed from calendar_v3.Calendar.
 */
export interface CalendarApi {
  listEvents(params: calendar_v3.Params$Resource$Events$List): Promise<calendar_v3.Schema$Event[]>;
  listCalendars(): Promise<calendar_v3.Schema$CalendarListEntry[]>;
}

/**
 * The slice of calendar_v3.Calendar that googleCalendarApi calls.
 */
export interface CalendarRequests {
  events: {
    list(
      params: calendar_v3.Params$Resource$Events$List,
      options: { timeout: number }
    ): Promise<{ data: calendar_v3.Schema$Events }>;
  };
  calendarList: {
    list(
      params: calendar_v3.Params$Resource$Calendarlist$List,
      options: { timeout: number }
    ): Promise<{ data: calendar_v3.Schema$CalendarList }>;
  };
}

// ============================================================================
// Constants
// ============================================================================

export const LOOKBACK_MINUTES = 15;
export const LOOKAHEAD_HOURS = 2;
export const SNOOZE_LOOKAHEAD_HOURS = 24;
const MAX_RESULTS = 50;
export const REQUEST_TIMEOUT_MS = 10_000;

// ============================================================================
// Parsing
// ============================================================================

function parseEventTime(time?: calendar_v3.Schema$EventDateTime): Date | null {
  if (!time?.dateTime) return null;
  const date = new Date(time.dateTime);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Convert an API event. All-day and cancelled events are not meetings.
 */
export function toMeetingEvent(event: calendar_v3.Schema$Event): MeetingEvent | null {
  if (event.status === "cancelled") return null;
  const start = parseEventTime(event.start);
  const end = parseEventTime(event.end);
  if (!start || !end) return null;

  return {
    id: event.id || null,
    summary: event.summary || "(No title)",
    start,
    end,
  };
}

/**
 * The window queried each cycle: 15 minutes back, and 2 hours ahead (a full
 * day while snoozed, so overlap checks see the rest of the day).
 */
export function fetchWindow(now: Date, snoozed: boolean): { timeMin: Date; timeMax: Date } {
  const aheadHours = snoozed ? SNOOZE_LOOKAHEAD_HOURS : LOOKAHEAD_HOURS;
  return {
    timeMin: new Date(now.getTime() - LOOKBACK_MINUTES * 60 * 1000),
    timeMax: new Date(now.getTime() + aheadHours * 60 * 60 * 1000),
  };
}

// ============================================================================
// Errors
// ============================================================================

/**
 * True for failures that retrying will not fix: missing or rejected tokens.
 */
export function isAuthError(err: unknown): boolean {
  if (err instanceof CalendarAuthError) return true;
  if (typeof err !== "object" || err === null) return false;

  if ("response" in err) {
    const response = err.response;
    if (typeof response === "object" && response !== null && "status" in response) {
      if (response.status === 401) return true;
    }
  }
  const message = err instanceof Error ? err.message : "";
  return /invalid_grant|invalid_token|unauthorized_client/.test(message);
}

// ============================================================================
// Google source
// ============================================================================

export function googleCalendarApi(calendar: CalendarRequests): CalendarApi {
  const options = { timeout: REQUEST_TIMEOUT_MS };
  return {
    async listEvents(params) {
      const response = await calendar.events.list(params, options);
      return response.data.items || [];
    },
    async listCalendars() {
      const response = await calendar.calendarList.list({}, options);
      return response.data.items || [];
    },
  };
}

/**
 * CalendarSource backed by the Google Calendar API. Authorizes lazily on
 * first use with the saved tokens for `account`.
 */
export class GoogleCalendarSource implements CalendarSource {
  private api: CalendarApi | null = null;

  constructor(
    private readonly account: string = DEFAULT_ACCOUNT,
    private readonly connect: (account: string) => Promise<CalendarApi> = async (a) =>
      googleCalendarApi(getCalendarClient(await loadAuthorizedClient(a)))
  ) {}

  async fetch(calendarId: string, timeMin: Date, timeMax: Date): Promise<MeetingEvent[]> {
    const api = await this.getApi();
    const items = await api.listEvents({
      calendarId,
      timeMin: timeMin.toISOString(),
      timeMax: timeMax.toISOString(),
      maxResults: MAX_RESULTS,
      singleEvents: true,
      orderBy: "startTime",
    });

    const events: MeetingEvent[] = [];
    for (const item of items) {
      const event = toMeetingEvent(item);
      if (event) events.push(event);
    }
    return events;
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    const api = await this.getApi();
    const items = await api.listCalendars();
    return items
      .filter((cal) => !!cal.id)
      .map((cal) => ({
        id: cal.id || "",
        summary: cal.summary || cal.id || "",
        primary: cal.primary || false,
      }));
  }

  reset(): void {
    this.api = null;
  }

  private async getApi(): Promise<CalendarApi> {
    if (!this.api) {
      this.api = await this.connect(this.account);
    }
    return this.api;
  }
}
