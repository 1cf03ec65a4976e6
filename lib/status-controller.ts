/**
 * Status Controller
 *
 * Ties the pieces together: each cycle reloads the state, reads the calendar,
 * resolves the status, saves the resulting patch and updates the light.
 * Also exposes the operations the control surfaces call (manual status,
 * end meeting early, lights off).
 */

import { isAuthError, fetchWindow, type CalendarSource, type CalendarSummary } from "./calendar-window.js";
import { formatRgb, type ColorMap } from "./color-map.js";
import type { LightDevice } from "./govee-client.js";
import { LightActuator, type AppliedLightState, type LightCommand } from "./light-actuator.js";
import {
  MEETING_ENDED_EARLY,
  clearOverridePatch,
  readOverride,
  setOverridePatch,
} from "./manual-override.js";
import { describeMeeting, ongoingMeetings, selectMeetings, type MeetingEvent } from "./meetings.js";
import { StatusScheduler, type SchedulerOptions, type SchedulerStatus } from "./scheduler.js";
import {
  beginSnooze,
  clearSnoozePatch,
  readAnchor,
  readSnooze,
  snoozePatch,
  type SnoozeWindow,
} from "./snooze.js";
import type { PersistedState, StateStore } from "./state-store.js";
import { resolveStatus, type Resolution } from "./status-resolver.js";

// ============================================================================
// Types
// ============================================================================

export interface StatusControllerOptions {
  store: StateStore;
  /** Null when no calendar is configured; status is then manual-only. */
  calendar: CalendarSource | null;
  /** Null when the light is not configured. */
  device: LightDevice | null;
  now?: () => Date;
  scheduler?: Pick<SchedulerOptions, "restartDelayMs" | "maxRestarts" | "stopTimeoutMs">;
}

export interface StatusReport {
  status: string | null;
  override: string | null;
  snoozeUntil: string | null;
  calendarSyncEnabled: boolean;
  lightControlEnabled: boolean;
  lights: AppliedLightState;
  lastResolution: { status: string; calendarStatus: string; reason: string; at: string } | null;
  scheduler: SchedulerStatus;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================================
// Controller
// ============================================================================

export class StatusController {
  readonly scheduler: StatusScheduler;
  private readonly store: StateStore;
  private readonly calendar: CalendarSource | null;
  private readonly actuator: LightActuator | null;
  private readonly now: () => Date;
  private lastResolution: StatusReport["lastResolution"] = null;

  constructor(options: StatusControllerOptions) {
    this.store = options.store;
    this.calendar = options.calendar;
    this.actuator = options.device ? new LightActuator(options.device) : null;
    this.now = options.now ?? (() => new Date());
    this.scheduler = new StatusScheduler(async () => {
      await this.runCycle();
    }, {
      ...options.scheduler,
      now: this.now,
      intervalSeconds: async () => (await this.store.read()).state.REFRESH_INTERVAL,
    });
  }

  /**
   * Read the light's power state, then start the loop.
   */
  async start(): Promise<void> {
    if (this.actuator && !this.scheduler.isRunning()) {
      const power = await this.actuator.sync();
      console.log(`[Controller] Light reports power ${power ?? "unknown"}`);
    }
    await this.scheduler.start();
  }

  stop(): Promise<void> {
    return this.scheduler.stop();
  }

  /**
   * Stop the loop, then turn the light off so no later tick can turn it back on.
   */
  async shutdown(): Promise<boolean> {
    await this.stop();
    return this.turnOffLightsImmediately();
  }

  updateNow(): Promise<void> {
    return this.scheduler.updateNow();
  }

  /**
   * One resolution cycle. Transient calendar failures skip the cycle without
   * touching the state; anything unexpected propagates to the scheduler.
   */
  async runCycle(): Promise<Resolution | null> {
    const now = this.now();
    const { state, colorMap } = await this.store.reload();

    let events: MeetingEvent[] = [];
    if (!state.DISABLE_CALENDAR_SYNC && this.calendar) {
      const fetched = await this.fetchEvents(this.calendar, state, now);
      if (fetched === null) {
        return null;
      }
      events = fetched;
    }

    const { currentMeeting, nextMeeting, anchorMeeting } = selectMeetings(
      events,
      now,
      readAnchor(state)
    );
    const resolution = resolveStatus({
      now,
      currentMeeting,
      nextMeeting,
      anchorMeeting,
      candidates: events,
      override: readOverride(state),
      snooze: readSnooze(state),
      colorMap,
    });

    if (resolution.status !== state.LAST_STATUS_APPLIED) {
      console.log(
        `[Controller] Status "${state.LAST_STATUS_APPLIED ?? "none"}" -> "${resolution.status}" (${resolution.reason})` +
          (currentMeeting ? `; current ${describeMeeting(currentMeeting)}` : "") +
          (nextMeeting ? `; next ${describeMeeting(nextMeeting)}` : "")
      );
    }
    this.lastResolution = {
      status: resolution.status,
      calendarStatus: resolution.calendarStatus,
      reason: resolution.reason,
      at: now.toISOString(),
    };

    const saved = await this.store.update({
      ...resolution.patch,
      LAST_STATUS_APPLIED: resolution.status,
    });
    await this.applyLights(resolution.status, saved.state, saved.colorMap);
    return resolution;
  }

  // ==========================================================================
  // Control operations
  // ==========================================================================

  /**
   * Snooze until the latest ongoing meeting ends (5 minutes when nothing is
   * ongoing or the calendar cannot be read), then re-evaluate.
   */
  async endMeetingEarly(): Promise<SnoozeWindow> {
    const window = await this.scheduler.exclusive(async () => {
      const now = this.now();
      const { state } = await this.store.read();

      let ongoing: MeetingEvent[] = [];
      if (!state.DISABLE_CALENDAR_SYNC && this.calendar) {
        const { timeMin, timeMax } = fetchWindow(now, false);
        try {
          const events = await this.calendar.fetch(state.SELECTED_CALENDAR_ID, timeMin, timeMax);
          ongoing = ongoingMeetings(events, now);
        } catch (err) {
          console.error(`[Controller] Could not read ongoing meetings: ${errorMessage(err)}`);
        }
      }

      const snooze = beginSnooze(ongoing, now);
      await this.store.update({
        ...setOverridePatch(MEETING_ENDED_EARLY, now, state.MANUAL_STATUS_EXPIRY),
        ...snoozePatch(snooze),
        SNOOZE_HOLD_UNTIL: null,
      });
      return snooze;
    });

    await this.updateNow();
    return window;
  }

  async setManualStatus(status: string): Promise<void> {
    const label = status.trim();
    if (!label) {
      throw new Error("Status must not be empty");
    }
    if (label === MEETING_ENDED_EARLY) {
      await this.endMeetingEarly();
      return;
    }

    await this.scheduler.exclusive(async () => {
      const { state } = await this.store.read();
      await this.store.update({
        ...setOverridePatch(label, this.now(), state.MANUAL_STATUS_EXPIRY),
        ...clearSnoozePatch(),
      });
      console.log(`[Controller] Manual status set to "${label}"`);
    });
    await this.updateNow();
  }

  async clearManualStatus(): Promise<void> {
    await this.scheduler.exclusive(() =>
      this.store.update({ ...clearOverridePatch(), ...clearSnoozePatch() })
    );
    console.log("[Controller] Manual status cleared");
    await this.updateNow();
  }

  /**
   * Cancel a snooze (and the post-snooze hold) without touching an unrelated
   * manual status.
   */
  async resetSnooze(): Promise<void> {
    await this.scheduler.exclusive(() =>
      this.store.update((state) => {
        const snoozeOwned =
          state.CURRENT_STATUS === MEETING_ENDED_EARLY || state.SNOOZE_HOLD_UNTIL !== null;
        return snoozeOwned ? { ...clearOverridePatch(), ...clearSnoozePatch() } : clearSnoozePatch();
      })
    );
    console.log("[Controller] Snooze reset");
    await this.updateNow();
  }

  /**
   * Send an off command now, even when light control is disabled.
   */
  async turnOffLightsImmediately(): Promise<boolean> {
    const actuator = this.actuator;
    if (!actuator) {
      console.warn("[Controller] No light configured, nothing to turn off");
      return false;
    }
    return this.scheduler.exclusive(async () => {
      const ok = await actuator.forceOff();
      if (ok) {
        await this.recordApplied(actuator);
      }
      return ok;
    });
  }

  async setBrightness(level: number): Promise<boolean> {
    if (!this.actuator) {
      console.warn("[Controller] No light configured");
      return false;
    }
    return this.actuator.setBrightness(level);
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    if (!this.calendar) return [];
    return this.calendar.listCalendars();
  }

  async getStatus(): Promise<StatusReport> {
    const { state } = await this.store.read();
    return {
      status: state.LAST_STATUS_APPLIED,
      override: state.CURRENT_STATUS,
      snoozeUntil: state.SNOOZE_UNTIL,
      calendarSyncEnabled: !state.DISABLE_CALENDAR_SYNC && this.calendar !== null,
      lightControlEnabled: !state.DISABLE_LIGHT_CONTROL && this.actuator !== null,
      lights: this.actuator?.getAppliedState() ?? { power: null, color: null },
      lastResolution: this.lastResolution,
      scheduler: this.scheduler.getStatus(),
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Returns null when the cycle should be skipped. An authentication failure
   * turns calendar sync off so the status falls back to manual only.
   */
  private async fetchEvents(
    calendar: CalendarSource,
    state: PersistedState,
    now: Date
  ): Promise<MeetingEvent[] | null> {
    const { timeMin, timeMax } = fetchWindow(now, state.SNOOZE_UNTIL !== null);
    try {
      return await calendar.fetch(state.SELECTED_CALENDAR_ID, timeMin, timeMax);
    } catch (err) {
      if (isAuthError(err)) {
        console.error(
          `[Calendar] Authentication failed, disabling calendar sync: ${errorMessage(err)}`
        );
        calendar.reset();
        await this.store.update({ DISABLE_CALENDAR_SYNC: true });
        return [];
      }
      console.error(
        `[Calendar] Fetch failed for ${state.SELECTED_CALENDAR_ID} ` +
          `(${timeMin.toISOString()} - ${timeMax.toISOString()}), keeping current status: ${errorMessage(err)}`
      );
      return null;
    }
  }

  private async applyLights(
    status: string,
    state: PersistedState,
    colorMap: ColorMap
  ): Promise<LightCommand[]> {
    const actuator = this.actuator;
    if (!actuator) return [];
    if (state.DISABLE_LIGHT_CONTROL) {
      // Someone else may drive the light meanwhile; re-send everything once re-enabled.
      actuator.reset();
      return [];
    }

    const commands = await actuator.apply(status, colorMap, {
      offForUnknownStatus: state.OFF_FOR_UNKNOWN_STATUS,
      powerOffWhenAvailable: state.POWER_OFF_WHEN_AVAILABLE,
    });
    if (commands.length > 0) {
      await this.recordApplied(actuator);
    }
    return commands;
  }

  private async recordApplied(actuator: LightActuator): Promise<void> {
    const { power, color } = actuator.getAppliedState();
    await this.store.update({
      LAST_POWER_APPLIED: power,
      LAST_COLOR_APPLIED: color ? formatRgb(color) : null,
    });
  }
}
