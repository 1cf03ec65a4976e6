/**
 * State Store
 *
 * Owns the persisted status/settings record. Every read and write goes through
 * a single promise queue, so the scheduler and the control surface never
 * interleave a read-modify-write. Changes are written back to the JSON file
 * after each update.
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import * as path from "path";
import {
  DEFAULT_RAW_COLOR_MAP,
  parseColorMap,
  type ColorMap,
  type RawColorEntry,
  type RawColorMap,
} from "./color-map.js";

// ============================================================================
// Types
// ============================================================================

export type PowerState = "on" | "off";

/**
 * On-disk shape. Key names match the config file.
 */
export interface PersistedState {
  CURRENT_STATUS: string | null;
  MANUAL_STATUS_TIMESTAMP: number | null; // epoch seconds
  MANUAL_STATUS_EXPIRY: number; // seconds
  SNOOZE_UNTIL: string | null; // ISO
  SNOOZE_EVENT_ID: string | null;
  SNOOZE_EVENT_SUMMARY: string | null;
  SNOOZE_EVENT_START: string | null; // ISO
  SNOOZE_HOLD_UNTIL: string | null; // ISO
  SELECTED_CALENDAR_ID: string;
  STATUS_COLOR_MAP: RawColorMap;
  REFRESH_INTERVAL: number; // seconds
  DISABLE_CALENDAR_SYNC: boolean;
  DISABLE_LIGHT_CONTROL: boolean;
  POWER_OFF_WHEN_AVAILABLE: boolean;
  OFF_FOR_UNKNOWN_STATUS: boolean;
  GOVEE_DEVICE_ID: string | null;
  GOVEE_DEVICE_MODEL: string | null;
  LAST_STATUS_APPLIED: string | null;
  LAST_POWER_APPLIED: PowerState | null;
  LAST_COLOR_APPLIED: string | null;
}

export type StatePatch = Partial<PersistedState>;

export interface StateSnapshot {
  state: PersistedState;
  colorMap: ColorMap;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_STATE_PATH =
  process.env.STATUS_LIGHT_CONFIG || path.join(process.cwd(), "config", "status-light.json");

export const MIN_REFRESH_INTERVAL = 15;
export const SUPPORTED_REFRESH_INTERVALS = [15, 30, 60] as const;
export const DEFAULT_REFRESH_INTERVAL = 60;
export const DEFAULT_MANUAL_STATUS_EXPIRY = 7200;

// ============================================================================
// Defaults & normalization
// ============================================================================

/**
 * Copy a raw color map down to its entries.
 */
export function copyColorMap(map: RawColorMap): RawColorMap {
  return Object.fromEntries(
    Object.entries(map).map(([status, entry]) => [
      status,
      typeof entry === "string" ? entry : { ...entry },
    ])
  );
}

function copyState(state: PersistedState): PersistedState {
  return { ...state, STATUS_COLOR_MAP: copyColorMap(state.STATUS_COLOR_MAP) };
}

export function getDefaultState(): PersistedState {
  return {
    CURRENT_STATUS: null,
    MANUAL_STATUS_TIMESTAMP: null,
    MANUAL_STATUS_EXPIRY: DEFAULT_MANUAL_STATUS_EXPIRY,
    SNOOZE_UNTIL: null,
    SNOOZE_EVENT_ID: null,
    SNOOZE_EVENT_SUMMARY: null,
    SNOOZE_EVENT_START: null,
    SNOOZE_HOLD_UNTIL: null,
    SELECTED_CALENDAR_ID: "primary",
    STATUS_COLOR_MAP: copyColorMap(DEFAULT_RAW_COLOR_MAP),
    REFRESH_INTERVAL: DEFAULT_REFRESH_INTERVAL,
    DISABLE_CALENDAR_SYNC: false,
    DISABLE_LIGHT_CONTROL: false,
    POWER_OFF_WHEN_AVAILABLE: false,
    OFF_FOR_UNKNOWN_STATUS: false,
    GOVEE_DEVICE_ID: null,
    GOVEE_DEVICE_MODEL: null,
    LAST_STATUS_APPLIED: null,
    LAST_POWER_APPLIED: null,
    LAST_COLOR_APPLIED: null,
  };
}

/**
 * Enforce the 15 second minimum and snap to the nearest supported cadence
 * at or above the requested value (anything over 30 runs once a minute).
 */
export function normalizeRefreshInterval(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return DEFAULT_REFRESH_INTERVAL;
  }
  const seconds = Math.max(MIN_REFRESH_INTERVAL, value);
  for (const supported of SUPPORTED_REFRESH_INTERVALS) {
    if (seconds <= supported) return supported;
  }
  return DEFAULT_REFRESH_INTERVAL;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function normalizeColorMap(value: unknown): RawColorMap {
  if (!isRecord(value)) {
    return copyColorMap(DEFAULT_RAW_COLOR_MAP);
  }
  const map: RawColorMap = {};
  for (const [status, entry] of Object.entries(value)) {
    let parsed: RawColorEntry | null = null;
    if (typeof entry === "string") {
      parsed = entry;
    } else if (isRecord(entry)) {
      parsed = {
        color: typeof entry.color === "string" ? entry.color : undefined,
        power_off: entry.power_off === true,
      };
    }
    if (parsed !== null) {
      map[status] = parsed;
    } else {
      console.warn(`[State] Ignoring invalid STATUS_COLOR_MAP entry for "${status}"`);
    }
  }
  return map;
}

/**
 * Merge a parsed JSON document over the defaults, dropping values of the wrong type.
 */
export function normalizeState(raw: unknown): PersistedState {
  const defaults = getDefaultState();
  if (!isRecord(raw)) {
    return defaults;
  }
  const power = raw.LAST_POWER_APPLIED;

  return {
    CURRENT_STATUS: stringOrNull(raw.CURRENT_STATUS),
    MANUAL_STATUS_TIMESTAMP: numberOrNull(raw.MANUAL_STATUS_TIMESTAMP),
    MANUAL_STATUS_EXPIRY: numberOrNull(raw.MANUAL_STATUS_EXPIRY) ?? defaults.MANUAL_STATUS_EXPIRY,
    SNOOZE_UNTIL: stringOrNull(raw.SNOOZE_UNTIL),
    SNOOZE_EVENT_ID: stringOrNull(raw.SNOOZE_EVENT_ID),
    SNOOZE_EVENT_SUMMARY: stringOrNull(raw.SNOOZE_EVENT_SUMMARY),
    SNOOZE_EVENT_START: stringOrNull(raw.SNOOZE_EVENT_START),
    SNOOZE_HOLD_UNTIL: stringOrNull(raw.SNOOZE_HOLD_UNTIL),
    SELECTED_CALENDAR_ID: stringOrNull(raw.SELECTED_CALENDAR_ID) ?? defaults.SELECTED_CALENDAR_ID,
    STATUS_COLOR_MAP:
      raw.STATUS_COLOR_MAP === undefined
        ? defaults.STATUS_COLOR_MAP
        : normalizeColorMap(raw.STATUS_COLOR_MAP),
    REFRESH_INTERVAL: normalizeRefreshInterval(raw.REFRESH_INTERVAL),
    DISABLE_CALENDAR_SYNC: bool(raw.DISABLE_CALENDAR_SYNC, defaults.DISABLE_CALENDAR_SYNC),
    DISABLE_LIGHT_CONTROL: bool(raw.DISABLE_LIGHT_CONTROL, defaults.DISABLE_LIGHT_CONTROL),
    POWER_OFF_WHEN_AVAILABLE: bool(raw.POWER_OFF_WHEN_AVAILABLE, defaults.POWER_OFF_WHEN_AVAILABLE),
    OFF_FOR_UNKNOWN_STATUS: bool(raw.OFF_FOR_UNKNOWN_STATUS, defaults.OFF_FOR_UNKNOWN_STATUS),
    GOVEE_DEVICE_ID: stringOrNull(raw.GOVEE_DEVICE_ID),
    GOVEE_DEVICE_MODEL: stringOrNull(raw.GOVEE_DEVICE_MODEL),
    LAST_STATUS_APPLIED: stringOrNull(raw.LAST_STATUS_APPLIED),
    LAST_POWER_APPLIED: power === "on" || power === "off" ? power : null,
    LAST_COLOR_APPLIED: stringOrNull(raw.LAST_COLOR_APPLIED),
  };
}

// ============================================================================
// Store
// ============================================================================

/**
 * StateStore keeps the state in memory and serializes access to it.
 *
 * Usage:
 *   const store = new StateStore();
 *   await store.load();
 *   await store.update({ CURRENT_STATUS: "focus" });
 */
export class StateStore {
  private state: PersistedState = getDefaultState();
  private colorMap: ColorMap = parseColorMap(this.state.STATUS_COLOR_MAP);
  private queue: Promise<unknown> = Promise.resolve();
  private loaded = false;

  constructor(readonly filePath: string = DEFAULT_STATE_PATH) {}

  /**
   * Load the file. A missing or unreadable file yields the defaults.
   */
  load(): Promise<StateSnapshot> {
    return this.enqueue(async () => {
      const raw = await this.readFile();
      this.replace(raw === undefined ? getDefaultState() : normalizeState(raw));
      this.loaded = true;
      return this.snapshot();
    });
  }

  /**
   * Re-read the file to pick up edits made outside this process. An unreadable
   * file keeps the in-memory state.
   */
  reload(): Promise<StateSnapshot> {
    return this.enqueue(async () => {
      const raw = await this.readFile();
      if (raw !== undefined) {
        this.replace(normalizeState(raw));
      } else if (!this.loaded) {
        this.replace(getDefaultState());
      }
      this.loaded = true;
      return this.snapshot();
    });
  }

  read(): Promise<StateSnapshot> {
    return this.enqueue(async () => this.snapshot());
  }

  /**
   * Apply a patch (or a function computing one from the current state) and
   * persist the result when anything changed.
   */
  update(change: StatePatch | ((state: PersistedState) => StatePatch)): Promise<StateSnapshot> {
    return this.enqueue(async () => {
      const patch = typeof change === "function" ? change(copyState(this.state)) : change;
      const next = normalizeState({ ...this.state, ...patch });
      if (JSON.stringify(next) !== JSON.stringify(this.state)) {
        this.replace(next);
        await this.persist();
      }
      return this.snapshot();
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private replace(next: PersistedState): void {
    if (JSON.stringify(next.STATUS_COLOR_MAP) !== JSON.stringify(this.state.STATUS_COLOR_MAP)) {
      this.colorMap = parseColorMap(next.STATUS_COLOR_MAP);
    }
    this.state = next;
  }

  private snapshot(): StateSnapshot {
    const colorMap: ColorMap = new Map();
    for (const [status, action] of this.colorMap) {
      colorMap.set(status, action.kind === "on" ? { kind: "on", color: { ...action.color } } : action);
    }
    return { state: copyState(this.state), colorMap };
  }

  /**
   * Returns the parsed JSON, or undefined when the file is missing or invalid.
   */
  private async readFile(): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isRecord(err) && err.code === "ENOENT") {
        return undefined;
      }
      throw err;
    }
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      console.warn(
        `[State] Could not parse ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`
      );
      return undefined;
    }
  }

  private async persist(): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(this.state, null, 2));
    await rename(tmpPath, this.filePath);
  }
}
