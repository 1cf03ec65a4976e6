/**
 * Color Map Library
 *
 * Maps status labels to light actions. Entries in the config file come in two
 * shapes: a legacy "r,g,b" string, or a structured { color, power_off } object.
 * Both are parsed once into a ColorAction when the config is loaded.
 */

// ============================================================================
// Types
// ============================================================================

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export type ColorAction = { kind: "on"; color: Rgb } | { kind: "off" };

/**
 * Raw color map entry as stored in the JSON config.
 */
export type RawColorEntry = string | { color?: string; power_off?: boolean };

export type RawColorMap = Record<string, RawColorEntry>;

/**
 * Parsed color map. A Map keeps the declaration order of the config keys,
 * which decides keyword matching ties.
 */
export type ColorMap = Map<string, ColorAction>;

export interface LightTargetOptions {
  offForUnknownStatus: boolean;
  powerOffWhenAvailable: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const WHITE: Rgb = { r: 255, g: 255, b: 255 };

export const DEFAULT_RAW_COLOR_MAP: RawColorMap = {
  in_meeting: { color: "255,0,0", power_off: false },
  available: { color: "0,255,0", power_off: false },
  focus: { color: "0,0,255", power_off: false },
  offline: { color: "128,128,128", power_off: false },
};

// ============================================================================
// Parsing
// ============================================================================

/**
 * Clamp RGB values to the 0-255 range.
 */
export function clampRgb(r: number, g: number, b: number): Rgb {
  const clamp = (v: number) => Math.max(0, Math.min(255, Math.trunc(v)));
  return { r: clamp(r), g: clamp(g), b: clamp(b) };
}

/**
 * Parse an "r,g,b" string. Returns null unless it has exactly three numeric parts.
 */
export function parseRgb(value: string): Rgb | null {
  const parts = value.split(",").map((p) => p.trim());
  if (parts.length !== 3 || parts.some((p) => p === "")) {
    return null;
  }
  const [r, g, b] = parts.map(Number);
  if ([r, g, b].some((n) => Number.isNaN(n))) {
    return null;
  }
  return clampRgb(r, g, b);
}

export function formatRgb(color: Rgb): string {
  return `${color.r},${color.g},${color.b}`;
}

export function parseColorEntry(entry: RawColorEntry): ColorAction {
  if (typeof entry === "string") {
    return { kind: "on", color: parseRgb(entry) ?? WHITE };
  }
  if (entry.power_off) {
    return { kind: "off" };
  }
  return { kind: "on", color: parseRgb(entry.color ?? "") ?? WHITE };
}

export function parseColorMap(raw: RawColorMap): ColorMap {
  const map: ColorMap = new Map();
  for (const [status, entry] of Object.entries(raw)) {
    map.set(status, parseColorEntry(entry));
  }
  return map;
}

// ============================================================================
// Targets
// ============================================================================

/**
 * Resolve the light action for a status.
 *
 * Statuses without an entry fall back to POWER_OFF_WHEN_AVAILABLE (for
 * "available" only), then to OFF_FOR_UNKNOWN_STATUS, then to plain white.
 */
export function resolveLightTarget(
  status: string,
  colorMap: ColorMap,
  options: LightTargetOptions
): ColorAction {
  const entry = colorMap.get(status);
  if (entry) {
    return entry;
  }
  if (status === "available" && options.powerOffWhenAvailable) {
    return { kind: "off" };
  }
  if (options.offForUnknownStatus) {
    return { kind: "off" };
  }
  return { kind: "on", color: WHITE };
}

export function sameColor(a: Rgb | null, b: Rgb | null): boolean {
  if (!a || !b) return a === b;
  return a.r === b.r && a.g === b.g && a.b === b.b;
}
