/**
 * Color Map Tests
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_RAW_COLOR_MAP,
  WHITE,
  clampRgb,
  formatRgb,
  parseColorEntry,
  parseColorMap,
  parseRgb,
  resolveLightTarget,
  sameColor,
} from "../lib/color-map.js";

const NO_FALLBACKS = { offForUnknownStatus: false, powerOffWhenAvailable: false };

describe("Color Map", () => {
  describe("clampRgb", () => {
    it("clamps each channel to 0-255", () => {
      expect(clampRgb(300, -5, 128)).toEqual({ r: 255, g: 0, b: 128 });
    });

    it("truncates fractional values", () => {
      expect(clampRgb(10.9, 0.2, 254.99)).toEqual({ r: 10, g: 0, b: 254 });
    });
  });

  describe("parseRgb", () => {
    it("parses an r,g,b string with spaces", () => {
      expect(parseRgb("255, 128 ,0")).toEqual({ r: 255, g: 128, b: 0 });
    });

    it("clamps out-of-range channels", () => {
      expect(parseRgb("999,-1,10")).toEqual({ r: 255, g: 0, b: 10 });
    });

    it("rejects the wrong number of parts", () => {
      expect(parseRgb("255,0")).toBeNull();
      expect(parseRgb("1,2,3,4")).toBeNull();
    });

    it("rejects non-numeric and empty parts", () => {
      expect(parseRgb("red,0,0")).toBeNull();
      expect(parseRgb("1,,3")).toBeNull();
      expect(parseRgb("")).toBeNull();
    });
  });

  describe("formatRgb", () => {
    it("formats as r,g,b", () => {
      expect(formatRgb({ r: 1, g: 2, b: 3 })).toBe("1,2,3");
    });
  });

  describe("parseColorEntry", () => {
    it("accepts the legacy string form", () => {
      expect(parseColorEntry("0,0,255")).toEqual({ kind: "on", color: { r: 0, g: 0, b: 255 } });
    });

    it("falls back to white for an unparseable legacy string", () => {
      expect(parseColorEntry("blue")).toEqual({ kind: "on", color: WHITE });
    });

    it("turns power_off entries into an off action, ignoring the color", () => {
      expect(parseColorEntry({ color: "0,255,0", power_off: true })).toEqual({ kind: "off" });
    });

    it("falls back to white when the structured color is missing or invalid", () => {
      expect(parseColorEntry({ power_off: false })).toEqual({ kind: "on", color: WHITE });
      expect(parseColorEntry({ color: "1,2" })).toEqual({ kind: "on", color: WHITE });
    });
  });

  describe("parseColorMap", () => {
    it("keeps the declaration order of the keys", () => {
      const map = parseColorMap({ focus: "0,0,255", lunch: "255,255,0", in_meeting: "255,0,0" });
      expect([...map.keys()]).toEqual(["focus", "lunch", "in_meeting"]);
    });

    it("parses the default map", () => {
      const map = parseColorMap(DEFAULT_RAW_COLOR_MAP);
      expect(map.get("in_meeting")).toEqual({ kind: "on", color: { r: 255, g: 0, b: 0 } });
      expect(map.get("available")).toEqual({ kind: "on", color: { r: 0, g: 255, b: 0 } });
      expect(map.get("focus")).toEqual({ kind: "on", color: { r: 0, g: 0, b: 255 } });
      expect(map.get("offline")).toEqual({ kind: "on", color: { r: 128, g: 128, b: 128 } });
    });
  });

  describe("resolveLightTarget", () => {
    const map = parseColorMap({
      in_meeting: "255,0,0",
      away: { color: "1,1,1", power_off: true },
    });

    it("uses the mapped entry", () => {
      expect(resolveLightTarget("in_meeting", map, NO_FALLBACKS)).toEqual({
        kind: "on",
        color: { r: 255, g: 0, b: 0 },
      });
      expect(resolveLightTarget("away", map, NO_FALLBACKS)).toEqual({ kind: "off" });
    });

    it("an explicit entry wins over the fallback flags", () => {
      expect(
        resolveLightTarget("in_meeting", map, { offForUnknownStatus: true, powerOffWhenAvailable: true })
      ).toEqual({ kind: "on", color: { r: 255, g: 0, b: 0 } });
    });

    it("turns off an unmapped available status when powerOffWhenAvailable is set", () => {
      expect(
        resolveLightTarget("available", map, { offForUnknownStatus: false, powerOffWhenAvailable: true })
      ).toEqual({ kind: "off" });
    });

    it("turns off unknown statuses when offForUnknownStatus is set", () => {
      expect(
        resolveLightTarget("lunch", map, { offForUnknownStatus: true, powerOffWhenAvailable: false })
      ).toEqual({ kind: "off" });
    });

    it("shows white for unknown statuses otherwise", () => {
      expect(resolveLightTarget("lunch", map, NO_FALLBACKS)).toEqual({ kind: "on", color: WHITE });
    });
  });

  describe("sameColor", () => {
    it("compares channels", () => {
      expect(sameColor({ r: 1, g: 2, b: 3 }, { r: 1, g: 2, b: 3 })).toBe(true);
      expect(sameColor({ r: 1, g: 2, b: 3 }, { r: 1, g: 2, b: 4 })).toBe(false);
    });

    it("treats null as different from any color", () => {
      expect(sameColor(null, { r: 0, g: 0, b: 0 })).toBe(false);
      expect(sameColor(null, null)).toBe(true);
    });
  });
});
