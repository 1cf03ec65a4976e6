import { describe, it, expect } from "vitest";
import {
  MEETING_ENDED_EARLY,
  clearOverridePatch,
  isOverrideCorrupt,
  isOverrideExpired,
  readOverride,
  setOverridePatch,
} from "../lib/manual-override.js";
import { getDefaultState } from "../lib/state-store.js";

const NOW = new Date("2026-03-02T10:00:00.000Z");

describe("Manual Override", () => {
  it("reads nothing when no status is set", () => {
    expect(readOverride(getDefaultState())).toBeNull();
  });

  it("round-trips through the persisted fields", () => {
    const state = { ...getDefaultState(), ...setOverridePatch("focus", NOW, 600) };

    expect(state.MANUAL_STATUS_TIMESTAMP).toBe(NOW.getTime() / 1000);
    expect(readOverride(state)).toEqual({
      status: "focus",
      setAt: NOW,
      expirySeconds: 600,
      holdUntil: null,
    });
  });

  it("expires only once the age is strictly greater than the expiry", () => {
    const override = { status: "focus", setAt: NOW, expirySeconds: 7200, holdUntil: null };

    expect(isOverrideExpired(override, new Date(NOW.getTime() + 7200 * 1000))).toBe(false);
    expect(isOverrideExpired(override, new Date(NOW.getTime() + 7201 * 1000))).toBe(true);
  });

  it("uses the hold deadline when one is set", () => {
    const holdUntil = new Date(NOW.getTime() + 60 * 1000);
    const override = { status: "available", setAt: NOW, expirySeconds: 7200, holdUntil };

    expect(isOverrideExpired(override, new Date(NOW.getTime() + 59 * 1000))).toBe(false);
    expect(isOverrideExpired(override, holdUntil)).toBe(true);
  });

  it("flags a timestamp-less override as corrupt, except the snooze bridge", () => {
    expect(
      isOverrideCorrupt({ status: "focus", setAt: null, expirySeconds: 7200, holdUntil: null })
    ).toBe(true);
    expect(
      isOverrideCorrupt({ status: MEETING_ENDED_EARLY, setAt: null, expirySeconds: 7200, holdUntil: null })
    ).toBe(false);
  });

  it("leaves the expiry setting alone when clearing", () => {
    expect(clearOverridePatch()).toEqual({ CURRENT_STATUS: null, MANUAL_STATUS_TIMESTAMP: null });
  });
});
