/**
 * Light Actuator Tests
 *
 * Runs against an in-memory device that records every command.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DEFAULT_RAW_COLOR_MAP, parseColorMap, type Rgb } from "../lib/color-map.js";
import { LightActuator } from "../lib/light-actuator.js";
import { FakeDevice } from "./fakes.js";

const colorMap = parseColorMap(DEFAULT_RAW_COLOR_MAP);
const OPTIONS = { offForUnknownStatus: false, powerOffWhenAvailable: false };
const RED = { r: 255, g: 0, b: 0 };
const GREEN = { r: 0, g: 255, b: 0 };

describe("Light Actuator", () => {
  let device: FakeDevice;
  let actuator: LightActuator;

  beforeEach(() => {
    device = new FakeDevice();
    actuator = new LightActuator(device);
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("powers on and sets the color the first time", async () => {
    const issued = await actuator.apply("in_meeting", colorMap, OPTIONS);

    expect(issued).toEqual([
      { type: "power", state: "on" },
      { type: "color", color: RED },
    ]);
    expect(device.sent).toEqual([{ power: true }, { color: RED }]);
  });

  it("issues nothing when applied twice with the same status", async () => {
    await actuator.apply("in_meeting", colorMap, OPTIONS);
    device.sent = [];

    const issued = await actuator.apply("in_meeting", colorMap, OPTIONS);
    expect(issued).toEqual([]);
    expect(device.sent).toEqual([]);
  });

  it("only changes the color between two colored statuses", async () => {
    await actuator.apply("in_meeting", colorMap, OPTIONS);
    device.sent = [];

    await actuator.apply("available", colorMap, OPTIONS);
    expect(device.sent).toEqual([{ color: GREEN }]);
  });

  it("sends only a power off for a power_off entry", async () => {
    const map = parseColorMap({ available: { color: "0,255,0", power_off: true } });
    const issued = await actuator.apply("available", map, OPTIONS);

    expect(issued).toEqual([{ type: "power", state: "off" }]);
    expect(device.sent).toEqual([{ power: false }]);
  });

  it("re-sends the color after the light was turned off", async () => {
    const map = parseColorMap({
      in_meeting: "255,0,0",
      offline: { power_off: true },
    });
    await actuator.apply("in_meeting", map, OPTIONS);
    await actuator.apply("offline", map, OPTIONS);
    device.sent = [];

    await actuator.apply("in_meeting", map, OPTIONS);
    expect(device.sent).toEqual([{ power: true }, { color: RED }]);
  });

  it("does not repeat a power off", async () => {
    const map = parseColorMap({});
    const options = { offForUnknownStatus: true, powerOffWhenAvailable: false };
    await actuator.apply("lunch", map, options);
    device.sent = [];

    expect(await actuator.apply("lunch", map, options)).toEqual([]);
    expect(device.sent).toEqual([]);
  });

  it("leaves the cache untouched when the device rejects a command", async () => {
    device.failing = true;
    expect(await actuator.apply("in_meeting", colorMap, OPTIONS)).toEqual([]);
    expect(actuator.getAppliedState()).toEqual({ power: null, color: null });

    device.failing = false;
    await actuator.apply("in_meeting", colorMap, OPTIONS);
    expect(device.sent).toEqual([{ power: true }, { color: RED }]);
  });

  it("retries the color alone when only the color command failed", async () => {
    const flaky = new FakeDevice();
    let colorCalls = 0;
    flaky.setColor = async (color: Rgb) => {
      colorCalls++;
      if (colorCalls === 1) return false;
      flaky.sent.push({ color });
      return true;
    };
    const flakyActuator = new LightActuator(flaky);

    await flakyActuator.apply("in_meeting", colorMap, OPTIONS);
    expect(flakyActuator.getAppliedState()).toEqual({ power: "on", color: null });

    await flakyActuator.apply("in_meeting", colorMap, OPTIONS);
    expect(flaky.sent).toEqual([{ power: true }, { color: RED }]);
  });

  it("forceOff always sends, even when the cache says off", async () => {
    await actuator.forceOff();
    await actuator.forceOff();
    expect(device.sent).toEqual([{ power: false }, { power: false }]);
    expect(actuator.getAppliedState()).toEqual({ power: "off", color: null });
  });

  it("logs power off transitions like any other", async () => {
    const map = parseColorMap({ offline: { power_off: true } });
    await actuator.apply("offline", map, OPTIONS);

    expect(console.log).toHaveBeenCalledWith('[Lights] Applied "offline": power off');
  });

  it("seeds the cached power from the device", async () => {
    device.power = "on";
    expect(await actuator.sync()).toBe("on");

    await actuator.apply("in_meeting", colorMap, OPTIONS);
    expect(device.sent).toEqual([{ color: RED }]);
  });

  it("keeps the cache when the device state is unknown", async () => {
    actuator = new LightActuator(device);
    await actuator.apply("in_meeting", colorMap, OPTIONS);

    expect(await actuator.sync()).toBeNull();
    expect(actuator.getAppliedState()).toEqual({ power: "on", color: RED });
  });

  it("re-sends everything after a reset", async () => {
    await actuator.apply("available", colorMap, OPTIONS);
    actuator.reset();
    device.sent = [];

    await actuator.apply("available", colorMap, OPTIONS);
    expect(device.sent).toEqual([{ power: true }, { color: GREEN }]);
  });

  it("passes brightness through to the device", async () => {
    expect(await actuator.setBrightness(40)).toBe(true);
    expect(device.sent).toEqual([{ brightness: 40 }]);
  });
});
