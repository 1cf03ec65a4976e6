import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { checkSettings, createStatusLight } from "../lib/bootstrap.js";
import { getDefaultState } from "../lib/state-store.js";
import { FakeCalendar, FakeDevice } from "./fakes.js";

const API_KEY = "test-secret-".padEnd(32, "0");

describe("Bootstrap", () => {
  let tmpDir: string;
  let statePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "status-light-"));
    statePath = path.join(tmpDir, "status-light.json");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe("checkSettings", () => {
    it("reports each invalid setting", () => {
      const problems = checkSettings(
        { ...getDefaultState(), SELECTED_CALENDAR_ID: "nope" },
        "test-secret"
      );
      expect(problems).toHaveLength(4);
      expect(problems[0]).toContain("GOVEE_API_KEY");
      expect(problems[3]).toContain("SELECTED_CALENDAR_ID");
    });

    it("accepts a complete configuration", () => {
      const state = {
        ...getDefaultState(),
        GOVEE_DEVICE_ID: "10:00:D7:C1:83:46:65:8C",
        GOVEE_DEVICE_MODEL: "H6159",
      };
      expect(checkSettings(state, API_KEY)).toEqual([]);
    });
  });

  describe("createStatusLight", () => {
    it("wires the light and calendar when the settings are valid", async () => {
      fs.writeFileSync(
        statePath,
        JSON.stringify({ GOVEE_DEVICE_ID: "10:00:D7:C1:83:46:65:8C", GOVEE_DEVICE_MODEL: "H6159" })
      );
      const device = new FakeDevice();
      const createDevice = vi.fn((_key: string, _id: string, _model: string) => device);
      const createCalendar = vi.fn((_account: string) => new FakeCalendar());

      const app = await createStatusLight({
        statePath,
        env: { GOVEE_API_KEY: API_KEY, GOOGLE_ACCOUNT: "work" },
        createDevice,
        createCalendar,
      });

      expect(app.problems).toEqual([]);
      expect(createDevice).toHaveBeenCalledWith(API_KEY, "10:00:D7:C1:83:46:65:8C", "H6159");
      expect(createCalendar).toHaveBeenCalledWith("work");

      await app.controller.updateNow();
      expect(device.sent).toEqual([{ power: true }, { color: { r: 0, g: 255, b: 0 } }]);
    });

    it("runs without a light when the API key is missing", async () => {
      const createDevice = vi.fn((_key: string, _id: string, _model: string) => new FakeDevice());

      const app = await createStatusLight({
        statePath,
        env: {},
        createDevice,
        createCalendar: () => new FakeCalendar(),
      });

      expect(createDevice).not.toHaveBeenCalled();
      expect((await app.controller.getStatus()).lightControlEnabled).toBe(false);
    });

    it("runs manual-only with an invalid calendar id", async () => {
      fs.writeFileSync(statePath, JSON.stringify({ SELECTED_CALENDAR_ID: "not a calendar" }));
      const createCalendar = vi.fn((_account: string) => new FakeCalendar());

      const app = await createStatusLight({ statePath, env: {}, createCalendar });

      expect(createCalendar).not.toHaveBeenCalled();
      expect((await app.controller.getStatus()).calendarSyncEnabled).toBe(false);
    });
  });
});
