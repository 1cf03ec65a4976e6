/**
 * Govee Client
 *
 * Minimal client for the Govee developer API. Each command is a single
 * request with a 10 second timeout; failures are logged and reported as
 * `false` so the caller can retry on its next cycle.
 */

import { clampRgb, type Rgb } from "./color-map.js";
import type { PowerState } from "./state-store.js";

// ============================================================================
// Types
// ============================================================================

/**
 * The light commands the actuator needs. GoveeClient is the real device;
 * tests supply an in-memory one.
 */
export interface LightDevice {
  setPower(on: boolean): Promise<boolean>;
  setColor(color: Rgb): Promise<boolean>;
  setBrightness(level: number): Promise<boolean>;
  /** Null when the state cannot be read. */
  readPower(): Promise<PowerState | null>;
}

export interface GoveeClientOptions {
  apiKey: string;
  deviceId: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

type GoveeCommand =
  | { name: "turn"; value: "on" | "off" }
  | { name: "color"; value: Rgb }
  | { name: "brightness"; value: number };

// ============================================================================
// Constants
// ============================================================================

export const GOVEE_BASE_URL = "https://developer-api.govee.com/v1/devices";
const DEFAULT_TIMEOUT_MS = 10_000;

// ============================================================================
// Client
// ============================================================================

export class GoveeClient implements LightDevice {
  private readonly apiKey: string;
  private readonly deviceId: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GoveeClientOptions) {
    this.apiKey = options.apiKey;
    this.deviceId = options.deviceId;
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? GOVEE_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  setPower(on: boolean): Promise<boolean> {
    return this.send({ name: "turn", value: on ? "on" : "off" });
  }

  setColor(color: Rgb): Promise<boolean> {
    return this.send({ name: "color", value: clampRgb(color.r, color.g, color.b) });
  }

  /**
   * Brightness is a percentage; values outside 0-100 are clamped.
   */
  setBrightness(level: number): Promise<boolean> {
    const value = Math.max(0, Math.min(100, Math.round(level)));
    return this.send({ name: "brightness", value });
  }

  /**
   * Query the device power state.
   */
  async readPower(): Promise<PowerState | null> {
    const url = new URL(`${this.baseUrl}/state`);
    url.searchParams.set("device", this.deviceId);
    url.searchParams.set("model", this.model);

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { "Govee-API-Key": this.apiKey },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      const body: unknown = await response.json();
      return readPowerState(body);
    } catch (err) {
      console.error(
        `[Lights] Failed to read device state: ${err instanceof Error ? err.message : String(err)}`
      );
      return null;
    }
  }

  private async send(cmd: GoveeCommand): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/control`, {
        method: "PUT",
        headers: {
          "Govee-API-Key": this.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ device: this.deviceId, model: this.model, cmd }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      console.log(`[Lights] ${cmd.name} -> ${JSON.stringify(cmd.value)}`);
      return true;
    } catch (err) {
      console.error(
        `[Lights] Failed to send ${cmd.name} command: ${err instanceof Error ? err.message : String(err)}`
      );
      return false;
    }
  }
}

/**
 * The state endpoint reports `data.properties` as a list of single-key
 * objects, one of which is `{ powerState: "on" | "off" }`.
 */
function readPowerState(body: unknown): PowerState | null {
  if (typeof body !== "object" || body === null || !("data" in body)) return null;
  const data = body.data;
  if (typeof data !== "object" || data === null || !("properties" in data)) return null;
  const properties = data.properties;
  if (!Array.isArray(properties)) return null;

  for (const property of properties) {
    if (typeof property === "object" && property !== null && "powerState" in property) {
      const power = property.powerState;
      return power === "on" || power === "off" ? power : null;
    }
  }
  return null;
}
