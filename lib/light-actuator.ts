/**
 * Light Actuator
 *
 * Turns a status into power/color commands for the light, sending only what
 * differs from the last state the device accepted.
 */

import {
  formatRgb,
  resolveLightTarget,
  sameColor,
  type ColorMap,
  type LightTargetOptions,
  type Rgb,
} from "./color-map.js";
import type { LightDevice } from "./govee-client.js";
import type { PowerState } from "./state-store.js";

// ============================================================================
// Types
// ============================================================================

export type LightCommand = { type: "power"; state: PowerState } | { type: "color"; color: Rgb };

export interface AppliedLightState {
  power: PowerState | null;
  color: Rgb | null;
}

// ============================================================================
// Actuator
// ============================================================================

export class LightActuator {
  private lastPower: PowerState | null = null;
  private lastColor: Rgb | null = null;

  constructor(private readonly device: LightDevice) {}

  /**
   * Bring the light in line with `status`. Returns the commands the device
   * accepted; an empty list means nothing needed to change.
   */
  async apply(
    status: string,
    colorMap: ColorMap,
    options: LightTargetOptions
  ): Promise<LightCommand[]> {
    const target = resolveLightTarget(status, colorMap, options);
    const issued =
      target.kind === "off" ? await this.turnOff() : await this.showColor(target.color);

    if (issued.length > 0) {
      console.log(
        `[Lights] Applied "${status}": ${issued
          .map((c) => (c.type === "power" ? `power ${c.state}` : `color ${formatRgb(c.color)}`))
          .join(", ")}`
      );
    }
    return issued;
  }

  private async turnOff(): Promise<LightCommand[]> {
    if (this.lastPower === "off" || !(await this.device.setPower(false))) {
      return [];
    }
    this.lastPower = "off";
    this.lastColor = null;
    return [{ type: "power", state: "off" }];
  }

  private async showColor(color: Rgb): Promise<LightCommand[]> {
    const issued: LightCommand[] = [];
    if (this.lastPower !== "on") {
      if (!(await this.device.setPower(true))) {
        return issued;
      }
      this.lastPower = "on";
      this.lastColor = null;
      issued.push({ type: "power", state: "on" });
    }

    if (!sameColor(this.lastColor, color)) {
      if (await this.device.setColor(color)) {
        this.lastColor = color;
        issued.push({ type: "color", color });
      }
    }
    return issued;
  }

  /**
   * Seed the cached power state from the device. The color stays unknown, so
   * the next apply re-sends it.
   */
  async sync(): Promise<PowerState | null> {
    const power = await this.device.readPower();
    if (power !== null) {
      this.lastPower = power;
      this.lastColor = null;
    }
    return power;
  }

  /**
   * Send an off command regardless of the cached state.
   */
  async forceOff(): Promise<boolean> {
    const ok = await this.device.setPower(false);
    if (ok) {
      this.lastPower = "off";
      this.lastColor = null;
    }
    return ok;
  }

  setBrightness(level: number): Promise<boolean> {
    return this.device.setBrightness(level);
  }

  /**
   * Forget the cached state so the next apply re-sends everything.
   */
  reset(): void {
    this.lastPower = null;
    this.lastColor = null;
  }

  getAppliedState(): AppliedLightState {
    return { power: this.lastPower, color: this.lastColor };
  }
}
