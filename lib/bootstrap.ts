/**
 * Bootstrap
 *
 * Builds a StatusController from the state file and environment, checking
 * the configured identifiers first. Invalid Govee settings leave the
 * controller without a light; an invalid calendar id leaves it manual-only.
 */

import { GoogleCalendarSource, type CalendarSource } from "./calendar-window.js";
import { DEFAULT_ACCOUNT } from "./google-auth.js";
import { GoveeClient, type LightDevice } from "./govee-client.js";
import { StateStore, type PersistedState } from "./state-store.js";
import { StatusController } from "./status-controller.js";
import {
  isValidGoogleCalendarId,
  isValidGoveeApiKey,
  isValidGoveeDeviceId,
  isValidGoveeDeviceModel,
} from "./validation.js";

// ============================================================================
// Types
// ============================================================================

export interface BootstrapOptions {
  statePath?: string;
  env?: NodeJS.ProcessEnv;
  createCalendar?: (account: string) => CalendarSource;
  createDevice?: (apiKey: string, deviceId: string, model: string) => LightDevice;
}

export interface StatusLightApp {
  controller: StatusController;
  store: StateStore;
  /** Problems found in the settings; each has already been logged. */
  problems: string[];
}

// ============================================================================
// Validation
// ============================================================================

/**
 * List what is wrong with the light and calendar settings.
 */
export function checkSettings(state: PersistedState, apiKey: string | undefined): string[] {
  const problems: string[] = [];
  if (!isValidGoveeApiKey(apiKey)) {
    problems.push("GOVEE_API_KEY is missing or too short (expected at least 32 characters)");
  }
  if (!isValidGoveeDeviceId(state.GOVEE_DEVICE_ID)) {
    problems.push(
      `GOVEE_DEVICE_ID "${state.GOVEE_DEVICE_ID ?? ""}" is not a device id like 10:00:D7:C1:83:46:65:8C`
    );
  }
  if (!isValidGoveeDeviceModel(state.GOVEE_DEVICE_MODEL)) {
    problems.push(`GOVEE_DEVICE_MODEL "${state.GOVEE_DEVICE_MODEL ?? ""}" is not a model like H6159`);
  }
  if (!isValidGoogleCalendarId(state.SELECTED_CALENDAR_ID)) {
    problems.push(`SELECTED_CALENDAR_ID "${state.SELECTED_CALENDAR_ID}" is not a calendar id`);
  }
  return problems;
}

// ============================================================================
// Factory
// ============================================================================

export async function createStatusLight(options: BootstrapOptions = {}): Promise<StatusLightApp> {
  const env = options.env ?? process.env;
  const store = new StateStore(options.statePath ?? env.STATUS_LIGHT_CONFIG);
  const { state } = await store.load();

  const apiKey = env.GOVEE_API_KEY;
  const problems = checkSettings(state, apiKey);
  for (const problem of problems) {
    console.warn(`[Config] ${problem}`);
  }

  let device: LightDevice | null = null;
  if (
    apiKey &&
    state.GOVEE_DEVICE_ID &&
    state.GOVEE_DEVICE_MODEL &&
    isValidGoveeApiKey(apiKey) &&
    isValidGoveeDeviceId(state.GOVEE_DEVICE_ID) &&
    isValidGoveeDeviceModel(state.GOVEE_DEVICE_MODEL)
  ) {
    const create =
      options.createDevice ??
      ((key: string, deviceId: string, model: string) => new GoveeClient({ apiKey: key, deviceId, model }));
    device = create(apiKey, state.GOVEE_DEVICE_ID, state.GOVEE_DEVICE_MODEL);
  } else {
    console.warn("[Config] Light control unavailable until the Govee settings are fixed");
  }

  let calendar: CalendarSource | null = null;
  if (isValidGoogleCalendarId(state.SELECTED_CALENDAR_ID)) {
    const account = env.GOOGLE_ACCOUNT || DEFAULT_ACCOUNT;
    calendar = options.createCalendar
      ? options.createCalendar(account)
      : new GoogleCalendarSource(account);
  } else {
    console.warn("[Config] Calendar sync unavailable, status is manual only");
  }

  return {
    controller: new StatusController({ store, calendar, device }),
    store,
    problems,
  };
}
