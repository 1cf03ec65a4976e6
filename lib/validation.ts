/**
 * Settings Validation
 *
 * Format checks for the Govee and Google Calendar identifiers in the config.
 */

const DEVICE_ID_PATTERN = /^([0-9A-Fa-f]{2}:){7}[0-9A-Fa-f]{2}$/;
const DEVICE_MODEL_PATTERN = /^[A-Za-z0-9-]+$/;
const EMAIL_LIKE_PATTERN = /[^@]+@[^@]+\.[^@]+/;

/**
 * Govee API keys are long opaque strings; anything shorter than 32 characters
 * is a copy/paste mistake.
 */
export function isValidGoveeApiKey(apiKey: string | null | undefined): boolean {
  return !!apiKey && apiKey.length >= 32;
}

/**
 * Device IDs look like 10:00:D7:C1:83:46:65:8C.
 */
export function isValidGoveeDeviceId(deviceId: string | null | undefined): boolean {
  return !!deviceId && DEVICE_ID_PATTERN.test(deviceId);
}

/**
 * Device models look like H6159 or H6001.
 */
export function isValidGoveeDeviceModel(model: string | null | undefined): boolean {
  return !!model && DEVICE_MODEL_PATTERN.test(model);
}

/**
 * Accepts "primary", email addresses and group calendar ids.
 */
export function isValidGoogleCalendarId(calendarId: string | null | undefined): boolean {
  if (!calendarId) return false;
  if (calendarId === "primary") return true;
  if (calendarId.endsWith("@group.calendar.google.com")) return true;
  return EMAIL_LIKE_PATTERN.test(calendarId);
}
