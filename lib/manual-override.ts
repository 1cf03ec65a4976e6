/**
 * Manual Override Store
 *
 * A user-selected status that wins over the calendar until it expires or a
 * meeting pre-empts it.
 */

import {
  DEFAULT_MANUAL_STATUS_EXPIRY,
  type PersistedState,
  type StatePatch,
} from "./state-store.js";

// ============================================================================
// Types
// ============================================================================

export interface ManualOverride {
  status: string;
  setAt: Date | null;
  expirySeconds: number;
  /** Set only for the short "available" hold that follows a snooze. */
  holdUntil: Date | null;
}

// ============================================================================
// Constants
// ============================================================================

/** Bridge state between an override and a snooze window. */
export const MEETING_ENDED_EARLY = "meeting_ended_early";

export const DEFAULT_OVERRIDE_EXPIRY_SECONDS = DEFAULT_MANUAL_STATUS_EXPIRY;

// ============================================================================
// Reading
// ============================================================================

export function readOverride(state: PersistedState): ManualOverride | null {
  if (!state.CURRENT_STATUS) return null;

  const hold = state.SNOOZE_HOLD_UNTIL ? new Date(state.SNOOZE_HOLD_UNTIL) : null;
  return {
    status: state.CURRENT_STATUS,
    setAt:
      state.MANUAL_STATUS_TIMESTAMP !== null
        ? new Date(state.MANUAL_STATUS_TIMESTAMP * 1000)
        : null,
    expirySeconds: state.MANUAL_STATUS_EXPIRY,
    holdUntil: hold && !Number.isNaN(hold.getTime()) ? hold : null,
  };
}

/**
 * An override without a timestamp is a partial write. The snooze bridge
 * state is exempt: its lifetime comes from the snooze window.
 */
export function isOverrideCorrupt(override: ManualOverride): boolean {
  return override.setAt === null && override.status !== MEETING_ENDED_EARLY;
}

/**
 * Expired once more than `expirySeconds` have passed since it was set, or,
 * for a post-snooze hold, once the hold deadline is reached.
 */
export function isOverrideExpired(override: ManualOverride, now: Date): boolean {
  if (override.holdUntil) {
    return now.getTime() >= override.holdUntil.getTime();
  }
  if (!override.setAt) return false;
  const ageSeconds = (now.getTime() - override.setAt.getTime()) / 1000;
  return ageSeconds > override.expirySeconds;
}

// ============================================================================
// Patches
// ============================================================================

export function setOverridePatch(
  status: string,
  now: Date,
  expirySeconds: number = DEFAULT_OVERRIDE_EXPIRY_SECONDS
): StatePatch {
  return {
    CURRENT_STATUS: status,
    MANUAL_STATUS_TIMESTAMP: now.getTime() / 1000,
    MANUAL_STATUS_EXPIRY: expirySeconds,
  };
}

/**
 * Clears the override. MANUAL_STATUS_EXPIRY is a setting and is left alone.
 */
export function clearOverridePatch(): StatePatch {
  return {
    CURRENT_STATUS: null,
    MANUAL_STATUS_TIMESTAMP: null,
  };
}
