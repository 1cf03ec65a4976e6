#!/usr/bin/env node
/**
 * List Calendars
 *
 * Prints the calendars the authorized account can read, to pick a value for
 * SELECTED_CALENDAR_ID.
 *
 * Usage:
 *   npm run calendars              # Default account
 *   npm run calendars -- work      # Another account
 */

import { GoogleCalendarSource } from "../lib/calendar-window.js";
import { DEFAULT_ACCOUNT } from "../lib/google-auth.js";

async function main(): Promise<void> {
  const account = process.argv[2] || DEFAULT_ACCOUNT;
  console.log(`Calendars for account: ${account}\n`);

  const calendars = await new GoogleCalendarSource(account).listCalendars();
  if (calendars.length === 0) {
    console.log("  (none found)");
    return;
  }
  for (const cal of calendars) {
    console.log(`  ${cal.primary ? "*" : " "} ${cal.summary}`);
    console.log(`      ${cal.id}`);
  }
  console.log("\n* primary calendar. Set SELECTED_CALENDAR_ID to one of the ids above.");
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
