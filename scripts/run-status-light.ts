#!/usr/bin/env node
/**
 * Status Light Daemon
 *
 * Keeps the light in sync with the calendar until interrupted. On Ctrl+C or
 * SIGTERM the light is turned off before exiting.
 *
 * Usage:
 *   npm start                              # Run with config/status-light.json
 *   npm start -- --config ./my-state.json  # Use another state file
 *   npm start -- --once                    # Run a single cycle and exit
 */

import { createStatusLight } from "../lib/bootstrap.js";

function printHelp(): void {
  console.log(`
Status Light

Shows your calendar status on a Govee light: red while in a meeting, green
when available, or any manual status from the color map.

Usage:
  npm start -- [options]

Options:
  --config <path>         State file (default: config/status-light.json,
                          or $STATUS_LIGHT_CONFIG)
  --once                  Run one update and exit
  --help, -h              Show this help message

Environment:
  GOVEE_API_KEY           Govee developer API key
  GOOGLE_ACCOUNT          Account whose tokens are used (default: personal)

Authorize the calendar first with:
  npm run auth [account-name]
  `);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  let statePath: string | undefined;
  let once = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }

    if (arg === "--config" && args[i + 1]) {
      statePath = args[i + 1];
      i++;
      continue;
    }

    if (arg === "--once") {
      once = true;
      continue;
    }

    console.error(`Unknown option: ${arg}`);
    printHelp();
    process.exit(1);
  }

  const { controller, store } = await createStatusLight({ statePath });
  console.log(`[Status Light] Using state file ${store.filePath}`);

  if (once) {
    await controller.updateNow();
    const status = await controller.getStatus();
    console.log(`[Status Light] Status: ${status.status ?? "unknown"}`);
    return;
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[Status Light] ${signal} received, turning lights off`);
    await controller.shutdown();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        console.error("Shutdown failed:", err instanceof Error ? err.message : err);
        process.exit(1);
      });
    });
  }

  await controller.start();
  console.log("[Status Light] Running. Press Ctrl+C to stop.");
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
