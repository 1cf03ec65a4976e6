/**
 * Status Control Tools
 *
 * Tool definitions and dispatch for the MCP control server. Kept apart from
 * the stdio wiring so the handlers can run against a fake controller.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { StatusController } from "../../lib/status-controller.js";

// ============================================================================
// Types
// ============================================================================

export type StatusControl = Pick<
  StatusController,
  | "getStatus"
  | "setManualStatus"
  | "clearManualStatus"
  | "endMeetingEarly"
  | "resetSnooze"
  | "turnOffLightsImmediately"
  | "updateNow"
  | "setBrightness"
  | "listCalendars"
>;

export type ToolArgs = Record<string, unknown> | undefined;

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

// ============================================================================
// Tool definitions
// ============================================================================

export const TOOLS: Tool[] = [
  {
    name: "get_status",
    description:
      "Get the displayed status, any manual override or snooze, the last light state and the scheduler state",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
  },
  {
    name: "set_status",
    description:
      'Set a manual status (e.g. "focus", "available"). It wins over the calendar until it expires or a meeting starts. "meeting_ended_early" snoozes the current meeting instead.',
    inputSchema: {
      type: "object",
      properties: {
        status: {
          type: "string",
          description: "Status label; any key of the color map, or a custom label",
        },
      },
      required: ["status"],
    },
  },
  {
    name: "clear_status",
    description: "Clear the manual status and any snooze, returning to the calendar status",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
  },
  {
    name: "end_meeting_early",
    description:
      "Mark the current meeting as over. The light shows available until the meeting would have ended, unless another meeting starts first.",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
  },
  {
    name: "reset_snooze",
    description: "Cancel an end-meeting-early snooze and re-evaluate the calendar",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
  },
  {
    name: "turn_off_lights",
    description: "Turn the light off now, even if light control is disabled",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
  },
  {
    name: "update_now",
    description: "Re-check the calendar and update the light without waiting for the next tick",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
  },
  {
    name: "set_brightness",
    description: "Set the light brightness",
    inputSchema: {
      type: "object",
      properties: {
        level: {
          type: "number",
          description: "Brightness from 0 to 100",
        },
      },
      required: ["level"],
    },
  },
  {
    name: "list_calendars",
    description: "List the calendars the authorized Google account can read",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
  },
];

// ============================================================================
// Helpers
// ============================================================================

function text(value: unknown): ToolResult {
  return {
    content: [
      {
        type: "text",
        text: typeof value === "string" ? value : JSON.stringify(value, null, 2),
      },
    ],
  };
}

function failure(message: string): ToolResult {
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

function stringArg(args: ToolArgs, key: string): string | null {
  const value = args?.[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

function numberArg(args: ToolArgs, key: string): number | null {
  const value = args?.[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

// ============================================================================
// Dispatch
// ============================================================================

export async function callTool(
  controller: StatusControl,
  name: string,
  args: ToolArgs
): Promise<ToolResult> {
  try {
    switch (name) {
      case "get_status":
        return text(await controller.getStatus());

      case "set_status": {
        const status = stringArg(args, "status");
        if (!status) {
          return failure("Missing required argument: status");
        }
        await controller.setManualStatus(status);
        return text(await controller.getStatus());
      }

      case "clear_status":
        await controller.clearManualStatus();
        return text(await controller.getStatus());

      case "end_meeting_early": {
        const window = await controller.endMeetingEarly();
        return text({
          snoozeUntil: window.until.toISOString(),
          meeting: window.anchor.summary,
          status: (await controller.getStatus()).status,
        });
      }

      case "reset_snooze":
        await controller.resetSnooze();
        return text(await controller.getStatus());

      case "turn_off_lights": {
        const ok = await controller.turnOffLightsImmediately();
        return ok ? text("Lights turned off") : failure("Could not turn the lights off");
      }

      case "update_now":
        await controller.updateNow();
        return text(await controller.getStatus());

      case "set_brightness": {
        const level = numberArg(args, "level");
        if (level === null || level < 0 || level > 100) {
          return failure("level must be a number from 0 to 100");
        }
        const ok = await controller.setBrightness(level);
        return ok ? text(`Brightness set to ${Math.round(level)}`) : failure("Could not set brightness");
      }

      case "list_calendars":
        return text(await controller.listCalendars());

      default:
        return failure(`Unknown tool: ${name}`);
    }
  } catch (error) {
    return failure(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
}
