#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { createStatusLight } from "../../lib/bootstrap.js";
import { TOOLS, callTool } from "./tools.js";

// Logs go to stderr; stdout carries the protocol.
console.log = console.error;

const { controller } = await createStatusLight();

const server = new Server(
  {
    name: "status-light",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
      resources: {},
    },
  }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: TOOLS };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return callTool(controller, name, args);
});

// List resources
server.setRequestHandler(ListResourcesRequestSchema, async () => {
  return {
    resources: [
      {
        uri: "status://current",
        name: "Current Status",
        description: "The displayed status, override, snooze and light state",
        mimeType: "application/json",
      },
    ],
  };
});

// Read resources
server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
  const { uri } = request.params;
  if (uri !== "status://current") {
    throw new Error(`Unknown resource: ${uri}`);
  }
  return {
    contents: [
      {
        uri,
        mimeType: "application/json",
        text: JSON.stringify(await controller.getStatus(), null, 2),
      },
    ],
  };
});

async function shutdown(signal: string): Promise<void> {
  console.error(`[MCP] ${signal} received, turning lights off`);
  await controller.shutdown();
  process.exit(0);
}

// Start the server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("Status light MCP server running on stdio");
  await controller.start();

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
