#!/usr/bin/env node
/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { enableStdoutGuard, log, setLogLevel } from "./utils/logger.js";
import { loadConfig } from "./utils/config.js";
import { CanvasApiClient } from "./api/index.js";
import { registerAllTools } from "./tools/index.js";

// CRITICAL: Enable stdout guard IMMEDIATELY to prevent corruption of stdio transport
enableStdoutGuard();

// Unhandled rejection handler
process.on("unhandledRejection", (reason) => {
  log("ERROR", "Unhandled promise rejection", reason);
});

async function main(): Promise<void> {
  try {
    // Load configuration; missing URL or token stops here
    const config = loadConfig();
    setLogLevel(config.logLevel);
    log("DEBUG", "Configuration loaded", {
      apiUrl: config.apiUrl,
      envFile: config.envFile ?? null,
      timeoutMs: config.timeoutMs ?? null,
    });

    // Create MCP server instance
    const server = new McpServer({
      name: "canvas-course-mcp",
      version: "1.0.0",
    });

    const apiClient = new CanvasApiClient({
      baseUrl: config.apiUrl,
      token: config.apiToken,
      timeoutMs: config.timeoutMs,
    });

    registerAllTools(server, apiClient);
    log("DEBUG", "MCP tools registered");

    // Connect stdio transport
    const transport = new StdioServerTransport();
    await server.connect(transport);

    log("INFO", `Canvas MCP server running on stdio for ${apiClient.baseUrl}`);
  } catch (error) {
    log("ERROR", "MCP Server failed to start", error);
    process.exit(1);
  }
}

// Graceful shutdown
process.on("SIGINT", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});
process.on("SIGTERM", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});

void main();
