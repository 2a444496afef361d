/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CanvasApiClient } from "../api/index.js";
import { registerCourseTools } from "./courses.js";
import { registerSectionTools } from "./sections.js";
import { registerModuleTools } from "./modules.js";
import { registerModuleItemTools } from "./module-items.js";
import { registerPageTools } from "./pages.js";

// Tool registration functions - barrel export
export {
  registerCourseTools,
  registerSectionTools,
  registerModuleTools,
  registerModuleItemTools,
  registerPageTools,
};

// Re-export shared helpers and schemas for convenience
export { toolResponse, errorResponse, sanitizeError, runTool } from "./tool-helpers.js";
export * from "./schemas.js";

export function registerAllTools(server: McpServer, apiClient: CanvasApiClient): void {
  registerCourseTools(server, apiClient);
  registerSectionTools(server, apiClient);
  registerModuleTools(server, apiClient);
  registerModuleItemTools(server, apiClient);
  registerPageTools(server, apiClient);
}
