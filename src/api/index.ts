/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Canvas API client and domain operations - public exports

// Main client
export { CanvasApiClient } from "./client.js";

// Errors
export { ApiError, NetworkError } from "./errors.js";
export { extractErrorMessage, MESSAGE_STRATEGIES } from "./error-message.js";
export type { MessageStrategy } from "./error-message.js";

// Domain operations
export * from "./courses.js";
export * from "./sections.js";
export * from "./modules.js";
export * from "./module-items.js";
export * from "./pages.js";

// Types
export type {
  CanvasApiClientOptions,
  CanvasId,
  ConnectionContext,
  FormPayload,
  FormValue,
  HttpMethod,
  QueryParams,
  RequestOptions,
} from "./types.js";
