/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Application configuration
export interface AppConfig {
  apiUrl: string; // e.g. https://school.instructure.com/api/v1
  apiToken: string;
  timeoutMs?: number; // no request deadline when unset
  logLevel: LogLevel;
  envFile?: string; // .env file that was loaded, if any
}

// Log levels
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARN", "ERROR"];
