/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: Error) {
    super(`[CMCP-1001] Configuration error: ${message}`, cause);
    this.name = "ConfigError";
  }
}

export class UnsupportedMethodError extends AppError {
  constructor(public readonly method: string) {
    super(`[CMCP-1002] Unsupported HTTP method: ${method}`);
    this.name = "UnsupportedMethodError";
  }
}
