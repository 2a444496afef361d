/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { AppError } from "../utils/errors.js";
import type { HttpMethod } from "./types.js";

/**
 * The single error kind raised by the transport layer.
 * `message` is the text extracted from the Canvas response, without any prefix.
 */
export class ApiError extends AppError {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly method?: HttpMethod,
    public readonly endpoint?: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = "ApiError";
  }

  toJSON(): { statusCode: number; message: string } {
    return { statusCode: this.statusCode, message: this.message };
  }

  override toString(): string {
    return `Canvas API error (${this.statusCode}): ${this.message}`;
  }
}

// No HTTP response at all: DNS failures, refused connections, timeouts
export class NetworkError extends ApiError {
  constructor(
    message: string,
    method?: HttpMethod,
    endpoint?: string,
    cause?: Error,
  ) {
    super(500, message, method, endpoint, cause);
    this.name = "NetworkError";
  }
}
