/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "DELETE"];

// Scalar value of a form field or query parameter
export type FormValue = string | number | boolean;

// Form body keyed by bracketed field name, e.g. "module[name]"
export type FormPayload = Record<string, FormValue>;

// Query string; undefined entries are skipped, arrays become repeated keys
export type QueryParams = Record<string, FormValue | readonly FormValue[] | undefined>;

export interface RequestOptions {
  params?: QueryParams;
  data?: FormPayload;
}

// Immutable for the lifetime of a client
export interface ConnectionContext {
  readonly baseUrl: string; // e.g. https://school.instructure.com/api/v1
  readonly token: string;
  readonly timeoutMs?: number;
}

// CanvasApiClient constructor options
export interface CanvasApiClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number; // no deadline when unset
}

// Numeric IDs arrive as numbers or strings; SIS IDs and "self" are strings
export type CanvasId = string | number;
