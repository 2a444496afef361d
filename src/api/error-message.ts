/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

/**
 * Pulls a human-readable message out of a parsed Canvas error body.
 * Receives `undefined` when the body was empty or not JSON.
 */
export type MessageStrategy = (body: unknown) => string | undefined;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (isRecord(value)) {
    return typeof value.message === "string" ? value.message : JSON.stringify(value);
  }
  if (Array.isArray(value)) return JSON.stringify(value);
  return String(value);
}

// { "errors": { "message": "..." } }
export const nestedErrorsMessage: MessageStrategy = (body) => {
  if (!isRecord(body) || !isRecord(body.errors) || !("message" in body.errors)) {
    return undefined;
  }
  return asText(body.errors.message);
};

// { "errors": ["...", ...] } or { "errors": [{ "message": "..." }] }
export const firstErrorsEntry: MessageStrategy = (body) => {
  if (!isRecord(body) || !Array.isArray(body.errors) || body.errors.length === 0) {
    return undefined;
  }
  return asText(body.errors[0]);
};

// { "message": "..." }
export const topLevelMessage: MessageStrategy = (body) => {
  if (!isRecord(body) || !("message" in body)) return undefined;
  return asText(body.message);
};

export const MESSAGE_STRATEGIES: readonly MessageStrategy[] = [
  nestedErrorsMessage,
  firstErrorsEntry,
  topLevelMessage,
];

/**
 * Try each strategy in order; the first one that yields a string wins.
 * `fallback` describes the transport failure itself.
 */
export function extractErrorMessage(
  body: unknown,
  fallback: string,
  strategies: readonly MessageStrategy[] = MESSAGE_STRATEGIES,
): string {
  if (body === undefined) return fallback;
  for (const strategy of strategies) {
    const message = strategy(body);
    if (message !== undefined) return message;
  }
  return fallback;
}

/** Parse JSON text, returning undefined for empty or malformed input. */
export function parseJsonBody(text: string): unknown {
  if (text.trim().length === 0) return undefined;
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}
