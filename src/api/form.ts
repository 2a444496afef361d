/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { FormPayload, FormValue, QueryParams } from "./types.js";

/**
 * Set `field` only when a value was provided.
 * `undefined` means "not provided"; "", 0 and false are real values.
 */
export function setOptional(
  payload: FormPayload,
  field: string,
  value: FormValue | undefined,
): void {
  if (value !== undefined) {
    payload[field] = value;
  }
}

/**
 * Expand a list into `field[0]`, `field[1]`, ...
 * An explicitly empty list becomes `field[]` = "" so Canvas clears the value.
 */
export function setIndexed(
  payload: FormPayload,
  field: string,
  values: readonly FormValue[] | undefined,
): void {
  if (values === undefined) return;
  if (values.length === 0) {
    payload[`${field}[]`] = "";
    return;
  }
  values.forEach((value, index) => {
    payload[`${field}[${index}]`] = value;
  });
}

export function encodeForm(payload: FormPayload): URLSearchParams {
  const form = new URLSearchParams();
  for (const [field, value] of Object.entries(payload)) {
    form.append(field, String(value));
  }
  return form;
}

export function appendQuery(url: URL, params: QueryParams | undefined): void {
  if (!params) return;
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (isList(value)) {
      for (const item of value) url.searchParams.append(key, String(item));
    } else {
      url.searchParams.append(key, String(value));
    }
  }
}

function isList(value: FormValue | readonly FormValue[]): value is readonly FormValue[] {
  return Array.isArray(value);
}

/** Encode a resource identifier (numeric ID or page slug) as one path segment. */
export function idSegment(id: string | number): string {
  return encodeURIComponent(String(id));
}
