/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasApiClient } from "./client.js";
import type { CanvasId, FormPayload } from "./types.js";
import { idSegment, setOptional } from "./form.js";

export const MODULE_ITEM_TYPES = [
  "File",
  "Page",
  "Discussion",
  "Assignment",
  "Quiz",
  "SubHeader",
  "ExternalUrl",
  "ExternalTool",
] as const;

export type ModuleItemType = (typeof MODULE_ITEM_TYPES)[number];

export const COMPLETION_REQUIREMENT_TYPES = [
  "must_view",
  "must_submit",
  "must_contribute",
  "must_mark_done",
  "min_score",
] as const;

export type CompletionRequirementType = (typeof COMPLETION_REQUIREMENT_TYPES)[number];

// Only the min_score variant carries a threshold
export type CompletionRequirement =
  | { type: "min_score"; minScore?: number }
  | { type: Exclude<CompletionRequirementType, "min_score"> };

export interface CreateModuleItemParams {
  courseId: CanvasId;
  moduleId: CanvasId;
  title: string;
  type: ModuleItemType;
  contentId?: CanvasId; // ignored for ExternalUrl
  position?: number;
  indent?: number;
  pageUrl?: string; // Page items only
  externalUrl?: string; // ExternalUrl items only
  newTab?: boolean;
  completionRequirement?: CompletionRequirement;
}

export interface UpdateModuleItemParams {
  courseId: CanvasId;
  moduleId: CanvasId;
  itemId: CanvasId;
  title?: string;
  position?: number;
  indent?: number;
  externalUrl?: string;
  newTab?: boolean;
  completionRequirement?: CompletionRequirement;
}

function itemPath(courseId: CanvasId, moduleId: CanvasId, itemId?: CanvasId): string {
  const base = `courses/${idSegment(courseId)}/modules/${idSegment(moduleId)}/items`;
  return itemId === undefined ? base : `${base}/${idSegment(itemId)}`;
}

/**
 * Build a completion requirement from the flat tool arguments.
 * A score given with any type other than min_score is dropped.
 */
export function toCompletionRequirement(
  type: CompletionRequirementType | undefined,
  minScore: number | undefined,
): CompletionRequirement | undefined {
  if (type === undefined) return undefined;
  if (type === "min_score") {
    return minScore === undefined ? { type } : { type, minScore };
  }
  return { type };
}

function setCompletionRequirement(
  data: FormPayload,
  requirement: CompletionRequirement | undefined,
): void {
  if (!requirement) return;
  data["module_item[completion_requirement][type]"] = requirement.type;
  if (requirement.type === "min_score") {
    setOptional(data, "module_item[completion_requirement][min_score]", requirement.minScore);
  }
}

export async function listModuleItems(
  client: CanvasApiClient,
  courseId: CanvasId,
  moduleId: CanvasId,
): Promise<unknown> {
  return await client.get(itemPath(courseId, moduleId));
}

export async function getModuleItem(
  client: CanvasApiClient,
  courseId: CanvasId,
  moduleId: CanvasId,
  itemId: CanvasId,
): Promise<unknown> {
  return await client.get(itemPath(courseId, moduleId, itemId));
}

/**
 * Build the form body for a new module item.
 *
 * content_id is omitted for ExternalUrl items and always sent otherwise.
 * page_url and external_url are only sent when they match the item type;
 * a mismatched one is dropped rather than rejected.
 */
export function buildModuleItemPayload(params: CreateModuleItemParams): FormPayload {
  const data: FormPayload = {
    "module_item[title]": params.title,
    "module_item[type]": params.type,
  };

  if (params.type !== "ExternalUrl") {
    data["module_item[content_id]"] = params.contentId ?? "";
  }

  setOptional(data, "module_item[position]", params.position);
  setOptional(data, "module_item[indent]", params.indent);

  if (params.type === "Page") {
    setOptional(data, "module_item[page_url]", params.pageUrl);
  }
  if (params.type === "ExternalUrl") {
    setOptional(data, "module_item[external_url]", params.externalUrl);
  }

  setOptional(data, "module_item[new_tab]", params.newTab);
  setCompletionRequirement(data, params.completionRequirement);
  return data;
}

export async function createModuleItem(
  client: CanvasApiClient,
  params: CreateModuleItemParams,
): Promise<unknown> {
  return await client.post(
    itemPath(params.courseId, params.moduleId),
    buildModuleItemPayload(params),
  );
}

export async function updateModuleItem(
  client: CanvasApiClient,
  params: UpdateModuleItemParams,
): Promise<unknown> {
  const data: FormPayload = {};
  setOptional(data, "module_item[title]", params.title);
  setOptional(data, "module_item[position]", params.position);
  setOptional(data, "module_item[indent]", params.indent);
  setOptional(data, "module_item[external_url]", params.externalUrl);
  setOptional(data, "module_item[new_tab]", params.newTab);
  setCompletionRequirement(data, params.completionRequirement);

  return await client.put(itemPath(params.courseId, params.moduleId, params.itemId), data);
}

export async function deleteModuleItem(
  client: CanvasApiClient,
  courseId: CanvasId,
  moduleId: CanvasId,
  itemId: CanvasId,
): Promise<unknown> {
  return await client.delete(itemPath(courseId, moduleId, itemId));
}
