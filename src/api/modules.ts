/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasApiClient } from "./client.js";
import type { CanvasId, FormPayload } from "./types.js";
import { idSegment, setIndexed, setOptional } from "./form.js";

interface ModuleFields {
  position?: number;
  unlockAt?: string; // ISO 8601
  requireSequentialProgress?: boolean;
  prerequisiteModuleIds?: CanvasId[];
  publishFinalGrade?: boolean;
}

export interface CreateModuleParams extends ModuleFields {
  courseId: CanvasId;
  name: string;
}

export interface UpdateModuleParams extends ModuleFields {
  courseId: CanvasId;
  moduleId: CanvasId;
  name?: string;
}

function modulePath(courseId: CanvasId, moduleId?: CanvasId): string {
  const base = `courses/${idSegment(courseId)}/modules`;
  return moduleId === undefined ? base : `${base}/${idSegment(moduleId)}`;
}

function setModuleFields(data: FormPayload, fields: ModuleFields): void {
  setOptional(data, "module[position]", fields.position);
  setOptional(data, "module[unlock_at]", fields.unlockAt);
  setOptional(data, "module[require_sequential_progress]", fields.requireSequentialProgress);
  setIndexed(data, "module[prerequisite_module_ids]", fields.prerequisiteModuleIds);
  setOptional(data, "module[publish_final_grade]", fields.publishFinalGrade);
}

export async function listModules(client: CanvasApiClient, courseId: CanvasId): Promise<unknown> {
  return await client.get(modulePath(courseId));
}

export async function getModule(
  client: CanvasApiClient,
  courseId: CanvasId,
  moduleId: CanvasId,
): Promise<unknown> {
  return await client.get(modulePath(courseId, moduleId));
}

export async function createModule(
  client: CanvasApiClient,
  params: CreateModuleParams,
): Promise<unknown> {
  const data: FormPayload = {
    "module[name]": params.name,
  };
  setModuleFields(data, params);

  return await client.post(modulePath(params.courseId), data);
}

export async function updateModule(
  client: CanvasApiClient,
  params: UpdateModuleParams,
): Promise<unknown> {
  const data: FormPayload = {};
  setOptional(data, "module[name]", params.name);
  setModuleFields(data, params);

  return await client.put(modulePath(params.courseId, params.moduleId), data);
}

export async function deleteModule(
  client: CanvasApiClient,
  courseId: CanvasId,
  moduleId: CanvasId,
): Promise<unknown> {
  return await client.delete(modulePath(courseId, moduleId));
}
