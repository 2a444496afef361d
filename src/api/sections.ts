/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasApiClient } from "./client.js";
import type { CanvasId, FormPayload } from "./types.js";
import { idSegment, setOptional } from "./form.js";

export interface CreateSectionParams {
  courseId: CanvasId;
  sectionName: string;
  sisSectionId?: string;
}

export interface UpdateSectionParams {
  sectionId: CanvasId;
  sectionName?: string;
}

export interface CrossListSectionParams {
  sectionId: CanvasId;
  newCourseId: CanvasId;
}

export async function listSections(client: CanvasApiClient, courseId: CanvasId): Promise<unknown> {
  return await client.get(`courses/${idSegment(courseId)}/sections`);
}

export async function getSection(client: CanvasApiClient, sectionId: CanvasId): Promise<unknown> {
  return await client.get(`sections/${idSegment(sectionId)}`);
}

export async function createSection(
  client: CanvasApiClient,
  params: CreateSectionParams,
): Promise<unknown> {
  const data: FormPayload = {
    "course_section[name]": params.sectionName,
  };
  setOptional(data, "course_section[sis_section_id]", params.sisSectionId);

  return await client.post(`courses/${idSegment(params.courseId)}/sections`, data);
}

export async function updateSection(
  client: CanvasApiClient,
  params: UpdateSectionParams,
): Promise<unknown> {
  const data: FormPayload = {};
  setOptional(data, "course_section[name]", params.sectionName);

  return await client.put(`sections/${idSegment(params.sectionId)}`, data);
}

export async function deleteSection(client: CanvasApiClient, sectionId: CanvasId): Promise<unknown> {
  return await client.delete(`sections/${idSegment(sectionId)}`);
}

/** Move a section into another course. */
export async function crossListSection(
  client: CanvasApiClient,
  params: CrossListSectionParams,
): Promise<unknown> {
  return await client.post(
    `sections/${idSegment(params.sectionId)}/crosslist/${idSegment(params.newCourseId)}`,
  );
}
