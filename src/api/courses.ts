/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasApiClient } from "./client.js";
import type { CanvasId, FormPayload } from "./types.js";
import { idSegment, setOptional } from "./form.js";

export interface ListCoursesParams {
  enrollmentType?: string; // teacher, student, ta, observer, designer
  enrollmentState?: string; // active, invited_or_pending, completed
  include?: string[]; // e.g. ["term", "total_students"]
}

export interface CreateCourseParams {
  accountId: CanvasId;
  name: string;
  courseCode?: string;
  sisCourseId?: string;
}

export async function listCourses(
  client: CanvasApiClient,
  params: ListCoursesParams = {},
): Promise<unknown> {
  return await client.get("courses", {
    enrollment_type: params.enrollmentType,
    enrollment_state: params.enrollmentState,
    "include[]": params.include,
  });
}

export async function getCourse(client: CanvasApiClient, courseId: CanvasId): Promise<unknown> {
  return await client.get(`courses/${idSegment(courseId)}`);
}

export async function createCourse(
  client: CanvasApiClient,
  params: CreateCourseParams,
): Promise<unknown> {
  const data: FormPayload = {
    "course[name]": params.name,
  };
  setOptional(data, "course[course_code]", params.courseCode);
  setOptional(data, "course[sis_course_id]", params.sisCourseId);

  return await client.post(`accounts/${idSegment(params.accountId)}/courses`, data);
}
