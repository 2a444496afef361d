/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import { COMPLETION_REQUIREMENT_TYPES, MODULE_ITEM_TYPES } from "../api/index.js";

/**
 * Zod schemas for MCP tool input validation.
 * Passed directly to the MCP SDK as inputSchema; the SDK detects Zod v4 via the ._zod property.
 * Also used in tool handlers for runtime parsing via .parse(args).
 */

const canvasId = (what: string) =>
  z.union([z.string(), z.number().int()]).describe(`The Canvas ${what} ID`);

const courseId = canvasId("course");
const moduleId = canvasId("module");
const sectionId = canvasId("section");
const itemId = canvasId("module item");

const pageUrl = z.string().describe("The page's URL slug (e.g. 'week-1-overview')");
const position = z.number().int().optional().describe("Optional 1-based position");
const indent = z.number().int().optional().describe("Optional indentation level");
const newTab = z.boolean().optional().describe("Whether the item opens in a new tab");
const editingRoles = z.string().optional()
  .describe("Optional comma-separated roles allowed to edit (e.g. 'teachers,students,public')");
const published = z.boolean().optional().describe("Whether the page is published");
const frontPage = z.boolean().optional().describe("Whether this page is the course front page");

const completionRequirementType = z.enum(COMPLETION_REQUIREMENT_TYPES).optional()
  .describe("Optional completion requirement (must_view, must_submit, must_contribute, must_mark_done, min_score)");
const minScore = z.number().optional()
  .describe("Minimum score; only used with the min_score requirement type");

// Courses

export const ListCoursesSchema = z.object({
  enrollment_type: z.string().optional()
    .describe("Only courses where the user has this enrollment type (teacher, student, ta, observer, designer)"),
  enrollment_state: z.string().optional()
    .describe("Only courses with enrollments in this state (active, invited_or_pending, completed)"),
  include: z.array(z.string()).optional()
    .describe("Extra fields to include (e.g. 'term', 'total_students')"),
});

export const GetCourseSchema = z.object({
  course_id: courseId,
});

export const CreateCourseSchema = z.object({
  account_id: z.union([z.string(), z.number().int()])
    .describe("The Canvas account ID, or 'self'"),
  name: z.string().describe("The name of the course"),
  course_code: z.string().optional().describe("Optional course code"),
  sis_course_id: z.string().optional().describe("Optional SIS ID for the course"),
});

// Sections

export const ListSectionsSchema = z.object({
  course_id: courseId,
});

export const GetSectionSchema = z.object({
  section_id: sectionId,
});

export const CreateSectionSchema = z.object({
  course_id: courseId,
  section_name: z.string().describe("The name of the section"),
  sis_section_id: z.string().optional().describe("Optional SIS ID for the section"),
});

export const UpdateSectionSchema = z.object({
  section_id: sectionId,
  section_name: z.string().optional().describe("New name for the section"),
});

export const DeleteSectionSchema = z.object({
  section_id: sectionId,
});

export const CrossListSectionSchema = z.object({
  section_id: sectionId,
  new_course_id: canvasId("destination course"),
});

// Modules

const moduleFields = {
  position,
  unlock_at: z.string().optional().describe("Optional unlock date (ISO 8601)"),
  require_sequential_progress: z.boolean().optional()
    .describe("Whether students must progress through the module sequentially"),
  prerequisite_module_ids: z.array(z.union([z.string(), z.number().int()])).optional()
    .describe("Module IDs that must be completed first; an empty list clears them"),
  publish_final_grade: z.boolean().optional()
    .describe("Whether to publish the final grade when the module is completed"),
};

export const ListModulesSchema = z.object({
  course_id: courseId,
});

export const GetModuleSchema = z.object({
  course_id: courseId,
  module_id: moduleId,
});

export const CreateModuleSchema = z.object({
  course_id: courseId,
  name: z.string().describe("The name of the module"),
  ...moduleFields,
});

export const UpdateModuleSchema = z.object({
  course_id: courseId,
  module_id: moduleId,
  name: z.string().optional().describe("Optional new name for the module"),
  ...moduleFields,
});

export const DeleteModuleSchema = GetModuleSchema;

// Module items

export const ListModuleItemsSchema = GetModuleSchema;

export const GetModuleItemSchema = z.object({
  course_id: courseId,
  module_id: moduleId,
  item_id: itemId,
});

export const CreateModuleItemSchema = z.object({
  course_id: courseId,
  module_id: moduleId,
  title: z.string().describe("The title of the item"),
  type: z.enum(MODULE_ITEM_TYPES).describe("The type of item"),
  content_id: z.union([z.string(), z.number().int()]).optional()
    .describe("ID of the linked content; not used for ExternalUrl items"),
  position,
  indent,
  page_url: z.string().optional().describe("Page slug; only used for Page items"),
  external_url: z.string().optional().describe("Link target; only used for ExternalUrl items"),
  new_tab: newTab,
  completion_requirement_type: completionRequirementType,
  min_score: minScore,
});

export const UpdateModuleItemSchema = z.object({
  course_id: courseId,
  module_id: moduleId,
  item_id: itemId,
  title: z.string().optional().describe("Optional new title"),
  position,
  indent,
  external_url: z.string().optional().describe("Optional new URL for ExternalUrl items"),
  new_tab: newTab,
  completion_requirement_type: completionRequirementType,
  min_score: minScore,
});

export const DeleteModuleItemSchema = GetModuleItemSchema;

// Pages

export const ListPagesSchema = z.object({
  course_id: courseId,
  search_term: z.string().optional().describe("Optional term to search for in page titles"),
});

export const GetPageSchema = z.object({
  course_id: courseId,
  page_url: pageUrl,
});

export const CreatePageSchema = z.object({
  course_id: courseId,
  title: z.string().describe("The title of the page"),
  body: z.string().describe("The content of the page in HTML"),
  editing_roles: editingRoles,
  published,
  front_page: frontPage,
});

export const UpdatePageSchema = z.object({
  course_id: courseId,
  page_url: pageUrl,
  title: z.string().optional().describe("Optional new title"),
  body: z.string().optional().describe("Optional new HTML content"),
  editing_roles: editingRoles,
  published,
  front_page: frontPage,
});

export const DeletePageSchema = GetPageSchema;

export const AddPageToModuleSchema = z.object({
  course_id: courseId,
  module_id: moduleId,
  page_url: pageUrl,
  title: z.string().optional().describe("Title for the module item; defaults to the page title"),
  position,
  indent,
  new_tab: newTab,
});

export const CreatePageAndAddToModuleSchema = z.object({
  course_id: courseId,
  module_id: moduleId,
  title: z.string().describe("The title of the page"),
  body: z.string().describe("The content of the page in HTML"),
  editing_roles: editingRoles,
  published: z.boolean().default(true).describe("Whether the page is published (default true)"),
  front_page: frontPage,
  module_item_position: position,
  module_item_indent: indent,
  new_tab: newTab,
});
