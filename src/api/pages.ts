/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import type { CanvasApiClient } from "./client.js";
import type { CanvasId, FormPayload } from "./types.js";
import { idSegment, setOptional } from "./form.js";
import { createModuleItem } from "./module-items.js";
import { log } from "../utils/logger.js";

interface PageFields {
  editingRoles?: string; // comma-separated, e.g. "teachers,students"
  published?: boolean;
  frontPage?: boolean;
}

export interface ListPagesParams {
  courseId: CanvasId;
  searchTerm?: string;
}

export interface CreatePageParams extends PageFields {
  courseId: CanvasId;
  title: string;
  body: string; // HTML
}

export interface UpdatePageParams extends PageFields {
  courseId: CanvasId;
  pageUrl: string;
  title?: string;
  body?: string;
}

export interface AddPageToModuleParams {
  courseId: CanvasId;
  moduleId: CanvasId;
  pageUrl: string;
  title?: string; // defaults to the page's own title
  position?: number;
  indent?: number;
  newTab?: boolean;
}

export interface CreatePageAndAddToModuleParams extends CreatePageParams {
  moduleId: CanvasId;
  modulePosition?: number;
  moduleIndent?: number;
  newTab?: boolean;
}

// The fields of a page response the composites rely on
const PageRefSchema = z.object({
  url: z.string().nullish(),
  title: z.string().nullish(),
  page_id: z.union([z.number(), z.string()]).nullish(),
  id: z.union([z.number(), z.string()]).nullish(),
});

type PageRef = z.infer<typeof PageRefSchema>;

function readPageRef(page: unknown): PageRef {
  const parsed = PageRefSchema.safeParse(page);
  return parsed.success ? parsed.data : {};
}

function pageContentId(page: PageRef): CanvasId {
  return page.page_id ?? page.id ?? "";
}

/**
 * Final path segment of a page URL: ".../pages/intro" -> "intro".
 */
export function pageSlugFromUrl(url: string): string {
  return url.replace(/\/+$/, "").split("/").pop() ?? "";
}

function pagePath(courseId: CanvasId, pageUrl?: string): string {
  const base = `courses/${idSegment(courseId)}/pages`;
  return pageUrl === undefined ? base : `${base}/${idSegment(pageUrl)}`;
}

function setPageFields(data: FormPayload, fields: PageFields): void {
  setOptional(data, "wiki_page[editing_roles]", fields.editingRoles);
  setOptional(data, "wiki_page[published]", fields.published);
  setOptional(data, "wiki_page[front_page]", fields.frontPage);
}

export async function listPages(client: CanvasApiClient, params: ListPagesParams): Promise<unknown> {
  return await client.get(pagePath(params.courseId), {
    search_term: params.searchTerm,
  });
}

export async function getPage(
  client: CanvasApiClient,
  courseId: CanvasId,
  pageUrl: string,
): Promise<unknown> {
  return await client.get(pagePath(courseId, pageUrl));
}

export async function createPage(
  client: CanvasApiClient,
  params: CreatePageParams,
): Promise<unknown> {
  const data: FormPayload = {
    "wiki_page[title]": params.title,
    "wiki_page[body]": params.body,
  };
  setPageFields(data, params);

  return await client.post(pagePath(params.courseId), data);
}

export async function updatePage(
  client: CanvasApiClient,
  params: UpdatePageParams,
): Promise<unknown> {
  const data: FormPayload = {};
  setOptional(data, "wiki_page[title]", params.title);
  setOptional(data, "wiki_page[body]", params.body);
  setPageFields(data, params);

  return await client.put(pagePath(params.courseId, params.pageUrl), data);
}

export async function deletePage(
  client: CanvasApiClient,
  courseId: CanvasId,
  pageUrl: string,
): Promise<unknown> {
  return await client.delete(pagePath(courseId, pageUrl));
}

/**
 * Add an existing page to a module: fetch the page, then create a Page item for it.
 *
 * Two requests, no rollback. A failure in either step propagates as is.
 */
export async function addPageToModule(
  client: CanvasApiClient,
  params: AddPageToModuleParams,
): Promise<unknown> {
  const page = readPageRef(await getPage(client, params.courseId, params.pageUrl));

  return await createModuleItem(client, {
    courseId: params.courseId,
    moduleId: params.moduleId,
    title: params.title ?? page.title ?? "",
    type: "Page",
    contentId: pageContentId(page),
    position: params.position,
    indent: params.indent,
    pageUrl: params.pageUrl,
    newTab: params.newTab,
  });
}

/**
 * Create a page (published unless told otherwise) and add it to a module.
 *
 * The module item's page_url is the last segment of the created page's url.
 * Two requests, no rollback: if the module item cannot be created the page
 * stays in the course and the error propagates.
 */
export async function createPageAndAddToModule(
  client: CanvasApiClient,
  params: CreatePageAndAddToModuleParams,
): Promise<unknown> {
  const page = readPageRef(
    await createPage(client, {
      courseId: params.courseId,
      title: params.title,
      body: params.body,
      editingRoles: params.editingRoles,
      published: params.published ?? true,
      frontPage: params.frontPage,
    }),
  );
  const slug = pageSlugFromUrl(page.url ?? "");

  try {
    return await createModuleItem(client, {
      courseId: params.courseId,
      moduleId: params.moduleId,
      title: params.title,
      type: "Page",
      contentId: pageContentId(page),
      position: params.modulePosition,
      indent: params.moduleIndent,
      pageUrl: slug,
      newTab: params.newTab,
    });
  } catch (error) {
    log(
      "WARN",
      `Page "${slug}" was created in course ${params.courseId} but not added to module ${params.moduleId}`,
    );
    throw error;
  }
}
