import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  CanvasApiClient,
  addPageToModule,
  createPage,
  createPageAndAddToModule,
  deletePage,
  getPage,
  listPages,
  updatePage,
} from "../api/index.js";
import {
  AddPageToModuleSchema,
  CreatePageAndAddToModuleSchema,
  CreatePageSchema,
  DeletePageSchema,
  GetPageSchema,
  ListPagesSchema,
  UpdatePageSchema,
} from "./schemas.js";
import { runTool } from "./tool-helpers.js";

/**
 * Register page tools, including the two page + module composites
 */
export function registerPageTools(server: McpServer, apiClient: CanvasApiClient): void {
  server.registerTool(
    "list_pages",
    {
      title: "List Pages",
      description: "List the pages in a course, optionally filtered by a title search term.",
      inputSchema: ListPagesSchema,
    },
    async (args) =>
      runTool("list_pages", async () => {
        const input = ListPagesSchema.parse(args);
        return await listPages(apiClient, {
          courseId: input.course_id,
          searchTerm: input.search_term,
        });
      }),
  );

  server.registerTool(
    "get_page",
    {
      title: "Get Page",
      description: "Get a page, including its HTML body, by its URL slug.",
      inputSchema: GetPageSchema,
    },
    async (args) =>
      runTool("get_page", async () => {
        const { course_id, page_url } = GetPageSchema.parse(args);
        return await getPage(apiClient, course_id, page_url);
      }),
  );

  server.registerTool(
    "create_page",
    {
      title: "Create Page",
      description: "Create a page in a course. The body is HTML.",
      inputSchema: CreatePageSchema,
    },
    async (args) =>
      runTool("create_page", async () => {
        const input = CreatePageSchema.parse(args);
        return await createPage(apiClient, {
          courseId: input.course_id,
          title: input.title,
          body: input.body,
          editingRoles: input.editing_roles,
          published: input.published,
          frontPage: input.front_page,
        });
      }),
  );

  server.registerTool(
    "update_page",
    {
      title: "Update Page",
      description: "Update a page. Only the fields provided are changed.",
      inputSchema: UpdatePageSchema,
    },
    async (args) =>
      runTool("update_page", async () => {
        const input = UpdatePageSchema.parse(args);
        return await updatePage(apiClient, {
          courseId: input.course_id,
          pageUrl: input.page_url,
          title: input.title,
          body: input.body,
          editingRoles: input.editing_roles,
          published: input.published,
          frontPage: input.front_page,
        });
      }),
  );

  server.registerTool(
    "delete_page",
    {
      title: "Delete Page",
      description: "Delete a page from a course.",
      inputSchema: DeletePageSchema,
    },
    async (args) =>
      runTool("delete_page", async () => {
        const { course_id, page_url } = DeletePageSchema.parse(args);
        return await deletePage(apiClient, course_id, page_url);
      }),
  );

  server.registerTool(
    "add_page_to_module",
    {
      title: "Add Page to Module",
      description:
        "Add an existing page to a module. Looks the page up first, " +
        "so the module item title defaults to the page title.",
      inputSchema: AddPageToModuleSchema,
    },
    async (args) =>
      runTool("add_page_to_module", async () => {
        const input = AddPageToModuleSchema.parse(args);
        return await addPageToModule(apiClient, {
          courseId: input.course_id,
          moduleId: input.module_id,
          pageUrl: input.page_url,
          title: input.title,
          position: input.position,
          indent: input.indent,
          newTab: input.new_tab,
        });
      }),
  );

  server.registerTool(
    "create_page_and_add_to_module",
    {
      title: "Create Page and Add to Module",
      description:
        "Create a page and add it to a module in one call. Not atomic: " +
        "if adding to the module fails, the new page stays in the course.",
      inputSchema: CreatePageAndAddToModuleSchema,
    },
    async (args) =>
      runTool("create_page_and_add_to_module", async () => {
        const input = CreatePageAndAddToModuleSchema.parse(args);
        return await createPageAndAddToModule(apiClient, {
          courseId: input.course_id,
          moduleId: input.module_id,
          title: input.title,
          body: input.body,
          editingRoles: input.editing_roles,
          published: input.published,
          frontPage: input.front_page,
          modulePosition: input.module_item_position,
          moduleIndent: input.module_item_indent,
          newTab: input.new_tab,
        });
      }),
  );
}
