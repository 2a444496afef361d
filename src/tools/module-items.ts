import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  CanvasApiClient,
  createModuleItem,
  deleteModuleItem,
  getModuleItem,
  listModuleItems,
  toCompletionRequirement,
  updateModuleItem,
} from "../api/index.js";
import {
  CreateModuleItemSchema,
  DeleteModuleItemSchema,
  GetModuleItemSchema,
  ListModuleItemsSchema,
  UpdateModuleItemSchema,
} from "./schemas.js";
import { runTool } from "./tool-helpers.js";

/**
 * Register module item tools
 */
export function registerModuleItemTools(server: McpServer, apiClient: CanvasApiClient): void {
  server.registerTool(
    "list_module_items",
    {
      title: "List Module Items",
      description: "List all items in a module.",
      inputSchema: ListModuleItemsSchema,
    },
    async (args) =>
      runTool("list_module_items", async () => {
        const { course_id, module_id } = ListModuleItemsSchema.parse(args);
        return await listModuleItems(apiClient, course_id, module_id);
      }),
  );

  server.registerTool(
    "get_module_item",
    {
      title: "Get Module Item",
      description: "Get a single module item by ID.",
      inputSchema: GetModuleItemSchema,
    },
    async (args) =>
      runTool("get_module_item", async () => {
        const { course_id, module_id, item_id } = GetModuleItemSchema.parse(args);
        return await getModuleItem(apiClient, course_id, module_id, item_id);
      }),
  );

  server.registerTool(
    "create_module_item",
    {
      title: "Create Module Item",
      description:
        "Add an item to a module. content_id is required for every type except ExternalUrl. " +
        "page_url is only used for Page items and external_url only for ExternalUrl items.",
      inputSchema: CreateModuleItemSchema,
    },
    async (args) =>
      runTool("create_module_item", async () => {
        const input = CreateModuleItemSchema.parse(args);
        return await createModuleItem(apiClient, {
          courseId: input.course_id,
          moduleId: input.module_id,
          title: input.title,
          type: input.type,
          contentId: input.content_id,
          position: input.position,
          indent: input.indent,
          pageUrl: input.page_url,
          externalUrl: input.external_url,
          newTab: input.new_tab,
          completionRequirement: toCompletionRequirement(
            input.completion_requirement_type,
            input.min_score,
          ),
        });
      }),
  );

  server.registerTool(
    "update_module_item",
    {
      title: "Update Module Item",
      description: "Update a module item. Only the fields provided are changed.",
      inputSchema: UpdateModuleItemSchema,
    },
    async (args) =>
      runTool("update_module_item", async () => {
        const input = UpdateModuleItemSchema.parse(args);
        return await updateModuleItem(apiClient, {
          courseId: input.course_id,
          moduleId: input.module_id,
          itemId: input.item_id,
          title: input.title,
          position: input.position,
          indent: input.indent,
          externalUrl: input.external_url,
          newTab: input.new_tab,
          completionRequirement: toCompletionRequirement(
            input.completion_requirement_type,
            input.min_score,
          ),
        });
      }),
  );

  server.registerTool(
    "delete_module_item",
    {
      title: "Delete Module Item",
      description: "Remove an item from a module. The linked content itself is kept.",
      inputSchema: DeleteModuleItemSchema,
    },
    async (args) =>
      runTool("delete_module_item", async () => {
        const { course_id, module_id, item_id } = DeleteModuleItemSchema.parse(args);
        return await deleteModuleItem(apiClient, course_id, module_id, item_id);
      }),
  );
}
