import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  CanvasApiClient,
  createModule,
  deleteModule,
  getModule,
  listModules,
  updateModule,
} from "../api/index.js";
import {
  CreateModuleSchema,
  DeleteModuleSchema,
  GetModuleSchema,
  ListModulesSchema,
  UpdateModuleSchema,
} from "./schemas.js";
import { runTool } from "./tool-helpers.js";

/**
 * Register module tools
 */
export function registerModuleTools(server: McpServer, apiClient: CanvasApiClient): void {
  server.registerTool(
    "list_modules",
    {
      title: "List Modules",
      description: "List all modules in a course with their IDs, names and positions.",
      inputSchema: ListModulesSchema,
    },
    async (args) =>
      runTool("list_modules", async () => {
        const { course_id } = ListModulesSchema.parse(args);
        return await listModules(apiClient, course_id);
      }),
  );

  server.registerTool(
    "get_module",
    {
      title: "Get Module",
      description: "Get a single module by ID.",
      inputSchema: GetModuleSchema,
    },
    async (args) =>
      runTool("get_module", async () => {
        const { course_id, module_id } = GetModuleSchema.parse(args);
        return await getModule(apiClient, course_id, module_id);
      }),
  );

  server.registerTool(
    "create_module",
    {
      title: "Create Module",
      description:
        "Create a module in a course. Optional fields left out keep Canvas defaults.",
      inputSchema: CreateModuleSchema,
    },
    async (args) =>
      runTool("create_module", async () => {
        const input = CreateModuleSchema.parse(args);
        return await createModule(apiClient, {
          courseId: input.course_id,
          name: input.name,
          position: input.position,
          unlockAt: input.unlock_at,
          requireSequentialProgress: input.require_sequential_progress,
          prerequisiteModuleIds: input.prerequisite_module_ids,
          publishFinalGrade: input.publish_final_grade,
        });
      }),
  );

  server.registerTool(
    "update_module",
    {
      title: "Update Module",
      description:
        "Update a module. Only the fields provided are changed; " +
        "pass an empty prerequisite_module_ids list to remove all prerequisites.",
      inputSchema: UpdateModuleSchema,
    },
    async (args) =>
      runTool("update_module", async () => {
        const input = UpdateModuleSchema.parse(args);
        return await updateModule(apiClient, {
          courseId: input.course_id,
          moduleId: input.module_id,
          name: input.name,
          position: input.position,
          unlockAt: input.unlock_at,
          requireSequentialProgress: input.require_sequential_progress,
          prerequisiteModuleIds: input.prerequisite_module_ids,
          publishFinalGrade: input.publish_final_grade,
        });
      }),
  );

  server.registerTool(
    "delete_module",
    {
      title: "Delete Module",
      description: "Delete a module from a course. The module's content is not deleted.",
      inputSchema: DeleteModuleSchema,
    },
    async (args) =>
      runTool("delete_module", async () => {
        const { course_id, module_id } = DeleteModuleSchema.parse(args);
        return await deleteModule(apiClient, course_id, module_id);
      }),
  );
}
