import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  CanvasApiClient,
  createSection,
  crossListSection,
  deleteSection,
  getSection,
  listSections,
  updateSection,
} from "../api/index.js";
import {
  CreateSectionSchema,
  CrossListSectionSchema,
  DeleteSectionSchema,
  GetSectionSchema,
  ListSectionsSchema,
  UpdateSectionSchema,
} from "./schemas.js";
import { runTool } from "./tool-helpers.js";

/**
 * Register section tools
 */
export function registerSectionTools(server: McpServer, apiClient: CanvasApiClient): void {
  server.registerTool(
    "list_sections",
    {
      title: "List Sections",
      description: "List all sections in a course.",
      inputSchema: ListSectionsSchema,
    },
    async (args) =>
      runTool("list_sections", async () => {
        const { course_id } = ListSectionsSchema.parse(args);
        return await listSections(apiClient, course_id);
      }),
  );

  server.registerTool(
    "get_section",
    {
      title: "Get Section",
      description: "Get a single section by ID.",
      inputSchema: GetSectionSchema,
    },
    async (args) =>
      runTool("get_section", async () => {
        const { section_id } = GetSectionSchema.parse(args);
        return await getSection(apiClient, section_id);
      }),
  );

  server.registerTool(
    "create_section",
    {
      title: "Create Section",
      description: "Create a new section in a course.",
      inputSchema: CreateSectionSchema,
    },
    async (args) =>
      runTool("create_section", async () => {
        const input = CreateSectionSchema.parse(args);
        return await createSection(apiClient, {
          courseId: input.course_id,
          sectionName: input.section_name,
          sisSectionId: input.sis_section_id,
        });
      }),
  );

  server.registerTool(
    "update_section",
    {
      title: "Update Section",
      description: "Rename a section.",
      inputSchema: UpdateSectionSchema,
    },
    async (args) =>
      runTool("update_section", async () => {
        const input = UpdateSectionSchema.parse(args);
        return await updateSection(apiClient, {
          sectionId: input.section_id,
          sectionName: input.section_name,
        });
      }),
  );

  server.registerTool(
    "delete_section",
    {
      title: "Delete Section",
      description: "Delete a section. This cannot be undone.",
      inputSchema: DeleteSectionSchema,
    },
    async (args) =>
      runTool("delete_section", async () => {
        const { section_id } = DeleteSectionSchema.parse(args);
        return await deleteSection(apiClient, section_id);
      }),
  );

  server.registerTool(
    "cross_list_section",
    {
      title: "Cross-list Section",
      description: "Move a section into a different course.",
      inputSchema: CrossListSectionSchema,
    },
    async (args) =>
      runTool("cross_list_section", async () => {
        const input = CrossListSectionSchema.parse(args);
        return await crossListSection(apiClient, {
          sectionId: input.section_id,
          newCourseId: input.new_course_id,
        });
      }),
  );
}
