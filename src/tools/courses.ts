import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CanvasApiClient, createCourse, getCourse, listCourses } from "../api/index.js";
import { CreateCourseSchema, GetCourseSchema, ListCoursesSchema } from "./schemas.js";
import { runTool } from "./tool-helpers.js";

/**
 * Register list_courses, get_course and create_course
 */
export function registerCourseTools(server: McpServer, apiClient: CanvasApiClient): void {
  server.registerTool(
    "list_courses",
    {
      title: "List Courses",
      description:
        "List the Canvas courses visible to the token's user (first page only). " +
        "Use this to find course IDs by name before calling other tools.",
      inputSchema: ListCoursesSchema,
    },
    async (args) =>
      runTool("list_courses", async () => {
        const input = ListCoursesSchema.parse(args);
        return await listCourses(apiClient, {
          enrollmentType: input.enrollment_type,
          enrollmentState: input.enrollment_state,
          include: input.include,
        });
      }),
  );

  server.registerTool(
    "get_course",
    {
      title: "Get Course",
      description: "Get a single Canvas course by ID.",
      inputSchema: GetCourseSchema,
    },
    async (args) =>
      runTool("get_course", async () => {
        const { course_id } = GetCourseSchema.parse(args);
        return await getCourse(apiClient, course_id);
      }),
  );

  server.registerTool(
    "create_course",
    {
      title: "Create Course",
      description: "Create a new course in a Canvas account. Use account_id 'self' for the user's own account.",
      inputSchema: CreateCourseSchema,
    },
    async (args) =>
      runTool("create_course", async () => {
        const input = CreateCourseSchema.parse(args);
        return await createCourse(apiClient, {
          accountId: input.account_id,
          name: input.name,
          courseCode: input.course_code,
          sisCourseId: input.sis_course_id,
        });
      }),
  );
}
