import { describe, it, expect, vi, beforeEach } from "vitest";
import { z } from "zod";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ApiError, NetworkError } from "../../src/api/errors.js";
import {
  errorResponse,
  runTool,
  sanitizeError,
  toolResponse,
} from "../../src/tools/tool-helpers.js";

function textOf(result: CallToolResult): string | undefined {
  const first = result.content[0];
  return first?.type === "text" ? first.text : undefined;
}

describe("tool helpers", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("toolResponse returns indented JSON text", () => {
    const result = toolResponse({ id: 1, name: "Week 1" });

    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([
      { type: "text", text: '{\n  "id": 1,\n  "name": "Week 1"\n}' },
    ]);
  });

  it("errorResponse flags the result as an error", () => {
    expect(errorResponse("nope")).toEqual({
      content: [{ type: "text", text: "nope" }],
      isError: true,
    });
  });

  describe("sanitizeError", () => {
    it("keeps the Canvas status and message and adds a hint for known statuses", () => {
      expect(textOf(sanitizeError(new ApiError(404, "The specified resource does not exist.")))).toBe(
        "Canvas API error (404): The specified resource does not exist.\n" +
          "The course or item may not exist, or the token's user cannot see it.",
      );
      expect(textOf(sanitizeError(new ApiError(422, "name is too long")))).toBe(
        "Canvas API error (422): name is too long",
      );
    });

    it("explains failures that never reached Canvas", () => {
      const result = sanitizeError(new NetworkError("fetch failed: getaddrinfo ENOTFOUND canvas.test"));

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        "Could not reach Canvas: fetch failed: getaddrinfo ENOTFOUND canvas.test. " +
          "Check CANVAS_API_URL and your connection.",
      );
    });

    it("lists validation issues by path", () => {
      const parsed = z.object({ course_id: z.string() }).safeParse({ course_id: 5 });
      if (parsed.success) throw new Error("expected a validation failure");

      const text = textOf(sanitizeError(parsed.error));

      expect(text?.startsWith("Invalid input: course_id: ")).toBe(true);
    });

    it("hides unexpected errors", () => {
      expect(textOf(sanitizeError(new Error("secret internal detail")))).toBe(
        "An unexpected error occurred. Please try again.",
      );
    });
  });

  describe("runTool", () => {
    it("wraps the action result", async () => {
      const result = await runTool("list_courses", async () => [{ id: 1 }]);

      expect(result.isError).toBeUndefined();
      expect(textOf(result)).toBe('[\n  {\n    "id": 1\n  }\n]');
    });

    it("reports a schema failure inside the action as invalid input", async () => {
      const schema = z.object({ course_id: z.string() });

      const result = await runTool("get_course", async () => schema.parse({}));

      expect(result.isError).toBe(true);
      expect(textOf(result)?.startsWith("Invalid input: course_id: ")).toBe(true);
    });

    it("turns a thrown error into an error result", async () => {
      const result = await runTool("get_course", async () => {
        throw new ApiError(401, "Invalid access token.");
      });

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe(
        "Canvas API error (401): Invalid access token.\n" +
          "Check that CANVAS_API_TOKEN is valid and has not expired.",
      );
    });
  });
});
