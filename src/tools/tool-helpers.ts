import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import { ApiError, NetworkError } from "../api/index.js";
import { log } from "../utils/logger.js";

/**
 * Wrap data as MCP-compatible tool result
 */
export function toolResponse(data: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

/**
 * Wrap error message as MCP-compatible tool result
 */
export function errorResponse(message: string): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: message,
      },
    ],
    isError: true,
  };
}

const STATUS_HINTS: Record<number, string> = {
  401: "Check that CANVAS_API_TOKEN is valid and has not expired.",
  403: "The token's user may not have permission for this resource.",
  404: "The course or item may not exist, or the token's user cannot see it.",
};

/**
 * Turn an error into a tool result.
 *
 * Canvas errors keep their status and message; the token never appears
 * because the client does not put it in error messages.
 */
export function sanitizeError(error: unknown): CallToolResult {
  // Log full error to stderr for debugging (token redaction handled by logger)
  log("ERROR", "Tool error", error);

  if (error instanceof NetworkError) {
    return errorResponse(
      `Could not reach Canvas: ${error.message}. Check CANVAS_API_URL and your connection.`
    );
  }

  if (error instanceof ApiError) {
    const hint = STATUS_HINTS[error.statusCode];
    return errorResponse(hint ? `${error.toString()}\n${hint}` : error.toString());
  }

  // Tool arguments are validated by the SDK before a handler runs; this
  // covers schemas parsed inside a runTool action
  if (error instanceof ZodError) {
    const issues = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    return errorResponse(`Invalid input: ${issues.join(", ")}`);
  }

  // Default fallback
  return errorResponse("An unexpected error occurred. Please try again.");
}

/**
 * Run a tool body, wrapping its result or error.
 */
export async function runTool(
  toolName: string,
  action: () => Promise<unknown>,
): Promise<CallToolResult> {
  try {
    log("DEBUG", `${toolName} tool called`);
    const result = await action();
    return toolResponse(result);
  } catch (error) {
    return sanitizeError(error);
  }
}
