/**
 * MCP tool response helpers.
 */

import type { Result } from "./result.js";

export type TextContent = {
  type: "text";
  text: string;
};

export type ToolResponse = {
  content: TextContent[];
  isError?: boolean;
};

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

export function errorResponse(message: string): ToolResponse {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    isError: true,
  };
}

/**
 * Format a successful Result with `formatter`; report a failure as an error response.
 */
export function resultToResponse<T, E extends string | Error>(
  result: Result<T, E>,
  formatter: (value: T) => string
): ToolResponse {
  if (result.ok) {
    return textResponse(formatter(result.value));
  }
  const error: string | Error = result.error;
  const message = error instanceof Error ? error.message : error;
  return errorResponse(message);
}
