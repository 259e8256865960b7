/**
 * symbolgraph_get_symbol - Show one symbol's documentation node.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse } from "@symgraph/core";
import type { DocumentationWorkspace } from "../core/services/DocumentationWorkspace.js";
import { formatSymbol } from "./format.js";

const InputSchema = {
  identifier: z.string().describe("Precise symbol identifier, e.g. s:3Kit6WidgetV"),
};

export function registerGetSymbol(server: McpServer, workspace: DocumentationWorkspace): void {
  server.registerTool(
    "symbolgraph_get_symbol",
    {
      title: "Get symbol",
      description: "Show a symbol's kind, URL, selectors, availability and documentation comment.",
      inputSchema: InputSchema,
    },
    async ({ identifier }) => resultToResponse(workspace.symbol(identifier), formatSymbol)
  );
}
