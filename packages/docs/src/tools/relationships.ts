/**
 * symbolgraph_relationships - Show the relationships resolved for a symbol.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse } from "@symgraph/core";
import type { DocumentationWorkspace } from "../core/services/DocumentationWorkspace.js";
import { formatRelationships } from "./format.js";

const InputSchema = {
  identifier: z.string().describe("Precise symbol identifier"),
};

export function registerRelationships(server: McpServer, workspace: DocumentationWorkspace): void {
  server.registerTool(
    "symbolgraph_relationships",
    {
      title: "Get relationships",
      description:
        "Show conformances, inheritance, default implementations and topic-graph neighbors of a symbol, " +
        "per selector. Unresolved targets are listed with their fallback names.",
      inputSchema: InputSchema,
    },
    async ({ identifier }) => resultToResponse(workspace.relationships(identifier), formatRelationships)
  );
}
