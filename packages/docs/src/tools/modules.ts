/**
 * symbolgraph_modules - List loaded modules.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse } from "@symgraph/core";
import type { DocumentationWorkspace } from "../core/services/DocumentationWorkspace.js";
import { formatModules } from "./format.js";

export function registerModules(server: McpServer, workspace: DocumentationWorkspace): void {
  server.registerTool(
    "symbolgraph_modules",
    {
      title: "List modules",
      description: "List the modules of the loaded bundle with symbol counts and the graph files merged into each.",
      inputSchema: {},
    },
    async () => resultToResponse(workspace.modules(), formatModules)
  );
}
