/**
 * symbolgraph_diagnostics - List problems found while loading.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse } from "@symgraph/core";
import type { DocumentationWorkspace } from "../core/services/DocumentationWorkspace.js";
import { formatDiagnostics } from "./format.js";

export function registerDiagnostics(server: McpServer, workspace: DocumentationWorkspace): void {
  server.registerTool(
    "symbolgraph_diagnostics",
    {
      title: "List diagnostics",
      description: "List the diagnostics of the last load: missing relationship sources, invalid references.",
      inputSchema: {},
    },
    async () => resultToResponse(workspace.diagnostics(), formatDiagnostics)
  );
}
