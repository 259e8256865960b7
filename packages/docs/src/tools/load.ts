/**
 * symbolgraph_load - Load every symbol graph under a directory.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToResponse } from "@symgraph/core";
import type { DocumentationWorkspace } from "../core/services/DocumentationWorkspace.js";
import { formatLoadSummary } from "./format.js";

const InputSchema = {
  path: z.string().describe("Directory containing *.symbols.json files (searched recursively)"),
};

export function registerLoad(server: McpServer, workspace: DocumentationWorkspace): void {
  server.registerTool(
    "symbolgraph_load",
    {
      title: "Load symbol graphs",
      description:
        "Decode, unify and register every symbol graph under a directory. " +
        "Reads symgraph.config.json at the directory root when present. Replaces any previous load.",
      inputSchema: InputSchema,
    },
    async ({ path }) => resultToResponse(await workspace.load(path), formatLoadSummary)
  );
}
