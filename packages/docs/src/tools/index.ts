/**
 * MCP tool registration for the docs package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DocumentationWorkspace } from "../core/services/DocumentationWorkspace.js";

import { registerLoad } from "./load.js";
import { registerModules } from "./modules.js";
import { registerGetSymbol } from "./getSymbol.js";
import { registerRelationships } from "./relationships.js";
import { registerDiagnostics } from "./diagnostics.js";

export interface Services {
  workspace: DocumentationWorkspace;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { workspace } = services;

  registerLoad(server, workspace);

  // Queries over the loaded workspace
  registerModules(server, workspace);
  registerGetSymbol(server, workspace);
  registerRelationships(server, workspace);
  registerDiagnostics(server, workspace);
}
