/**
 * MCP server for symbol graph documentation.
 */

import { runServer } from "@symgraph/core";
import { DocumentationWorkspace } from "./core/services/DocumentationWorkspace.js";
import { GlobBundleScanner } from "./infrastructure/GlobBundleScanner.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "symgraph:docs",
    version: "0.1.0",
  },
  createServices: () => ({
    workspace: new DocumentationWorkspace(new GlobBundleScanner()),
  }),
  registerTools: registerAllTools,
});
