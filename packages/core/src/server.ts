/**
 * MCP server bootstrap shared by the packages that expose tools over stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Factory for the services the tools operate on */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create services, register tools, install signal handlers and connect over stdio.
 * stdout belongs to the protocol; log with `console.error`.
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<McpServer> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });
  registerTools(server, services);

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };
  const handleSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(`[${config.name}] Shutdown failed:`, error);
      process.exit(1);
    });
  };
  process.on("SIGTERM", handleSignal);
  process.on("SIGINT", handleSignal);

  await onStartup?.(services);

  await server.connect(new StdioServerTransport());
  console.error(`[${config.name}] Listening on stdio (v${config.version})`);
  return server;
}

/**
 * Entry point for server binaries: any bootstrap failure is fatal.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
