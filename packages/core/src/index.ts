export type { Result } from "./result.js";
export { Ok, Err, toError } from "./result.js";

export type { TextContent, ToolResponse } from "./mcp.js";
export { textResponse, errorResponse, resultToResponse } from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";

export { AsyncSemaphore, Lock, yieldToEventLoop, concurrentPerform, concurrentForEach } from "./concurrency.js";

export type { Diagnostic, DiagnosticSeverity } from "./diagnostics.js";
export { DiagnosticEngine, createDiagnostic, formatDiagnostic } from "./diagnostics.js";
