/**
 * Small symbol graph documents and a helper that loads and registers them.
 */

import { DiagnosticEngine } from "@symgraph/core";
import { InMemoryDataProvider, SymbolGraphLoader } from "@symgraph/symbols";
import { DocumentationContext } from "../../src/core/services/DocumentationContext.js";
import { registerSymbols } from "../../src/core/services/SymbolRegistrar.js";
import type { DocumentationBundle } from "../../src/core/model.js";

export const bundle: DocumentationBundle = { identifier: "com.example.kit", displayName: "Kit" };

export interface SymbolOptions {
  title?: string;
  doc?: string[];
  docModule?: string;
  extension?: { extendedModule: string; typeKind?: string };
}

export function symbol(id: string, kind: string, path: string[], options: SymbolOptions = {}): Record<string, unknown> {
  return {
    kind: { identifier: `swift.${kind}`, displayName: kind },
    identifier: { precise: id, interfaceLanguage: "swift" },
    pathComponents: path,
    names: { title: options.title ?? path[path.length - 1] },
    accessLevel: "public",
    ...(options.doc
      ? { docComment: { lines: options.doc.map((text) => ({ text })), ...(options.docModule ? { module: options.docModule } : {}) } }
      : {}),
    ...(options.extension ? { swiftExtension: options.extension } : {}),
  };
}

export function edge(
  source: string,
  kind: string,
  target: string,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  return { source, target, kind, ...extra };
}

export function graph(
  module: string,
  symbols: Record<string, unknown>[],
  relationships: Record<string, unknown>[] = []
): string {
  return JSON.stringify({
    metadata: { formatVersion: { major: 0, minor: 6, patch: 0 }, generator: "test-generator" },
    module: { name: module, platform: { operatingSystem: { name: "macosx" } } },
    symbols,
    relationships,
  });
}

export interface BuildOptions {
  inheritDocs?: boolean;
  /** Runs after the context exists and before symbols are registered */
  prepare?: (context: DocumentationContext) => void;
}

/**
 * Load `files` (location → graph JSON) and register their symbols in a fresh context.
 */
export async function buildContext(
  files: Record<string, string>,
  options: BuildOptions = {}
): Promise<DocumentationContext> {
  const diagnostics = new DiagnosticEngine();
  const loader = new SymbolGraphLoader(Object.keys(files), new InMemoryDataProvider(files), { diagnostics });
  const loaded = await loader.loadAll();
  if (!loaded.ok) throw loaded.error;

  const context = new DocumentationContext(bundle, { inheritDocs: options.inheritDocs, diagnostics });
  options.prepare?.(context);
  registerSymbols(context, loaded.value.unifiedGraphs);
  return context;
}
