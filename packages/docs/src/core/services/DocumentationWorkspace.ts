/**
 * Documentation workspace - loads a bundle's symbol graphs and answers questions about the
 * documentation built from them.
 */

import path from "node:path";
import { type Result, Ok, Err, DiagnosticEngine, type Diagnostic } from "@symgraph/core";
import {
  NodeDataProvider,
  SymbolGraphLoader,
  availabilityOf,
  primaryView,
  type AvailabilityItem,
  type DataProvider,
  type DecodingStrategy,
  type GraphLocation,
  type UnifiedSymbolGraph,
} from "@symgraph/symbols";
import type { BundleScanner } from "../ports/BundleScanner.js";
import {
  symbolOf,
  type DefaultImplementationsSection,
  type DocumentationNode,
  type RelationshipsSection,
  type SymbolSemantic,
} from "../model.js";
import { parseDocsConfiguration, resolveDocsConfiguration } from "../configuration.js";
import { referenceURL } from "../references.js";
import type { TopicGraphNode } from "../TopicGraph.js";
import { DocumentationContext } from "./DocumentationContext.js";
import { registerSymbols } from "./SymbolRegistrar.js";
import { documentedView } from "./RelationshipsBuilder.js";

export interface WorkspaceSummary {
  rootPath: string;
  bundleIdentifier: string;
  files: number;
  modules: string[];
  symbols: number;
  relationships: number;
  decodingStrategy: DecodingStrategy;
  diagnostics: number;
}

export interface ModuleSummary {
  name: string;
  symbols: number;
  relationships: number;
  orphanRelationships: number;
  graphs: GraphLocation[];
}

export interface SymbolDetails {
  identifier: string;
  url: string;
  title: string;
  kind: string;
  moduleName: string;
  selectors: string[];
  docComment: string[];
  availability: AvailabilityItem[];
  isRequired?: boolean;
  origin?: string;
}

export interface SymbolRelationships {
  identifier: string;
  title: string;
  relationships: Map<string, RelationshipsSection>;
  defaultImplementations: Map<string, DefaultImplementationsSection>;
  parents: TopicGraphNode[];
  children: TopicGraphNode[];
}

interface LoadedWorkspace {
  graphs: Map<string, UnifiedSymbolGraph>;
  graphLocations: Map<string, GraphLocation[]>;
  context: DocumentationContext;
}

export interface DocumentationWorkspaceOptions {
  createDataProvider?: (rootPath: string) => DataProvider;
}

const NOT_LOADED = "No symbol graphs loaded. Call symbolgraph_load first.";

export class DocumentationWorkspace {
  private loaded: LoadedWorkspace | null = null;
  private readonly createDataProvider: (rootPath: string) => DataProvider;

  constructor(
    private readonly scanner: BundleScanner,
    options: DocumentationWorkspaceOptions = {}
  ) {
    this.createDataProvider = options.createDataProvider ?? ((rootPath) => new NodeDataProvider(rootPath));
  }

  get isLoaded(): boolean {
    return this.loaded !== null;
  }

  /**
   * Load every symbol graph under `rootPath`. A failed load leaves the previous workspace in place.
   */
  async load(rootPath: string): Promise<Result<WorkspaceSummary, Error>> {
    const scanned = await this.scanner.scan(rootPath);
    if (!scanned.ok) return scanned;
    const { symbolGraphs, configuration: configLocation } = scanned.value;
    if (symbolGraphs.length === 0) {
      return Err(new Error(`No symbol graphs found under ${rootPath}`));
    }

    const dataProvider = this.createDataProvider(rootPath);
    const bundleName = path.basename(path.resolve(rootPath));

    let configuration = resolveDocsConfiguration({}, bundleName);
    if (configLocation !== undefined) {
      const contents = await dataProvider.contents(configLocation);
      if (!contents.ok) return contents;
      const text = typeof contents.value === "string" ? contents.value : new TextDecoder().decode(contents.value);
      const parsed = parseDocsConfiguration(text, bundleName);
      if (!parsed.ok) return parsed;
      configuration = parsed.value;
    }

    const diagnostics = new DiagnosticEngine();
    const loader = new SymbolGraphLoader(symbolGraphs, dataProvider, {
      configuration: configuration.loader,
      diagnostics,
    });
    const result = await loader.loadAll();
    if (!result.ok) return result;

    const context = new DocumentationContext(configuration.bundle, {
      inheritDocs: configuration.inheritDocs,
      diagnostics,
    });
    const registered = registerSymbols(context, result.value.unifiedGraphs);

    this.loaded = {
      graphs: result.value.unifiedGraphs,
      graphLocations: result.value.graphLocations,
      context,
    };

    return Ok({
      rootPath,
      bundleIdentifier: configuration.bundle.identifier,
      files: symbolGraphs.length,
      modules: [...result.value.unifiedGraphs.keys()].sort(),
      symbols: registered.symbols,
      relationships: registered.relationships,
      decodingStrategy: result.value.decodingStrategy,
      diagnostics: diagnostics.diagnostics.length,
    });
  }

  modules(): Result<ModuleSummary[], string> {
    if (!this.loaded) return Err(NOT_LOADED);
    const { graphs, graphLocations } = this.loaded;
    return Ok(
      [...graphs.values()]
        .sort((a, b) => (a.moduleName < b.moduleName ? -1 : a.moduleName > b.moduleName ? 1 : 0))
        .map((graph) => ({
          name: graph.moduleName,
          symbols: graph.symbols.size,
          relationships: graph.allRelationships().length,
          orphanRelationships: graph.orphanRelationships.length,
          graphs: graphLocations.get(graph.moduleName) ?? [],
        }))
    );
  }

  symbol(identifier: string): Result<SymbolDetails, string> {
    const found = this.findSymbol(identifier);
    if (!found.ok) return found;
    const { node, symbol } = found.value;

    const unified = node.unifiedSymbol;
    const view = unified ? primaryView(unified) : undefined;
    const documented = unified ? documentedView(unified) : undefined;

    return Ok({
      identifier,
      url: referenceURL(node.reference),
      title: symbol.title,
      kind: node.kind,
      moduleName: symbol.moduleName,
      selectors: unified ? [...unified.views.keys()].sort() : [],
      docComment: documented?.docComment?.lines.map((line) => line.text) ?? [],
      availability: view ? (availabilityOf(view.mixins) ?? []) : [],
      ...(symbol.isRequired !== undefined ? { isRequired: symbol.isRequired } : {}),
      ...(symbol.origin ? { origin: symbol.origin.displayName } : {}),
    });
  }

  relationships(identifier: string): Result<SymbolRelationships, string> {
    const found = this.findSymbol(identifier);
    if (!found.ok) return found;
    const { node, symbol } = found.value;
    const topicGraph = found.value.context.topicGraph;

    return Ok({
      identifier,
      title: symbol.title,
      relationships: symbol.relationshipsVariants,
      defaultImplementations: symbol.defaultImplementationsVariants,
      parents: topicGraph.parents(node.reference),
      children: topicGraph.children(node.reference),
    });
  }

  diagnostics(): Result<readonly Diagnostic[], string> {
    if (!this.loaded) return Err(NOT_LOADED);
    return Ok(this.loaded.context.diagnostics.diagnostics);
  }

  private findSymbol(
    identifier: string
  ): Result<{ node: DocumentationNode; symbol: SymbolSemantic; context: DocumentationContext }, string> {
    if (!this.loaded) return Err(NOT_LOADED);
    const { context } = this.loaded;
    const node = context.localCache.get(identifier);
    const symbol = symbolOf(node);
    if (!node || !symbol) {
      return Err(`Symbol not found: ${identifier}`);
    }
    return Ok({ node, symbol, context });
  }
}
