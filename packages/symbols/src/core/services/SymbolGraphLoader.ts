/**
 * Loads the symbol graphs of a documentation bundle into one unified graph per module.
 */

import {
  type Result,
  Ok,
  Err,
  Lock,
  concurrentForEach,
  createDiagnostic,
  toError,
  type DiagnosticEngine,
} from "@symgraph/core";
import type { SymbolGraph } from "../model.js";
import { availabilityOf, setMixin } from "../mixins.js";
import { isMainSymbolGraphFile, moduleNameFor } from "../fileNames.js";
import { platformNameOf } from "../platforms.js";
import { synthesizeAvailability } from "../availability.js";
import { resolveLoaderConfiguration, type LoaderConfiguration } from "../configuration.js";
import { MixedExtensionFormatsError } from "../errors.js";
import type { DataProvider } from "../ports/DataProvider.js";
import { decodeSymbolGraph } from "./ConcurrentDecoder.js";
import { transformExtensionBlockFormatToExtendedTypeFormat } from "./ExtendedTypeTransformation.js";
import { GraphCollector, type CollectedGraphs } from "./GraphCollector.js";
import type { UnifiedSymbolGraph } from "./UnifiedSymbolGraph.js";

export const MIXED_EXTENSION_FORMATS = "symgraph.MixedExtensionFormats";

/**
 * - `concurrentlyAllFiles`: many graphs (one per platform); each file is one task.
 * - `concurrentlyEachFileInBatches`: one large graph; files in turn, symbols split across workers.
 */
export type DecodingStrategy = "concurrentlyAllFiles" | "concurrentlyEachFileInBatches";

export function decodingStrategyFor(locations: readonly string[]): DecodingStrategy {
  const mainGraphCount = locations.filter(isMainSymbolGraphFile).length;
  return mainGraphCount > 1 ? "concurrentlyAllFiles" : "concurrentlyEachFileInBatches";
}

export interface LoadedSymbolGraphs extends CollectedGraphs {
  decodingStrategy: DecodingStrategy;
  /** Whether the extension graphs used the extension block format */
  usesExtensionBlockFormat: boolean;
}

export interface SymbolGraphLoaderOptions {
  configuration?: LoaderConfiguration;
  diagnostics?: DiagnosticEngine;
}

export class SymbolGraphLoader {
  private readonly locations: readonly string[];
  private readonly dataProvider: DataProvider;
  private readonly configuration: LoaderConfiguration;
  private readonly diagnostics?: DiagnosticEngine;

  constructor(locations: readonly string[], dataProvider: DataProvider, options: SymbolGraphLoaderOptions = {}) {
    this.locations = locations;
    this.dataProvider = dataProvider;
    this.configuration = options.configuration ?? resolveLoaderConfiguration();
    this.diagnostics = options.diagnostics;
  }

  /**
   * Decode, transform, merge and complete availability. The first failure aborts the load and
   * is the error of the result.
   */
  async loadAll(): Promise<Result<LoadedSymbolGraphs, Error>> {
    const strategy = decodingStrategyFor(this.locations);
    console.error(`[symbols] Loading ${this.locations.length} symbol graph(s) (${strategy})`);

    let loaded: { decoded: Map<string, SymbolGraph>; formats: Map<string, boolean> };
    try {
      loaded = await this.decodeAll(strategy);
    } catch (error) {
      const failure = toError(error);
      console.error(`[symbols] Loading failed: ${failure.message}`);
      return Err(failure);
    }
    const { decoded, formats } = loaded;

    const usesExtensionBlockFormat = [...formats.values()].some(Boolean);
    const collector = new GraphCollector(
      usesExtensionBlockFormat ? "extendingGraph" : "extendedGraph",
      this.configuration.platforms
    );
    for (const [location, graph] of decoded) {
      collector.mergeSymbolGraph(graph, location);
    }
    const collected = collector.finishLoading();

    if (usesExtensionBlockFormat) {
      for (const unified of collected.unifiedGraphs.values()) {
        unified.mergeExtendedModuleSymbols();
      }
    }

    const registeredPlatforms = new Set<string>();
    for (const graph of decoded.values()) {
      const platform = platformNameOf(this.configuration.platforms, graph.module.platform);
      if (platform !== undefined) registeredPlatforms.add(platform);
    }
    for (const unified of collected.unifiedGraphs.values()) {
      this.addAvailability(unified, registeredPlatforms);
      console.error(
        `[symbols] ${unified.moduleName}: ${unified.symbols.size} symbols, ` +
          `${unified.allRelationships().length} relationships from ${unified.moduleData.size} file(s)`
      );
    }

    return Ok({ ...collected, decodingStrategy: strategy, usesExtensionBlockFormat });
  }

  private async decodeAll(
    strategy: DecodingStrategy
  ): Promise<{ decoded: Map<string, SymbolGraph>; formats: Map<string, boolean> }> {
    const decoded = new Map<string, SymbolGraph>();
    // extension graph location → whether it used extension blocks
    const formats = new Map<string, boolean>();
    const lock = new Lock();

    const loadGraph = async (location: string, batches: number): Promise<void> => {
      const data = await this.dataProvider.contents(location);
      if (!data.ok) throw data.error;

      const graph = await decodeSymbolGraph(data.value, { batches, location });

      let usesBlocks: boolean | undefined;
      if (!isMainSymbolGraphFile(location)) {
        const moduleName = moduleNameFor(location) ?? graph.module.name;
        const transformed = transformExtensionBlockFormatToExtendedTypeFormat(graph, moduleName);
        // An empty graph says nothing about the format.
        if (transformed || graph.symbols.size > 0) usesBlocks = transformed;
      }

      await lock.withLock(() => {
        if (usesBlocks !== undefined) {
          formats.set(location, usesBlocks);
          this.checkConsistentFormats(formats);
        }
        decoded.set(location, graph);
      });
    };

    if (strategy === "concurrentlyAllFiles") {
      await concurrentForEach(this.locations, this.locations.length, (location) => loadGraph(location, 1));
    } else {
      await concurrentForEach(this.locations, 1, (location) =>
        loadGraph(location, this.configuration.workerCount)
      );
    }

    return { decoded, formats };
  }

  private checkConsistentFormats(formats: ReadonlyMap<string, boolean>): void {
    const values = new Set(formats.values());
    if (values.size < 2) return;

    const locations = [...formats.keys()].sort();
    const error = new MixedExtensionFormatsError(locations);
    this.diagnostics?.emit(createDiagnostic(MIXED_EXTENSION_FORMATS, "error", error.message));
    throw error;
  }

  private addAvailability(unified: UnifiedSymbolGraph, registeredPlatforms: ReadonlySet<string>): void {
    const context = {
      defaults: this.configuration.defaultAvailability.get(unified.moduleName) ?? [],
      registeredPlatforms,
      inheritDefaultAvailabilityVersions: this.configuration.inheritDefaultAvailabilityVersions,
      configuration: this.configuration.platforms,
    };

    for (const symbol of unified.symbols.values()) {
      for (const view of symbol.views.values()) {
        const items = availabilityOf(view.mixins);
        const synthesized = synthesizeAvailability(items ?? [], context);
        if (items === undefined && synthesized.length === 0) continue;

        view.mixins = new Map(view.mixins);
        setMixin(view.mixins, { key: "availability", items: synthesized });
      }
    }
  }
}
