/**
 * Groups decoded graphs by module and merges each group into a {@link UnifiedSymbolGraph}.
 */

import type { SymbolGraph } from "../model.js";
import { isMainSymbolGraphFile, moduleNameFor } from "../fileNames.js";
import type { PlatformConfiguration } from "../platforms.js";
import { UnifiedSymbolGraph } from "./UnifiedSymbolGraph.js";

/**
 * Which module an extension graph's symbols belong to.
 *
 * - `extendingGraph`: the module that declares the extensions (`Kit` for `Kit@Other`). Used with
 *   the extended type format, where extended types and modules are symbols of their own.
 * - `extendedGraph`: the module being extended (`Other`), which must have a main graph.
 */
export type ExtensionGraphAssociation = "extendingGraph" | "extendedGraph";

export interface GraphLocation {
  kind: "primary" | "extension";
  location: string;
}

export interface CollectedGraphs {
  unifiedGraphs: Map<string, UnifiedSymbolGraph>;
  graphLocations: Map<string, GraphLocation[]>;
}

interface PendingGraph {
  graph: SymbolGraph;
  location: string;
}

function byLocation(a: PendingGraph, b: PendingGraph): number {
  return a.location < b.location ? -1 : a.location > b.location ? 1 : 0;
}

export class GraphCollector {
  private readonly pending: PendingGraph[] = [];

  constructor(
    private readonly association: ExtensionGraphAssociation,
    private readonly platforms: PlatformConfiguration
  ) {}

  mergeSymbolGraph(graph: SymbolGraph, location: string): void {
    this.pending.push({ graph, location });
  }

  /**
   * Merge everything collected. Main graphs go first so that extension graphs associated with
   * the extended module find its unified graph. Within each group graphs merge in location
   * order, whatever order they were collected in.
   */
  finishLoading(): CollectedGraphs {
    const unifiedGraphs = new Map<string, UnifiedSymbolGraph>();
    const graphLocations = new Map<string, GraphLocation[]>();

    const record = (moduleName: string, kind: GraphLocation["kind"], entry: PendingGraph): void => {
      let unified = unifiedGraphs.get(moduleName);
      if (!unified) {
        unified = new UnifiedSymbolGraph(moduleName, this.platforms);
        unifiedGraphs.set(moduleName, unified);
      }
      unified.mergeGraph(entry.graph, entry.location, kind === "primary");
      graphLocations.set(moduleName, [...(graphLocations.get(moduleName) ?? []), { kind, location: entry.location }]);
    };

    const sorted = [...this.pending].sort(byLocation);
    const mainGraphs = sorted.filter((entry) => isMainSymbolGraphFile(entry.location));
    const extensionGraphs = sorted.filter((entry) => !isMainSymbolGraphFile(entry.location));

    for (const entry of mainGraphs) {
      record(entry.graph.module.name, "primary", entry);
    }

    for (const entry of extensionGraphs) {
      const fileModuleName = moduleNameFor(entry.location) ?? entry.graph.module.name;
      if (entry.graph.module.bystanders) {
        // Cross-import overlays document additions to their first module.
        record(fileModuleName, "extension", entry);
      } else if (this.association === "extendingGraph") {
        record(entry.graph.module.name, "extension", entry);
      } else if (unifiedGraphs.has(fileModuleName)) {
        record(fileModuleName, "extension", entry);
      } else {
        console.error(`[symbols] Skipping ${entry.location}: no main symbol graph for module '${fileModuleName}'`);
      }
    }

    for (const unified of unifiedGraphs.values()) {
      unified.collectOrphans();
    }

    return { unifiedGraphs, graphLocations };
  }
}
