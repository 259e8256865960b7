/**
 * One logical graph per module, merged from every graph file that describes it.
 */

import type {
  DocComment,
  GraphMetadata,
  GraphModule,
  GraphSymbol,
  Relationship,
  Selector,
  SymbolGraph,
  SymbolKind,
  SymbolMixins,
  SymbolNames,
} from "../model.js";
import { selectorKey } from "../model.js";
import { dedupeRelationships, relationshipKey } from "../mixins.js";
import { KindIdentifier, canonicalKind, maxAccessLevel } from "../kinds.js";
import { platformNameOf, type PlatformConfiguration } from "../platforms.js";

/**
 * What a symbol looks like under one selector.
 */
export interface SymbolView {
  selector: Selector;
  module: GraphModule;
  kind: SymbolKind;
  pathComponents: string[];
  names: SymbolNames;
  docComment?: DocComment;
  accessLevel: string;
  mixins: SymbolMixins;
  /** Recorded from a main graph rather than an extension graph */
  fromMainGraph: boolean;
}

export interface UnifiedSymbol {
  uniqueIdentifier: string;
  /** Keyed by {@link selectorKey} */
  views: Map<string, SymbolView>;
}

interface RelationshipBucket {
  selector: Selector;
  relationships: Relationship[];
  keys: Set<string>;
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * The view consumers should prefer: main-graph views first, then by selector key.
 */
export function primaryView(symbol: UnifiedSymbol): SymbolView | undefined {
  let best: { key: string; view: SymbolView } | undefined;
  for (const [key, view] of symbol.views) {
    if (
      !best ||
      (view.fromMainGraph && !best.view.fromMainGraph) ||
      (view.fromMainGraph === best.view.fromMainGraph && compareKeys(key, best.key) < 0)
    ) {
      best = { key, view };
    }
  }
  return best?.view;
}

export function viewKind(view: SymbolView): string {
  return canonicalKind(view.kind.identifier, view.selector.interfaceLanguage);
}

export class UnifiedSymbolGraph {
  readonly moduleName: string;
  readonly symbols = new Map<string, UnifiedSymbol>();
  readonly moduleData = new Map<string, GraphModule>();
  readonly metadata = new Map<string, GraphMetadata>();
  orphanRelationships: Relationship[] = [];

  private readonly buckets = new Map<string, RelationshipBucket>();
  private readonly orphanKeys = new Set<string>();
  private readonly platforms: PlatformConfiguration;

  constructor(moduleName: string, platforms: PlatformConfiguration) {
    this.moduleName = moduleName;
    this.platforms = platforms;
  }

  /**
   * Merge one decoded graph. Graphs must be merged in a stable order (the collector sorts them
   * by location) since the first view recorded for a selector is kept.
   */
  mergeGraph(graph: SymbolGraph, location: string, isMainGraph: boolean): void {
    this.moduleData.set(location, graph.module);
    this.metadata.set(location, graph.metadata);
    const platform = platformNameOf(this.platforms, graph.module.platform);

    const selectorsBySymbol = new Map<string, Selector>();
    for (const symbol of graph.symbols.values()) {
      const selector: Selector = { interfaceLanguage: symbol.identifier.interfaceLanguage, platform };
      selectorsBySymbol.set(symbol.identifier.precise, selector);
      this.mergeSymbol(symbol, selector, graph.module, isMainGraph);
    }

    for (const relationship of graph.relationships) {
      const selector = selectorsBySymbol.get(relationship.source) ?? selectorsBySymbol.get(relationship.target);
      if (selector) {
        this.addRelationship(relationship, selector);
      } else {
        this.addOrphan(relationship);
      }
    }
  }

  private mergeSymbol(symbol: GraphSymbol, selector: Selector, module: GraphModule, isMainGraph: boolean): void {
    const key = selectorKey(selector);
    const unified = this.symbols.get(symbol.identifier.precise) ?? {
      uniqueIdentifier: symbol.identifier.precise,
      views: new Map<string, SymbolView>(),
    };
    this.symbols.set(symbol.identifier.precise, unified);

    const existing = unified.views.get(key);
    // A main graph's view wins over an extension graph's; otherwise the first one stays.
    if (existing && (existing.fromMainGraph || !isMainGraph)) {
      return;
    }
    unified.views.set(key, {
      selector,
      module,
      kind: symbol.kind,
      pathComponents: symbol.pathComponents,
      names: symbol.names,
      ...(symbol.docComment ? { docComment: symbol.docComment } : {}),
      accessLevel: symbol.accessLevel,
      mixins: symbol.mixins,
      fromMainGraph: isMainGraph,
    });
  }

  private addRelationship(relationship: Relationship, selector: Selector): void {
    const key = selectorKey(selector);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { selector, relationships: [], keys: new Set() };
      this.buckets.set(key, bucket);
    }
    const identity = relationshipKey(relationship);
    if (bucket.keys.has(identity)) return;
    bucket.keys.add(identity);
    bucket.relationships.push(relationship);
  }

  private addOrphan(relationship: Relationship): void {
    const identity = relationshipKey(relationship);
    if (this.orphanKeys.has(identity)) return;
    this.orphanKeys.add(identity);
    this.orphanRelationships.push(relationship);
  }

  /**
   * Relationships filed under each selector, in selector-key order.
   */
  get relationshipsBySelector(): Map<string, { selector: Selector; relationships: Relationship[] }> {
    const result = new Map<string, { selector: Selector; relationships: Relationship[] }>();
    for (const key of [...this.buckets.keys()].sort(compareKeys)) {
      const bucket = this.buckets.get(key);
      if (bucket) result.set(key, { selector: bucket.selector, relationships: bucket.relationships });
    }
    return result;
  }

  /**
   * Every relationship once: selector buckets in key order, then orphans.
   */
  allRelationships(): Relationship[] {
    const lists = [...this.relationshipsBySelector.values()].map((bucket) => bucket.relationships);
    return dedupeRelationships([...lists.flat(), ...this.orphanRelationships]);
  }

  /**
   * File orphans whose source symbol is now known under that symbol's first selector.
   */
  collectOrphans(): void {
    const remaining: Relationship[] = [];
    this.orphanKeys.clear();
    for (const relationship of this.orphanRelationships) {
      const source = this.symbols.get(relationship.source);
      const firstKey = source ? [...source.views.keys()].sort(compareKeys)[0] : undefined;
      const view = firstKey === undefined || !source ? undefined : source.views.get(firstKey);
      if (view) {
        this.addRelationship(relationship, view.selector);
      } else {
        this.orphanKeys.add(relationshipKey(relationship));
        remaining.push(relationship);
      }
    }
    this.orphanRelationships = remaining;
  }

  /**
   * Rewrite every relationship endpoint found in `mapping`, in all buckets and orphans.
   */
  redirectRelationships(mapping: ReadonlyMap<string, string>): void {
    const rewrite = (relationship: Relationship): Relationship => ({
      ...relationship,
      source: mapping.get(relationship.source) ?? relationship.source,
      target: mapping.get(relationship.target) ?? relationship.target,
    });

    for (const bucket of this.buckets.values()) {
      const rewritten = dedupeRelationships(bucket.relationships.map(rewrite));
      bucket.relationships = rewritten;
      bucket.keys = new Set(rewritten.map(relationshipKey));
    }
    this.orphanRelationships = dedupeRelationships(this.orphanRelationships.map(rewrite));
    this.orphanKeys.clear();
    for (const relationship of this.orphanRelationships) this.orphanKeys.add(relationshipKey(relationship));
  }

  /**
   * Extended module symbols from different files that name the same module collapse into the
   * one with the smallest identifier, with access levels widened per selector.
   */
  mergeExtendedModuleSymbols(): void {
    const byTitle = new Map<string, UnifiedSymbol[]>();
    for (const symbol of this.symbols.values()) {
      const view = primaryView(symbol);
      if (!view || viewKind(view) !== KindIdentifier.extendedModule) continue;
      byTitle.set(view.names.title, [...(byTitle.get(view.names.title) ?? []), symbol]);
    }

    const mapping = new Map<string, string>();
    for (const group of byTitle.values()) {
      if (group.length < 2) continue;
      const [canonical, ...duplicates] = [...group].sort((a, b) => compareKeys(a.uniqueIdentifier, b.uniqueIdentifier));
      for (const duplicate of duplicates) {
        for (const [key, view] of duplicate.views) {
          const kept = canonical.views.get(key);
          if (kept) {
            kept.accessLevel = maxAccessLevel(kept.accessLevel, view.accessLevel);
          } else {
            canonical.views.set(key, { ...view });
          }
        }
        this.symbols.delete(duplicate.uniqueIdentifier);
        mapping.set(duplicate.uniqueIdentifier, canonical.uniqueIdentifier);
      }
    }

    if (mapping.size > 0) {
      this.redirectRelationships(mapping);
    }
  }
}
