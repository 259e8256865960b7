/**
 * Symbol registration - one documentation node per unified symbol, then every relationship
 * handed to the Relationship Builder.
 */

import {
  KindIdentifier,
  RelationshipKind,
  extensionInfoOf,
  primaryView,
  sourceOriginOf,
  viewKind,
  type Relationship,
  type Selector,
  type UnifiedSymbol,
  type UnifiedSymbolGraph,
} from "@symgraph/symbols";
import type { DocumentationNode, ResolvedTopicReference, SymbolSemantic } from "../model.js";
import { moduleReference, symbolPath, symbolReference } from "../references.js";
import type { DocumentationContext } from "./DocumentationContext.js";
import {
  addConformanceRelationship,
  addImplementationRelationship,
  addInheritanceRelationship,
  addInheritedDefaultImplementation,
  addOptionalRequirementRelationship,
  addOverloadRelationship,
  addProtocolExtensionMemberConstraint,
  addRequirementRelationship,
} from "./RelationshipsBuilder.js";

const DEFAULT_LANGUAGE = "swift";

export interface RegistrationSummary {
  modules: number;
  symbols: number;
  relationships: number;
}

function byString(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function emptySemantic(title: string, kind: string, moduleName: string): SymbolSemantic {
  return {
    title,
    kind,
    moduleName,
    relationshipsVariants: new Map(),
    defaultImplementationsVariants: new Map(),
  };
}

function moduleLanguage(graph: UnifiedSymbolGraph): string {
  for (const symbol of graph.symbols.values()) {
    const view = primaryView(symbol);
    if (view) return view.selector.interfaceLanguage;
  }
  return DEFAULT_LANGUAGE;
}

/**
 * Register one module: its module node and a node per symbol. Two symbols with the same path
 * keep distinct references; the later one (in identifier order) gets its identifier appended.
 */
function registerModuleNodes(context: DocumentationContext, graph: UnifiedSymbolGraph): void {
  const language = moduleLanguage(graph);
  const moduleNode: DocumentationNode = {
    reference: moduleReference(context.bundle, graph.moduleName, language),
    kind: KindIdentifier.module,
    sourceLanguage: language,
    name: graph.moduleName,
    semantic: { kind: "symbol", symbol: emptySemantic(graph.moduleName, KindIdentifier.module, graph.moduleName) },
  };
  context.addNode(moduleNode);

  const identifiers = [...graph.symbols.keys()].sort(byString);
  for (const identifier of identifiers) {
    const symbol = graph.symbols.get(identifier);
    const view = symbol ? primaryView(symbol) : undefined;
    if (!symbol || !view) continue;

    const sourceLanguage = view.selector.interfaceLanguage;
    let reference = symbolReference(context.bundle, graph.moduleName, view.pathComponents, sourceLanguage);
    if (context.hasReference(reference)) {
      reference = { ...reference, path: `${reference.path}-${symbolPath([identifier])}` };
    }

    const semantic = emptySemantic(view.names.title, viewKind(view), graph.moduleName);
    const extension = extensionInfoOf(view.mixins);
    if (extension) semantic.swiftExtension = { ...extension, constraints: [...extension.constraints] };

    context.addNode({
      reference,
      kind: viewKind(view),
      sourceLanguage,
      name: view.names.title,
      semantic: { kind: "symbol", symbol: semantic },
      symbolIdentifier: identifier,
      unifiedSymbol: symbol,
    });

    if (view.pathComponents.length <= 1) {
      addTopicEdge(context, moduleNode.reference, reference);
    }
  }
}

function addTopicEdge(context: DocumentationContext, from: ResolvedTopicReference, to: ResolvedTopicReference): void {
  const parent = context.topicGraph.nodeWithReference(from);
  const child = context.topicGraph.nodeWithReference(to);
  if (parent && child) context.topicGraph.addEdge(parent, child);
}

/**
 * Page hierarchy edges: members under their type, extended types under their module or
 * enclosing extended type.
 */
function addHierarchyEdge(context: DocumentationContext, edge: Relationship): void {
  switch (edge.kind) {
    case RelationshipKind.memberOf:
    case RelationshipKind.declaredIn:
    case RelationshipKind.inContextOf: {
      const parent = context.localCache.reference(edge.target);
      const child = context.localCache.reference(edge.source);
      if (parent && child) addTopicEdge(context, parent, child);
      break;
    }
    default:
      break;
  }
}

function dispatch(
  context: DocumentationContext,
  edge: Relationship,
  selector: Selector,
  moduleName: string,
  extendedModuleRelationships: ReadonlyMap<string, string>
): void {
  switch (edge.kind) {
    case RelationshipKind.conformsTo:
      addConformanceRelationship(context, edge, selector);
      break;
    case RelationshipKind.defaultImplementationOf:
      addImplementationRelationship(context, edge, selector);
      break;
    case RelationshipKind.inheritsFrom:
      addInheritanceRelationship(context, edge, selector);
      break;
    case RelationshipKind.requirementOf:
      addRequirementRelationship(context, edge);
      break;
    case RelationshipKind.optionalRequirementOf:
      addOptionalRequirementRelationship(context, edge);
      break;
    case RelationshipKind.memberOf:
      addProtocolExtensionMemberConstraint(context, edge, extendedModuleRelationships);
      break;
    case RelationshipKind.overloadOf:
      addOverloadRelationship(context, edge);
      break;
    default:
      break;
  }

  const origin = sourceOriginOf(edge);
  if (origin) {
    addInheritedDefaultImplementation(context, origin, edge.source, moduleName);
  }
}

function orphanSelector(graph: UnifiedSymbolGraph, symbol: UnifiedSymbol | undefined): Selector {
  const view = symbol ? primaryView(symbol) : undefined;
  return view?.selector ?? { interfaceLanguage: moduleLanguage(graph) };
}

function registerModuleRelationships(context: DocumentationContext, graph: UnifiedSymbolGraph): number {
  const all = graph.allRelationships();

  const extendedModuleRelationships = new Map<string, string>();
  for (const edge of all) {
    if (edge.kind === RelationshipKind.declaredIn) {
      extendedModuleRelationships.set(edge.source, edge.target);
    }
    addHierarchyEdge(context, edge);
  }

  let count = 0;
  for (const { selector, relationships } of graph.relationshipsBySelector.values()) {
    for (const edge of relationships) {
      dispatch(context, edge, selector, graph.moduleName, extendedModuleRelationships);
      count++;
    }
  }
  for (const edge of graph.orphanRelationships) {
    dispatch(context, edge, orphanSelector(graph, graph.symbols.get(edge.source)), graph.moduleName, extendedModuleRelationships);
    count++;
  }
  return count;
}

/**
 * Register every module in name order. Nodes of all modules exist before any relationship is
 * wired, so edges between modules of the bundle resolve locally.
 */
export function registerSymbols(
  context: DocumentationContext,
  graphs: ReadonlyMap<string, UnifiedSymbolGraph>
): RegistrationSummary {
  const moduleNames = [...graphs.keys()].sort(byString);
  let symbols = 0;
  for (const moduleName of moduleNames) {
    const graph = graphs.get(moduleName);
    if (!graph) continue;
    registerModuleNodes(context, graph);
    symbols += graph.symbols.size;
  }

  let relationships = 0;
  for (const moduleName of moduleNames) {
    const graph = graphs.get(moduleName);
    if (graph) relationships += registerModuleRelationships(context, graph);
  }

  console.error(`[docs] Registered ${symbols} symbols and ${relationships} relationships in ${moduleNames.length} module(s)`);
  return { modules: moduleNames.length, symbols, relationships };
}
