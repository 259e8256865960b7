/**
 * Relationship Builder - turns symbol graph edges into documentation relationships.
 *
 * Every function handles one edge. A missing source is reported and the edge dropped; a target
 * that is not in this bundle becomes an unresolved reference carrying the edge's fallback name.
 */

import { createDiagnostic, type Diagnostic, type DiagnosticEngine } from "@symgraph/core";
import {
  KindIdentifier,
  constraintsOf,
  makeKind,
  primaryView,
  type GenericConstraint,
  type Relationship,
  type Selector,
  type SourceOrigin,
  type SymbolView,
  type UnifiedSymbol,
  selectorKey,
} from "@symgraph/symbols";
import {
  symbolOf,
  type DefaultImplementationsSection,
  type DocumentationBundle,
  type DocumentationNode,
  type RelationshipEntry,
  type RelationshipsSection,
  type ResolvedTopicReference,
  type SymbolSemantic,
  type TopicReference,
} from "../model.js";
import type { ExternalCache, LocalCache } from "../caches.js";
import type { TopicGraph } from "../TopicGraph.js";
import {
  removingLastPathComponent,
  resolved,
  topicReferenceKey,
  unresolved,
  unresolvedReference,
} from "../references.js";

export const SYMBOL_NODE_NOT_FOUND = "symgraph.SymbolNodeNotFound";
export const INVALID_SYMBOL_IDENTIFIER = "symgraph.InvalidSymbolIdentifier";
export const EXTENSION_CONSTRAINT_MISMATCH = "symgraph.ExtensionConstraintMismatch";

export const NodeProblem = {
  notFound(identifier: string): Diagnostic {
    return createDiagnostic(SYMBOL_NODE_NOT_FOUND, "error", `Symbol with identifier '${identifier}' couldn't be found`);
  },
  invalidReference(path: string): Diagnostic {
    return createDiagnostic(INVALID_SYMBOL_IDENTIFIER, "error", `Relationship symbol path '${path}' isn't valid`);
  },
};

export interface RelationshipBuilderContext {
  bundle: DocumentationBundle;
  localCache: LocalCache;
  externalCache: ExternalCache;
  topicGraph: TopicGraph;
  diagnostics: DiagnosticEngine;
  /** Copy documentation from symbols declared in other modules onto inherited symbols */
  inheritDocs: boolean;
  entity(reference: ResolvedTopicReference): DocumentationNode | undefined;
}

// ============================================================================
// Sections
// ============================================================================

function relationshipsSection(symbol: SymbolSemantic, selector: Selector): RelationshipsSection {
  const key = selectorKey(selector);
  let section = symbol.relationshipsVariants.get(key);
  if (!section) {
    section = { relationships: [], targetFallbacks: new Map() };
    symbol.relationshipsVariants.set(key, section);
  }
  return section;
}

function defaultImplementationsSection(symbol: SymbolSemantic, selector: Selector): DefaultImplementationsSection {
  const key = selectorKey(selector);
  let section = symbol.defaultImplementationsVariants.get(key);
  if (!section) {
    section = { implementations: [], targetFallbacks: new Map() };
    symbol.defaultImplementationsVariants.set(key, section);
  }
  return section;
}

function addRelationship(section: RelationshipsSection, entry: RelationshipEntry): void {
  const key = `${entry.kind} ${topicReferenceKey(entry.target)}`;
  if (section.relationships.some((existing) => `${existing.kind} ${topicReferenceKey(existing.target)}` === key)) {
    return;
  }
  section.relationships.push(entry);
}

/**
 * The target of `edge` when it is not a local symbol: an external reference when one is cached,
 * otherwise an unresolved reference. Reports and returns undefined when no reference can be made.
 */
function nonLocalTarget(
  ctx: RelationshipBuilderContext,
  edge: Relationship,
  options: { useExternalCache: boolean }
): TopicReference | undefined {
  if (options.useExternalCache) {
    const external = ctx.externalCache.reference(edge.target);
    if (external) return resolved(external);
  }
  const reference = unresolvedReference(ctx.bundle, edge.target);
  if (!reference) {
    ctx.diagnostics.emit(NodeProblem.invalidReference(edge.target));
    return undefined;
  }
  return unresolved(reference);
}

// ============================================================================
// Edges
// ============================================================================

/**
 * defaultImplementationOf: the source implements the target requirement.
 */
export function addImplementationRelationship(
  ctx: RelationshipBuilderContext,
  edge: Relationship,
  selector: Selector
): void {
  const implementorNode = ctx.localCache.get(edge.source);
  const implementor = symbolOf(implementorNode);
  if (!implementorNode || !implementor) {
    ctx.diagnostics.emit(NodeProblem.notFound(edge.source));
    return;
  }

  const interfaceNode = ctx.localCache.get(edge.target);
  if (!interfaceNode) {
    const target = nonLocalTarget(ctx, edge, { useExternalCache: false });
    if (!target) return;
    if (edge.targetFallback !== undefined) {
      defaultImplementationsSection(implementor, selector).targetFallbacks.set(
        topicReferenceKey(target),
        edge.targetFallback
      );
    }
  }

  const parentNode = ctx.entity(removingLastPathComponent(implementorNode.reference));
  const parentName = symbolOf(parentNode)?.title;

  const interfaceSymbol = symbolOf(interfaceNode);
  if (!interfaceNode || !interfaceSymbol) return;

  defaultImplementationsSection(interfaceSymbol, selector).implementations.push({
    reference: resolved(implementorNode.reference),
    ...(parentName !== undefined ? { parent: parentName } : {}),
    ...(edge.targetFallback !== undefined ? { fallbackName: edge.targetFallback } : {}),
  });

  const child = ctx.topicGraph.nodeWithReference(implementorNode.reference);
  const parent = ctx.topicGraph.nodeWithReference(interfaceNode.reference);
  if (child && parent) {
    ctx.topicGraph.addEdge(parent, child);
  }
}

/**
 * conformsTo: a type conforms to a protocol, or a protocol refines another.
 */
export function addConformanceRelationship(
  ctx: RelationshipBuilderContext,
  edge: Relationship,
  selector: Selector
): void {
  const conformingNode = ctx.localCache.get(edge.source);
  const conforming = symbolOf(conformingNode);
  if (!conformingNode || !conforming) {
    ctx.diagnostics.emit(NodeProblem.notFound(edge.source));
    return;
  }

  const conformanceNode = ctx.localCache.get(edge.target);
  let target: TopicReference;
  if (conformanceNode) {
    target = resolved(conformanceNode.reference);
  } else {
    const nonLocal = nonLocalTarget(ctx, edge, { useExternalCache: true });
    if (!nonLocal) return;
    target = nonLocal;
    if (nonLocal.kind === "unresolved" && edge.targetFallback !== undefined) {
      relationshipsSection(conforming, selector).targetFallbacks.set(topicReferenceKey(nonLocal), edge.targetFallback);
    }
  }

  const constraints: GenericConstraint[] = constraintsOf(edge) ?? [];
  const sourceIsProtocol = conformingNode.kind === KindIdentifier.protocol;

  addRelationship(
    relationshipsSection(conforming, selector),
    sourceIsProtocol ? { kind: "inheritsFrom", target } : { kind: "conformsTo", target, constraints }
  );

  const conformance = symbolOf(conformanceNode);
  if (!conformance) return;
  const source = resolved(conformingNode.reference);
  addRelationship(
    relationshipsSection(conformance, selector),
    sourceIsProtocol ? { kind: "inheritedBy", target: source } : { kind: "conformingType", target: source, constraints }
  );
}

/**
 * inheritsFrom: a class inherits from a superclass.
 */
export function addInheritanceRelationship(
  ctx: RelationshipBuilderContext,
  edge: Relationship,
  selector: Selector
): void {
  const childNode = ctx.localCache.get(edge.source);
  const child = symbolOf(childNode);
  if (!childNode || !child) {
    ctx.diagnostics.emit(NodeProblem.notFound(edge.source));
    return;
  }

  const parentNode = ctx.localCache.get(edge.target);
  let target: TopicReference;
  if (parentNode) {
    target = resolved(parentNode.reference);
  } else {
    const nonLocal = nonLocalTarget(ctx, edge, { useExternalCache: true });
    if (!nonLocal) return;
    target = nonLocal;
    if (nonLocal.kind === "unresolved" && edge.targetFallback !== undefined) {
      relationshipsSection(child, selector).targetFallbacks.set(topicReferenceKey(nonLocal), edge.targetFallback);
    }
  }

  addRelationship(relationshipsSection(child, selector), { kind: "inheritsFrom", target });

  const parent = symbolOf(parentNode);
  if (parent) {
    addRelationship(relationshipsSection(parent, selector), {
      kind: "inheritedBy",
      target: resolved(childNode.reference),
    });
  }
}

function addProtocolRelationship(ctx: RelationshipBuilderContext, edge: Relationship, required: boolean): void {
  const symbol = symbolOf(ctx.localCache.get(edge.source));
  if (!symbol) {
    ctx.diagnostics.emit(NodeProblem.notFound(edge.source));
    return;
  }
  symbol.isRequired = required;
}

export function addRequirementRelationship(ctx: RelationshipBuilderContext, edge: Relationship): void {
  addProtocolRelationship(ctx, edge, true);
}

export function addOptionalRequirementRelationship(ctx: RelationshipBuilderContext, edge: Relationship): void {
  addProtocolRelationship(ctx, edge, false);
}

/**
 * The view whose doc comment documents the symbol: the primary view when it has one, otherwise
 * the first view in selector order that does.
 */
export function documentedView(symbol: UnifiedSymbol): SymbolView | undefined {
  const primary = primaryView(symbol);
  if (primary?.docComment) return primary;
  const keys = [...symbol.views.keys()].sort();
  for (const key of keys) {
    const view = symbol.views.get(key);
    if (view?.docComment) return view;
  }
  return undefined;
}

/**
 * Whether the view's doc comment was written in `moduleName`; undefined when the comment does
 * not say where it was written.
 */
export function isDocCommentFromSameModule(view: SymbolView, moduleName: string): boolean | undefined {
  const comment = view.docComment;
  if (!comment || comment.lines.length === 0 || comment.moduleName === undefined) return undefined;
  return comment.moduleName === moduleName;
}

/**
 * Mark a symbol as inherited from `sourceOrigin`. Documentation from another module is dropped
 * unless `inheritDocs` is set.
 */
export function addInheritedDefaultImplementation(
  ctx: RelationshipBuilderContext,
  sourceOrigin: SourceOrigin,
  inheritedSymbolID: string,
  moduleName: string
): void {
  const inheritedNode = ctx.localCache.get(inheritedSymbolID);
  const inherited = symbolOf(inheritedNode);
  if (!inheritedNode || !inherited) return;

  inherited.origin = sourceOrigin;

  const originSymbol = symbolOf(ctx.localCache.get(sourceOrigin.identifier));
  if (originSymbol && originSymbol.moduleName === inherited.moduleName) return;

  const unified = inheritedNode.unifiedSymbol;
  if (ctx.inheritDocs || !unified) return;
  const documented = documentedView(unified);
  if (documented && isDocCommentFromSameModule(documented, moduleName) === false) {
    for (const view of unified.views.values()) {
      delete view.docComment;
    }
  }
}

function addSwiftExtensionConstraint(
  ctx: RelationshipBuilderContext,
  symbol: SymbolSemantic,
  extendedModule: string,
  typeKind: string,
  constraint: GenericConstraint
): void {
  const existing = symbol.swiftExtension;
  if (!existing) {
    symbol.swiftExtension = { extendedModule, typeKind, constraints: [constraint] };
    return;
  }
  if (existing.extendedModule !== extendedModule || existing.typeKind !== typeKind) {
    ctx.diagnostics.emit(
      createDiagnostic(
        EXTENSION_CONSTRAINT_MISMATCH,
        "warning",
        `Constraint for '${symbol.title}' names module '${extendedModule}' but the symbol extends '${existing.extendedModule}'`
      )
    );
  }
  symbol.swiftExtension = { ...existing, constraints: [...existing.constraints, constraint] };
}

/**
 * Members of an extension to a protocol from another module get a `Self == Protocol` constraint
 * so that readers can tell which protocol the extension is for.
 *
 * @param extendedModuleRelationships Extended type identifier → extended module identifier
 */
export function addProtocolExtensionMemberConstraint(
  ctx: RelationshipBuilderContext,
  edge: Relationship,
  extendedModuleRelationships: ReadonlyMap<string, string>
): void {
  const extendedModuleID = extendedModuleRelationships.get(edge.target);
  if (extendedModuleID === undefined) return;

  const targetNode = ctx.localCache.get(edge.target);
  const target = symbolOf(targetNode);
  if (!targetNode || !target || targetNode.kind !== KindIdentifier.extendedProtocol) return;

  const sourceNode = ctx.localCache.get(edge.source);
  const source = symbolOf(sourceNode);
  const extendedModule = symbolOf(ctx.localCache.get(extendedModuleID));
  if (!sourceNode || !source || !extendedModule) return;

  addSwiftExtensionConstraint(
    ctx,
    source,
    extendedModule.title,
    makeKind(KindIdentifier.protocol, sourceNode.sourceLanguage).identifier,
    { kind: "sameType", lhs: "Self", rhs: target.title }
  );
}

/**
 * overloadOf: the source is one overload of the target overload group.
 */
export function addOverloadRelationship(ctx: RelationshipBuilderContext, edge: Relationship): void {
  const overloadNode = ctx.localCache.get(edge.source);
  if (!overloadNode) {
    ctx.diagnostics.emit(NodeProblem.notFound(edge.source));
    return;
  }
  const groupNode = ctx.localCache.get(edge.target);
  if (!groupNode) {
    ctx.diagnostics.emit(NodeProblem.notFound(edge.target));
    return;
  }

  const overload = ctx.topicGraph.nodeWithReference(overloadNode.reference);
  const group = ctx.topicGraph.nodeWithReference(groupNode.reference);
  if (!overload || !group) return;
  group.isOverloadGroup = true;
  ctx.topicGraph.addEdge(group, overload);
}
