/**
 * Documentation nodes and the references between them.
 *
 * A node's payload is a closed variant; consumers switch on `semantic.kind` instead of testing
 * for a concrete class.
 */

import type { ExtensionInfo, GenericConstraint, SourceOrigin, UnifiedSymbol } from "@symgraph/symbols";

export interface DocumentationBundle {
  /** Host of every `doc://` reference in the bundle */
  identifier: string;
  displayName: string;
}

// ============================================================================
// References
// ============================================================================

export interface ResolvedTopicReference {
  bundleIdentifier: string;
  /** Absolute path, e.g. `/documentation/Kit/Widget/draw()` */
  path: string;
  sourceLanguage: string;
}

export interface UnresolvedTopicReference {
  topicURL: string;
}

export type TopicReference =
  | { kind: "resolved"; reference: ResolvedTopicReference }
  | { kind: "unresolved"; reference: UnresolvedTopicReference };

// ============================================================================
// Symbol semantics
// ============================================================================

export type RelationshipEntry =
  | { kind: "conformsTo"; target: TopicReference; constraints: GenericConstraint[] }
  | { kind: "conformingType"; target: TopicReference; constraints: GenericConstraint[] }
  | { kind: "inheritsFrom"; target: TopicReference }
  | { kind: "inheritedBy"; target: TopicReference };

export interface RelationshipsSection {
  relationships: RelationshipEntry[];
  /** Topic reference key → display name, for targets that did not resolve */
  targetFallbacks: Map<string, string>;
}

export interface Implementation {
  reference: TopicReference;
  /** Title of the type that declares the implementation */
  parent?: string;
  fallbackName?: string;
}

export interface DefaultImplementationsSection {
  implementations: Implementation[];
  targetFallbacks: Map<string, string>;
}

export interface SymbolSemantic {
  title: string;
  /** Canonical kind, e.g. `protocol` or `protocol.extension` */
  kind: string;
  moduleName: string;
  /** Keyed by selector */
  relationshipsVariants: Map<string, RelationshipsSection>;
  defaultImplementationsVariants: Map<string, DefaultImplementationsSection>;
  isRequired?: boolean;
  /** Where an inherited default implementation was first declared */
  origin?: SourceOrigin;
  swiftExtension?: ExtensionInfo;
}

export type NodeSemantic =
  | { kind: "symbol"; symbol: SymbolSemantic }
  | { kind: "article"; title: string }
  | { kind: "collection"; title: string };

export interface DocumentationNode {
  reference: ResolvedTopicReference;
  /** Canonical symbol kind for symbol nodes, `article` or `collection` otherwise */
  kind: string;
  sourceLanguage: string;
  name: string;
  semantic: NodeSemantic;
  /** Precise identifier, for symbol nodes */
  symbolIdentifier?: string;
  unifiedSymbol?: UnifiedSymbol;
}

export function symbolOf(node: DocumentationNode | undefined): SymbolSemantic | undefined {
  if (!node) return undefined;
  switch (node.semantic.kind) {
    case "symbol":
      return node.semantic.symbol;
    case "article":
    case "collection":
      return undefined;
  }
}

export function titleOf(node: DocumentationNode): string {
  switch (node.semantic.kind) {
    case "symbol":
      return node.semantic.symbol.title;
    case "article":
    case "collection":
      return node.semantic.title;
  }
}
