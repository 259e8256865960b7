/**
 * Data model for symbol graphs: one decoded file and the pieces it is made of.
 *
 * Mixins are stored as a closed union keyed by their wire name. Keys this package does not
 * understand are kept verbatim in an `unknown` variant so that nothing is lost on re-encode.
 */

import type { SemanticVersion } from "./version.js";

// ============================================================================
// Symbols
// ============================================================================

export interface SymbolIdentifier {
  precise: string;
  interfaceLanguage: string;
}

export interface SymbolKind {
  /** Wire identifier, e.g. `swift.struct` or `swift.struct.extension` */
  identifier: string;
  displayName: string;
}

export interface DeclarationFragment {
  kind: string;
  spelling: string;
  preciseIdentifier?: string;
}

export interface SymbolNames {
  title: string;
  navigator?: DeclarationFragment[];
  subHeading?: DeclarationFragment[];
}

export interface DocComment {
  lines: { text: string }[];
  /** Module the comment was written in, when it differs from the symbol's */
  moduleName?: string;
}

export interface GraphSymbol {
  identifier: SymbolIdentifier;
  kind: SymbolKind;
  pathComponents: string[];
  names: SymbolNames;
  docComment?: DocComment;
  accessLevel: string;
  mixins: SymbolMixins;
}

// ============================================================================
// Mixins
// ============================================================================

export interface AvailabilityItem {
  domain?: string;
  introduced?: SemanticVersion;
  deprecated?: SemanticVersion;
  obsoleted?: SemanticVersion;
  message?: string;
  renamed?: string;
  isUnconditionallyDeprecated: boolean;
  isUnconditionallyUnavailable: boolean;
}

export type ConstraintKind = "conformance" | "superclass" | "sameType";

export interface GenericConstraint {
  kind: ConstraintKind;
  lhs: string;
  rhs: string;
  rhsPrecise?: string;
}

export interface GenericParameter {
  name: string;
  index: number;
  depth: number;
}

export interface GenericsInfo {
  parameters: GenericParameter[];
  constraints: GenericConstraint[];
}

export interface ExtensionInfo {
  extendedModule: string;
  /** Kind identifier of the extended type */
  typeKind?: string;
  constraints: GenericConstraint[];
}

export type SymbolMixin =
  | { key: "availability"; items: AvailabilityItem[] }
  | { key: "declarationFragments"; fragments: DeclarationFragment[] }
  | { key: "swiftGenerics"; generics: GenericsInfo }
  | { key: "swiftExtension"; extension: ExtensionInfo }
  | { key: "unknown"; name: string; raw: unknown };

export type SymbolMixins = Map<string, SymbolMixin>;

export interface SourceOrigin {
  identifier: string;
  displayName: string;
}

export type RelationshipMixin =
  | { key: "swiftConstraints"; constraints: GenericConstraint[] }
  | { key: "sourceOrigin"; origin: SourceOrigin }
  | { key: "unknown"; name: string; raw: unknown };

export type RelationshipMixins = Map<string, RelationshipMixin>;

// ============================================================================
// Relationships
// ============================================================================

export const RelationshipKind = {
  memberOf: "memberOf",
  conformsTo: "conformsTo",
  inheritsFrom: "inheritsFrom",
  requirementOf: "requirementOf",
  optionalRequirementOf: "optionalRequirementOf",
  extensionTo: "extensionTo",
  defaultImplementationOf: "defaultImplementationOf",
  overloadOf: "overloadOf",
  declaredIn: "declaredIn",
  inContextOf: "inContextOf",
  overrides: "overrides",
} as const;

export interface Relationship {
  source: string;
  target: string;
  /** One of {@link RelationshipKind}; other kinds pass through untouched */
  kind: string;
  targetFallback?: string;
  mixins: RelationshipMixins;
}

// ============================================================================
// Graph
// ============================================================================

export interface OperatingSystem {
  name: string;
  minimumVersion?: SemanticVersion;
}

export interface Platform {
  architecture?: string;
  vendor?: string;
  operatingSystem?: OperatingSystem;
  environment?: string;
}

export interface GraphModule {
  name: string;
  platform: Platform;
  /** Secondary modules of a cross-import overlay */
  bystanders?: string[];
}

export interface GraphMetadata {
  formatVersion: SemanticVersion;
  generator: string;
}

export interface SymbolGraph {
  metadata: GraphMetadata;
  module: GraphModule;
  symbols: Map<string, GraphSymbol>;
  relationships: Relationship[];
}

/**
 * Partition of per-symbol data in a unified graph.
 */
export interface Selector {
  interfaceLanguage: string;
  platform?: string;
}

export function selectorKey(selector: Selector): string {
  return `${selector.interfaceLanguage}|${selector.platform ?? ""}`;
}
