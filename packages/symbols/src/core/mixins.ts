/**
 * Typed access to symbol and relationship mixins.
 */

import type {
  AvailabilityItem,
  DeclarationFragment,
  ExtensionInfo,
  GenericConstraint,
  Relationship,
  RelationshipMixin,
  RelationshipMixins,
  SourceOrigin,
  SymbolMixin,
  SymbolMixins,
} from "./model.js";

export function mixinName(mixin: SymbolMixin | RelationshipMixin): string {
  return mixin.key === "unknown" ? mixin.name : mixin.key;
}

export function setMixin(mixins: SymbolMixins, mixin: SymbolMixin): void {
  mixins.set(mixinName(mixin), mixin);
}

export function availabilityOf(mixins: SymbolMixins): AvailabilityItem[] | undefined {
  const mixin = mixins.get("availability");
  return mixin?.key === "availability" ? mixin.items : undefined;
}

export function declarationFragmentsOf(mixins: SymbolMixins): DeclarationFragment[] | undefined {
  const mixin = mixins.get("declarationFragments");
  return mixin?.key === "declarationFragments" ? mixin.fragments : undefined;
}

export function extensionInfoOf(mixins: SymbolMixins): ExtensionInfo | undefined {
  const mixin = mixins.get("swiftExtension");
  return mixin?.key === "swiftExtension" ? mixin.extension : undefined;
}

export function constraintsOf(relationship: Relationship): GenericConstraint[] | undefined {
  const mixin = relationship.mixins.get("swiftConstraints");
  return mixin?.key === "swiftConstraints" ? mixin.constraints : undefined;
}

export function sourceOriginOf(relationship: Relationship): SourceOrigin | undefined {
  const mixin = relationship.mixins.get("sourceOrigin");
  return mixin?.key === "sourceOrigin" ? mixin.origin : undefined;
}

export function relationshipMixins(...mixins: RelationshipMixin[]): RelationshipMixins {
  return new Map(mixins.map((mixin) => [mixinName(mixin), mixin]));
}

/**
 * Equality key of a relationship: (source, target, kind, fallback, constraints).
 */
export function relationshipKey(relationship: Relationship): string {
  return JSON.stringify([
    relationship.source,
    relationship.target,
    relationship.kind,
    relationship.targetFallback ?? null,
    constraintsOf(relationship) ?? null,
  ]);
}

export function dedupeRelationships(relationships: Iterable<Relationship>): Relationship[] {
  const seen = new Set<string>();
  const unique: Relationship[] = [];
  for (const relationship of relationships) {
    const key = relationshipKey(relationship);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(relationship);
  }
  return unique;
}
