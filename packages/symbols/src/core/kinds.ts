/**
 * Symbol kinds and access levels.
 *
 * Wire identifiers carry the interface language as a prefix (`swift.struct`); comparisons use
 * the canonical form without it (`struct`).
 */

import type { GraphSymbol, SymbolKind } from "./model.js";

export const KindIdentifier = {
  class: "class",
  struct: "struct",
  enum: "enum",
  protocol: "protocol",
  extension: "extension",
  module: "module",
  extendedModule: "module.extension",
  extendedStructure: "struct.extension",
  extendedClass: "class.extension",
  extendedEnumeration: "enum.extension",
  extendedProtocol: "protocol.extension",
  unknownExtendedType: "unknown.extension",
} as const;

const EXTENDED_KIND_DISPLAY_NAMES: Record<string, string> = {
  [KindIdentifier.extendedModule]: "Extended Module",
  [KindIdentifier.extendedStructure]: "Extended Structure",
  [KindIdentifier.extendedClass]: "Extended Class",
  [KindIdentifier.extendedEnumeration]: "Extended Enumeration",
  [KindIdentifier.extendedProtocol]: "Extended Protocol",
  [KindIdentifier.unknownExtendedType]: "Extended Type",
};

/**
 * Strip the language prefix from a kind identifier when it has one.
 */
export function canonicalKind(identifier: string, interfaceLanguage: string): string {
  const prefix = `${interfaceLanguage}.`;
  return identifier.startsWith(prefix) ? identifier.slice(prefix.length) : identifier;
}

export function kindOf(symbol: GraphSymbol): string {
  return canonicalKind(symbol.kind.identifier, symbol.identifier.interfaceLanguage);
}

/**
 * Build a wire kind for a canonical identifier in the given language.
 */
export function makeKind(canonical: string, interfaceLanguage: string): SymbolKind {
  return {
    identifier: `${interfaceLanguage}.${canonical}`,
    displayName: EXTENDED_KIND_DISPLAY_NAMES[canonical] ?? canonical,
  };
}

/**
 * Kind of the symbol that stands for all extensions of a type of kind `typeKind`.
 */
export function extendedKindFor(typeKind: string | undefined): string {
  switch (typeKind) {
    case KindIdentifier.struct:
      return KindIdentifier.extendedStructure;
    case KindIdentifier.class:
      return KindIdentifier.extendedClass;
    case KindIdentifier.enum:
      return KindIdentifier.extendedEnumeration;
    case KindIdentifier.protocol:
      return KindIdentifier.extendedProtocol;
    default:
      return KindIdentifier.unknownExtendedType;
  }
}

const ACCESS_LEVEL_RANK: Record<string, number> = {
  private: 0,
  fileprivate: 1,
  internal: 2,
  package: 3,
  public: 4,
  open: 5,
};

function accessRank(level: string): number {
  return ACCESS_LEVEL_RANK[level] ?? -1;
}

/**
 * The wider of two access levels. Unknown levels rank below `private`; ties keep `a`.
 */
export function maxAccessLevel(a: string, b: string): string {
  return accessRank(b) > accessRank(a) ? b : a;
}
