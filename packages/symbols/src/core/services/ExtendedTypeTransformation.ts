/**
 * Rewrites the extension block format into the extended type format.
 *
 * In the block format every `extension X {}` emits its own symbol. Here all blocks that extend
 * the same type collapse into one extended type symbol, nested types gain synthesized parents
 * linked by `inContextOf`, and each extended module gets a symbol that top-level extended types
 * are `declaredIn`.
 */

import type { DeclarationFragment, GraphSymbol, Relationship, SymbolGraph, SymbolMixins } from "../model.js";
import { RelationshipKind } from "../model.js";
import { declarationFragmentsOf, extensionInfoOf, relationshipMixins, setMixin } from "../mixins.js";
import { KindIdentifier, canonicalKind, extendedKindFor, kindOf, makeKind, maxAccessLevel } from "../kinds.js";
import { InvalidSymbolReferencePathError } from "../errors.js";

export const EXTENDED_TYPE_ID_PREFIX = "s:e:";
export const EXTENDED_MODULE_ID_PREFIX = "s:m:";

const byString = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Module names become the first path component of symbol references.
 */
// Path separators, query and fragment markers and control characters.
const PATH_HOSTILE_CHARACTER = /[/\\?#\u0000-\u001f\u007f]/;

function validateModuleName(moduleName: string): void {
  if (moduleName.length === 0) {
    throw new InvalidSymbolReferencePathError(moduleName, "module name is empty");
  }
  const hostile = PATH_HOSTILE_CHARACTER.exec(moduleName);
  if (hostile) {
    throw new InvalidSymbolReferencePathError(moduleName, `module name contains ${JSON.stringify(hostile[0])}`);
  }
  try {
    encodeURIComponent(moduleName);
  } catch {
    throw new InvalidSymbolReferencePathError(moduleName, "module name cannot be percent-encoded");
  }
}

function extractExtensionBlockSymbols(graph: SymbolGraph): Map<string, GraphSymbol> {
  const blocks = new Map<string, GraphSymbol>();
  for (const [id, symbol] of graph.symbols) {
    if (kindOf(symbol) === KindIdentifier.extension) {
      blocks.set(id, symbol);
      graph.symbols.delete(id);
    }
  }
  return blocks;
}

function prependModuleName(symbol: GraphSymbol, fallbackModuleName: string): void {
  const moduleName = extensionInfoOf(symbol.mixins)?.extendedModule ?? fallbackModuleName;
  validateModuleName(moduleName);
  symbol.pathComponents = [moduleName, ...symbol.pathComponents];
}

interface ExtractedRelationships {
  extensionTo: Relationship[];
  memberOf: Relationship[];
  conformsTo: Relationship[];
}

function extractRelationshipsTouchingBlocks(
  graph: SymbolGraph,
  blocks: ReadonlyMap<string, GraphSymbol>
): ExtractedRelationships {
  const extracted: ExtractedRelationships = { extensionTo: [], memberOf: [], conformsTo: [] };
  graph.relationships = graph.relationships.filter((relationship) => {
    if (relationship.kind === RelationshipKind.extensionTo && blocks.has(relationship.source)) {
      extracted.extensionTo.push(relationship);
      return false;
    }
    if (relationship.kind === RelationshipKind.memberOf && blocks.has(relationship.target)) {
      extracted.memberOf.push(relationship);
      return false;
    }
    if (relationship.kind === RelationshipKind.conformsTo && blocks.has(relationship.source)) {
      extracted.conformsTo.push(relationship);
      return false;
    }
    return true;
  });
  return extracted;
}

/**
 * `extension Outer.Inner where T: P` → `extension Outer.Inner`: the keyword, a space and the
 * first name, followed by the rest of the dotted name.
 */
function declarationWithoutWhereClause(fragments: readonly DeclarationFragment[]): DeclarationFragment[] {
  const prefix = fragments.slice(0, 3);
  for (const fragment of fragments.slice(3)) {
    const continuesName =
      fragment.kind === "typeIdentifier" ||
      fragment.kind === "identifier" ||
      (fragment.kind === "text" && fragment.spelling === ".");
    if (!continuesName) break;
    prefix.push(fragment);
  }
  return prefix;
}

function createExtendedTypeSymbol(block: GraphSymbol, id: string): GraphSymbol {
  const mixins: SymbolMixins = new Map();
  const extension = extensionInfoOf(block.mixins);
  if (extension) {
    setMixin(mixins, { key: "swiftExtension", extension: { ...extension, constraints: [] } });
  }
  const fragments = declarationFragmentsOf(block.mixins);
  if (fragments) {
    setMixin(mixins, { key: "declarationFragments", fragments: declarationWithoutWhereClause(fragments) });
  }

  const language = block.identifier.interfaceLanguage;
  const typeKind = extension?.typeKind === undefined ? undefined : canonicalKind(extension.typeKind, language);

  return {
    identifier: { precise: id, interfaceLanguage: language },
    kind: makeKind(extendedKindFor(typeKind), language),
    pathComponents: [...block.pathComponents],
    names: block.names,
    accessLevel: block.accessLevel,
    mixins,
  };
}

interface PrimaryExtendedTypes {
  symbols: Map<string, GraphSymbol>;
  blockToExtendedType: Map<string, string>;
  extendedTypeToBlocks: Map<string, string[]>;
}

function synthesizePrimaryExtendedTypes(
  blocks: ReadonlyMap<string, GraphSymbol>,
  extensionTo: readonly Relationship[]
): PrimaryExtendedTypes {
  const result: PrimaryExtendedTypes = {
    symbols: new Map(),
    blockToExtendedType: new Map(),
    extendedTypeToBlocks: new Map(),
  };
  // extended type (extensionTo target) → id of the synthesized symbol
  const idsByExtendedType = new Map<string, string>();

  // Sorted so that the same block always lends its identifier, whatever order the compiler wrote.
  const sorted = [...extensionTo].sort((a, b) => byString(a.source, b.source));
  for (const relationship of sorted) {
    const block = blocks.get(relationship.source);
    if (!block) continue;

    const id = idsByExtendedType.get(relationship.target) ?? block.identifier.precise;
    idsByExtendedType.set(relationship.target, id);

    const existing = result.symbols.get(id);
    if (existing) {
      existing.accessLevel = maxAccessLevel(existing.accessLevel, block.accessLevel);
    } else {
      result.symbols.set(id, createExtendedTypeSymbol(block, id));
    }
    result.blockToExtendedType.set(block.identifier.precise, id);
    result.extendedTypeToBlocks.set(id, [...(result.extendedTypeToBlocks.get(id) ?? []), block.identifier.precise]);
  }
  return result;
}

function keepExtensionMixin(mixins: SymbolMixins): SymbolMixins {
  const kept: SymbolMixins = new Map();
  const extension = mixins.get("swiftExtension");
  if (extension) kept.set("swiftExtension", extension);
  return kept;
}

function pathKey(pathComponents: readonly string[]): string {
  return JSON.stringify(pathComponents);
}

/**
 * Create a parent for every nesting level that is not itself extended, stopping below the
 * module component, and connect each extended type to its parent with `inContextOf`.
 */
function synthesizeSecondaryExtendedTypes(extendedTypes: Map<string, GraphSymbol>): Relationship[] {
  const sortedKeys = [...extendedTypes.values()]
    .map((symbol) => ({ depth: symbol.pathComponents.length, id: symbol.identifier.precise }))
    .sort((a, b) => a.depth - b.depth || byString(a.id, b.id));

  const idsByPath = new Map<string, string>();
  for (const [id, symbol] of extendedTypes) {
    idsByPath.set(pathKey(symbol.pathComponents), id);
  }

  const relationships: Relationship[] = [];
  const connectedToParent = new Set<string>();

  for (const { id } of sortedKeys) {
    let symbol = extendedTypes.get(id);
    if (!symbol) continue;
    let pathComponents = symbol.pathComponents.slice(0, -1);

    while (pathComponents.length > 1) {
      const existingId = idsByPath.get(pathKey(pathComponents));
      const existing = existingId === undefined ? undefined : extendedTypes.get(existingId);

      let parent: GraphSymbol;
      if (existing) {
        existing.accessLevel = maxAccessLevel(existing.accessLevel, symbol.accessLevel);
        parent = existing;
      } else {
        const language = symbol.identifier.interfaceLanguage;
        parent = {
          identifier: { precise: EXTENDED_TYPE_ID_PREFIX + symbol.identifier.precise, interfaceLanguage: language },
          kind: makeKind(KindIdentifier.unknownExtendedType, language),
          pathComponents: [...pathComponents],
          names: {
            title: pathComponents.slice(1).join("."),
            navigator: [{ kind: "identifier", spelling: pathComponents[pathComponents.length - 1] }],
          },
          accessLevel: symbol.accessLevel,
          mixins: keepExtensionMixin(symbol.mixins),
        };
        idsByPath.set(pathKey(pathComponents), parent.identifier.precise);
        extendedTypes.set(parent.identifier.precise, parent);
      }

      if (!connectedToParent.has(symbol.identifier.precise)) {
        relationships.push({
          source: symbol.identifier.precise,
          target: parent.identifier.precise,
          kind: RelationshipKind.inContextOf,
          targetFallback: parent.names.title,
          mixins: new Map(),
        });
        connectedToParent.add(symbol.identifier.precise);
      }

      symbol = parent;
      pathComponents = pathComponents.slice(0, -1);
    }
  }
  return relationships;
}

function redirect(
  relationships: Relationship[],
  anchor: "source" | "target",
  mapping: ReadonlyMap<string, string>
): void {
  for (const relationship of relationships) {
    const replacement = mapping.get(relationship[anchor]);
    if (replacement !== undefined) {
      relationship[anchor] = replacement;
    }
  }
}

function lineCount(symbol: GraphSymbol): number {
  return symbol.docComment?.lines.length ?? 0;
}

/**
 * Give each undocumented extended type the longest comment among its blocks. Blocks are
 * visited in identifier order and a later block only wins with strictly more lines.
 */
function attachDocComments(
  extendedTypes: ReadonlyMap<string, GraphSymbol>,
  extendedTypeToBlocks: ReadonlyMap<string, string[]>,
  blocks: ReadonlyMap<string, GraphSymbol>
): void {
  for (const [id, symbol] of extendedTypes) {
    if (symbol.docComment) continue;
    const candidates = (extendedTypeToBlocks.get(id) ?? [])
      .map((blockId) => blocks.get(blockId))
      .filter((block): block is GraphSymbol => block?.docComment !== undefined)
      .sort((a, b) => byString(a.identifier.precise, b.identifier.precise));

    let winner: GraphSymbol | undefined;
    for (const candidate of candidates) {
      if (!winner || lineCount(candidate) > lineCount(winner)) {
        winner = candidate;
      }
    }
    if (winner?.docComment) {
      symbol.docComment = winner.docComment;
    }
  }
}

/**
 * One extended module symbol per module that top-level extended types belong to.
 */
function synthesizeExtendedModules(graph: SymbolGraph, topLevelIds: readonly string[]): void {
  const moduleIds = new Map<string, string>();

  for (const typeId of [...topLevelIds].sort(byString)) {
    const extendedType = graph.symbols.get(typeId);
    if (!extendedType) continue;
    const moduleName = extendedType.pathComponents[0];

    const id = moduleIds.get(moduleName) ?? EXTENDED_MODULE_ID_PREFIX + typeId;
    moduleIds.set(moduleName, id);

    const existing = graph.symbols.get(id);
    if (existing) {
      existing.accessLevel = maxAccessLevel(existing.accessLevel, extendedType.accessLevel);
    } else {
      graph.symbols.set(id, {
        identifier: { precise: id, interfaceLanguage: extendedType.identifier.interfaceLanguage },
        kind: makeKind(KindIdentifier.extendedModule, extendedType.identifier.interfaceLanguage),
        pathComponents: [moduleName],
        names: { title: moduleName },
        accessLevel: extendedType.accessLevel,
        mixins: new Map(),
      });
    }

    graph.relationships.push({
      source: typeId,
      target: id,
      kind: RelationshipKind.declaredIn,
      targetFallback: moduleName,
      mixins: relationshipMixins(),
    });
  }
}

/**
 * Transform `graph` in place. Returns false, leaving the graph untouched, when it contains no
 * extension block symbols.
 *
 * @param moduleName Prepended to path components of symbols that do not name their extended module
 * @throws InvalidSymbolReferencePathError when a module name cannot start a reference path
 */
export function transformExtensionBlockFormatToExtendedTypeFormat(graph: SymbolGraph, moduleName: string): boolean {
  const hasBlocks = [...graph.symbols.values()].some((symbol) => kindOf(symbol) === KindIdentifier.extension);
  if (!hasBlocks) {
    return false;
  }
  const blocks = extractExtensionBlockSymbols(graph);

  for (const symbol of graph.symbols.values()) prependModuleName(symbol, moduleName);
  for (const block of blocks.values()) prependModuleName(block, moduleName);

  const { extensionTo, memberOf, conformsTo } = extractRelationshipsTouchingBlocks(graph, blocks);
  const primary = synthesizePrimaryExtendedTypes(blocks, extensionTo);
  const inContextOf = synthesizeSecondaryExtendedTypes(primary.symbols);

  redirect(memberOf, "target", primary.blockToExtendedType);
  redirect(conformsTo, "source", primary.blockToExtendedType);

  attachDocComments(primary.symbols, primary.extendedTypeToBlocks, blocks);

  graph.relationships.push(...memberOf, ...conformsTo, ...inContextOf);
  for (const [id, symbol] of primary.symbols) {
    graph.symbols.set(id, symbol);
  }

  const topLevel = [...primary.symbols.values()]
    .filter((symbol) => symbol.pathComponents.length === 2)
    .map((symbol) => symbol.identifier.precise);
  synthesizeExtendedModules(graph, topLevel);

  return true;
}
