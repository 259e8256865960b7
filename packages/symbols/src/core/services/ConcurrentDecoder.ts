/**
 * Decodes one symbol graph document with several interleaved workers.
 *
 * Metadata, module and relationships are decoded by one task. Symbols are split by stride:
 * worker `i` decodes the symbols at indices `i, i + N, i + 2N, ...`. Each worker builds its own
 * partial map and hands it to a single merge step guarded by a lock.
 */

import { Lock, concurrentPerform, yieldToEventLoop } from "@symgraph/core";
import type { GraphSymbol, Relationship, SymbolGraph } from "../model.js";
import { declarationFragmentsOf } from "../mixins.js";
import {
  decodeDocument,
  decodeMetadata,
  decodeModule,
  decodeRelationship,
  decodeSymbol,
  encodeSymbol,
  parseJSON,
  type RawDocument,
} from "../codec.js";

export const DEFAULT_DECODER_BATCHES = 4;

/** Symbols a worker decodes before letting the other workers run */
const SLICE_SIZE = 256;

export interface DecodeOptions {
  /** Number of symbol workers */
  batches?: number;
  /** Reported in decoding errors */
  location?: string;
}

interface DecodedSymbol {
  index: number;
  symbol: GraphSymbol;
}

function isAsyncDeclaration(symbol: GraphSymbol): boolean {
  const fragments = declarationFragmentsOf(symbol.mixins) ?? [];
  return fragments.some((fragment) => fragment.kind === "keyword" && fragment.spelling === "async");
}

/**
 * Which of two symbols sharing a precise identifier to keep.
 *
 * Prefers the declaration without `async` (the completion-handler variant of an imported
 * method shares its identifier with the async variant). Otherwise keeps the symbol whose
 * encoding sorts first. The choice does not depend on argument order.
 */
export function symbolToKeepInCaseOfPreciseIdentifierConflict(a: GraphSymbol, b: GraphSymbol): GraphSymbol {
  const aIsAsync = isAsyncDeclaration(a);
  const bIsAsync = isAsyncDeclaration(b);
  if (aIsAsync !== bIsAsync) {
    return aIsAsync ? b : a;
  }
  return JSON.stringify(encodeSymbol(a)) <= JSON.stringify(encodeSymbol(b)) ? a : b;
}

async function decodeSymbolStride(
  rawSymbols: readonly unknown[],
  worker: number,
  stride: number,
  location: string
): Promise<Map<string, DecodedSymbol>> {
  const partial = new Map<string, DecodedSymbol>();
  let decodedInSlice = 0;

  for (let index = worker; index < rawSymbols.length; index += stride) {
    const symbol = decodeSymbol(rawSymbols[index], location, `symbols.${index}`);
    const id = symbol.identifier.precise;
    const existing = partial.get(id);
    partial.set(
      id,
      existing
        ? { index: Math.min(existing.index, index), symbol: symbolToKeepInCaseOfPreciseIdentifierConflict(existing.symbol, symbol) }
        : { index, symbol }
    );

    decodedInSlice += 1;
    if (decodedInSlice === SLICE_SIZE) {
      decodedInSlice = 0;
      await yieldToEventLoop();
    }
  }
  return partial;
}

async function decodeHeader(
  document: RawDocument,
  location: string
): Promise<Pick<SymbolGraph, "metadata" | "module" | "relationships">> {
  const relationships: Relationship[] = document.relationships.map((raw, index) =>
    decodeRelationship(raw, location, `relationships.${index}`)
  );
  return { metadata: decodeMetadata(document), module: decodeModule(document), relationships };
}

/**
 * Decode a symbol graph. The result does not depend on the number of batches.
 *
 * @throws SymbolGraphDecodingError for malformed JSON or invalid content
 */
export async function decodeSymbolGraph(data: string | Uint8Array, options: DecodeOptions = {}): Promise<SymbolGraph> {
  const location = options.location ?? "<memory>";
  const batches = Math.max(1, Math.floor(options.batches ?? DEFAULT_DECODER_BATCHES));

  const document = decodeDocument(parseJSON(data, location), location);

  const merged = new Map<string, DecodedSymbol>();
  const lock = new Lock();

  // Settle every task before reporting, so no worker outlives a failed decode.
  const [header, workers] = await Promise.allSettled([
    decodeHeader(document, location),
    concurrentPerform(batches, async (worker) => {
      const partial = await decodeSymbolStride(document.symbols, worker, batches, location);
      await lock.withLock(() => {
        for (const [id, decoded] of partial) {
          const existing = merged.get(id);
          merged.set(
            id,
            existing
              ? {
                  index: Math.min(existing.index, decoded.index),
                  symbol: symbolToKeepInCaseOfPreciseIdentifierConflict(existing.symbol, decoded.symbol),
                }
              : decoded
          );
        }
      });
    }),
  ]);
  if (header.status === "rejected") throw header.reason;
  if (workers.status === "rejected") throw workers.reason;

  // Document order, independent of which worker finished first.
  const ordered = [...merged.values()].sort((a, b) => a.index - b.index);
  const symbols = new Map<string, GraphSymbol>(ordered.map(({ symbol }) => [symbol.identifier.precise, symbol]));

  return { ...header.value, symbols };
}
