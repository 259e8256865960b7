/**
 * Symbol lookups used while wiring relationships.
 */

import type { DocumentationNode, ResolvedTopicReference } from "./model.js";

/**
 * Documentation nodes of this bundle's symbols, by precise identifier.
 */
export class LocalCache {
  private readonly nodes = new Map<string, DocumentationNode>();

  add(symbolID: string, node: DocumentationNode): void {
    this.nodes.set(symbolID, node);
  }

  get(symbolID: string): DocumentationNode | undefined {
    return this.nodes.get(symbolID);
  }

  has(symbolID: string): boolean {
    return this.nodes.has(symbolID);
  }

  reference(symbolID: string): ResolvedTopicReference | undefined {
    return this.nodes.get(symbolID)?.reference;
  }

  get size(): number {
    return this.nodes.size;
  }

  values(): IterableIterator<DocumentationNode> {
    return this.nodes.values();
  }
}

/**
 * References to symbols documented elsewhere, by precise identifier.
 */
export class ExternalCache {
  private readonly references = new Map<string, ResolvedTopicReference>();

  add(symbolID: string, reference: ResolvedTopicReference): void {
    this.references.set(symbolID, reference);
  }

  reference(symbolID: string): ResolvedTopicReference | undefined {
    return this.references.get(symbolID);
  }
}
