/**
 * Directed graph of documentation pages: an edge goes from a page to a page listed under it.
 */

import type { ResolvedTopicReference } from "./model.js";
import { referenceURL } from "./references.js";

export interface TopicGraphNode {
  reference: ResolvedTopicReference;
  kind: string;
  title: string;
  isOverloadGroup: boolean;
}

export class TopicGraph {
  private readonly nodes = new Map<string, TopicGraphNode>();
  private readonly edges = new Map<string, string[]>();
  private readonly reverseEdges = new Map<string, string[]>();

  /** Adding a reference that is already present keeps the existing node. */
  addNode(node: TopicGraphNode): TopicGraphNode {
    const key = referenceURL(node.reference);
    const existing = this.nodes.get(key);
    if (existing) return existing;
    this.nodes.set(key, node);
    return node;
  }

  nodeWithReference(reference: ResolvedTopicReference): TopicGraphNode | undefined {
    return this.nodes.get(referenceURL(reference));
  }

  /**
   * Add an edge between two nodes already in the graph. Self edges and duplicates are ignored.
   */
  addEdge(from: TopicGraphNode, to: TopicGraphNode): void {
    const source = referenceURL(from.reference);
    const target = referenceURL(to.reference);
    if (source === target || !this.nodes.has(source) || !this.nodes.has(target)) return;

    const children = this.edges.get(source) ?? [];
    if (children.includes(target)) return;
    this.edges.set(source, [...children, target]);
    this.reverseEdges.set(target, [...(this.reverseEdges.get(target) ?? []), source]);
  }

  children(reference: ResolvedTopicReference): TopicGraphNode[] {
    return this.lookup(this.edges.get(referenceURL(reference)) ?? []);
  }

  parents(reference: ResolvedTopicReference): TopicGraphNode[] {
    return this.lookup(this.reverseEdges.get(referenceURL(reference)) ?? []);
  }

  get size(): number {
    return this.nodes.size;
  }

  private lookup(keys: readonly string[]): TopicGraphNode[] {
    const found: TopicGraphNode[] = [];
    for (const key of keys) {
      const node = this.nodes.get(key);
      if (node) found.push(node);
    }
    return found;
  }
}
