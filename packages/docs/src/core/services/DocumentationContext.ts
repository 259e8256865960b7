/**
 * The documentation nodes of one bundle and everything relationships are wired into.
 */

import { DiagnosticEngine } from "@symgraph/core";
import type { DocumentationBundle, DocumentationNode, ResolvedTopicReference } from "../model.js";
import { titleOf } from "../model.js";
import { ExternalCache, LocalCache } from "../caches.js";
import { TopicGraph } from "../TopicGraph.js";
import { referenceURL } from "../references.js";
import type { RelationshipBuilderContext } from "./RelationshipsBuilder.js";

export interface DocumentationContextOptions {
  inheritDocs?: boolean;
  diagnostics?: DiagnosticEngine;
}

export class DocumentationContext implements RelationshipBuilderContext {
  readonly bundle: DocumentationBundle;
  readonly localCache = new LocalCache();
  readonly externalCache = new ExternalCache();
  readonly topicGraph = new TopicGraph();
  readonly diagnostics: DiagnosticEngine;
  readonly inheritDocs: boolean;

  private readonly nodes = new Map<string, DocumentationNode>();

  constructor(bundle: DocumentationBundle, options: DocumentationContextOptions = {}) {
    this.bundle = bundle;
    this.inheritDocs = options.inheritDocs ?? false;
    this.diagnostics = options.diagnostics ?? new DiagnosticEngine();
  }

  /**
   * Register a node under its reference, in the local cache when it documents a symbol, and in
   * the topic graph.
   */
  addNode(node: DocumentationNode): void {
    this.nodes.set(referenceURL(node.reference), node);
    if (node.symbolIdentifier !== undefined) {
      this.localCache.add(node.symbolIdentifier, node);
    }
    this.topicGraph.addNode({
      reference: node.reference,
      kind: node.kind,
      title: titleOf(node),
      isOverloadGroup: false,
    });
  }

  entity(reference: ResolvedTopicReference): DocumentationNode | undefined {
    return this.nodes.get(referenceURL(reference));
  }

  hasReference(reference: ResolvedTopicReference): boolean {
    return this.nodes.has(referenceURL(reference));
  }

  get nodeCount(): number {
    return this.nodes.size;
  }
}
