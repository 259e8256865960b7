import { describe, it, expect } from "vitest";
import { TopicGraph, type TopicGraphNode } from "../src/core/TopicGraph.js";

function node(path: string, title = path): TopicGraphNode {
  return {
    reference: { bundleIdentifier: "com.example.kit", path, sourceLanguage: "swift" },
    kind: "struct",
    title,
    isOverloadGroup: false,
  };
}

describe("TopicGraph", () => {
  it("keeps the first node added for a reference", () => {
    const graph = new TopicGraph();
    const first = graph.addNode(node("/documentation/Kit/T", "T"));
    const second = graph.addNode(node("/documentation/Kit/T", "Other"));

    expect(second).toBe(first);
    expect(graph.size).toBe(1);
    expect(graph.nodeWithReference(first.reference)?.title).toBe("T");
  });

  it("connects children and parents", () => {
    const graph = new TopicGraph();
    const parent = graph.addNode(node("/documentation/Kit"));
    const child = graph.addNode(node("/documentation/Kit/T"));

    graph.addEdge(parent, child);
    graph.addEdge(parent, child);

    expect(graph.children(parent.reference)).toEqual([child]);
    expect(graph.parents(child.reference)).toEqual([parent]);
  });

  it("ignores self edges and nodes it does not hold", () => {
    const graph = new TopicGraph();
    const parent = graph.addNode(node("/documentation/Kit"));

    graph.addEdge(parent, parent);
    graph.addEdge(parent, node("/documentation/Kit/Missing"));

    expect(graph.children(parent.reference)).toEqual([]);
  });
});
