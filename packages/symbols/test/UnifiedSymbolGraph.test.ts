import { describe, it, expect } from "vitest";
import { decodeSymbolGraph } from "../src/core/services/ConcurrentDecoder.js";
import { UnifiedSymbolGraph, primaryView } from "../src/core/services/UnifiedSymbolGraph.js";
import { createPlatformConfiguration } from "../src/core/platforms.js";
import { graphJSON, rawRelationship, rawSymbol, type RawGraphOptions } from "./fixtures/builders.js";

const platforms = createPlatformConfiguration();

function decode(options: RawGraphOptions) {
  return decodeSymbolGraph(graphJSON(options), { location: "test.symbols.json" });
}

function edges(unified: UnifiedSymbolGraph): string[] {
  return unified.allRelationships().map((r) => `${r.source} ${r.kind} ${r.target}`);
}

describe("UnifiedSymbolGraph", () => {
  it("keeps one view per selector, preferring main graphs", async () => {
    const unified = new UnifiedSymbolGraph("Kit", platforms);
    unified.mergeGraph(
      await decode({ module: "Kit", symbols: [rawSymbol({ id: "s:A", kind: "struct", path: ["A"], title: "First" })] }),
      "Kit@X.symbols.json",
      false
    );
    unified.mergeGraph(
      await decode({ module: "Kit", symbols: [rawSymbol({ id: "s:A", kind: "struct", path: ["A"], title: "Second" })] }),
      "Kit@Y.symbols.json",
      false
    );
    expect(unified.symbols.get("s:A")?.views.get("swift|macOS")?.names.title).toBe("First");

    unified.mergeGraph(
      await decode({ module: "Kit", symbols: [rawSymbol({ id: "s:A", kind: "struct", path: ["A"], title: "Main" })] }),
      "Kit.symbols.json",
      true
    );
    expect(unified.symbols.get("s:A")?.views.get("swift|macOS")?.names.title).toBe("Main");
    expect(unified.moduleData.size).toBe(3);
  });

  it("prefers the main-graph view across selectors", async () => {
    const unified = new UnifiedSymbolGraph("Kit", platforms);
    unified.mergeGraph(
      await decode({ module: "Kit", os: "ios", symbols: [rawSymbol({ id: "s:A", kind: "struct", path: ["A"], title: "Extension" })] }),
      "ios/Kit@X.symbols.json",
      false
    );
    unified.mergeGraph(
      await decode({ module: "Kit", os: "tvos", symbols: [rawSymbol({ id: "s:A", kind: "struct", path: ["A"], title: "Main" })] }),
      "tvos/Kit.symbols.json",
      true
    );
    const symbol = unified.symbols.get("s:A");
    expect(symbol ? primaryView(symbol)?.names.title : undefined).toBe("Main");
  });

  it("files relationships under their source's selector once", async () => {
    const unified = new UnifiedSymbolGraph("Kit", platforms);
    unified.mergeGraph(
      await decode({
        module: "Kit",
        os: "ios",
        symbols: [rawSymbol({ id: "s:a", kind: "property", path: ["A", "a"] })],
        relationships: [rawRelationship("s:a", "s:A", "memberOf"), rawRelationship("s:a", "s:A", "memberOf")],
      }),
      "Kit.symbols.json",
      true
    );
    expect([...unified.relationshipsBySelector.keys()]).toEqual(["swift|iOS"]);
    expect(edges(unified)).toEqual(["s:a memberOf s:A"]);
  });

  it("re-homes orphans once their source is known", async () => {
    const unified = new UnifiedSymbolGraph("Kit", platforms);
    unified.mergeGraph(
      await decode({ module: "Kit", relationships: [rawRelationship("s:X", "s:Y", "conformsTo")] }),
      "macos/Kit.symbols.json",
      true
    );
    expect(unified.orphanRelationships).toHaveLength(1);

    unified.mergeGraph(
      await decode({ module: "Kit", os: "ios", symbols: [rawSymbol({ id: "s:X", kind: "struct", path: ["X"] })] }),
      "ios/Kit.symbols.json",
      true
    );
    unified.collectOrphans();

    expect(unified.orphanRelationships).toEqual([]);
    expect(unified.relationshipsBySelector.get("swift|iOS")?.relationships.map((r) => r.target)).toEqual(["s:Y"]);
  });

  it("keeps orphans whose source never appears", async () => {
    const unified = new UnifiedSymbolGraph("Kit", platforms);
    unified.mergeGraph(
      await decode({ module: "Kit", relationships: [rawRelationship("s:X", "s:Y", "conformsTo")] }),
      "Kit.symbols.json",
      true
    );
    unified.collectOrphans();
    expect(edges(unified)).toEqual(["s:X conformsTo s:Y"]);
  });

  it("redirects relationship endpoints and drops the duplicates that creates", async () => {
    const unified = new UnifiedSymbolGraph("Kit", platforms);
    unified.mergeGraph(
      await decode({
        module: "Kit",
        symbols: [rawSymbol({ id: "s:a", kind: "property", path: ["A", "a"] })],
        relationships: [rawRelationship("s:a", "s:A", "memberOf"), rawRelationship("s:a", "s:B", "memberOf")],
      }),
      "Kit.symbols.json",
      true
    );
    unified.redirectRelationships(new Map([["s:B", "s:A"]]));
    expect(edges(unified)).toEqual(["s:a memberOf s:A"]);
  });
});
