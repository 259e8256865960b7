import { describe, it, expect, beforeAll } from "vitest";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Ok } from "@symgraph/core";
import { InMemoryDataProvider } from "@symgraph/symbols";
import { DocumentationWorkspace } from "../src/core/services/DocumentationWorkspace.js";
import type { BundleScanner } from "../src/core/ports/BundleScanner.js";
import { GlobBundleScanner } from "../src/infrastructure/GlobBundleScanner.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const BUNDLE = path.join(__dirname, "fixtures", "bundle");
const NOT_LOADED = "No symbol graphs loaded. Call symbolgraph_load first.";

function fixedScanner(symbolGraphs: string[], configuration?: string): BundleScanner {
  return {
    scan: async () => Ok({ symbolGraphs, ...(configuration ? { configuration } : {}) }),
  };
}

describe("DocumentationWorkspace", () => {
  describe("before loading", () => {
    const workspace = new DocumentationWorkspace(new GlobBundleScanner());

    it("answers every query with the same error", () => {
      expect(workspace.isLoaded).toBe(false);
      expect(workspace.modules()).toEqual({ ok: false, error: NOT_LOADED });
      expect(workspace.symbol("s:T")).toEqual({ ok: false, error: NOT_LOADED });
      expect(workspace.relationships("s:T")).toEqual({ ok: false, error: NOT_LOADED });
      expect(workspace.diagnostics()).toEqual({ ok: false, error: NOT_LOADED });
    });
  });

  describe("with the fixture bundle", () => {
    const workspace = new DocumentationWorkspace(new GlobBundleScanner());

    beforeAll(async () => {
      const result = await workspace.load(BUNDLE);
      if (!result.ok) throw result.error;
    });

    it("summarizes the load", async () => {
      const result = await workspace.load(BUNDLE);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({
        rootPath: BUNDLE,
        bundleIdentifier: "com.example.kit",
        files: 1,
        modules: ["Kit"],
        symbols: 4,
        relationships: 5,
        decodingStrategy: "concurrentlyEachFileInBatches",
        diagnostics: 0,
      });
    });

    it("lists modules with the files they came from", () => {
      const result = workspace.modules();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual([
        {
          name: "Kit",
          symbols: 4,
          relationships: 5,
          orphanRelationships: 0,
          graphs: [{ kind: "primary", location: "graphs/Kit.symbols.json" }],
        },
      ]);
    });

    it("describes a symbol with its configured availability", () => {
      const result = workspace.symbol("s:T");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({
        identifier: "s:T",
        url: "doc://com.example.kit/documentation/Kit/T",
        title: "T",
        kind: "struct",
        moduleName: "Kit",
        selectors: ["swift|macOS"],
        docComment: ["A shape."],
        availability: [
          {
            domain: "macOS",
            introduced: { major: 13, minor: 0, patch: 0 },
            isUnconditionallyDeprecated: false,
            isUnconditionallyUnavailable: false,
          },
        ],
      });
    });

    it("reports requirements", () => {
      const result = workspace.symbol("s:P.f");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.isRequired).toBe(true);
    });

    it("returns relationships and the page hierarchy", () => {
      const result = workspace.relationships("s:T");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.relationships.get("swift|macOS")?.relationships.map((entry) => entry.kind)).toEqual([
        "conformsTo",
      ]);
      expect(result.value.parents.map((node) => node.title)).toEqual(["Kit"]);
      expect(result.value.children.map((node) => node.title)).toEqual(["f()"]);
    });

    it("reports unknown symbols", () => {
      expect(workspace.symbol("s:Nope")).toEqual({ ok: false, error: "Symbol not found: s:Nope" });
    });

    it("has no diagnostics", () => {
      expect(workspace.diagnostics()).toEqual({ ok: true, value: [] });
    });
  });

  it("fails when the root has no symbol graphs", async () => {
    const workspace = new DocumentationWorkspace(fixedScanner([]));
    const result = await workspace.load("/bundles/empty");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("No symbol graphs found under /bundles/empty");
    expect(workspace.isLoaded).toBe(false);
  });

  it("rejects malformed configuration", async () => {
    const workspace = new DocumentationWorkspace(fixedScanner(["Kit.symbols.json"], "symgraph.config.json"), {
      createDataProvider: () => new InMemoryDataProvider({ "symgraph.config.json": "{" }),
    });
    const result = await workspace.load("/bundles/kit");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message.startsWith("symgraph.config.json: malformed JSON")).toBe(true);
  });

  it("defaults the bundle identifier to the root directory name", async () => {
    const graph = await readFile(path.join(BUNDLE, "graphs", "Kit.symbols.json"), "utf8");
    const workspace = new DocumentationWorkspace(fixedScanner(["Kit.symbols.json"]), {
      createDataProvider: () => new InMemoryDataProvider({ "Kit.symbols.json": graph }),
    });
    const result = await workspace.load("/bundles/kit");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.bundleIdentifier).toBe("kit");
    const symbol = workspace.symbol("s:T");
    expect(symbol.ok && symbol.value.url).toBe("doc://kit/documentation/Kit/T");
    expect(symbol.ok && symbol.value.availability).toEqual([]);
  });
});
