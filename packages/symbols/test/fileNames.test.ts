import { describe, it, expect } from "vitest";
import { isMainSymbolGraphFile, isSymbolGraphFile, moduleNameFor } from "../src/core/fileNames.js";

describe("moduleNameFor", () => {
  it("names the module of a main graph", () => {
    expect(moduleNameFor("/bundle/Kit.symbols.json")).toBe("Kit");
  });

  it("names the extended module of an extension graph", () => {
    expect(moduleNameFor("/bundle/Kit@Other.symbols.json")).toBe("Other");
  });

  it("names the first module of a cross-import overlay", () => {
    expect(moduleNameFor("/bundle/Kit@Other@_Kit_Other.symbols.json")).toBe("Kit");
  });

  it("parses names without the suffix as a whole", () => {
    expect(moduleNameFor("Kit.json")).toBe("Kit.json");
    expect(moduleNameFor("Kit@Other.json")).toBe("Other.json");
  });

  it("ignores empty components around a single @", () => {
    expect(moduleNameFor("@Kit.symbols.json")).toBe("Kit");
    expect(moduleNameFor("Kit@.symbols.json")).toBe("Kit");
  });

  it("returns undefined when no name remains", () => {
    expect(moduleNameFor(".symbols.json")).toBeUndefined();
    expect(moduleNameFor("/bundle/")).toBeUndefined();
    expect(moduleNameFor("@.symbols.json")).toBeUndefined();
  });
});

describe("file classification", () => {
  it("treats names without @ as main graphs", () => {
    expect(isMainSymbolGraphFile("dir@x/Kit.symbols.json")).toBe(true);
    expect(isMainSymbolGraphFile("Kit@Other.symbols.json")).toBe(false);
  });

  it("recognizes the suffix", () => {
    expect(isSymbolGraphFile("a/Kit.symbols.json")).toBe(true);
    expect(isSymbolGraphFile("a/Kit.json")).toBe(false);
  });
});
