import { describe, it, expect } from "vitest";
import {
  moduleReference,
  referenceURL,
  removingLastPathComponent,
  symbolPath,
  symbolReference,
  unresolvedReference,
} from "../src/core/references.js";

const bundle = { identifier: "com.example.kit", displayName: "Kit" };

describe("references", () => {
  it("joins path components", () => {
    expect(symbolPath(["Widget", "draw(in:)"])).toBe("Widget/draw(in:)");
  });

  it("replaces characters a URL path cannot hold", () => {
    expect(symbolPath(["Set", "<(_:_:)"])).toBe("Set/_(_:_:)");
    expect(symbolPath(["a b"])).toBe("a_b");
  });

  it("places symbols under their module", () => {
    const reference = symbolReference(bundle, "Kit", ["Widget", "draw()"], "swift");
    expect(referenceURL(reference)).toBe("doc://com.example.kit/documentation/Kit/Widget/draw()");
    expect(removingLastPathComponent(reference).path).toBe("/documentation/Kit/Widget");
    expect(symbolReference(bundle, "Kit", [], "swift")).toEqual(moduleReference(bundle, "Kit", "swift"));
  });

  it("stops removing components at the root", () => {
    const root = { bundleIdentifier: "com.example.kit", path: "/documentation", sourceLanguage: "swift" };
    expect(removingLastPathComponent(root)).toBe(root);
  });

  it("percent-encodes unresolved paths", () => {
    expect(unresolvedReference(bundle, "Other/a b")).toEqual({
      topicURL: "doc://com.example.kit/documentation/Other/a%20b",
    });
  });

  it("cannot make unresolved references from empty or unencodable paths", () => {
    expect(unresolvedReference(bundle, "")).toBeUndefined();
    expect(unresolvedReference(bundle, "\uD800")).toBeUndefined();
  });
});
