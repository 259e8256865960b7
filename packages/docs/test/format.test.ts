import { describe, it, expect } from "vitest";
import { createDiagnostic } from "@symgraph/core";
import { formatAvailability, formatDiagnostics, formatRelationships, formatSymbol } from "../src/tools/format.js";

const reference = { bundleIdentifier: "com.example.kit", path: "/documentation/Kit/P", sourceLanguage: "swift" };

describe("formatAvailability", () => {
  it("lists the domain and versions", () => {
    expect(
      formatAvailability({
        domain: "iOS",
        introduced: { major: 13, minor: 0, patch: 0 },
        deprecated: { major: 15, minor: 2, patch: 0 },
        isUnconditionallyDeprecated: false,
        isUnconditionallyUnavailable: false,
      })
    ).toBe("iOS introduced 13.0.0 deprecated 15.2.0");
  });

  it("marks records without a domain", () => {
    expect(
      formatAvailability({ isUnconditionallyDeprecated: true, isUnconditionallyUnavailable: false })
    ).toBe("* deprecated");
  });
});

describe("formatSymbol", () => {
  it("renders the fields that are present", () => {
    const text = formatSymbol({
      identifier: "s:P.f",
      url: "doc://com.example.kit/documentation/Kit/P/f()",
      title: "f()",
      kind: "method",
      moduleName: "Kit",
      selectors: ["swift|macOS"],
      docComment: ["Draws."],
      availability: [],
      isRequired: false,
    });

    expect(text.split("\n")).toEqual([
      "## f()",
      "",
      "**Identifier:** s:P.f",
      "**Kind:** method",
      "**Module:** Kit",
      "**URL:** doc://com.example.kit/documentation/Kit/P/f()",
      "**Selectors:** swift|macOS",
      "**Required:** No",
      "",
      "Draws.",
    ]);
  });
});

describe("formatRelationships", () => {
  it("shows constraints and fallback names", () => {
    const text = formatRelationships({
      identifier: "s:T",
      title: "T",
      relationships: new Map([
        [
          "swift|macOS",
          {
            relationships: [
              {
                kind: "conformsTo" as const,
                target: { kind: "resolved" as const, reference },
                constraints: [{ kind: "sameType" as const, lhs: "Element", rhs: "Int" }],
              },
              {
                kind: "inheritsFrom" as const,
                target: { kind: "unresolved" as const, reference: { topicURL: "doc://com.example.kit/documentation/s:B" } },
              },
            ],
            targetFallbacks: new Map([["doc://com.example.kit/documentation/s:B", "Base"]]),
          },
        ],
      ]),
      defaultImplementations: new Map(),
      parents: [],
      children: [],
    });

    expect(text.split("\n")).toEqual([
      "## T",
      "",
      "### Relationships (swift|macOS)",
      "- conformsTo doc://com.example.kit/documentation/Kit/P where Element == Int",
      "- inheritsFrom Base (unresolved: doc://com.example.kit/documentation/s:B)",
    ]);
  });
});

describe("formatDiagnostics", () => {
  it("says when there is nothing to report", () => {
    expect(formatDiagnostics([])).toBe("No diagnostics.");
  });

  it("renders one line per diagnostic", () => {
    expect(formatDiagnostics([createDiagnostic("symgraph.Example", "warning", "Something happened")])).toBe(
      "warning: Something happened [symgraph.Example]"
    );
  });
});
