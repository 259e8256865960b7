/**
 * Markdown rendering of workspace answers for tool responses.
 */

import { formatDiagnostic, type Diagnostic } from "@symgraph/core";
import { formatSemanticVersion, type AvailabilityItem } from "@symgraph/symbols";
import type { RelationshipEntry, TopicReference } from "../core/model.js";
import { referenceURL } from "../core/references.js";
import type {
  ModuleSummary,
  SymbolDetails,
  SymbolRelationships,
  WorkspaceSummary,
} from "../core/services/DocumentationWorkspace.js";

function describeReference(reference: TopicReference, fallbacks?: ReadonlyMap<string, string>): string {
  if (reference.kind === "resolved") {
    return referenceURL(reference.reference);
  }
  const fallback = fallbacks?.get(reference.reference.topicURL);
  return fallback !== undefined
    ? `${fallback} (unresolved: ${reference.reference.topicURL})`
    : `${reference.reference.topicURL} (unresolved)`;
}

export function formatAvailability(item: AvailabilityItem): string {
  const parts = [item.domain ?? "*"];
  if (item.isUnconditionallyUnavailable) parts.push("unavailable");
  if (item.isUnconditionallyDeprecated) parts.push("deprecated");
  if (item.introduced) parts.push(`introduced ${formatSemanticVersion(item.introduced)}`);
  if (item.deprecated) parts.push(`deprecated ${formatSemanticVersion(item.deprecated)}`);
  if (item.obsoleted) parts.push(`obsoleted ${formatSemanticVersion(item.obsoleted)}`);
  return parts.join(" ");
}

export function formatLoadSummary(summary: WorkspaceSummary): string {
  return [
    `Loaded ${summary.files} symbol graph(s) from ${summary.rootPath}`,
    `Bundle: ${summary.bundleIdentifier}`,
    `Modules: ${summary.modules.join(", ")}`,
    `Symbols: ${summary.symbols}`,
    `Relationships: ${summary.relationships}`,
    `Decoding: ${summary.decodingStrategy}`,
    `Diagnostics: ${summary.diagnostics}`,
  ].join("\n");
}

export function formatModules(modules: readonly ModuleSummary[]): string {
  if (modules.length === 0) return "No modules.";
  const lines: string[] = [];
  for (const module of modules) {
    lines.push(`## ${module.name}`);
    lines.push(`${module.symbols} symbols, ${module.relationships} relationships (${module.orphanRelationships} orphaned)`);
    for (const graph of module.graphs) {
      lines.push(`- ${graph.kind}: ${graph.location}`);
    }
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

export function formatSymbol(details: SymbolDetails): string {
  const lines = [
    `## ${details.title}`,
    "",
    `**Identifier:** ${details.identifier}`,
    `**Kind:** ${details.kind}`,
    `**Module:** ${details.moduleName}`,
    `**URL:** ${details.url}`,
    `**Selectors:** ${details.selectors.join(", ")}`,
  ];
  if (details.isRequired !== undefined) {
    lines.push(`**Required:** ${details.isRequired ? "Yes" : "No"}`);
  }
  if (details.origin !== undefined) {
    lines.push(`**Inherited from:** ${details.origin}`);
  }
  if (details.availability.length > 0) {
    lines.push("", "### Availability", ...details.availability.map((item) => `- ${formatAvailability(item)}`));
  }
  if (details.docComment.length > 0) {
    lines.push("", ...details.docComment);
  }
  return lines.join("\n");
}

function formatEntry(entry: RelationshipEntry, fallbacks: ReadonlyMap<string, string>): string {
  const target = describeReference(entry.target, fallbacks);
  switch (entry.kind) {
    case "conformsTo":
    case "conformingType": {
      const where = entry.constraints.map((c) => `${c.lhs} ${c.kind === "sameType" ? "==" : ":"} ${c.rhs}`);
      return `- ${entry.kind} ${target}${where.length > 0 ? ` where ${where.join(", ")}` : ""}`;
    }
    case "inheritsFrom":
    case "inheritedBy":
      return `- ${entry.kind} ${target}`;
  }
}

export function formatRelationships(result: SymbolRelationships): string {
  const lines = [`## ${result.title}`, ""];

  for (const [selector, section] of [...result.relationships].sort(([a], [b]) => (a < b ? -1 : 1))) {
    lines.push(`### Relationships (${selector})`);
    lines.push(...section.relationships.map((entry) => formatEntry(entry, section.targetFallbacks)));
    lines.push("");
  }

  for (const [selector, section] of [...result.defaultImplementations].sort(([a], [b]) => (a < b ? -1 : 1))) {
    lines.push(`### Default implementations (${selector})`);
    for (const implementation of section.implementations) {
      const parent = implementation.parent !== undefined ? ` in ${implementation.parent}` : "";
      lines.push(`- ${describeReference(implementation.reference, section.targetFallbacks)}${parent}`);
    }
    lines.push("");
  }

  if (result.parents.length > 0) {
    lines.push("### Listed under", ...result.parents.map((node) => `- ${node.title} (${referenceURL(node.reference)})`), "");
  }
  if (result.children.length > 0) {
    lines.push(
      "### Topics",
      ...result.children.map((node) => `- ${node.title}${node.isOverloadGroup ? " [overload group]" : ""}`),
      ""
    );
  }

  return lines.join("\n").trimEnd();
}

export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string {
  if (diagnostics.length === 0) return "No diagnostics.";
  return diagnostics.map(formatDiagnostic).join("\n");
}
