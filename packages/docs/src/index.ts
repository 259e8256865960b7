// Model
export type {
  DefaultImplementationsSection,
  DocumentationBundle,
  DocumentationNode,
  Implementation,
  NodeSemantic,
  RelationshipEntry,
  RelationshipsSection,
  ResolvedTopicReference,
  SymbolSemantic,
  TopicReference,
  UnresolvedTopicReference,
} from "./core/model.js";
export { symbolOf, titleOf } from "./core/model.js";
export {
  DOCUMENTATION_ROOT,
  moduleReference,
  referenceURL,
  removingLastPathComponent,
  resolved,
  symbolPath,
  symbolReference,
  topicReferenceKey,
  unresolved,
  unresolvedReference,
} from "./core/references.js";
export type { TopicGraphNode } from "./core/TopicGraph.js";
export { TopicGraph } from "./core/TopicGraph.js";
export { ExternalCache, LocalCache } from "./core/caches.js";
export type { DocsConfigInput, DocsConfiguration } from "./core/configuration.js";
export { DocsConfigSchema, parseDocsConfiguration, resolveDocsConfiguration } from "./core/configuration.js";

// Services
export type { RelationshipBuilderContext } from "./core/services/RelationshipsBuilder.js";
export {
  EXTENSION_CONSTRAINT_MISMATCH,
  INVALID_SYMBOL_IDENTIFIER,
  NodeProblem,
  SYMBOL_NODE_NOT_FOUND,
  addConformanceRelationship,
  addImplementationRelationship,
  addInheritanceRelationship,
  addInheritedDefaultImplementation,
  addOptionalRequirementRelationship,
  addOverloadRelationship,
  addProtocolExtensionMemberConstraint,
  addRequirementRelationship,
  documentedView,
  isDocCommentFromSameModule,
} from "./core/services/RelationshipsBuilder.js";
export type { DocumentationContextOptions } from "./core/services/DocumentationContext.js";
export { DocumentationContext } from "./core/services/DocumentationContext.js";
export type { RegistrationSummary } from "./core/services/SymbolRegistrar.js";
export { registerSymbols } from "./core/services/SymbolRegistrar.js";
export type {
  DocumentationWorkspaceOptions,
  ModuleSummary,
  SymbolDetails,
  SymbolRelationships,
  WorkspaceSummary,
} from "./core/services/DocumentationWorkspace.js";
export { DocumentationWorkspace } from "./core/services/DocumentationWorkspace.js";

// Ports and adapters
export type { BundleFiles, BundleScanner } from "./core/ports/BundleScanner.js";
export { GlobBundleScanner } from "./infrastructure/GlobBundleScanner.js";

// Tools
export type { Services } from "./tools/index.js";
export { registerAllTools } from "./tools/index.js";
