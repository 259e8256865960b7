// Model
export type {
  AvailabilityItem,
  ConstraintKind,
  DeclarationFragment,
  DocComment,
  ExtensionInfo,
  GenericConstraint,
  GenericParameter,
  GenericsInfo,
  GraphMetadata,
  GraphModule,
  GraphSymbol,
  OperatingSystem,
  Platform,
  Relationship,
  RelationshipMixin,
  RelationshipMixins,
  Selector,
  SourceOrigin,
  SymbolGraph,
  SymbolIdentifier,
  SymbolKind,
  SymbolMixin,
  SymbolMixins,
  SymbolNames,
} from "./core/model.js";
export { RelationshipKind, selectorKey } from "./core/model.js";
export {
  availabilityOf,
  constraintsOf,
  declarationFragmentsOf,
  dedupeRelationships,
  extensionInfoOf,
  mixinName,
  relationshipKey,
  relationshipMixins,
  setMixin,
  sourceOriginOf,
} from "./core/mixins.js";
export { KindIdentifier, canonicalKind, extendedKindFor, kindOf, makeKind, maxAccessLevel } from "./core/kinds.js";

// Versions, platforms, availability
export type { SemanticVersion } from "./core/version.js";
export {
  compareSemanticVersions,
  formatSemanticVersion,
  parseSemanticVersion,
  semanticVersion,
} from "./core/version.js";
export type { PlatformConfiguration, PlatformDefinition, PlatformFallback } from "./core/platforms.js";
export {
  PlatformNames,
  createPlatformConfiguration,
  displayNameOf,
  fallbackPlatformOf,
  normalizePlatformName,
  platformNameOf,
} from "./core/platforms.js";
export type { AvailabilityContext, DefaultAvailability, ModuleAvailability } from "./core/availability.js";
export {
  applyDefaultAvailability,
  applyFallbackPlatforms,
  availabilityItem,
  createDefaultAvailability,
  fillingMissingIntroducedVersion,
  synthesizeAvailability,
} from "./core/availability.js";
export type { LoaderConfiguration, SymbolGraphConfigInput } from "./core/configuration.js";
export {
  CONFIG_FILE_NAME,
  SymbolGraphConfigSchema,
  DEFAULT_WORKER_COUNT,
  parseLoaderConfiguration,
  resolveLoaderConfiguration,
} from "./core/configuration.js";

// Wire format
export { decodeRelationship, decodeSymbol, encodeRelationship, encodeSymbol, encodeSymbolGraph } from "./core/codec.js";
export { isMainSymbolGraphFile, isSymbolGraphFile, moduleNameFor, SYMBOL_GRAPH_SUFFIX } from "./core/fileNames.js";
export {
  DataProviderError,
  InvalidSymbolReferencePathError,
  MixedExtensionFormatsError,
  SymbolGraphDecodingError,
} from "./core/errors.js";

// Services
export type { DecodeOptions } from "./core/services/ConcurrentDecoder.js";
export {
  DEFAULT_DECODER_BATCHES,
  decodeSymbolGraph,
  symbolToKeepInCaseOfPreciseIdentifierConflict,
} from "./core/services/ConcurrentDecoder.js";
export {
  EXTENDED_MODULE_ID_PREFIX,
  EXTENDED_TYPE_ID_PREFIX,
  transformExtensionBlockFormatToExtendedTypeFormat,
} from "./core/services/ExtendedTypeTransformation.js";
export type { SymbolView, UnifiedSymbol } from "./core/services/UnifiedSymbolGraph.js";
export { UnifiedSymbolGraph, primaryView, viewKind } from "./core/services/UnifiedSymbolGraph.js";
export type { CollectedGraphs, ExtensionGraphAssociation, GraphLocation } from "./core/services/GraphCollector.js";
export { GraphCollector } from "./core/services/GraphCollector.js";
export type { DecodingStrategy, LoadedSymbolGraphs, SymbolGraphLoaderOptions } from "./core/services/SymbolGraphLoader.js";
export { MIXED_EXTENSION_FORMATS, SymbolGraphLoader, decodingStrategyFor } from "./core/services/SymbolGraphLoader.js";

// Ports and adapters
export type { DataProvider } from "./core/ports/DataProvider.js";
export { NodeDataProvider } from "./infrastructure/NodeDataProvider.js";
export { InMemoryDataProvider } from "./infrastructure/InMemoryDataProvider.js";
