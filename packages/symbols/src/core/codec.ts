/**
 * Wire format of symbol graph documents.
 *
 * Known fields are validated with zod. Mixin keys are decoded into their typed variant, and
 * keys without a schema are carried as unknown mixins so that encoding writes them back.
 */

import * as z from "zod/v4";
import type {
  GraphMetadata,
  GraphModule,
  GraphSymbol,
  Relationship,
  RelationshipMixin,
  RelationshipMixins,
  SymbolGraph,
  SymbolMixin,
  SymbolMixins,
} from "./model.js";
import { mixinName } from "./mixins.js";
import { SymbolGraphDecodingError } from "./errors.js";
import type { SemanticVersion } from "./version.js";

// ============================================================================
// Schemas
// ============================================================================

const VersionSchema = z.object({
  major: z.number().int().nonnegative(),
  minor: z.number().int().nonnegative().optional(),
  patch: z.number().int().nonnegative().optional(),
});

const FragmentSchema = z.object({
  kind: z.string(),
  spelling: z.string(),
  preciseIdentifier: z.string().optional(),
});

const ConstraintSchema = z.object({
  kind: z.enum(["conformance", "superclass", "sameType"]),
  lhs: z.string(),
  rhs: z.string(),
  rhsPrecise: z.string().optional(),
});

const AvailabilityItemSchema = z.object({
  domain: z.string().optional(),
  introduced: VersionSchema.optional(),
  deprecated: VersionSchema.optional(),
  obsoleted: VersionSchema.optional(),
  message: z.string().optional(),
  renamed: z.string().optional(),
  isUnconditionallyDeprecated: z.boolean().optional(),
  isUnconditionallyUnavailable: z.boolean().optional(),
});

const GenericsSchema = z.object({
  parameters: z
    .array(z.object({ name: z.string(), index: z.number().int(), depth: z.number().int() }))
    .optional(),
  constraints: z.array(ConstraintSchema).optional(),
});

const ExtensionSchema = z.object({
  extendedModule: z.string(),
  typeKind: z.string().optional(),
  constraints: z.array(ConstraintSchema).optional(),
});

const SymbolSchema = z.looseObject({
  kind: z.object({ identifier: z.string(), displayName: z.string() }),
  identifier: z.object({ precise: z.string().min(1), interfaceLanguage: z.string() }),
  pathComponents: z.array(z.string()),
  names: z.object({
    title: z.string(),
    navigator: z.array(FragmentSchema).optional(),
    subHeading: z.array(FragmentSchema).optional(),
  }),
  docComment: z
    .object({
      lines: z.array(z.looseObject({ text: z.string() })),
      module: z.string().optional(),
    })
    .optional(),
  accessLevel: z.string(),
});

const RelationshipSchema = z.looseObject({
  source: z.string(),
  target: z.string(),
  kind: z.string(),
  targetFallback: z.string().optional(),
});

const ModuleSchema = z.object({
  name: z.string(),
  platform: z.object({
    architecture: z.string().optional(),
    vendor: z.string().optional(),
    operatingSystem: z
      .object({ name: z.string(), minimumVersion: VersionSchema.optional() })
      .optional(),
    environment: z.string().optional(),
  }),
  bystanders: z.array(z.string()).optional(),
});

const MetadataSchema = z.object({
  formatVersion: VersionSchema,
  generator: z.string(),
});

/** Top level; symbols stay raw until a worker decodes them */
export const DocumentSchema = z.object({
  metadata: MetadataSchema,
  module: ModuleSchema,
  symbols: z.array(z.unknown()),
  relationships: z.array(z.unknown()),
});

export type RawDocument = z.infer<typeof DocumentSchema>;

const SYMBOL_FIELDS = new Set(["kind", "identifier", "pathComponents", "names", "docComment", "accessLevel"]);
const RELATIONSHIP_FIELDS = new Set(["source", "target", "kind", "targetFallback"]);

// ============================================================================
// Decoding
// ============================================================================

function parseOrThrow<T>(schema: z.ZodType<T>, value: unknown, location: string, path: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const issuePath = issue ? [path, ...issue.path.map(String)].filter(Boolean).join(".") : path;
    throw new SymbolGraphDecodingError(location, issue?.message ?? "invalid value", issuePath);
  }
  return result.data;
}

function version(raw: z.infer<typeof VersionSchema>): SemanticVersion {
  return { major: raw.major, minor: raw.minor ?? 0, patch: raw.patch ?? 0 };
}

function optionalVersion(raw: z.infer<typeof VersionSchema> | undefined): SemanticVersion | undefined {
  return raw === undefined ? undefined : version(raw);
}

function decodeSymbolMixin(name: string, raw: unknown, location: string, path: string): SymbolMixin {
  switch (name) {
    case "availability": {
      const items = parseOrThrow(z.array(AvailabilityItemSchema), raw, location, path);
      return {
        key: "availability",
        items: items.map((item) => ({
          ...(item.domain !== undefined ? { domain: item.domain } : {}),
          ...(item.introduced ? { introduced: version(item.introduced) } : {}),
          ...(item.deprecated ? { deprecated: version(item.deprecated) } : {}),
          ...(item.obsoleted ? { obsoleted: version(item.obsoleted) } : {}),
          ...(item.message !== undefined ? { message: item.message } : {}),
          ...(item.renamed !== undefined ? { renamed: item.renamed } : {}),
          isUnconditionallyDeprecated: item.isUnconditionallyDeprecated ?? false,
          isUnconditionallyUnavailable: item.isUnconditionallyUnavailable ?? false,
        })),
      };
    }
    case "declarationFragments":
      return { key: "declarationFragments", fragments: parseOrThrow(z.array(FragmentSchema), raw, location, path) };
    case "swiftGenerics": {
      const generics = parseOrThrow(GenericsSchema, raw, location, path);
      return {
        key: "swiftGenerics",
        generics: { parameters: generics.parameters ?? [], constraints: generics.constraints ?? [] },
      };
    }
    case "swiftExtension": {
      const extension = parseOrThrow(ExtensionSchema, raw, location, path);
      return {
        key: "swiftExtension",
        extension: {
          extendedModule: extension.extendedModule,
          ...(extension.typeKind !== undefined ? { typeKind: extension.typeKind } : {}),
          constraints: extension.constraints ?? [],
        },
      };
    }
    default:
      return { key: "unknown", name, raw };
  }
}

function decodeRelationshipMixin(name: string, raw: unknown, location: string, path: string): RelationshipMixin {
  switch (name) {
    case "swiftConstraints":
      return { key: "swiftConstraints", constraints: parseOrThrow(z.array(ConstraintSchema), raw, location, path) };
    case "sourceOrigin":
      return {
        key: "sourceOrigin",
        origin: parseOrThrow(z.object({ identifier: z.string(), displayName: z.string() }), raw, location, path),
      };
    default:
      return { key: "unknown", name, raw };
  }
}

export function decodeSymbol(raw: unknown, location: string, path: string): GraphSymbol {
  const parsed = parseOrThrow(SymbolSchema, raw, location, path);

  const mixins: SymbolMixins = new Map();
  for (const [name, value] of Object.entries(parsed)) {
    if (SYMBOL_FIELDS.has(name)) continue;
    const mixin = decodeSymbolMixin(name, value, location, `${path}.${name}`);
    mixins.set(mixinName(mixin), mixin);
  }

  const symbol: GraphSymbol = {
    identifier: { precise: parsed.identifier.precise, interfaceLanguage: parsed.identifier.interfaceLanguage },
    kind: { identifier: parsed.kind.identifier, displayName: parsed.kind.displayName },
    pathComponents: [...parsed.pathComponents],
    names: {
      title: parsed.names.title,
      ...(parsed.names.navigator ? { navigator: parsed.names.navigator } : {}),
      ...(parsed.names.subHeading ? { subHeading: parsed.names.subHeading } : {}),
    },
    accessLevel: parsed.accessLevel,
    mixins,
  };
  if (parsed.docComment) {
    symbol.docComment = {
      lines: parsed.docComment.lines.map((line) => ({ text: line.text })),
      ...(parsed.docComment.module !== undefined ? { moduleName: parsed.docComment.module } : {}),
    };
  }
  return symbol;
}

export function decodeRelationship(raw: unknown, location: string, path: string): Relationship {
  const parsed = parseOrThrow(RelationshipSchema, raw, location, path);

  const mixins: RelationshipMixins = new Map();
  for (const [name, value] of Object.entries(parsed)) {
    if (RELATIONSHIP_FIELDS.has(name)) continue;
    const mixin = decodeRelationshipMixin(name, value, location, `${path}.${name}`);
    mixins.set(mixinName(mixin), mixin);
  }

  return {
    source: parsed.source,
    target: parsed.target,
    kind: parsed.kind,
    ...(parsed.targetFallback !== undefined ? { targetFallback: parsed.targetFallback } : {}),
    mixins,
  };
}

export function decodeDocument(raw: unknown, location: string): RawDocument {
  return parseOrThrow(DocumentSchema, raw, location, "");
}

export function decodeModule(document: RawDocument): GraphModule {
  const { name, platform, bystanders } = document.module;
  const operatingSystem = platform.operatingSystem
    ? {
        name: platform.operatingSystem.name,
        ...(platform.operatingSystem.minimumVersion
          ? { minimumVersion: version(platform.operatingSystem.minimumVersion) }
          : {}),
      }
    : undefined;
  return {
    name,
    platform: {
      ...(platform.architecture !== undefined ? { architecture: platform.architecture } : {}),
      ...(platform.vendor !== undefined ? { vendor: platform.vendor } : {}),
      ...(operatingSystem ? { operatingSystem } : {}),
      ...(platform.environment !== undefined ? { environment: platform.environment } : {}),
    },
    ...(bystanders ? { bystanders } : {}),
  };
}

export function decodeMetadata(document: RawDocument): GraphMetadata {
  return {
    formatVersion: version(document.metadata.formatVersion),
    generator: document.metadata.generator,
  };
}

export function parseJSON(data: string | Uint8Array, location: string): unknown {
  const text = typeof data === "string" ? data : new TextDecoder().decode(data);
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SymbolGraphDecodingError(location, `malformed JSON: ${message}`);
  }
}

// ============================================================================
// Encoding
// ============================================================================

function encodeMixinValue(mixin: SymbolMixin | RelationshipMixin): unknown {
  switch (mixin.key) {
    case "availability":
      return mixin.items;
    case "declarationFragments":
      return mixin.fragments;
    case "swiftGenerics":
      return mixin.generics;
    case "swiftExtension":
      return mixin.extension;
    case "swiftConstraints":
      return mixin.constraints;
    case "sourceOrigin":
      return mixin.origin;
    case "unknown":
      return mixin.raw;
  }
}

function encodeMixins(mixins: Map<string, SymbolMixin | RelationshipMixin>): Record<string, unknown> {
  const encoded: Record<string, unknown> = {};
  for (const name of [...mixins.keys()].sort()) {
    const mixin = mixins.get(name);
    if (mixin) encoded[name] = encodeMixinValue(mixin);
  }
  return encoded;
}

export function encodeSymbol(symbol: GraphSymbol): Record<string, unknown> {
  return {
    kind: symbol.kind,
    identifier: symbol.identifier,
    pathComponents: symbol.pathComponents,
    names: symbol.names,
    ...(symbol.docComment
      ? {
          docComment: {
            lines: symbol.docComment.lines,
            ...(symbol.docComment.moduleName !== undefined ? { module: symbol.docComment.moduleName } : {}),
          },
        }
      : {}),
    accessLevel: symbol.accessLevel,
    ...encodeMixins(symbol.mixins),
  };
}

export function encodeRelationship(relationship: Relationship): Record<string, unknown> {
  return {
    source: relationship.source,
    target: relationship.target,
    kind: relationship.kind,
    ...(relationship.targetFallback !== undefined ? { targetFallback: relationship.targetFallback } : {}),
    ...encodeMixins(relationship.mixins),
  };
}

export function encodeSymbolGraph(graph: SymbolGraph): Record<string, unknown> {
  return {
    metadata: graph.metadata,
    module: graph.module,
    symbols: [...graph.symbols.values()].map(encodeSymbol),
    relationships: graph.relationships.map(encodeRelationship),
  };
}
