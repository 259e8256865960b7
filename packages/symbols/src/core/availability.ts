/**
 * Availability records and the bundle-level default availability they are completed from.
 */

import * as z from "zod/v4";
import type { AvailabilityItem } from "./model.js";
import { parseSemanticVersion, type SemanticVersion } from "./version.js";
import {
  fallbackPlatformOf,
  normalizePlatformName,
  type PlatformConfiguration,
} from "./platforms.js";

// ============================================================================
// Default availability configuration
// ============================================================================

export type ModuleAvailability =
  | { platformName: string; state: "available"; introducedVersion?: SemanticVersion }
  | { platformName: string; state: "unavailable" };

/** Module name → availability the module declares for each platform */
export type DefaultAvailability = Map<string, ModuleAvailability[]>;

const versionString = z
  .string()
  .refine((text) => {
    const parts = text.split(".");
    return parts.length >= 2 && parts.length <= 3 && parseSemanticVersion(text) !== undefined;
  }, "expected a version with two or three components, e.g. 13.0");

export const ModuleAvailabilitySchema = z.object({
  name: z.string().min(1),
  version: versionString.optional(),
  unavailable: z.boolean().optional(),
});

export const DefaultAvailabilitySchema = z.record(z.string(), z.array(ModuleAvailabilitySchema));

export type DefaultAvailabilityInput = z.infer<typeof DefaultAvailabilitySchema>;

/**
 * Build the default-availability table from validated configuration.
 *
 * Platforms that fall back on another platform are added when a module lists the platform they
 * inherit from but not the fallback platform itself (iOS 13 implies Mac Catalyst 13).
 */
export function createDefaultAvailability(
  input: DefaultAvailabilityInput,
  configuration: PlatformConfiguration
): DefaultAvailability {
  const table: DefaultAvailability = new Map();

  for (const [moduleName, entries] of Object.entries(input)) {
    const availabilities = entries.map((entry): ModuleAvailability => {
      const platformName = normalizePlatformName(configuration, entry.name);
      if (entry.unavailable) {
        return { platformName, state: "unavailable" };
      }
      const introducedVersion = entry.version === undefined ? undefined : parseSemanticVersion(entry.version);
      return introducedVersion
        ? { platformName, state: "available", introducedVersion }
        : { platformName, state: "available" };
    });

    for (const fallback of configuration.fallbacks) {
      if (availabilities.some((a) => a.platformName === fallback.platform)) continue;
      const inherited = availabilities.find((a) => a.platformName === fallback.inheritsFrom);
      if (inherited) {
        availabilities.push({ ...inherited, platformName: fallback.platform });
      }
    }

    table.set(moduleName, availabilities);
  }

  return table;
}

export function defaultVersionsByPlatform(availabilities: readonly ModuleAvailability[]): Map<string, SemanticVersion> {
  const versions = new Map<string, SemanticVersion>();
  for (const availability of availabilities) {
    if (availability.state === "available" && availability.introducedVersion) {
      versions.set(availability.platformName, availability.introducedVersion);
    }
  }
  return versions;
}

// ============================================================================
// Availability synthesis
// ============================================================================

export function availabilityItem(
  domain: string,
  fields: Partial<Omit<AvailabilityItem, "domain">> = {}
): AvailabilityItem {
  return {
    domain,
    isUnconditionallyDeprecated: false,
    isUnconditionallyUnavailable: false,
    ...fields,
  };
}

function hasDomain(items: readonly AvailabilityItem[], platform: string, configuration: PlatformConfiguration): boolean {
  return items.some(
    (item) => item.domain !== undefined && normalizePlatformName(configuration, item.domain) === platform
  );
}

/**
 * Give an item without an introduced version the default version of its platform, or of the
 * platform it falls back on. Items without a domain, unconditionally unavailable items and items
 * that already have a version are returned unchanged.
 */
export function fillingMissingIntroducedVersion(
  item: AvailabilityItem,
  defaultVersions: ReadonlyMap<string, SemanticVersion>,
  configuration: PlatformConfiguration
): AvailabilityItem {
  if (item.domain === undefined || item.isUnconditionallyUnavailable || item.introduced !== undefined) {
    return item;
  }
  const platform = normalizePlatformName(configuration, item.domain);
  const fallback = fallbackPlatformOf(configuration, platform);
  const introduced = defaultVersions.get(platform) ?? (fallback === undefined ? undefined : defaultVersions.get(fallback));
  return introduced ? { ...item, introduced } : item;
}

/**
 * Copy the record of the inherited platform to each fallback platform that no decoded graph
 * registered and that the symbol has no explicit record for.
 */
export function applyFallbackPlatforms(
  items: readonly AvailabilityItem[],
  registeredPlatforms: ReadonlySet<string>,
  configuration: PlatformConfiguration
): AvailabilityItem[] {
  const result = [...items];
  for (const fallback of configuration.fallbacks) {
    if (registeredPlatforms.has(fallback.platform)) continue;
    if (hasDomain(result, fallback.platform, configuration)) continue;
    const inherited = result.find(
      (item) => item.domain !== undefined && normalizePlatformName(configuration, item.domain) === fallback.inheritsFrom
    );
    if (inherited) {
      result.push({ ...inherited, domain: fallback.platform });
    }
  }
  return result;
}

/**
 * Add a record for every default platform the symbol says nothing about.
 */
export function applyDefaultAvailability(
  items: readonly AvailabilityItem[],
  defaults: readonly ModuleAvailability[],
  inheritVersions: boolean,
  configuration: PlatformConfiguration
): AvailabilityItem[] {
  const result = [...items];
  for (const availability of defaults) {
    if (hasDomain(result, availability.platformName, configuration)) continue;
    if (availability.state === "unavailable") {
      result.push(availabilityItem(availability.platformName, { isUnconditionallyUnavailable: true }));
    } else if (inheritVersions && availability.introducedVersion) {
      result.push(availabilityItem(availability.platformName, { introduced: availability.introducedVersion }));
    } else {
      result.push(availabilityItem(availability.platformName));
    }
  }
  return result;
}

export interface AvailabilityContext {
  defaults: readonly ModuleAvailability[];
  registeredPlatforms: ReadonlySet<string>;
  inheritDefaultAvailabilityVersions: boolean;
  configuration: PlatformConfiguration;
}

/**
 * Complete a symbol's availability: fill missing introduced versions, then fallback platforms,
 * then defaults for platforms still missing.
 */
export function synthesizeAvailability(
  items: readonly AvailabilityItem[],
  context: AvailabilityContext
): AvailabilityItem[] {
  const versions = defaultVersionsByPlatform(context.defaults);
  const filled = items.map((item) => fillingMissingIntroducedVersion(item, versions, context.configuration));
  const withFallbacks = applyFallbackPlatforms(filled, context.registeredPlatforms, context.configuration);
  return applyDefaultAvailability(
    withFallbacks,
    context.defaults,
    context.inheritDefaultAvailabilityVersions,
    context.configuration
  );
}
