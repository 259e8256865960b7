/**
 * Platform names and the fallback relationships between platforms.
 *
 * A {@link PlatformConfiguration} is built once and handed to whatever needs it.
 */

import type { Platform } from "./model.js";

export interface PlatformDefinition {
  /** Name used in availability domains and configuration */
  rawValue: string;
  displayName: string;
  aliases: readonly string[];
}

export interface PlatformFallback {
  /** Platform that borrows availability, e.g. `macCatalyst` */
  platform: string;
  /** Platform it borrows from, e.g. `iOS` */
  inheritsFrom: string;
}

export interface PlatformConfiguration {
  readonly platforms: readonly PlatformDefinition[];
  readonly fallbacks: readonly PlatformFallback[];
}

export const PlatformNames = {
  macOS: "macOS",
  iOS: "iOS",
  iPadOS: "iPadOS",
  macCatalyst: "macCatalyst",
  tvOS: "tvOS",
  watchOS: "watchOS",
  visionOS: "visionOS",
} as const;

const KNOWN_PLATFORMS: readonly PlatformDefinition[] = [
  { rawValue: "macOS", displayName: "macOS", aliases: ["macosx"] },
  { rawValue: "macOSAppExtension", displayName: "macOS App Extension", aliases: [] },
  { rawValue: "iOS", displayName: "iOS", aliases: [] },
  { rawValue: "iOSAppExtension", displayName: "iOS App Extension", aliases: [] },
  { rawValue: "watchOS", displayName: "watchOS", aliases: [] },
  { rawValue: "watchOSAppExtension", displayName: "watchOS App Extension", aliases: [] },
  { rawValue: "tvOS", displayName: "tvOS", aliases: [] },
  { rawValue: "tvOSAppExtension", displayName: "tvOS App Extension", aliases: [] },
  { rawValue: "linux", displayName: "Linux", aliases: [] },
  { rawValue: "macCatalyst", displayName: "Mac Catalyst", aliases: [] },
  { rawValue: "macCatalystAppExtension", displayName: "Mac Catalyst App Extension", aliases: [] },
  { rawValue: "swift", displayName: "Swift", aliases: [] },
  { rawValue: "iPadOS", displayName: "iPadOS", aliases: [] },
  { rawValue: "visionOS", displayName: "visionOS", aliases: ["xros"] },
];

const DEFAULT_FALLBACKS: readonly PlatformFallback[] = [
  { platform: PlatformNames.macCatalyst, inheritsFrom: PlatformNames.iOS },
  { platform: PlatformNames.iPadOS, inheritsFrom: PlatformNames.iOS },
];

export function createPlatformConfiguration(
  overrides: Partial<PlatformConfiguration> = {}
): PlatformConfiguration {
  return Object.freeze({
    platforms: Object.freeze([...(overrides.platforms ?? KNOWN_PLATFORMS)]),
    fallbacks: Object.freeze([...(overrides.fallbacks ?? DEFAULT_FALLBACKS)]),
  });
}

/**
 * Canonical raw name for `name`, matched case-insensitively against raw names, display names
 * and aliases. Unknown names are returned unchanged.
 */
export function normalizePlatformName(configuration: PlatformConfiguration, name: string): string {
  const needle = name.toLowerCase();
  const match = configuration.platforms.find(
    (platform) =>
      platform.rawValue.toLowerCase() === needle ||
      platform.displayName.toLowerCase() === needle ||
      platform.aliases.some((alias) => alias.toLowerCase() === needle)
  );
  return match?.rawValue ?? name;
}

export function displayNameOf(configuration: PlatformConfiguration, name: string): string {
  const rawValue = normalizePlatformName(configuration, name);
  return configuration.platforms.find((p) => p.rawValue === rawValue)?.displayName ?? name;
}

/**
 * The platform a graph was built for. `macabi` environments are Mac Catalyst.
 */
export function platformNameOf(configuration: PlatformConfiguration, platform: Platform): string | undefined {
  if (platform.environment === "macabi") {
    return PlatformNames.macCatalyst;
  }
  const name = platform.operatingSystem?.name;
  return name === undefined ? undefined : normalizePlatformName(configuration, name);
}

export function fallbackPlatformOf(configuration: PlatformConfiguration, name: string): string | undefined {
  const rawValue = normalizePlatformName(configuration, name);
  return configuration.fallbacks.find((fallback) => fallback.platform === rawValue)?.inheritsFrom;
}
