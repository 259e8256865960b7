import { describe, it, expect } from "vitest";
import {
  applyDefaultAvailability,
  applyFallbackPlatforms,
  availabilityItem,
  createDefaultAvailability,
  fillingMissingIntroducedVersion,
  synthesizeAvailability,
  DefaultAvailabilitySchema,
} from "../src/core/availability.js";
import {
  createPlatformConfiguration,
  displayNameOf,
  normalizePlatformName,
  platformNameOf,
} from "../src/core/platforms.js";
import { semanticVersion } from "../src/core/version.js";

const platforms = createPlatformConfiguration();

describe("platform names", () => {
  it("normalizes raw names, display names and aliases case-insensitively", () => {
    expect(normalizePlatformName(platforms, "macosx")).toBe("macOS");
    expect(normalizePlatformName(platforms, "IOS")).toBe("iOS");
    expect(normalizePlatformName(platforms, "Mac Catalyst")).toBe("macCatalyst");
    expect(normalizePlatformName(platforms, "Haiku")).toBe("Haiku");
  });

  it("maps the macabi environment to Mac Catalyst", () => {
    expect(platformNameOf(platforms, { operatingSystem: { name: "ios" }, environment: "macabi" })).toBe("macCatalyst");
    expect(platformNameOf(platforms, { operatingSystem: { name: "ios" } })).toBe("iOS");
    expect(platformNameOf(platforms, {})).toBeUndefined();
  });

  it("has display names", () => {
    expect(displayNameOf(platforms, "macCatalyst")).toBe("Mac Catalyst");
  });

  it("is immutable", () => {
    expect(Object.isFrozen(platforms)).toBe(true);
    expect(Object.isFrozen(platforms.fallbacks)).toBe(true);
  });
});

describe("createDefaultAvailability", () => {
  it("adds fallback platforms with the version of the platform they inherit from", () => {
    const table = createDefaultAvailability({ Kit: [{ name: "iOS", version: "13.0" }] }, platforms);
    expect(table.get("Kit")).toEqual([
      { platformName: "iOS", state: "available", introducedVersion: semanticVersion(13) },
      { platformName: "macCatalyst", state: "available", introducedVersion: semanticVersion(13) },
      { platformName: "iPadOS", state: "available", introducedVersion: semanticVersion(13) },
    ]);
  });

  it("keeps an explicit fallback platform entry", () => {
    const table = createDefaultAvailability(
      { Kit: [{ name: "iOS", version: "13.0" }, { name: "Mac Catalyst", version: "14.0" }] },
      platforms
    );
    expect(table.get("Kit")?.find((a) => a.platformName === "macCatalyst")).toEqual({
      platformName: "macCatalyst",
      state: "available",
      introducedVersion: semanticVersion(14),
    });
  });

  it("records unavailable platforms", () => {
    const table = createDefaultAvailability({ Kit: [{ name: "watchOS", unavailable: true }] }, platforms);
    expect(table.get("Kit")).toEqual([{ platformName: "watchOS", state: "unavailable" }]);
  });

  it("validates versions in configuration", () => {
    expect(DefaultAvailabilitySchema.safeParse({ Kit: [{ name: "iOS", version: "13" }] }).success).toBe(false);
    expect(DefaultAvailabilitySchema.safeParse({ Kit: [{ name: "iOS", version: "13.0.1" }] }).success).toBe(true);
  });
});

describe("fillingMissingIntroducedVersion", () => {
  const versions = new Map([["iOS", semanticVersion(10)]]);

  it("fills from the item's platform", () => {
    const filled = fillingMissingIntroducedVersion(availabilityItem("iOS"), versions, platforms);
    expect(filled.introduced).toEqual(semanticVersion(10));
  });

  it("fills from the fallback platform", () => {
    const filled = fillingMissingIntroducedVersion(availabilityItem("macCatalyst"), versions, platforms);
    expect(filled.introduced).toEqual(semanticVersion(10));
  });

  it("leaves versioned, unavailable and domain-less items alone", () => {
    const versioned = availabilityItem("iOS", { introduced: semanticVersion(12) });
    const unavailable = availabilityItem("iOS", { isUnconditionallyUnavailable: true });
    const anywhere = { isUnconditionallyDeprecated: true, isUnconditionallyUnavailable: false };
    expect(fillingMissingIntroducedVersion(versioned, versions, platforms)).toBe(versioned);
    expect(fillingMissingIntroducedVersion(unavailable, versions, platforms)).toBe(unavailable);
    expect(fillingMissingIntroducedVersion(anywhere, versions, platforms)).toBe(anywhere);
  });
});

describe("applyFallbackPlatforms", () => {
  const iOS = availabilityItem("iOS", {
    introduced: semanticVersion(13),
    deprecated: semanticVersion(15),
    message: "Use the new API",
  });

  it("copies the whole iOS record to Mac Catalyst and iPadOS", () => {
    const result = applyFallbackPlatforms([iOS], new Set(["iOS"]), platforms);
    expect(result).toEqual([iOS, { ...iOS, domain: "macCatalyst" }, { ...iOS, domain: "iPadOS" }]);
  });

  it("skips platforms some graph registered", () => {
    const result = applyFallbackPlatforms([iOS], new Set(["iOS", "macCatalyst"]), platforms);
    expect(result.map((item) => item.domain)).toEqual(["iOS", "iPadOS"]);
  });

  it("never overwrites an explicit record", () => {
    const catalyst = availabilityItem("macCatalyst", { introduced: semanticVersion(14) });
    const result = applyFallbackPlatforms([iOS, catalyst], new Set(), platforms);
    expect(result.filter((item) => item.domain === "macCatalyst")).toEqual([catalyst]);
  });
});

describe("applyDefaultAvailability", () => {
  const defaults = createDefaultAvailability(
    { Kit: [{ name: "macOS", version: "12.0" }, { name: "watchOS", unavailable: true }] },
    platforms
  ).get("Kit") ?? [];

  it("adds versioned records for missing platforms", () => {
    expect(applyDefaultAvailability([], defaults, true, platforms)).toEqual([
      availabilityItem("macOS", { introduced: semanticVersion(12) }),
      availabilityItem("watchOS", { isUnconditionallyUnavailable: true }),
    ]);
  });

  it("adds platform-only records when versions are not inherited", () => {
    expect(applyDefaultAvailability([], defaults, false, platforms)[0]).toEqual(availabilityItem("macOS"));
  });

  it("matches existing records through aliases", () => {
    const existing = availabilityItem("macosx", { introduced: semanticVersion(11) });
    const result = applyDefaultAvailability([existing], defaults, true, platforms);
    expect(result.map((item) => item.domain)).toEqual(["macosx", "watchOS"]);
  });
});

describe("synthesizeAvailability", () => {
  it("prefers the iOS record over the Mac Catalyst default", () => {
    const defaults = createDefaultAvailability({ Kit: [{ name: "iOS", version: "1.0" }] }, platforms).get("Kit") ?? [];
    const result = synthesizeAvailability([availabilityItem("iOS", { introduced: semanticVersion(10) })], {
      defaults,
      registeredPlatforms: new Set(["iOS"]),
      inheritDefaultAvailabilityVersions: true,
      configuration: platforms,
    });
    expect(result.map((item) => [item.domain, item.introduced?.major])).toEqual([
      ["iOS", 10],
      ["macCatalyst", 10],
      ["iPadOS", 10],
    ]);
  });
});
