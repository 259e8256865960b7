/**
 * Semantic versions as they appear in symbol graphs and availability configuration.
 */

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export function semanticVersion(major: number, minor = 0, patch = 0): SemanticVersion {
  return { major, minor, patch };
}

/**
 * Parse "1", "1.2" or "1.2.3". Missing components are zero.
 * Returns undefined for anything else, including empty components and more than three.
 */
export function parseSemanticVersion(text: string): SemanticVersion | undefined {
  const components = text.trim().split(".");
  if (components.length < 1 || components.length > 3) return undefined;

  const numbers: number[] = [];
  for (const component of components) {
    if (!/^\d+$/.test(component)) return undefined;
    numbers.push(Number.parseInt(component, 10));
  }
  const [major, minor = 0, patch = 0] = numbers;
  return { major, minor, patch };
}

export function compareSemanticVersions(a: SemanticVersion, b: SemanticVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function formatSemanticVersion(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}
