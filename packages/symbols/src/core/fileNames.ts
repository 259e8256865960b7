/**
 * Symbol graph file names.
 *
 * - `Kit.symbols.json`: main graph of `Kit`
 * - `Kit@Other.symbols.json`: extensions `Kit` makes to `Other`
 * - `Kit@Other@_Kit_Other.symbols.json`: cross-import overlay of `Kit` and `Other`
 */

export const SYMBOL_GRAPH_SUFFIX = ".symbols.json";

function baseName(location: string): string {
  const slash = Math.max(location.lastIndexOf("/"), location.lastIndexOf("\\"));
  return location.slice(slash + 1);
}

export function isSymbolGraphFile(location: string): boolean {
  return baseName(location).endsWith(SYMBOL_GRAPH_SUFFIX);
}

export function isMainSymbolGraphFile(location: string): boolean {
  return !baseName(location).includes("@");
}

/**
 * Module named by a symbol graph file name: the module of a main graph, the extended module of
 * an extension graph, the first module of a cross-import overlay.
 *
 * A name without the `.symbols.json` suffix is parsed as a whole. Returns undefined when no
 * non-empty module name remains.
 */
export function moduleNameFor(location: string): string | undefined {
  const name = baseName(location);
  const suffixIndex = name.indexOf(SYMBOL_GRAPH_SUFFIX);
  const fileName = suffixIndex === -1 ? name : name.slice(0, suffixIndex);

  const components = fileName.split("@");
  if (components.length > 2) {
    return components[0] || undefined;
  }
  const nonEmpty = components.filter((component) => component.length > 0);
  if (nonEmpty.length === 0) return undefined;
  // At most one "@": everything after it, or the whole name.
  return components.length === 2 && components[1].length > 0 ? components[1] : nonEmpty[nonEmpty.length - 1];
}
