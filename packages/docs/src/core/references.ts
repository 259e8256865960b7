/**
 * Building and keying topic references.
 */

import type {
  DocumentationBundle,
  ResolvedTopicReference,
  TopicReference,
  UnresolvedTopicReference,
} from "./model.js";

export const DOCUMENTATION_ROOT = "/documentation";

// Everything outside the URL path character set.
const DISALLOWED_PATH_CHARACTERS = /[^A-Za-z0-9\-._~!$&'()*+,;=:@/]/gu;

/**
 * Join path components with `/`, replacing characters a URL path cannot hold with `_`.
 */
export function symbolPath(pathComponents: readonly string[]): string {
  return pathComponents.join("/").replace(DISALLOWED_PATH_CHARACTERS, "_");
}

export function moduleReference(
  bundle: DocumentationBundle,
  moduleName: string,
  sourceLanguage: string
): ResolvedTopicReference {
  return {
    bundleIdentifier: bundle.identifier,
    path: `${DOCUMENTATION_ROOT}/${symbolPath([moduleName])}`,
    sourceLanguage,
  };
}

export function symbolReference(
  bundle: DocumentationBundle,
  moduleName: string,
  pathComponents: readonly string[],
  sourceLanguage: string
): ResolvedTopicReference {
  const module = moduleReference(bundle, moduleName, sourceLanguage);
  return pathComponents.length === 0 ? module : { ...module, path: `${module.path}/${symbolPath(pathComponents)}` };
}

export function removingLastPathComponent(reference: ResolvedTopicReference): ResolvedTopicReference {
  const slash = reference.path.lastIndexOf("/");
  return slash <= 0 ? reference : { ...reference, path: reference.path.slice(0, slash) };
}

export function referenceURL(reference: ResolvedTopicReference): string {
  return `doc://${reference.bundleIdentifier}${reference.path}`;
}

/**
 * A reference to be resolved later, or undefined when `path` cannot form a URL.
 */
export function unresolvedReference(
  bundle: DocumentationBundle,
  path: string
): UnresolvedTopicReference | undefined {
  if (path.length === 0) return undefined;
  try {
    return { topicURL: `doc://${bundle.identifier}${DOCUMENTATION_ROOT}/${encodeURI(path)}` };
  } catch {
    // Lone surrogates have no encoding.
    return undefined;
  }
}

export function resolved(reference: ResolvedTopicReference): TopicReference {
  return { kind: "resolved", reference };
}

export function unresolved(reference: UnresolvedTopicReference): TopicReference {
  return { kind: "unresolved", reference };
}

export function topicReferenceKey(reference: TopicReference): string {
  return reference.kind === "resolved" ? referenceURL(reference.reference) : reference.reference.topicURL;
}
