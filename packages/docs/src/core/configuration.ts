/**
 * Documentation settings: the loader options plus what the documentation build itself needs.
 */

import * as z from "zod/v4";
import { type Result, Ok, Err } from "@symgraph/core";
import {
  CONFIG_FILE_NAME,
  SymbolGraphConfigSchema,
  resolveLoaderConfiguration,
  type LoaderConfiguration,
} from "@symgraph/symbols";
import type { DocumentationBundle } from "./model.js";

export const DocsConfigSchema = SymbolGraphConfigSchema.extend({
  bundleIdentifier: z.string().min(1).optional(),
  displayName: z.string().min(1).optional(),
  inheritDocs: z.boolean().optional(),
});

export type DocsConfigInput = z.infer<typeof DocsConfigSchema>;

export interface DocsConfiguration {
  loader: LoaderConfiguration;
  bundle: DocumentationBundle;
  inheritDocs: boolean;
}

export function resolveDocsConfiguration(input: DocsConfigInput, bundleName: string): DocsConfiguration {
  return {
    loader: resolveLoaderConfiguration(input),
    bundle: {
      identifier: input.bundleIdentifier ?? bundleName,
      displayName: input.displayName ?? bundleName,
    },
    inheritDocs: input.inheritDocs ?? false,
  };
}

export function parseDocsConfiguration(text: string, bundleName: string): Result<DocsConfiguration, Error> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Err(new Error(`${CONFIG_FILE_NAME}: malformed JSON: ${message}`));
  }

  const parsed = DocsConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return Err(new Error(`${CONFIG_FILE_NAME}: ${z.prettifyError(parsed.error)}`));
  }
  return Ok(resolveDocsConfiguration(parsed.data, bundleName));
}
