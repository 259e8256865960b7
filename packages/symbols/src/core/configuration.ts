/**
 * Loader configuration as it is written in `symgraph.config.json`.
 */

import * as z from "zod/v4";
import { type Result, Ok, Err } from "@symgraph/core";
import { DefaultAvailabilitySchema, createDefaultAvailability, type DefaultAvailability } from "./availability.js";
import { createPlatformConfiguration, type PlatformConfiguration } from "./platforms.js";

export const CONFIG_FILE_NAME = "symgraph.config.json";

export const SymbolGraphConfigSchema = z.object({
  defaultAvailability: DefaultAvailabilitySchema.optional(),
  inheritDefaultAvailabilityVersions: z.boolean().optional(),
  workerCount: z.number().int().positive().optional(),
});

export type SymbolGraphConfigInput = z.infer<typeof SymbolGraphConfigSchema>;

export interface LoaderConfiguration {
  platforms: PlatformConfiguration;
  defaultAvailability: DefaultAvailability;
  inheritDefaultAvailabilityVersions: boolean;
  workerCount: number;
}

export const DEFAULT_WORKER_COUNT = 4;

export function resolveLoaderConfiguration(
  input: SymbolGraphConfigInput = {},
  platforms: PlatformConfiguration = createPlatformConfiguration()
): LoaderConfiguration {
  return {
    platforms,
    defaultAvailability: createDefaultAvailability(input.defaultAvailability ?? {}, platforms),
    inheritDefaultAvailabilityVersions: input.inheritDefaultAvailabilityVersions ?? true,
    workerCount: input.workerCount ?? DEFAULT_WORKER_COUNT,
  };
}

/**
 * Parse and validate configuration JSON.
 */
export function parseLoaderConfiguration(
  text: string,
  platforms?: PlatformConfiguration
): Result<LoaderConfiguration, Error> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Err(new Error(`${CONFIG_FILE_NAME}: malformed JSON: ${message}`));
  }

  const parsed = SymbolGraphConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return Err(new Error(`${CONFIG_FILE_NAME}: ${z.prettifyError(parsed.error)}`));
  }
  return Ok(resolveLoaderConfiguration(parsed.data, platforms));
}
