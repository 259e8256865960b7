import { readFile } from "node:fs/promises";
import path from "node:path";
import { type Result, Ok, Err } from "@symgraph/core";
import type { DataProvider } from "../core/ports/DataProvider.js";
import { DataProviderError } from "../core/errors.js";

/**
 * Reads symbol graphs from disk. Relative locations resolve against `basePath`.
 */
export class NodeDataProvider implements DataProvider {
  private readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath ?? process.cwd();
  }

  async contents(location: string): Promise<Result<Uint8Array | string, Error>> {
    const resolved = path.isAbsolute(location) ? location : path.resolve(this.basePath, location);
    try {
      return Ok(await readFile(resolved));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return Err(new DataProviderError(location, message));
    }
  }
}
