import type { Result } from "@symgraph/core";

/**
 * Port for reading symbol graph files.
 */
export interface DataProvider {
  /**
   * Raw contents of the file at `location`.
   */
  contents(location: string): Promise<Result<Uint8Array | string, Error>>;
}
