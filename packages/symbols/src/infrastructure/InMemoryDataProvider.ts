import { type Result, Ok, Err } from "@symgraph/core";
import type { DataProvider } from "../core/ports/DataProvider.js";
import { DataProviderError } from "../core/errors.js";

/**
 * Serves file contents from memory. Used by tests and by callers that already hold the data.
 */
export class InMemoryDataProvider implements DataProvider {
  private readonly files = new Map<string, Uint8Array | string>();

  constructor(files: Record<string, Uint8Array | string> = {}) {
    for (const [location, data] of Object.entries(files)) {
      this.files.set(location, data);
    }
  }

  set(location: string, data: Uint8Array | string): void {
    this.files.set(location, data);
  }

  get locations(): string[] {
    return [...this.files.keys()];
  }

  async contents(location: string): Promise<Result<Uint8Array | string, Error>> {
    const data = this.files.get(location);
    return data === undefined ? Err(new DataProviderError(location, "no such file")) : Ok(data);
  }
}
