import type { Result } from "@symgraph/core";

export interface BundleFiles {
  /** Symbol graph locations relative to the root, sorted */
  symbolGraphs: string[];
  /** Location of the configuration file, when there is one */
  configuration?: string;
}

/**
 * Port for discovering the files of a documentation bundle.
 */
export interface BundleScanner {
  scan(rootPath: string): Promise<Result<BundleFiles, Error>>;
}
