import { glob } from "glob";
import { type Result, Ok, Err, toError } from "@symgraph/core";
import { CONFIG_FILE_NAME, SYMBOL_GRAPH_SUFFIX } from "@symgraph/symbols";
import type { BundleFiles, BundleScanner } from "../core/ports/BundleScanner.js";

const IGNORE = ["**/node_modules/**", "**/dist/**", "**/.git/**"];

/**
 * Finds symbol graphs anywhere under the root and the configuration file at the root.
 */
export class GlobBundleScanner implements BundleScanner {
  async scan(rootPath: string): Promise<Result<BundleFiles, Error>> {
    try {
      const symbolGraphs = await glob(`**/*${SYMBOL_GRAPH_SUFFIX}`, {
        cwd: rootPath,
        nodir: true,
        posix: true,
        ignore: IGNORE,
      });
      const configuration = await glob(CONFIG_FILE_NAME, { cwd: rootPath, nodir: true });

      return Ok({
        symbolGraphs: symbolGraphs.sort(),
        ...(configuration.length > 0 ? { configuration: configuration[0] } : {}),
      });
    } catch (error) {
      return Err(toError(error));
    }
  }
}
