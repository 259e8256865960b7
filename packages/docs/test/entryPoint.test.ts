import { describe, it, expect } from "vitest";
import { access, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import * as z from "zod/v4";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PACKAGE_ROOT = path.join(__dirname, "..");

const ManifestSchema = z.object({ bin: z.record(z.string(), z.string()) });

describe("symgraph-docs entry point", () => {
  it("declares a launcher that starts the server module", async () => {
    const manifest = ManifestSchema.parse(JSON.parse(await readFile(path.join(PACKAGE_ROOT, "package.json"), "utf8")));
    expect(manifest.bin).toEqual({ "symgraph-docs": "./bin/symgraph-docs.mjs" });

    const launcherPath = path.join(PACKAGE_ROOT, "bin", "symgraph-docs.mjs");
    const launcher = await readFile(launcherPath, "utf8");
    expect(launcher.split("\n")[0]).toBe("#!/usr/bin/env node");
    expect(launcher).toContain('await import("../src/server.ts");');

    await expect(access(path.resolve(path.dirname(launcherPath), "../src/server.ts"))).resolves.toBeUndefined();
  });
});
