/**
 * ticketplan version - read dynamically from package.json
 */
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string(),
});

function findPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 10; i++) {
    try {
      const content = readFileSync(join(dir, "package.json"), "utf-8");
      const pkg = PackageJsonSchema.safeParse(JSON.parse(content));
      if (pkg.success && pkg.data.name === "ticketplan") return pkg.data.version;
    } catch {
      // Not found at this level, go up
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

export const VERSION: string = findPackageVersion();
