import { readFileSync } from "node:fs";
import { z } from "zod";

const PackageSchema = z.object({ version: z.string() });

let cached: string | undefined;

/** Version field of the package.json beside src/ and dist/. */
export function packageVersion(): string {
  if (cached === undefined) {
    const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
    cached = PackageSchema.parse(JSON.parse(raw)).version;
  }
  return cached;
}
