import { readFileSync } from "node:fs";
import { z } from "zod";

const PackageSchema = z.object({ name: z.string(), version: z.string() });

const pkg = PackageSchema.parse(
  JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8"),
  ),
);

export const VERSION: string = pkg.version;
