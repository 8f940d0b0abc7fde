import { existsSync, readFileSync } from "node:fs";
import type { Logger } from "pino";
import { z } from "zod";
import { hash } from "./hashUtils.js";

const SampleEntrySchema = z.object({
  plaintext: z.string().min(1).max(128),
  description: z.string().default(""),
  difficulty: z.enum(["easy", "medium", "hard"]).default("medium"),
});

const SampleFileSchema = z.array(SampleEntrySchema);

/**
 * A precomputed synthetic digest offered as an attack target.
 * The plaintext itself is never exposed, only its length.
 */
export interface SampleDigest {
  digest: string;
  description: string;
  difficulty: "easy" | "medium" | "hard";
  length: number;
}

/**
 * Load sample plaintexts from a JSON file and hash them.
 * A missing file yields no samples.
 * @throws Error if the file exists but does not match the expected shape
 */
export function loadSamples(path: string, log: Logger): SampleDigest[] {
  if (!existsSync(path)) {
    log.warn({ path }, "Sample file not found, no sample digests loaded");
    return [];
  }

  const parsed = SampleFileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
  if (!parsed.success) {
    const errors = parsed.error.issues.map((err) => `${err.path.join(".")}: ${err.message}`);
    throw new Error(`Invalid sample file ${path}:\n${errors.join("\n")}`);
  }

  const samples = parsed.data.map((entry) => ({
    digest: hash(entry.plaintext),
    description: entry.description,
    difficulty: entry.difficulty,
    length: entry.plaintext.length,
  }));

  log.info({ path, count: samples.length }, "Loaded sample digests");
  return samples;
}
