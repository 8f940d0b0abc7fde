import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, it } from "vitest";
import { hash } from "./hashUtils.js";
import { log } from "./logger.js";
import { loadSamples } from "./samples.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "samples-test-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

it("hashes each sample and hides the plaintext", async () => {
  const path = join(tempDir, "samples.json");
  await writeFile(
    path,
    JSON.stringify([
      { plaintext: "sunshine", description: "Common word", difficulty: "easy" },
      { plaintext: "x9", description: "Short random" },
    ]),
  );

  expect(loadSamples(path, log)).toEqual([
    { digest: hash("sunshine"), description: "Common word", difficulty: "easy", length: 8 },
    { digest: hash("x9"), description: "Short random", difficulty: "medium", length: 2 },
  ]);
});

it("returns no samples when the file is missing", () => {
  expect(loadSamples(join(tempDir, "missing.json"), log)).toEqual([]);
});

it("rejects entries of the wrong shape", async () => {
  const path = join(tempDir, "samples.json");
  await writeFile(path, JSON.stringify([{ plaintext: "" }]));

  expect(() => loadSamples(path, log)).toThrow(`Invalid sample file ${path}`);
});

it("loads the bundled samples", () => {
  const samples = loadSamples("data/samples.json", log);

  expect(samples).toHaveLength(20);
  expect(samples[0]?.digest).toBe(hash("password"));
});
