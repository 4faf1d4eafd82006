/**
 * Archive Writing Benchmarks
 *
 * Compares DocumentArchive against fflate's zipSync, both at DEFLATE level 6,
 * building the archive in memory.
 */

import { describe, bench } from "vitest";
import { zipSync } from "fflate";
import { DocumentArchive } from "../src/index.js";

interface Entry {
  fileName: string;
  content: Uint8Array;
}

/**
 * Create entries with compressible content (repeated text with random
 * bytes mixed in)
 */
function createFixtures(fileCount: number, fileSize: number): Entry[] {
  const pattern = new TextEncoder().encode(
    "The quick brown fox jumps over the lazy dog. "
  );
  const entries: Entry[] = [];
  for (let i = 0; i < fileCount; i++) {
    const content = new Uint8Array(fileSize);
    for (let j = 0; j < fileSize; j++) {
      content[j] = pattern[j % pattern.length];
    }
    crypto.getRandomValues(content.subarray(0, Math.min(256, fileSize)));
    entries.push({
      fileName: `file-${i.toString().padStart(6, "0")}.txt`,
      content,
    });
  }
  return entries;
}

function benchmarks({
  fileCount,
  fileSize,
  ...benchOptions
}: {
  fileCount: number;
  fileSize: number;
} & import("vitest").BenchOptions) {
  let entries: Entry[] | undefined;

  function setup() {
    entries ??= createFixtures(fileCount, fileSize);
  }

  bench(
    "DocumentArchive",
    () => {
      const archive = new DocumentArchive();
      for (const entry of entries ?? []) {
        archive.add(entry.fileName, entry.content);
      }
      archive.finalize();
    },
    { ...benchOptions, setup }
  );

  bench(
    "fflate zipSync",
    () => {
      const files: Record<string, Uint8Array> = {};
      for (const entry of entries ?? []) {
        files[entry.fileName] = entry.content;
      }
      zipSync(files, { level: 6 });
    },
    { ...benchOptions, setup }
  );
}

describe("Small files (10 × 10KB)", () => {
  benchmarks({ fileCount: 10, fileSize: 10 * 1024, iterations: 3, time: 500 });
});

describe("Medium files (100 × 100KB)", () => {
  benchmarks({
    fileCount: 100,
    fileSize: 100 * 1024,
    iterations: 3,
    time: 1000,
  });
});
