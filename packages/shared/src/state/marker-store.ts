import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { MarkerStore } from "../types.js";

/**
 * Keeps the marker for the lifetime of the process only.
 */
export function createMemoryMarkerStore(
  initial: string | null = null,
): MarkerStore {
  let marker = initial;
  return {
    async load() {
      return marker;
    },
    async save(identifier) {
      marker = identifier;
    },
  };
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

/**
 * Persists the marker as a single line in `path` so it survives restarts.
 * A missing or blank file reads as "nothing processed yet".
 */
export function createFileMarkerStore(path: string): MarkerStore {
  return {
    async load() {
      try {
        const contents = (await readFile(path, "utf8")).trim();
        return contents.length > 0 ? contents : null;
      } catch (err) {
        if (isMissingFile(err)) return null;
        throw err;
      }
    },
    async save(identifier) {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, identifier + "\n", "utf8");
    },
  };
}
