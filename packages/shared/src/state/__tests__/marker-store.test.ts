import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createFileMarkerStore,
  createMemoryMarkerStore,
} from "../marker-store.js";

describe("createMemoryMarkerStore", () => {
  it("should start from the initial marker and keep the last save", async () => {
    const store = createMemoryMarkerStore("p0");
    expect(await store.load()).toBe("p0");

    await store.save("p1");
    expect(await store.load()).toBe("p1");
  });
});

describe("createFileMarkerStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "postwatch-marker-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should read a missing file as no marker", async () => {
    const store = createFileMarkerStore(join(dir, "last_processed.txt"));
    expect(await store.load()).toBeNull();
  });

  it("should read a blank file as no marker", async () => {
    const path = join(dir, "last_processed.txt");
    await writeFile(path, "\n");
    expect(await createFileMarkerStore(path).load()).toBeNull();
  });

  it("should write the marker as a single line, creating directories", async () => {
    const path = join(dir, "nested", "state", "last_processed.txt");
    const store = createFileMarkerStore(path);

    await store.save("https://example.substack.com/p/first-post");

    expect(await readFile(path, "utf8")).toBe(
      "https://example.substack.com/p/first-post\n",
    );
    expect(await createFileMarkerStore(path).load()).toBe(
      "https://example.substack.com/p/first-post",
    );
  });

  it("should surface errors other than a missing file", async () => {
    // A directory cannot be read as a file
    await expect(createFileMarkerStore(dir).load()).rejects.toThrow();
  });
});
