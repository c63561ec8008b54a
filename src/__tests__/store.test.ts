import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { InMemoryVersionStore, JsonFileVersionStore } from "../store.js";

describe("JsonFileVersionStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "versions-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("loads an empty snapshot on the first run", async () => {
    const store = new JsonFileVersionStore(path.join(dir, "last_check.json"));
    expect(await store.load()).toEqual({});
  });

  it("round-trips a committed snapshot as indented JSON", async () => {
    const file = path.join(dir, "last_check.json");
    const store = new JsonFileVersionStore(file);

    await store.commit({ "544007664": "19.10.4", "389801252": "312.0" });

    expect(fs.readFileSync(file, "utf8")).toBe('{\n  "389801252": "312.0",\n  "544007664": "19.10.4"\n}');
    expect(await store.load()).toEqual({ "544007664": "19.10.4", "389801252": "312.0" });
  });

  it("creates missing parent directories and leaves no temp file behind", async () => {
    const file = path.join(dir, "nested", "data", "last_check.json");
    await new JsonFileVersionStore(file).commit({ A: "1" });

    expect(fs.readdirSync(path.dirname(file))).toEqual(["last_check.json"]);
  });

  it("removes its temp file when the write cannot be completed", async () => {
    const file = path.join(dir, "last_check.json");
    // a non-empty directory in the way makes the final rename fail
    fs.mkdirSync(file);
    fs.writeFileSync(path.join(file, "keep"), "", "utf8");

    await expect(new JsonFileVersionStore(file).commit({ A: "1" })).rejects.toThrow();
    expect(fs.readdirSync(dir)).toEqual(["last_check.json"]);
  });

  it("replaces the whole mapping on commit", async () => {
    const file = path.join(dir, "last_check.json");
    const store = new JsonFileVersionStore(file);
    await store.commit({ A: "1", B: "2" });
    await store.commit({ A: "3" });

    expect(await store.load()).toEqual({ A: "3" });
  });

  it("refuses to reset on a corrupt file", async () => {
    const file = path.join(dir, "last_check.json");
    fs.writeFileSync(file, "{not json", "utf8");

    await expect(new JsonFileVersionStore(file).load()).rejects.toThrow(`Failed to parse ${file}`);
  });

  it("rejects a file that is not a flat mapping", async () => {
    const file = path.join(dir, "last_check.json");
    fs.writeFileSync(file, JSON.stringify({ A: { version: "1" } }), "utf8");

    await expect(new JsonFileVersionStore(file).load()).rejects.toThrow(
      `Stored versions at ${file} are not a flat id -> version mapping`
    );
  });
});

describe("InMemoryVersionStore", () => {
  it("hands out copies of its snapshot", async () => {
    const store = new InMemoryVersionStore({ A: "1" });
    const loaded = await store.load();
    loaded.A = "2";

    expect(await store.load()).toEqual({ A: "1" });
    expect(store.commits).toBe(0);
  });
});
