import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadTrackedApps } from "../apps.js";

describe("loadTrackedApps", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "apps-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeApps(data: unknown): string {
    const file = path.join(dir, "competitors.json");
    fs.writeFileSync(file, JSON.stringify(data), "utf8");
    return file;
  }

  it("reads ids in file order, trimmed and de-duplicated", () => {
    const file = writeApps({ app_ids: ["300", 200, "300", " 100 ", ""] });
    expect(loadTrackedApps(file)).toEqual(["300", "200", "100"]);
  });

  it("prefers inline ids over the file", () => {
    const file = writeApps({ app_ids: ["1"] });
    expect(loadTrackedApps(file, ["7", " 8", "7"])).toEqual(["7", "8"]);
  });

  it("fails when the file is missing", () => {
    const file = path.join(dir, "missing.json");
    expect(() => loadTrackedApps(file)).toThrow(`Tracked apps file not found at: ${file}`);
  });

  it("fails on the wrong shape", () => {
    const file = writeApps(["1", "2"]);
    expect(() => loadTrackedApps(file)).toThrow(`Tracked apps file ${file} must look like`);
  });

  it("fails when there is nothing to track", () => {
    const file = writeApps({ app_ids: [] });
    expect(() => loadTrackedApps(file)).toThrow("No apps to track");
  });
});
