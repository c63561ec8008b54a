import fs from "node:fs";
import { z } from "zod";
import { errorMessage } from "./utils.js";

const trackedAppsSchema = z.object({
  app_ids: z.array(z.union([z.string(), z.number().int().nonnegative()])),
});

function normalizeIds(ids: ReadonlyArray<string | number>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of ids) {
    const id = String(raw).trim();
    if (!id || seen.has(id)) continue;
    seen.add(id);
    result.push(id);
  }
  return result;
}

/**
 * Ordered, de-duplicated list of catalog ids to watch. Ids given inline (from
 * TRACKED_APP_IDS) win over the file.
 */
export function loadTrackedApps(filePath: string, inline?: readonly string[]): string[] {
  let ids: string[];

  if (inline) {
    ids = normalizeIds(inline);
  } else {
    if (!fs.existsSync(filePath)) {
      throw new Error(`Tracked apps file not found at: ${filePath}`);
    }
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
      throw new Error(`Failed to read tracked apps from ${filePath}: ${errorMessage(err)}`);
    }
    const parsed = trackedAppsSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Tracked apps file ${filePath} must look like { "app_ids": ["..."] }`);
    }
    ids = normalizeIds(parsed.data.app_ids);
  }

  if (ids.length === 0) {
    throw new Error("No apps to track. Set TRACKED_APP_IDS or add ids to the tracked apps file.");
  }
  return ids;
}
