import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { AppMetadata, FetchOutcome } from "./types.js";
import { errorMessage, parseDate } from "./utils.js";

export const LOOKUP_BASE_URL = "https://itunes.apple.com";

const lookupResultSchema = z.object({
  trackName: z.string(),
  artistName: z.string(),
  version: z.string(),
  currentVersionReleaseDate: z.string().optional(),
  trackViewUrl: z.string(),
  releaseNotes: z.string().optional(),
});

const lookupResponseSchema = z.object({
  resultCount: z.number(),
  results: z.array(z.unknown()),
});

export function createCatalogHttp(timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL: LOOKUP_BASE_URL,
    timeout: timeoutMs,
    headers: {
      "User-Agent": "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36",
    },
  });
}

export class AppStoreCatalog {
  constructor(
    private readonly http: AxiosInstance,
    private readonly country: string = "us"
  ) {}

  async lookup(appId: string): Promise<FetchOutcome> {
    let body: unknown;
    try {
      const { data } = await this.http.get<unknown>("/lookup", {
        params: { id: appId, country: this.country },
      });
      body = data;
    } catch (err) {
      console.error(`[CATALOG] Error fetching app info for ${appId}:`, errorMessage(err));
      return { ok: false, appId, reason: "error", message: errorMessage(err) };
    }

    const response = lookupResponseSchema.safeParse(body);
    if (!response.success) {
      return { ok: false, appId, reason: "error", message: "malformed response" };
    }
    if (response.data.resultCount === 0 || response.data.results.length === 0) {
      console.warn(`[CATALOG] No app found with ID: ${appId}`);
      return { ok: false, appId, reason: "not_found", message: `no app found with id ${appId}` };
    }

    const result = lookupResultSchema.safeParse(response.data.results[0]);
    if (!result.success) {
      return { ok: false, appId, reason: "error", message: "malformed response" };
    }

    const entry = result.data;
    const app: AppMetadata = {
      appId,
      name: entry.trackName,
      developer: entry.artistName,
      version: entry.version,
      lastUpdated: parseDate(entry.currentVersionReleaseDate),
      url: entry.trackViewUrl,
      releaseNotes: entry.releaseNotes,
    };
    return { ok: true, app };
  }
}
