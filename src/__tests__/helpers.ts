import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import type { AppMetadata, FetchOutcome } from "../types.js";

export function makeApp(appId: string, version: string, overrides: Partial<AppMetadata> = {}): AppMetadata {
  return {
    appId,
    name: `App ${appId}`,
    developer: `Dev ${appId}`,
    version,
    lastUpdated: new Date("2024-03-05T14:07:45Z"),
    url: `https://apps.example.com/${appId}`,
    ...overrides,
  };
}

export function ok(app: AppMetadata): FetchOutcome {
  return { ok: true, app };
}

export function failed(appId: string, message = "network down"): FetchOutcome {
  return { ok: false, appId, reason: "error", message };
}

/** Axios instance answered in-process by `handler` instead of the network. */
export function fakeHttp(handler: (config: InternalAxiosRequestConfig) => unknown): AxiosInstance {
  return axios.create({
    adapter: async (config) => ({
      data: handler(config),
      status: 200,
      statusText: "OK",
      headers: {},
      config,
    }),
  });
}
