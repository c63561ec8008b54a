import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { NotificationPayload } from "./format.js";

export const SLACK_API_BASE_URL = "https://slack.com/api";

const apiResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

export function createSlackHttp(): AxiosInstance {
  return axios.create({ baseURL: SLACK_API_BASE_URL, timeout: 20000 });
}

export class SlackNotifier {
  constructor(
    private readonly http: AxiosInstance,
    private readonly token: string,
    private readonly channel: string
  ) {}

  async deliver(payload: NotificationPayload): Promise<void> {
    const { data } = await this.http.post<unknown>(
      "/chat.postMessage",
      {
        channel: this.channel,
        text: payload.text,
        blocks: payload.blocks,
        unfurl_links: false,
        unfurl_media: false,
      },
      {
        headers: {
          Authorization: `Bearer ${this.token}`,
          "Content-Type": "application/json; charset=utf-8",
        },
      }
    );

    // Slack reports API errors in the body of a 200 response
    const parsed = apiResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error("Slack API returned an unexpected response");
    }
    if (!parsed.data.ok) {
      throw new Error(`Slack API error: ${parsed.data.error ?? "unknown_error"}`);
    }
  }
}
