import { config as loadDotenv } from "dotenv";
import { z } from "zod";

loadDotenv();

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Math.max(1, parseInt(v, 10) || parseInt(fallback, 10)));

export const configSchema = z.object({
  SLACK_BOT_TOKEN: z.string().min(10),
  SLACK_CHANNEL: z.string().min(1),
  CRON_SCHEDULE: z.string().default("0 * * * *"),
  TRACKED_APPS_FILE: z.string().default("./competitors.json"),
  TRACKED_APP_IDS: z
    .string()
    .optional()
    .transform((v) => (v ? v.split(",") : undefined)),
  CATALOG_COUNTRY: z.string().length(2).default("us"),
  FETCH_CONCURRENCY: positiveInt("3"),
  FETCH_TIMEOUT_MS: positiveInt("10000"),
  CYCLE_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((v) => {
      const ms = v ? parseInt(v, 10) : NaN;
      return ms > 0 ? ms : undefined;
    }),
  RELEASE_NOTES_MAX_LENGTH: positiveInt("500"),
  STATE_PATH: z.string().default("./data/last_check.json"),
  FIRESTORE_COLLECTION: z.string().default("app_monitor"),
  FIRESTORE_VERSIONS_DOC: z.string().default("last_check"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

// Settings the lookup command needs; no Slack credentials required
export const lookupConfigSchema = configSchema.pick({ CATALOG_COUNTRY: true, FETCH_TIMEOUT_MS: true });

export type LookupConfig = z.infer<typeof lookupConfigSchema>;

type Env = Record<string, string | undefined>;

function configError(error: z.ZodError): Error {
  // Show concise errors without secrets
  const errs = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
  return new Error(`Invalid configuration: ${errs}`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) throw configError(parsed.error);
  return parsed.data;
}

export function loadLookupConfig(env: Env = process.env): LookupConfig {
  const parsed = lookupConfigSchema.safeParse(env);
  if (!parsed.success) throw configError(parsed.error);
  return parsed.data;
}
