import { config as loadEnv } from "dotenv";
import { z } from "zod";

const TRUTHY = new Set(["1", "true", "t", "yes", "y"]);

const schema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DB_PATH: z.string().min(1).default("./data/tastings.sqlite"),
  ADMIN_IDS: z.string().default(""),
  ANALYTICS_ENABLED: z.string().default("1"),
  APP_ENV: z.string().min(1).default("production"),
  TZ: z.string().min(1).default("Europe/Amsterdam"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  ALBUM_QUIET_MS: z.coerce.number().int().min(0).default(2000),
  MORE_THROTTLE_MS: z.coerce.number().int().min(0).default(1000)
});

export function parseAdminIds(raw: string): number[] {
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => /^\d+$/.test(item))
    .map(Number);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  if (env === process.env) {
    loadEnv();
  }

  const parsed = schema.parse(env);

  return {
    telegramToken: parsed.TELEGRAM_BOT_TOKEN,
    port: parsed.PORT,
    dbPath: parsed.DB_PATH,
    adminIds: parseAdminIds(parsed.ADMIN_IDS),
    analyticsEnabled: TRUTHY.has(parsed.ANALYTICS_ENABLED.trim().toLowerCase()),
    appEnv: parsed.APP_ENV,
    timeZone: parsed.TZ,
    logLevel: parsed.LOG_LEVEL,
    albumQuietMs: parsed.ALBUM_QUIET_MS,
    moreThrottleMs: parsed.MORE_THROTTLE_MS
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
