// Loads and validates the bot configuration from the environment.

import cron from "node-cron";
import { z } from "zod";

const cronExpression = z
  .string()
  .refine((value) => cron.validate(value), { message: "Invalid cron expression" });

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const configSchema = z.object({
  DISCORD_BOT_TOKEN: z.string().min(1),
  DISCORD_PUBLIC_KEY: z.string().min(1),
  DISCORD_APPLICATION_ID: z.string().min(1),
  ADMIN_PASSWORD: z.string().min(1),
  REPORT_CHANNEL_ID: z.string().min(1),
  MEDAL_CHANNEL_ID: optionalString,
  PORT: z.coerce.number().int().positive().default(8080),
  TIME_ZONE: z
    .string()
    .default("Europe/Moscow")
    .refine((zone) => isValidTimeZone(zone), { message: "Unknown time zone" }),
  INGEST_SCHEDULE: cronExpression.default("*/5 * * * *"),
  INGEST_LOOKBACK_MINUTES: z.coerce.number().int().positive().default(60),
  MEDAL_SCHEDULE: cronExpression.default("0 20 * * *"),
  STORE_BACKEND: z.enum(["firestore", "memory"]).default("firestore"),
  GOOGLE_SHEET_ID: optionalString,
  GOOGLE_CREDENTIALS_PATH: z.string().default("credentials.json"),
  WORKSHEET_NAME: z.string().default("Sheet1"),
});

/**
 * Runtime configuration, passed explicitly to whatever needs it.
 */
export interface AppConfig {
  discord: {
    botToken: string;
    publicKey: string;
    applicationId: string;
    reportChannelId: string;   // Channel scanned for #отчет messages
    medalChannelId: string;    // Channel receiving the daily medal summary
  };
  adminPassword: string;
  port: number;
  timeZone: string;
  ingest: { schedule: string; lookbackMinutes: number };
  medalSchedule: string;
  storeBackend: "firestore" | "memory";
  sheet: { spreadsheetId: string; credentialsPath: string; worksheet: string } | null;
}

/**
 * Thrown when required environment variables are missing or malformed.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Reads the configuration from environment variables.
 * @param env Variables to read (defaults to process.env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const vars = parsed.data;
  return {
    discord: {
      botToken: vars.DISCORD_BOT_TOKEN,
      publicKey: vars.DISCORD_PUBLIC_KEY,
      applicationId: vars.DISCORD_APPLICATION_ID,
      reportChannelId: vars.REPORT_CHANNEL_ID,
      medalChannelId: vars.MEDAL_CHANNEL_ID ?? vars.REPORT_CHANNEL_ID,
    },
    adminPassword: vars.ADMIN_PASSWORD,
    port: vars.PORT,
    timeZone: vars.TIME_ZONE,
    ingest: { schedule: vars.INGEST_SCHEDULE, lookbackMinutes: vars.INGEST_LOOKBACK_MINUTES },
    medalSchedule: vars.MEDAL_SCHEDULE,
    storeBackend: vars.STORE_BACKEND,
    sheet: vars.GOOGLE_SHEET_ID
      ? {
          spreadsheetId: vars.GOOGLE_SHEET_ID,
          credentialsPath: vars.GOOGLE_CREDENTIALS_PATH,
          worksheet: vars.WORKSHEET_NAME,
        }
      : null,
  };
}

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}
