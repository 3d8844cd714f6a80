import { z } from "zod";
import { StartupConfigError } from "./errors";

const envSchema = z.object({
  BOT_TOKEN: z.string({ required_error: "BOT_TOKEN is missing" }).trim().min(1),
  DB_PATH: z.string().default("db.sqlite3"),
  TZ: z.string().default("Europe/Kyiv"),
  TOP_LIMIT: z.coerce.number().int().positive().default(10),
  WEBHOOK_URL: z.string().url().optional(),
  WEBHOOK_SECRET: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "only letters, digits, _ and - are allowed")
    .default("driver-ledger-secret"),
  PORT: z.coerce.number().int().positive().default(3000),
});

export interface AppConfig {
  botToken: string;
  dbPath: string;
  timeZone: string;
  topLimit: number;
  webhookUrl?: string;
  webhookSecret: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // an empty line in .env means "unset"
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value.trim() !== "",
    ),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new StartupConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    botToken: vars.BOT_TOKEN,
    dbPath: vars.DB_PATH,
    timeZone: vars.TZ,
    topLimit: vars.TOP_LIMIT,
    webhookUrl: vars.WEBHOOK_URL?.replace(/\/$/, ""),
    webhookSecret: vars.WEBHOOK_SECRET,
    port: vars.PORT,
  };
}
