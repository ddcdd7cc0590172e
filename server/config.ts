import { isValidTimeZone } from "./validation";

export interface AppConfig {
  databaseUrl: string;
  port: number;
  apiKey: string | null;
  tickIntervalMs: number;
  deliveryTimeoutMs: number;
  backfillDays: number;
  skipCompletedPrompts: boolean;
  defaultTimezone: string;
  promptWebhookUrl: string | null;
  promptWebhookToken: string | null;
}

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw == null || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

function boolFromEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw == null || raw === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`${name} must be true or false, got "${raw}"`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) throw new Error("DATABASE_URL is required");

  const defaultTimezone = env.DEFAULT_TIMEZONE || "UTC";
  if (!isValidTimeZone(defaultTimezone)) {
    throw new Error(`DEFAULT_TIMEZONE is not a known time zone: "${defaultTimezone}"`);
  }

  const promptWebhookUrl = env.PROMPT_WEBHOOK_URL || null;
  if (promptWebhookUrl && !/^https?:\/\//.test(promptWebhookUrl)) {
    throw new Error(`PROMPT_WEBHOOK_URL must be an http(s) URL, got "${promptWebhookUrl}"`);
  }

  return {
    databaseUrl,
    port: intFromEnv(env, "PORT", 5000, 1),
    apiKey: env.API_KEY || null,
    tickIntervalMs: intFromEnv(env, "TICK_INTERVAL_MS", 60_000, 1000),
    deliveryTimeoutMs: intFromEnv(env, "DELIVERY_TIMEOUT_MS", 10_000, 100),
    backfillDays: intFromEnv(env, "BACKFILL_DAYS", 0, 0),
    skipCompletedPrompts: boolFromEnv(env, "SKIP_COMPLETED_PROMPTS", false),
    defaultTimezone,
    promptWebhookUrl,
    promptWebhookToken: env.PROMPT_WEBHOOK_TOKEN || null,
  };
}
