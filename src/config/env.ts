import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../domain/errors.js";
import type { LogLevel } from "../utils/logger.js";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

const FALSY_FLAGS = new Set(["0", "false", "no", "off"]);

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const normalized = value?.trim().toLowerCase();
      if (!normalized) return fallback;
      return !FALSY_FLAGS.has(normalized);
    });

const requiredString = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]).default("info");

const monitorEnvSchema = z.object({
  TARGET_URL: requiredString("TARGET_URL").url("TARGET_URL must be an absolute URL").refine(
    (value) => /^https?:\/\//i.test(value),
    "TARGET_URL must use http or https",
  ),
  MATCH_KEYWORDS: requiredString("MATCH_KEYWORDS")
    .transform((value) =>
      value
        .split(",")
        .map((keyword) => keyword.trim())
        .filter(Boolean),
    )
    .refine((keywords) => keywords.length > 0, "MATCH_KEYWORDS must contain at least one phrase"),
  TELEGRAM_BOT_TOKEN: requiredString("TELEGRAM_BOT_TOKEN"),
  TELEGRAM_CHANNEL_ID: requiredString("TELEGRAM_CHANNEL_ID"),
  TELEGRAM_OWNER_CHAT_ID: requiredString("TELEGRAM_OWNER_CHAT_ID"),
  TELEGRAM_API_BASE_URL: z.string().url().default("https://api.telegram.org"),
  STATE_FILE: z.string().trim().min(1).default("state/state.json"),
  MONITORING_ENABLED: booleanFlag(true),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  ERROR_THROTTLE_MINUTES: z.coerce.number().int().min(0).default(60),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(500).default(30000),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().min(500).default(15000),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  LOG_LEVEL: logLevelSchema,
  DEBUG: booleanFlag(false),
});

const serverEnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  STATE_FILE: z.string().trim().min(1).default("state/state.json"),
  CORS_ORIGIN: z.string().default("*"),
  LOG_LEVEL: logLevelSchema,
});

export interface MonitorConfig {
  targetUrl: string;
  keywords: readonly string[];
  similarityThreshold: number;
  errorThrottleMinutes: number;
  monitoringEnabled: boolean;
  stateFile: string;
  requestTimeoutMs: number;
  notifyTimeoutMs: number;
  userAgent: string;
  logLevel: LogLevel;
  telegram: {
    botToken: string;
    channelId: string;
    ownerChatId: string;
    apiBaseUrl: string;
  };
}

export interface ServerConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  stateFile: string;
  corsOrigin: string;
  logLevel: LogLevel;
}

export type EnvSource = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.join(".");
    return key ? `${key}: ${issue.message}` : issue.message;
  });
}

function resolveStateFile(stateFile: string, cwd: string): string {
  return path.isAbsolute(stateFile) ? stateFile : path.resolve(cwd, stateFile);
}

/**
 * Builds the monitor configuration from an environment record. Called once at
 * start-up; the result is passed explicitly to everything that needs it.
 */
export function loadConfig(source: EnvSource = process.env, cwd: string = process.cwd()): MonitorConfig {
  const result = monitorEnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  const env = result.data;
  return Object.freeze({
    targetUrl: env.TARGET_URL,
    keywords: Object.freeze([...env.MATCH_KEYWORDS]),
    similarityThreshold: env.SIMILARITY_THRESHOLD,
    errorThrottleMinutes: env.ERROR_THROTTLE_MINUTES,
    monitoringEnabled: env.MONITORING_ENABLED,
    stateFile: resolveStateFile(env.STATE_FILE, cwd),
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    notifyTimeoutMs: env.NOTIFY_TIMEOUT_MS,
    userAgent: env.USER_AGENT,
    logLevel: env.DEBUG ? "debug" : env.LOG_LEVEL,
    telegram: Object.freeze({
      botToken: env.TELEGRAM_BOT_TOKEN,
      channelId: env.TELEGRAM_CHANNEL_ID,
      ownerChatId: env.TELEGRAM_OWNER_CHAT_ID,
      apiBaseUrl: env.TELEGRAM_API_BASE_URL,
    }),
  });
}

export function loadServerConfig(source: EnvSource = process.env, cwd: string = process.cwd()): ServerConfig {
  const result = serverEnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  const env = result.data;
  return Object.freeze({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    stateFile: resolveStateFile(env.STATE_FILE, cwd),
    corsOrigin: env.CORS_ORIGIN,
    logLevel: env.LOG_LEVEL,
  });
}
