import { tmpdir } from "node:os";
import { join } from "node:path";
import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./utils/errors.js";

export interface ProcessingOptions {
  readonly maxPostLength: number;
  readonly skipLongPosts: boolean;
  readonly removeUrls: boolean;
  readonly removeHashtags: boolean;
  readonly removeMentions: boolean;
  readonly removeEmojis: boolean;
  readonly trimExtraSpaces: boolean;
  readonly prefix: string;
  readonly suffix: string;
}

/** OAuth 1.0a user-context credentials; posting on X requires all four. */
export interface TwitterCredentials {
  readonly appKey: string;
  readonly appSecret: string;
  readonly accessToken: string;
  readonly accessSecret: string;
}

export interface Config {
  readonly telegramBotToken: string;
  readonly sourceChannels: readonly number[];
  readonly logChannel: number;
  readonly twitter: TwitterCredentials;
  readonly processing: ProcessingOptions;
  readonly healthPort: number;
  /** Directory for media staged between download and re-upload */
  readonly mediaDir: string;
  readonly requestTimeoutMs: number;
}

const INTEGER = /^[+-]?\d+$/;

function required(name: string) {
  const message = `Environment variable ${name} is required but not set`;
  return z.string({ required_error: message }).min(1, message);
}

function flag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : value.toLowerCase() === "true"));
}

function text(fallback: string) {
  return z
    .string()
    .optional()
    .transform((value) => value ?? fallback);
}

function parseInteger(raw: string): number | undefined {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  return INTEGER.test(trimmed) && Number.isSafeInteger(value) ? value : undefined;
}

function integerIssue(ctx: z.RefinementCtx, name: string, message: string): never {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `Environment variable ${name} ${message}`,
  });
  return z.NEVER;
}

function integer(name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined) return fallback;
      const value = parseInteger(raw);
      if (value === undefined) {
        return integerIssue(ctx, name, `must be a decimal integer (got "${raw}")`);
      }
      if (value < min || value > max) {
        return integerIssue(ctx, name, `must be between ${min} and ${max} (got ${value})`);
      }
      return value;
    });
}

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: required("TELEGRAM_BOT_TOKEN"),
  SOURCE_CHANNELS: required("SOURCE_CHANNELS").transform((raw, ctx) => {
    const parts = raw
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    if (parts.length === 0) {
      return integerIssue(ctx, "SOURCE_CHANNELS", "must list at least one channel id");
    }
    const ids: number[] = [];
    for (const part of parts) {
      const id = parseInteger(part);
      if (id === undefined) {
        return integerIssue(ctx, "SOURCE_CHANNELS", `must be comma-separated integers (got "${part}")`);
      }
      ids.push(id);
    }
    return [...new Set(ids)];
  }),
  LOG_CHANNEL: required("LOG_CHANNEL").transform((raw, ctx) => {
    const id = parseInteger(raw);
    return id === undefined ? integerIssue(ctx, "LOG_CHANNEL", `must be a decimal integer (got "${raw}")`) : id;
  }),

  TWITTER_CONSUMER_KEY: required("TWITTER_CONSUMER_KEY"),
  TWITTER_CONSUMER_SECRET: required("TWITTER_CONSUMER_SECRET"),
  TWITTER_ACCESS_TOKEN: required("TWITTER_ACCESS_TOKEN"),
  TWITTER_ACCESS_SECRET: required("TWITTER_ACCESS_SECRET"),

  MAX_TWITTER_LENGTH: integer("MAX_TWITTER_LENGTH", 280, 1),
  SKIP_LONG_POSTS: flag(true),
  REMOVE_URLS: flag(true),
  REMOVE_HASHTAGS: flag(false),
  REMOVE_MENTIONS: flag(false),
  REMOVE_EMOJIS: flag(false),
  TRIM_EXTRA_SPACES: flag(true),
  ADD_PREFIX: text("📢 "),
  ADD_SUFFIX: text(""),

  HEALTH_PORT: integer("HEALTH_PORT", 8000, 1, 65535),
  MEDIA_DIR: text(join(tmpdir(), "channel-relay")),
  REQUEST_TIMEOUT_MS: integer("REQUEST_TIMEOUT_MS", 60_000, 1),
});

/**
 * Build the process-wide configuration from environment variables.
 * Throws ConfigError listing every missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const variables = [...new Set(result.error.issues.map((issue) => String(issue.path[0])))];
    const details = result.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError(details, variables);
  }

  const vars = result.data;
  return deepFreeze({
    telegramBotToken: vars.TELEGRAM_BOT_TOKEN,
    sourceChannels: vars.SOURCE_CHANNELS,
    logChannel: vars.LOG_CHANNEL,
    twitter: {
      appKey: vars.TWITTER_CONSUMER_KEY,
      appSecret: vars.TWITTER_CONSUMER_SECRET,
      accessToken: vars.TWITTER_ACCESS_TOKEN,
      accessSecret: vars.TWITTER_ACCESS_SECRET,
    },
    processing: {
      maxPostLength: vars.MAX_TWITTER_LENGTH,
      skipLongPosts: vars.SKIP_LONG_POSTS,
      removeUrls: vars.REMOVE_URLS,
      removeHashtags: vars.REMOVE_HASHTAGS,
      removeMentions: vars.REMOVE_MENTIONS,
      removeEmojis: vars.REMOVE_EMOJIS,
      trimExtraSpaces: vars.TRIM_EXTRA_SPACES,
      prefix: vars.ADD_PREFIX,
      suffix: vars.ADD_SUFFIX,
    },
    healthPort: vars.HEALTH_PORT,
    mediaDir: vars.MEDIA_DIR,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
  });
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === "object") {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
