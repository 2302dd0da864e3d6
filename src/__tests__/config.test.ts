import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";
import { ConfigError } from "../utils/errors.js";

function baseEnv(): NodeJS.ProcessEnv {
  return {
    TELEGRAM_BOT_TOKEN: "test-token",
    SOURCE_CHANNELS: "-1001, -1002,,-1001",
    LOG_CHANNEL: "-1003",
    TWITTER_CONSUMER_KEY: "test-key",
    TWITTER_CONSUMER_SECRET: "test-secret",
    TWITTER_ACCESS_TOKEN: "test-access",
    TWITTER_ACCESS_SECRET: "test-access-secret",
  };
}

function captureError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected loadConfig to throw");
}

describe("loadConfig", () => {
  it("parses required values and applies defaults", () => {
    const config = loadConfig(baseEnv());

    expect(config.telegramBotToken).toBe("test-token");
    expect(config.sourceChannels).toEqual([-1001, -1002]);
    expect(config.logChannel).toBe(-1003);
    expect(config.twitter).toEqual({
      appKey: "test-key",
      appSecret: "test-secret",
      accessToken: "test-access",
      accessSecret: "test-access-secret",
    });
    expect(config.processing).toEqual({
      maxPostLength: 280,
      skipLongPosts: true,
      removeUrls: true,
      removeHashtags: false,
      removeMentions: false,
      removeEmojis: false,
      trimExtraSpaces: true,
      prefix: "📢 ",
      suffix: "",
    });
    expect(config.healthPort).toBe(8000);
    expect(config.requestTimeoutMs).toBe(60_000);
  });

  it("parses booleans case-insensitively", () => {
    const config = loadConfig({
      ...baseEnv(),
      REMOVE_HASHTAGS: "TRUE",
      REMOVE_MENTIONS: "True",
      SKIP_LONG_POSTS: "yes",
      REMOVE_URLS: "",
    });

    expect(config.processing.removeHashtags).toBe(true);
    expect(config.processing.removeMentions).toBe(true);
    expect(config.processing.skipLongPosts).toBe(false);
    expect(config.processing.removeUrls).toBe(false);
  });

  it("takes prefix, suffix and numbers from the environment", () => {
    const config = loadConfig({
      ...baseEnv(),
      ADD_PREFIX: "",
      ADD_SUFFIX: " via relay",
      MAX_TWITTER_LENGTH: "140",
      HEALTH_PORT: "9000",
      MEDIA_DIR: "/var/tmp/relay",
    });

    expect(config.processing.prefix).toBe("");
    expect(config.processing.suffix).toBe(" via relay");
    expect(config.processing.maxPostLength).toBe(140);
    expect(config.healthPort).toBe(9000);
    expect(config.mediaDir).toBe("/var/tmp/relay");
  });

  it("names a missing required variable", () => {
    const env = baseEnv();
    delete env.LOG_CHANNEL;

    const error = captureError(env);
    expect(error.message).toBe("Environment variable LOG_CHANNEL is required but not set");
    expect(error.variables).toEqual(["LOG_CHANNEL"]);
  });

  it("treats an empty required variable as missing", () => {
    const error = captureError({ ...baseEnv(), TELEGRAM_BOT_TOKEN: "" });
    expect(error.message).toBe("Environment variable TELEGRAM_BOT_TOKEN is required but not set");
  });

  it("reports every missing variable at once", () => {
    const env = baseEnv();
    delete env.TELEGRAM_BOT_TOKEN;
    delete env.TWITTER_ACCESS_SECRET;

    expect(captureError(env).variables).toEqual(["TELEGRAM_BOT_TOKEN", "TWITTER_ACCESS_SECRET"]);
  });

  it("rejects malformed integers", () => {
    expect(captureError({ ...baseEnv(), MAX_TWITTER_LENGTH: "abc" }).message).toBe(
      'Environment variable MAX_TWITTER_LENGTH must be a decimal integer (got "abc")',
    );
    expect(captureError({ ...baseEnv(), LOG_CHANNEL: "log" }).variables).toEqual(["LOG_CHANNEL"]);
    expect(captureError({ ...baseEnv(), SOURCE_CHANNELS: "-1001,abc" }).message).toBe(
      'Environment variable SOURCE_CHANNELS must be comma-separated integers (got "abc")',
    );
  });

  it("rejects out-of-range numbers", () => {
    expect(captureError({ ...baseEnv(), MAX_TWITTER_LENGTH: "0" }).message).toMatch(
      /^Environment variable MAX_TWITTER_LENGTH must be between 1 and/,
    );
    expect(captureError({ ...baseEnv(), HEALTH_PORT: "70000" }).message).toBe(
      "Environment variable HEALTH_PORT must be between 1 and 65535 (got 70000)",
    );
  });

  it("requires at least one source channel", () => {
    expect(captureError({ ...baseEnv(), SOURCE_CHANNELS: " , " }).message).toBe(
      "Environment variable SOURCE_CHANNELS must list at least one channel id",
    );
  });

  it("returns a frozen configuration", () => {
    const config = loadConfig(baseEnv());
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.processing)).toBe(true);
    expect(Object.isFrozen(config.sourceChannels)).toBe(true);
  });
});
