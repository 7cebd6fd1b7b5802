import { describe, expect, it } from "vitest";
import { loadConfig, requireTelegramTarget } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ GITHUB_TOKEN: "test-token" });
    expect(config).toEqual({
      GITHUB_TOKEN: "test-token",
      GITHUB_API_URL: "https://api.github.com",
      REPO_HERALD_CONFIG: "./repo-herald.yaml",
      LOG_LEVEL: "info",
    });
  });

  it("parses the fetch concurrency", () => {
    expect(loadConfig({ GITHUB_TOKEN: "test-token", FETCH_CONCURRENCY: "8" }).FETCH_CONCURRENCY).toBe(8);
  });

  it("rejects an out-of-range fetch concurrency", () => {
    expect(() => loadConfig({ GITHUB_TOKEN: "test-token", FETCH_CONCURRENCY: "0" })).toThrow(
      /FETCH_CONCURRENCY/,
    );
  });

  it("requires a GitHub token", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow("  - GITHUB_TOKEN: GITHUB_TOKEN is required");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ GITHUB_TOKEN: "test-token", LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });
});

describe("requireTelegramTarget", () => {
  it("returns the bot token and chat id", () => {
    const config = loadConfig({
      GITHUB_TOKEN: "test-token",
      TELEGRAM_BOT_TOKEN: "test-bot-token",
      TELEGRAM_CHAT_ID: "-100123",
    });
    expect(requireTelegramTarget(config)).toEqual({ botToken: "test-bot-token", chatId: "-100123" });
  });

  it("fails when the chat id is missing", () => {
    const config = loadConfig({ GITHUB_TOKEN: "test-token", TELEGRAM_BOT_TOKEN: "test-bot-token" });
    expect(() => requireTelegramTarget(config)).toThrow(ConfigError);
  });
});
