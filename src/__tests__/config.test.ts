import path from "node:path";
import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("fills defaults and resolves paths against the base dir", () => {
    const config = loadConfig({ BOT_TOKEN: "test-token" }, "/srv/bot");
    expect(config.botToken).toBe("test-token");
    expect(config.botMode).toBe("polling");
    expect(config.port).toBe(5555);
    expect(config.ai.provider).toBe("auto");
    expect(config.ai.openaiModel).toBe("gpt-4o-mini");
    expect(config.paths.store).toBe(path.resolve("/srv/bot", "data/chat_configs.db"));
    expect(config.paths.prompts).toBe(path.resolve("/srv/bot", "data/prompts"));
    expect(config.maxMentionsPerChat).toBe(10);
    expect(config.bossId).toBeUndefined();
  });

  it("treats blank values as unset and accepts the Gemini key alias", () => {
    const config = loadConfig({ BOT_MODE: "", PORT: " ", AI_PROVIDER: "Gemini", GEMINI_API_KEY: "test-key" });
    expect(config.botMode).toBe("polling");
    expect(config.port).toBe(5555);
    expect(config.ai.provider).toBe("gemini");
    expect(config.ai.googleApiKey).toBe("test-key");
  });

  it("ignores a malformed BOSS_ID and parses a valid one", () => {
    expect(loadConfig({ BOSS_ID: "not-a-number" }).bossId).toBeUndefined();
    expect(loadConfig({ BOSS_ID: "12345" }).bossId).toBe(12345);
  });

  it("throws on malformed values", () => {
    expect(() => loadConfig({ BOT_MODE: "push" })).toThrow(/^Invalid environment: BOT_MODE/);
    expect(() => loadConfig({ MAX_MENTIONS_PER_CHAT: "0" })).toThrow(/MAX_MENTIONS_PER_CHAT/);
  });
});
