import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/errors.js";
import { loadEnv } from "../src/utils/env.js";

const required = { DISCORD_BOT_TOKEN: "test-token", OPENAI_API_KEY: "test-secret" };

describe("loadEnv", () => {
  it("fills defaults", () => {
    expect(loadEnv(required)).toEqual({
      DISCORD_BOT_TOKEN: "test-token",
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "https://openrouter.ai/api/v1",
      MODEL_THERAPIST: "google/gemini-2.5-flash",
      MODEL_SUPERVISOR: "deepseek/deepseek-chat",
      LLM_TIMEOUT_MS: 60000,
      MEMORY_ENABLED: true,
      MEMORY_DIR: "agent_memory",
      MEMORY_HISTORY_LIMIT: 10,
      MEMORY_LOCK_TIMEOUT_MS: 10000,
      TRANSCRIPT_CACHE_LIMIT: 10,
      PORT: 3001,
    });
  });

  it("reads overrides", () => {
    const env = loadEnv({ ...required, MEMORY_ENABLED: "false", PORT: "8080", MODEL_SUPERVISOR: "judge" });

    expect(env.MEMORY_ENABLED).toBe(false);
    expect(env.PORT).toBe(8080);
    expect(env.MODEL_SUPERVISOR).toBe("judge");
  });

  it("requires the bot token and API key", () => {
    expect(() => loadEnv({ OPENAI_API_KEY: "test-secret" })).toThrow(ConfigError);
    expect(() => loadEnv({ DISCORD_BOT_TOKEN: "test-token" })).toThrow("Missing OPENAI_API_KEY");
  });

  it("rejects malformed integers", () => {
    expect(() => loadEnv({ ...required, MEMORY_HISTORY_LIMIT: "ten" })).toThrow(
      'MEMORY_HISTORY_LIMIT must be a non-negative integer, got "ten"'
    );
    expect(() => loadEnv({ ...required, PORT: "-1" })).toThrow(ConfigError);
  });

  it("rejects integers with trailing text", () => {
    expect(() => loadEnv({ ...required, MEMORY_HISTORY_LIMIT: "10abc" })).toThrow(
      'MEMORY_HISTORY_LIMIT must be a non-negative integer, got "10abc"'
    );
    expect(() => loadEnv({ ...required, PORT: "80.5" })).toThrow(ConfigError);
  });

  it("requires positive timeouts", () => {
    expect(() => loadEnv({ ...required, MEMORY_LOCK_TIMEOUT_MS: "0" })).toThrow(
      'MEMORY_LOCK_TIMEOUT_MS must be an integer >= 1, got "0"'
    );
    expect(() => loadEnv({ ...required, LLM_TIMEOUT_MS: "0" })).toThrow(ConfigError);
    expect(loadEnv({ ...required, MEMORY_LOCK_TIMEOUT_MS: "250" }).MEMORY_LOCK_TIMEOUT_MS).toBe(250);
  });
});
