//--------------------------------------------------------------
// Environment loader – typed and safe
//--------------------------------------------------------------

import dotenv from "dotenv";
import { ConfigError } from "../errors.js";
dotenv.config();

export interface EnvConfig {
  DISCORD_BOT_TOKEN: string;
  OPENAI_API_KEY: string;
  OPENAI_BASE_URL: string;
  MODEL_THERAPIST: string;
  MODEL_SUPERVISOR: string;
  LLM_TIMEOUT_MS: number;
  MEMORY_ENABLED: boolean;
  MEMORY_DIR: string;
  MEMORY_HISTORY_LIMIT: number;
  MEMORY_LOCK_TIMEOUT_MS: number;
  TRANSCRIPT_CACHE_LIMIT: number;
  PORT: number;
}

type EnvSource = Record<string, string | undefined>;

function readInt(source: EnvSource, key: string, fallback: number, min = 0): number {
  const raw = source[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    const kind = min > 0 ? `an integer >= ${min}` : "a non-negative integer";
    throw new ConfigError(`${key} must be ${kind}, got "${raw}"`);
  }
  return value;
}

function readBool(source: EnvSource, key: string, fallback: boolean): boolean {
  const raw = source[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === "true" || raw === "1" || raw === "yes";
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const { DISCORD_BOT_TOKEN, OPENAI_API_KEY } = source;

  if (!DISCORD_BOT_TOKEN) throw new ConfigError("Missing DISCORD_BOT_TOKEN");
  if (!OPENAI_API_KEY) throw new ConfigError("Missing OPENAI_API_KEY");

  return {
    DISCORD_BOT_TOKEN,
    OPENAI_API_KEY,
    OPENAI_BASE_URL: source.OPENAI_BASE_URL || "https://openrouter.ai/api/v1",

    MODEL_THERAPIST: source.MODEL_THERAPIST || "google/gemini-2.5-flash",
    MODEL_SUPERVISOR: source.MODEL_SUPERVISOR || "deepseek/deepseek-chat",
    LLM_TIMEOUT_MS: readInt(source, "LLM_TIMEOUT_MS", 60_000, 1),

    MEMORY_ENABLED: readBool(source, "MEMORY_ENABLED", true),
    MEMORY_DIR: source.MEMORY_DIR || "agent_memory",
    MEMORY_HISTORY_LIMIT: readInt(source, "MEMORY_HISTORY_LIMIT", 10),
    MEMORY_LOCK_TIMEOUT_MS: readInt(source, "MEMORY_LOCK_TIMEOUT_MS", 10_000, 1),

    TRANSCRIPT_CACHE_LIMIT: readInt(source, "TRANSCRIPT_CACHE_LIMIT", 10),
    PORT: readInt(source, "PORT", 3001),
  };
}
