//--------------------------------------------------------------
// FILE: src/index.ts
// System bootstrap: builds and wires everything from config
//--------------------------------------------------------------

import { Brain } from "./core/brain.js";
import { createMessageHandler, type MessageHandler } from "./core/handleMessage.js";
import { MemoryStore } from "./memory/memoryStore.js";
import { InMemoryTranscriptCache, type TranscriptCache } from "./memory/transcriptCache.js";
import { OpenAICompatibleLlm } from "./model/Llm.js";
import type { GenerativeCapability } from "./model/types.js";
import type { EnvConfig } from "./utils/env.js";
import { logger } from "./utils/logger.js";

export interface CompanionSystems {
  brain: Brain;
  memory?: MemoryStore;
  transcript: TranscriptCache;
  handleMessage: MessageHandler;
}

export function initCompanionSystems(
  env: EnvConfig,
  overrides: { llm?: GenerativeCapability; transcript?: TranscriptCache } = {}
): CompanionSystems {
  const llm =
    overrides.llm ??
    new OpenAICompatibleLlm({
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      timeoutMs: env.LLM_TIMEOUT_MS,
      models: {
        therapist: env.MODEL_THERAPIST,
        supervisor: env.MODEL_SUPERVISOR,
      },
    });

  const memory = env.MEMORY_ENABLED
    ? new MemoryStore({ memoryDir: env.MEMORY_DIR, lockTimeoutMs: env.MEMORY_LOCK_TIMEOUT_MS })
    : undefined;

  const transcript = overrides.transcript ?? new InMemoryTranscriptCache(env.TRANSCRIPT_CACHE_LIMIT);
  const brain = new Brain({ llm, memory });

  const handleMessage = createMessageHandler({
    brain,
    transcript,
    memory,
    historyLimit: env.MEMORY_HISTORY_LIMIT,
  });

  logger.info(
    `🌿 Companion systems initialized (therapist=${env.MODEL_THERAPIST}, supervisor=${env.MODEL_SUPERVISOR}, memory=${
      memory ? memory.memoryDir : "off"
    }).`
  );

  return { brain, memory, transcript, handleMessage };
}
