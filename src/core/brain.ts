//--------------------------------------------------------------
// FILE: src/core/brain.ts
// Grounding loop: analyze, draft, critique, retry
//--------------------------------------------------------------

import { EmptyMessageError, describeError } from "../errors.js";
import { formatTimestamp, type MemoryStore } from "../memory/memoryStore.js";
import type { MemoryEntry } from "../memory/types.js";
import {
  CritiqueResponse,
  DraftResponse,
  StateAssessmentResponse,
  isAccepted,
  type Critique,
  type Draft,
  type StateAssessment,
} from "../model/schemas.js";
import type { GenerativeCapability } from "../model/types.js";
import { logger } from "../utils/logger.js";
import { normalizeHistory } from "./history.js";
import {
  STATUS_ANALYZING,
  draftingStatus,
  notifyStatus,
  reviewingStatus,
  type Notifier,
} from "./notifier.js";
import {
  ANALYST_SYSTEM_PROMPT,
  SUPERVISOR_SYSTEM_PROMPT,
  buildAnalysisConversation,
  buildCritiqueConversation,
  buildDraftConversation,
  buildTherapistPrompt,
} from "./prompt.js";
import { EXHAUSTED_MESSAGE, checkSafety } from "./safety.js";

//--------------------------------------------------------------
// Types
//--------------------------------------------------------------

export const MAX_ATTEMPTS = 3;

export type GroundingOutcome =
  | {
      kind: "accepted";
      reply: string;
      assessment: StateAssessment;
      draft: Draft;
      attempts: number;
    }
  | {
      kind: "safety";
      reply: string;
      assessment: StateAssessment;
    }
  | {
      kind: "exhausted";
      reply: string;
      assessment: StateAssessment;
      attempts: number;
      /** Last rejected draft, never shown to the subject. */
      lastDraft: Draft;
    };

export interface BrainOptions {
  llm: GenerativeCapability;
  memory?: MemoryStore;
  /** Clamped to 1..3. */
  maxAttempts?: number;
}

type Rejection = { draft: Draft; critique: Critique };

export class Brain {
  private readonly llm: GenerativeCapability;
  private readonly memory?: MemoryStore;
  private readonly maxAttempts: number;

  constructor(options: BrainOptions) {
    this.llm = options.llm;
    this.memory = options.memory;
    this.maxAttempts = Math.max(1, Math.min(MAX_ATTEMPTS, Math.floor(options.maxAttempts ?? MAX_ATTEMPTS)));
  }

  //--------------------------------------------------------------
  // RUN: reply text, persisted when a memory store is attached
  //--------------------------------------------------------------

  async run(
    userMessage: string | null | undefined,
    history: readonly unknown[],
    notifier?: Notifier,
    subjectId?: string
  ): Promise<string> {
    const outcome = await this.respond(userMessage, history, notifier);

    if (this.memory && subjectId !== undefined && typeof userMessage === "string") {
      await this.remember(this.memory, subjectId, userMessage, outcome);
    }

    return outcome.reply;
  }

  //--------------------------------------------------------------
  // RESPOND: the state machine itself
  //--------------------------------------------------------------

  async respond(
    userMessage: string | null | undefined,
    history: readonly unknown[],
    notifier?: Notifier
  ): Promise<GroundingOutcome> {
    if (typeof userMessage !== "string" || userMessage.trim().length === 0) {
      throw new EmptyMessageError();
    }

    await notifyStatus(notifier, STATUS_ANALYZING);
    const assessment = await this.llm.generate({
      role: "supervisor",
      rolePrompt: ANALYST_SYSTEM_PROMPT,
      conversation: buildAnalysisConversation(userMessage),
      schema: StateAssessmentResponse,
    });

    const safetyReply = checkSafety(assessment);
    if (safetyReply) {
      logger.warn("🚨 Safety risk detected, skipping drafting.");
      return { kind: "safety", reply: safetyReply, assessment };
    }

    const turns = normalizeHistory(history);
    const conversation = buildDraftConversation(turns, userMessage);
    let lastRejected: Rejection | undefined;

    for (let attempt = 1; ; attempt++) {
      await notifyStatus(notifier, draftingStatus(attempt, this.maxAttempts));
      const draft = await this.llm.generate({
        role: "therapist",
        rolePrompt: buildTherapistPrompt(assessment, lastRejected),
        conversation,
        schema: DraftResponse,
      });

      await notifyStatus(notifier, reviewingStatus(attempt, this.maxAttempts));
      const critique = await this.llm.generate({
        role: "supervisor",
        rolePrompt: SUPERVISOR_SYSTEM_PROMPT,
        conversation: buildCritiqueConversation(userMessage, draft),
        schema: CritiqueResponse,
      });

      if (isAccepted(critique)) {
        logger.info(`✅ Draft accepted on attempt ${attempt} (${draft.technique})`);
        return { kind: "accepted", reply: draft.content, assessment, draft, attempts: attempt };
      }

      logger.warn(`⚠️ Attempt ${attempt} rejected: ${critique.feedback}`);

      if (attempt >= this.maxAttempts) {
        logger.warn(`🛑 All ${this.maxAttempts} drafts rejected, sending fallback.`);
        return {
          kind: "exhausted",
          reply: EXHAUSTED_MESSAGE,
          assessment,
          attempts: attempt,
          lastDraft: draft,
        };
      }

      lastRejected = { draft, critique };
    }
  }

  //--------------------------------------------------------------
  // MEMORY
  //--------------------------------------------------------------

  private async remember(
    memory: MemoryStore,
    subjectId: string,
    userMessage: string,
    outcome: GroundingOutcome
  ) {
    const { assessment } = outcome;
    const entry: MemoryEntry = {
      timestamp: formatTimestamp(new Date()),
      subjectId,
      userMessage,
      agentResponse: outcome.reply,
      emotion: assessment.emotion,
      intensity: assessment.intensity,
      cognitiveLevel: assessment.cognitiveLevel,
      distortion: assessment.distortion,
      technique: outcome.kind === "accepted" ? outcome.draft.technique : undefined,
    };

    try {
      await memory.save(entry);
    } catch (err) {
      logger.error(`❌ Failed to save memory for ${subjectId}: ${describeError(err)}`);
    }
  }
}
