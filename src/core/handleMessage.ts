//--------------------------------------------------------------
// FILE: src/core/handleMessage.ts
// Chat-facing turn handler: commands, history, loop, reply
//--------------------------------------------------------------

import { describeError } from "../errors.js";
import type { MemoryStore } from "../memory/memoryStore.js";
import type { TranscriptCache } from "../memory/transcriptCache.js";
import { logger } from "../utils/logger.js";
import type { Brain } from "./brain.js";
import { normalizeHistory } from "./history.js";
import type { Notifier } from "./notifier.js";
import { GENERIC_ERROR_MESSAGE, NON_TEXT_PLACEHOLDER } from "./safety.js";

//--------------------------------------------------------------
// Platform-neutral message shape
//--------------------------------------------------------------

export interface StatusHandle {
  edit(text: string): Promise<void>;
}

export interface IncomingMessage {
  subjectId: string;
  /** null for stickers, images and other non-text input */
  text: string | null;
  reply(text: string): Promise<StatusHandle>;
}

export interface MessageHandlerDeps {
  brain: Brain;
  transcript: TranscriptCache;
  memory?: MemoryStore;
  historyLimit?: number;
}

export const GREETING_MESSAGE =
  "Hi. I'm your CBT practice companion. Tell me, what's on your mind?";
export const STATUS_THINKING = "Thinking... (supervised drafting)";

type Command = "start" | "forget" | "memory";

function parseCommand(text: string): Command | null {
  const match = text.trim().match(/^\/(start|forget|memory)(?:@\S+)?$/i);
  if (!match) return null;
  const name = match[1].toLowerCase();
  return name === "start" || name === "forget" || name === "memory" ? name : null;
}

export function createMessageHandler(deps: MessageHandlerDeps) {
  const historyLimit = deps.historyLimit ?? 10;

  async function loadHistory(subjectId: string): Promise<unknown[]> {
    if (deps.memory) {
      const remembered = await deps.memory.load(subjectId, historyLimit);
      if (remembered.length > 0) return remembered;
    }

    try {
      return await deps.transcript.read(subjectId);
    } catch (err) {
      logger.warn(`Transcript cache read failed for ${subjectId}: ${describeError(err)}`);
      return [];
    }
  }

  async function runCommand(command: Command, incoming: IncomingMessage): Promise<string> {
    const { subjectId } = incoming;

    switch (command) {
      case "start":
        await deps.transcript.clear(subjectId);
        return GREETING_MESSAGE;

      case "forget": {
        await deps.transcript.clear(subjectId);
        if (!deps.memory) return "Memory is turned off, so there was nothing stored to forget.";
        const removed = await deps.memory.clear(subjectId);
        return removed ? "Done. I've forgotten our previous sessions." : "There was nothing stored to forget.";
      }

      case "memory": {
        if (!deps.memory) return "Memory is turned off.";
        const stats = await deps.memory.stats(subjectId);
        return stats.fileExists
          ? `I remember ${stats.totalSessions} session${stats.totalSessions === 1 ? "" : "s"} with you.`
          : "I don't have any stored sessions with you yet.";
      }
    }
  }

  return async function handleMessage(incoming: IncomingMessage): Promise<string> {
    const { subjectId } = incoming;
    const rawText = incoming.text?.trim() ?? "";

    const command = rawText ? parseCommand(rawText) : null;
    if (command) {
      let answer: string;
      try {
        answer = await runCommand(command, incoming);
      } catch (err) {
        logger.error(`Command /${command} failed for ${subjectId}:`, err);
        answer = GENERIC_ERROR_MESSAGE;
      }
      await incoming.reply(answer);
      return answer;
    }

    const userText = rawText || NON_TEXT_PLACEHOLDER;
    logger.info(`📩 Message received from ${subjectId}`);

    const status = await incoming.reply(STATUS_THINKING);
    const notifier: Notifier = (text) => status.edit(text);

    let reply: string;
    try {
      const history = normalizeHistory(await loadHistory(subjectId));
      reply = await deps.brain.run(userText, history, notifier, deps.memory ? subjectId : undefined);
    } catch (err) {
      logger.error(`Internal error processing message from ${subjectId}:`, err);
      await status.edit(GENERIC_ERROR_MESSAGE);
      return GENERIC_ERROR_MESSAGE;
    }

    try {
      await deps.transcript.append(subjectId, [
        { role: "user", content: userText },
        { role: "assistant", content: reply },
      ]);
    } catch (err) {
      logger.warn(`Transcript cache write failed for ${subjectId}: ${describeError(err)}`);
    }

    await status.edit(reply);
    return reply;
  };
}

export type MessageHandler = ReturnType<typeof createMessageHandler>;
