//--------------------------------------------------------------
// FILE: src/core/notifier.ts
// Progress updates for the chat layer (sync or async callbacks)
//--------------------------------------------------------------

import { describeError } from "../errors.js";
import { logger } from "../utils/logger.js";

export type Notifier = (text: string) => void | Promise<void>;

export const STATUS_ANALYZING = "🔍 Analyzing your state...";

export function draftingStatus(attempt: number, maxAttempts: number) {
  return `✍️ Drafting a reply (attempt ${attempt}/${maxAttempts})...`;
}

export function reviewingStatus(attempt: number, maxAttempts: number) {
  return `🧐 Supervisor is reviewing the draft (attempt ${attempt}/${maxAttempts})...`;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Calls the notifier with whatever convention it uses. A rejected promise or a
 * synchronous throw (e.g. Discord refusing an edit with identical text) is
 * logged and dropped.
 */
export async function notifyStatus(notifier: Notifier | undefined, text: string): Promise<void> {
  if (!notifier) return;

  try {
    const result: unknown = notifier(text);
    if (isThenable(result)) {
      await result;
    }
  } catch (err) {
    logger.debug(`Status update ignored: ${describeError(err)}`);
  }
}
