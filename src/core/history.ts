//--------------------------------------------------------------
// FILE: src/core/history.ts
// History normalizer: nothing reaches the model unvalidated
//--------------------------------------------------------------

import type { Turn, TurnRole } from "../model/types.js";
import { logger } from "../utils/logger.js";

function isRole(value: unknown): value is TurnRole {
  return value === "user" || value === "assistant";
}

export function toTurn(entry: unknown): Turn | null {
  if (!entry || typeof entry !== "object") return null;
  if (!("role" in entry) || !("content" in entry)) return null;

  const { role, content } = entry;
  if (!isRole(role) || typeof content !== "string") return null;

  return { role, content };
}

/**
 * Keeps only well-formed `{ role, content }` turns, in order. Anything else
 * (strings, nulls, foreign objects from the transcript cache) is dropped.
 */
export function normalizeHistory(input: unknown): Turn[] {
  if (!Array.isArray(input)) return [];

  const turns: Turn[] = [];
  for (const entry of input) {
    const turn = toTurn(entry);
    if (turn) turns.push(turn);
  }

  const dropped = input.length - turns.length;
  if (dropped > 0) {
    logger.debug(`🧹 Dropped ${dropped} malformed history entr${dropped === 1 ? "y" : "ies"}`);
  }

  return turns;
}
