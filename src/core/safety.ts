//--------------------------------------------------------------
// FILE: src/core/safety.ts
// Safety valve + fixed, non-generated replies
//--------------------------------------------------------------

import type { StateAssessment } from "../model/schemas.js";

export const SAFETY_MESSAGE =
  "I'm an AI assistant and I can't help in a crisis. " +
  "Please call your local emergency number or a suicide and crisis hotline right now. " +
  "You don't have to go through this alone.";

export const EXHAUSTED_MESSAGE =
  "Sorry, I'm having trouble putting together a helpful reply right now. " +
  "Could you try rephrasing what's on your mind?";

export const GENERIC_ERROR_MESSAGE =
  "Something went wrong on my side. Please try again in a moment, or send /start to begin fresh.";

export const NON_TEXT_PLACEHOLDER = "[non-text input]";

/** Returns the crisis reply when the assessment flags risk, otherwise null. */
export function checkSafety(assessment: StateAssessment): string | null {
  return assessment.safetyRisk ? SAFETY_MESSAGE : null;
}
