//--------------------------------------------------------------
// FILE: src/core/prompt.ts
// Role prompts + conversation builders for the grounding loop
//--------------------------------------------------------------

import type { Critique, Draft, StateAssessment } from "../model/schemas.js";
import type { Turn } from "../model/types.js";

export const ANALYST_SYSTEM_PROMPT = `
You are a CBT supervisor assessing a client's message.
Name the emotion, rate its intensity, classify the thought level and the dominant cognitive distortion.
Be vigilant about risk: any hint of suicide or self-harm sets safetyRisk to true.
`.trim();

export const THERAPIST_SYSTEM_PROMPT = `
You are a CBT therapist in a text chat.
Follow the protocol strictly:
1. Validate the feeling first.
2. Explore the thought with Socratic questions.
3. Never give direct advice or instructions.
Work on the client's current thought level: situational thoughts get evidence questions,
rules and assumptions get pros/cons and downward-arrow questions,
core-identity beliefs get gentle, slow exploration.
Keep replies short and warm.
`.trim();

export const SUPERVISOR_SYSTEM_PROMPT = `
You are a CBT supervisor reviewing a therapist's draft reply.
Check that the reply is safe, follows the protocol (validation -> exploration -> no advice)
and addresses the client's thought on the correct cognitive level.
If anything fails, explain precisely what the therapist must change.
`.trim();

//--------------------------------------------------------------
// Therapist framing
//--------------------------------------------------------------

function formatAssessment(assessment: StateAssessment): string {
  return [
    `Emotion: ${assessment.emotion} (${assessment.intensity}/10)`,
    `Thought level: ${assessment.cognitiveLevel}`,
    `Distortion: ${assessment.distortion}`,
  ].join("\n");
}

export function buildTherapistPrompt(
  assessment: StateAssessment,
  lastRejected?: { draft: Draft; critique: Critique }
): string {
  let prompt = `${THERAPIST_SYSTEM_PROMPT}\n\n## Client state\n${formatAssessment(assessment)}`;

  if (lastRejected) {
    prompt += `\n\n${buildFeedbackBlock(lastRejected.draft, lastRejected.critique)}`;
  }

  return prompt;
}

// Only the most recent rejection is quoted, never the whole retry history.
export function buildFeedbackBlock(draft: Draft, critique: Critique): string {
  return [
    "## Supervisor rejected your previous draft",
    `Previous draft: ${draft.content}`,
    `Supervisor feedback: ${critique.feedback}`,
    "Write a new reply that fixes these issues.",
  ].join("\n");
}

export function buildDraftConversation(history: readonly Turn[], userMessage: string): Turn[] {
  return [...history, { role: "user", content: userMessage }];
}

//--------------------------------------------------------------
// Supervisor inputs (never carry history)
//--------------------------------------------------------------

export function buildAnalysisConversation(userMessage: string): Turn[] {
  return [{ role: "user", content: userMessage }];
}

export function buildCritiqueConversation(userMessage: string, draft: Draft): Turn[] {
  return [
    {
      role: "user",
      content: `Client message: ${userMessage}\n\nTherapist reply: ${draft.content}`,
    },
  ];
}
