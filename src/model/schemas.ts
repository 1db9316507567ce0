//--------------------------------------------------------------
// FILE: src/model/schemas.ts
// Structured results the supervisor and therapist return
//--------------------------------------------------------------

import { z } from "zod";

export const COGNITIVE_LEVELS = ["situational", "rule-based", "core-identity"] as const;

export const DISTORTIONS = [
  "none",
  "all-or-nothing",
  "catastrophizing",
  "overgeneralization",
  "mind-reading",
  "should-statements",
  "labeling",
] as const;

export const cognitiveLevelSchema = z.enum(COGNITIVE_LEVELS);
export const distortionSchema = z.enum(DISTORTIONS);

export type CognitiveLevel = z.infer<typeof cognitiveLevelSchema>;
export type Distortion = z.infer<typeof distortionSchema>;

export const stateAssessmentSchema = z.object({
  emotion: z.string(),
  intensity: z.number().int().min(1).max(10),
  cognitiveLevel: cognitiveLevelSchema,
  distortion: distortionSchema,
  safetyRisk: z.boolean().default(false),
});

export const draftSchema = z.object({
  content: z.string().trim().min(1),
  technique: z.string(),
  targetLevel: cognitiveLevelSchema,
});

export const critiqueSchema = z.object({
  isSafe: z.boolean(),
  adherenceToProtocol: z.boolean(),
  correctLevelIdentification: z.boolean(),
  feedback: z.string(),
});

export type StateAssessment = z.infer<typeof stateAssessmentSchema>;
export type Draft = z.infer<typeof draftSchema>;
export type Critique = z.infer<typeof critiqueSchema>;

//--------------------------------------------------------------
// Response schemas as handed to the model client
//--------------------------------------------------------------

export interface ResponseSchema<T> {
  name: "StateAssessment" | "Draft" | "Critique";
  /** Appended to the system prompt so the backend knows the JSON shape. */
  instructions: string;
  parser: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const StateAssessmentResponse: ResponseSchema<StateAssessment> = {
  name: "StateAssessment",
  instructions: `Reply with a single JSON object:
{
  "emotion": string,            // named or implied emotion
  "intensity": integer 1-10,
  "cognitiveLevel": ${COGNITIVE_LEVELS.map((l) => `"${l}"`).join(" | ")},
  "distortion": ${DISTORTIONS.map((d) => `"${d}"`).join(" | ")},
  "safetyRisk": boolean         // true if there is ANY hint of suicide or self-harm
}`,
  parser: stateAssessmentSchema,
};

export const DraftResponse: ResponseSchema<Draft> = {
  name: "Draft",
  instructions: `Reply with a single JSON object:
{
  "content": string,            // the reply sent to the client
  "technique": string,          // CBT technique used, e.g. "Socratic questioning"
  "targetLevel": ${COGNITIVE_LEVELS.map((l) => `"${l}"`).join(" | ")}
}`,
  parser: draftSchema,
};

export const CritiqueResponse: ResponseSchema<Critique> = {
  name: "Critique",
  instructions: `Reply with a single JSON object:
{
  "isSafe": boolean,
  "adherenceToProtocol": boolean,         // validation -> exploration -> no advice
  "correctLevelIdentification": boolean,  // reply works on the right cognitive level
  "feedback": string                      // what the therapist must fix
}`,
  parser: critiqueSchema,
};

export function isAccepted(critique: Critique): boolean {
  return critique.isSafe && critique.adherenceToProtocol && critique.correctLevelIdentification;
}
