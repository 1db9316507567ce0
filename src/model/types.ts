//--------------------------------------------------------------
// FILE: src/model/types.ts
//--------------------------------------------------------------

import type { ResponseSchema } from "./schemas.js";

export type TurnRole = "user" | "assistant";

export type Turn = Readonly<{
  role: TurnRole;
  content: string;
}>;

/** Which model answers: the drafting role or the analyzer/critic role. */
export type GenerativeRole = "therapist" | "supervisor";

export interface GenerativeRequest<T> {
  role: GenerativeRole;
  rolePrompt: string;
  conversation: readonly Turn[];
  schema: ResponseSchema<T>;
}

/**
 * Resolves with a value that passed `schema.parser`, or rejects with
 * SchemaValidationError / TransportError.
 */
export interface GenerativeCapability {
  generate<T>(request: GenerativeRequest<T>): Promise<T>;
}
