// FILE: src/memory/types.ts
//--------------------------------------------------------------
// Memory model: one exchange per entry, analysis folded in
//--------------------------------------------------------------

import type { CognitiveLevel, Distortion } from "../model/schemas.js";

export type MemoryEntry = {
  timestamp: string;
  subjectId: string;
  userMessage: string;
  agentResponse: string;

  // Derived from the state assessment, when one was made
  emotion?: string;
  intensity?: number;
  cognitiveLevel?: CognitiveLevel;
  distortion?: Distortion;

  // Technique of the accepted draft
  technique?: string;
};

export type MemoryStats = {
  totalSessions: number;
  fileExists: boolean;
  filePath?: string;
};
