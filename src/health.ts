//--------------------------------------------------------------
// FILE: src/health.ts
//--------------------------------------------------------------

import type { MemoryStore } from "./memory/memoryStore.js";
import { describeError } from "./errors.js";
import { logger } from "./utils/logger.js";

export interface HealthReport {
  status: "ok";
  uptimeSeconds: number;
  memoryEnabled: boolean;
  subjects: number;
}

export async function buildHealthReport(
  memory: MemoryStore | undefined,
  startedAt: number,
  now = Date.now()
): Promise<HealthReport> {
  let subjects = 0;
  try {
    subjects = memory ? (await memory.listSubjects()).length : 0;
  } catch (err) {
    logger.warn(`Health check could not list memory subjects: ${describeError(err)}`);
  }

  return {
    status: "ok",
    uptimeSeconds: Math.floor((now - startedAt) / 1000),
    memoryEnabled: memory !== undefined,
    subjects,
  };
}
