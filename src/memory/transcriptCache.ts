//--------------------------------------------------------------
// FILE: src/memory/transcriptCache.ts
// Short-term transcript: rolling buffer per user
//--------------------------------------------------------------

import type { Turn } from "../model/types.js";

/**
 * Fallback transcript used when the memory log is disabled or empty.
 * `read` returns raw values on purpose: callers must normalize them.
 */
export interface TranscriptCache {
  read(subjectId: string): Promise<unknown[]>;
  append(subjectId: string, turns: readonly Turn[]): Promise<void>;
  clear(subjectId: string): Promise<void>;
}

export const DEFAULT_TRANSCRIPT_LIMIT = 10;

export class InMemoryTranscriptCache implements TranscriptCache {
  private buffers = new Map<string, unknown[]>();
  private readonly maxEntries: number;

  constructor(maxEntries = DEFAULT_TRANSCRIPT_LIMIT) {
    this.maxEntries = Math.max(0, Math.floor(maxEntries));
  }

  async read(subjectId: string): Promise<unknown[]> {
    return [...(this.buffers.get(subjectId) ?? [])];
  }

  async append(subjectId: string, turns: readonly Turn[]): Promise<void> {
    const buffer = this.buffers.get(subjectId) ?? [];
    buffer.push(...turns.map((t) => ({ role: t.role, content: t.content })));

    if (buffer.length > this.maxEntries) {
      buffer.splice(0, buffer.length - this.maxEntries);
    }
    this.buffers.set(subjectId, buffer);
  }

  async clear(subjectId: string): Promise<void> {
    this.buffers.delete(subjectId);
  }
}
