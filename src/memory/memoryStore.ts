// FILE: src/memory/memoryStore.ts
//--------------------------------------------------------------
// Per-user markdown memory log
//--------------------------------------------------------------

import fs from "fs";
import path from "path";
import type { Turn } from "../model/types.js";
import { describeError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { KeyedLock } from "./keyedLock.js";
import type { MemoryEntry, MemoryStats } from "./types.js";

const FILE_PREFIX = "user_";
const FILE_SUFFIX = ".md";
const SESSION_MARKER = "## Session:";
const USER_MARKER = "**User**:";
const AGENT_MARKER = "**Agent**:";

export interface MemoryStoreOptions {
  memoryDir: string;
  lockTimeoutMs?: number;
  /** How many lines after a user line are searched for its agent line. */
  historyWindow?: number;
  /** Shared lock; defaults to one private to this store. */
  locks?: KeyedLock;
}

// Stray files in the memory dir may not be valid percent-encoding.
function subjectFromFileName(fileName: string): string | null {
  try {
    return decodeURIComponent(fileName.slice(FILE_PREFIX.length, -FILE_SUFFIX.length));
  } catch {
    return null;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// Reconstruction is line based, so stored text has to stay on one line.
function inline(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, " ").trim();
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

export function formatEntry(entry: MemoryEntry): string {
  let md = `${SESSION_MARKER} ${entry.timestamp}\n\n`;

  const hasAnalysis =
    entry.emotion !== undefined ||
    entry.intensity !== undefined ||
    entry.cognitiveLevel !== undefined ||
    entry.distortion !== undefined;

  if (hasAnalysis) {
    md += "### 🧠 Analysis\n\n";
    if (entry.emotion !== undefined) md += `- **Emotion**: ${inline(entry.emotion)}\n`;
    if (entry.intensity !== undefined) md += `- **Intensity**: ${entry.intensity}/10\n`;
    if (entry.cognitiveLevel !== undefined) md += `- **Cognitive Level**: ${entry.cognitiveLevel}\n`;
    if (entry.distortion !== undefined) md += `- **Distortion**: ${entry.distortion}\n`;
    md += "\n";
  }

  md += "### 💬 Conversation\n\n";
  md += `${USER_MARKER} ${inline(entry.userMessage)}\n\n`;
  md += `${AGENT_MARKER} ${inline(entry.agentResponse)}\n\n`;

  if (entry.technique) {
    md += `**Technique Used**: ${inline(entry.technique)}\n\n`;
  }

  md += "---\n\n";
  return md;
}

function formatHeader(subjectId: string, created: Date): string {
  return `# Memory Log for User ${subjectId}\n\nCreated: ${formatTimestamp(created)}\n\n---\n\n`;
}

/**
 * Scans forward for `**User**:` lines and pairs each with the first
 * `**Agent**:` line inside the window. Unpaired markers are skipped.
 */
export function parseExchanges(content: string, window: number): Array<[Turn, Turn]> {
  const lines = content.split("\n");
  const exchanges: Array<[Turn, Turn]> = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line.startsWith(USER_MARKER)) continue;

    const userText = line.slice(USER_MARKER.length).trim();
    let agentText: string | null = null;

    for (let j = i + 1; j < lines.length && j <= i + window; j++) {
      const candidate = lines[j].trim();
      if (candidate.startsWith(USER_MARKER)) break;
      if (candidate.startsWith(AGENT_MARKER)) {
        agentText = candidate.slice(AGENT_MARKER.length).trim();
        break;
      }
    }

    if (userText && agentText) {
      exchanges.push([
        { role: "user", content: userText },
        { role: "assistant", content: agentText },
      ]);
    }
  }

  return exchanges;
}

export class MemoryStore {
  readonly memoryDir: string;
  private readonly lockTimeoutMs: number;
  private readonly historyWindow: number;
  private readonly locks: KeyedLock;

  constructor(options: MemoryStoreOptions) {
    this.memoryDir = path.resolve(options.memoryDir);
    this.lockTimeoutMs = options.lockTimeoutMs ?? 10_000;
    this.historyWindow = options.historyWindow ?? 10;
    this.locks = options.locks ?? new KeyedLock();
  }

  filePathFor(subjectId: string): string {
    return path.join(this.memoryDir, `${FILE_PREFIX}${encodeURIComponent(subjectId)}${FILE_SUFFIX}`);
  }

  //--------------------------------------------------------------
  // SAVE: read, append, replace; all under the subject lock
  //--------------------------------------------------------------

  async save(entry: MemoryEntry): Promise<void> {
    const filePath = this.filePathFor(entry.subjectId);

    await this.locks.withLock(entry.subjectId, this.lockTimeoutMs, async () => {
      await fs.promises.mkdir(this.memoryDir, { recursive: true });

      let content: string;
      try {
        content = await fs.promises.readFile(filePath, "utf8");
      } catch (err) {
        if (!isMissing(err)) throw err;
        content = formatHeader(entry.subjectId, new Date());
      }

      content += formatEntry(entry);

      const tmpPath = `${filePath}.tmp`;
      await fs.promises.writeFile(tmpPath, content, "utf8");
      await fs.promises.rename(tmpPath, filePath);
    });

    logger.debug(`💾 Saved session for ${entry.subjectId}`);
  }

  //--------------------------------------------------------------
  // LOAD: most recent `limit` exchanges, oldest first
  //--------------------------------------------------------------

  async load(subjectId: string, limit = 10): Promise<Turn[]> {
    if (limit <= 0) return [];

    let content: string;
    try {
      content = await fs.promises.readFile(this.filePathFor(subjectId), "utf8");
    } catch (err) {
      if (!isMissing(err)) {
        logger.error(`Failed to load memory for ${subjectId}: ${describeError(err)}`);
      }
      return [];
    }

    return parseExchanges(content, this.historyWindow)
      .slice(-limit)
      .flat();
  }

  async stats(subjectId: string): Promise<MemoryStats> {
    const filePath = this.filePathFor(subjectId);

    let content: string;
    try {
      content = await fs.promises.readFile(filePath, "utf8");
    } catch (err) {
      if (isMissing(err)) return { totalSessions: 0, fileExists: false };
      throw err;
    }

    const sessions = content.match(/^## Session:/gm);
    return {
      totalSessions: sessions ? sessions.length : 0,
      fileExists: true,
      filePath,
    };
  }

  /** Removes the whole log. Resolves false when there was nothing to remove. */
  async clear(subjectId: string): Promise<boolean> {
    const filePath = this.filePathFor(subjectId);

    const removed = await this.locks.withLock(subjectId, this.lockTimeoutMs, async () => {
      try {
        await fs.promises.unlink(filePath);
        return true;
      } catch (err) {
        if (isMissing(err)) return false;
        throw err;
      }
    });

    if (removed) logger.info(`🗑️ Cleared memory for ${subjectId}`);
    return removed;
  }

  async listSubjects(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.promises.readdir(this.memoryDir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const subjects: string[] = [];
    for (const file of files) {
      if (!file.startsWith(FILE_PREFIX) || !file.endsWith(FILE_SUFFIX)) continue;
      const subjectId = subjectFromFileName(file);
      if (subjectId === null) {
        logger.warn(`Skipping memory file with an undecodable name: ${file}`);
        continue;
      }
      subjects.push(subjectId);
    }
    return subjects;
  }
}
