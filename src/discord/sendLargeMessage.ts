//--------------------------------------------------------------
// FILE: src/discord/sendLargeMessage.ts
// Deliver long replies across multiple Discord messages
//--------------------------------------------------------------

import type { Message } from "discord.js";

export const MAX_CHUNK = 1900;

export function chunkText(text: string, limit = MAX_CHUNK): string[] {
  const chunks: string[] = [];
  let i = 0;

  while (i < text.length) {
    let end = Math.min(i + limit, text.length);
    let slice = text.slice(i, end);

    if (end < text.length) {
      const lastNewline = slice.lastIndexOf("\n");
      if (lastNewline > limit * 0.6) {
        end = i + lastNewline + 1;
        slice = text.slice(i, end);
      }
    }

    chunks.push(slice);
    i = end;
  }

  return chunks;
}

/**
 * The first chunk replaces the status message text; the rest follow in the
 * same channel.
 */
export async function editLargeMessage(status: Message, content: string): Promise<void> {
  const chunks = chunkText(content, MAX_CHUNK);
  if (chunks.length === 0) return;

  await status.edit(chunks[0]);
  for (let i = 1; i < chunks.length; i++) {
    await new Promise((resolve) => setTimeout(resolve, 200));
    if (status.channel.isSendable()) {
      await status.channel.send(chunks[i]);
    }
  }
}
