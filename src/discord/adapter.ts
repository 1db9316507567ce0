//--------------------------------------------------------------
// FILE: src/discord/adapter.ts
// discord.js Message → IncomingMessage
//--------------------------------------------------------------

import type { Message } from "discord.js";
import type { IncomingMessage, StatusHandle } from "../core/handleMessage.js";
import { editLargeMessage } from "./sendLargeMessage.js";

function statusHandle(status: Message): StatusHandle {
  let last = status.content;

  return {
    async edit(text: string) {
      // Discord rejects edits that change nothing
      if (text === last) return;
      last = text;
      await editLargeMessage(status, text);
    },
  };
}

export function toIncomingMessage(message: Message): IncomingMessage | null {
  if (message.author.bot) return null;

  const text = message.content?.trim();

  return {
    subjectId: message.author.id,
    text: text ? text : null,
    async reply(content: string) {
      const status = await message.reply(content);
      return statusHandle(status);
    },
  };
}
