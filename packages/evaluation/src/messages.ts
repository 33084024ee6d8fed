/**
 * Chat message formatting
 *
 * @module @flowkit/evaluation/messages
 */

import type { ChatMessageRecord, ChatMessageType } from './schemas.js';

const PREFIXES: Record<Exclude<ChatMessageType, 'chat'>, string> = {
  human: 'Human',
  ai: 'AI',
  system: 'System',
  function: 'Function',
  tool: 'Tool',
};

/**
 * Render messages as a transcript, one "Speaker: content" line each
 */
export function formatMessageBuffer(messages: ChatMessageRecord[]): string {
  return messages
    .map((message) => {
      const prefix =
        message.type === 'chat' ? message.data.role ?? 'Chat' : PREFIXES[message.type];
      return `${prefix}: ${message.data.content}`;
    })
    .join('\n');
}
