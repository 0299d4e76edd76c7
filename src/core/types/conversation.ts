/**
 * Conversation data model shared by the session store, the model runner
 * and the orchestrator.
 */

/**
 * Reply thread a conversation is scoped to: the bot message being replied
 * to plus the chat it lives in. Identity is exact-match on both fields.
 */
export interface ThreadKey {
  anchorMessageId: number | string;
  chatId: number | string;
}

export type ConversationRole = 'user' | 'assistant' | 'system' | 'tool';

/**
 * `message` is a plain dialogue turn. Tool invocation records and the
 * upstream placeholder marker are never fed back to the model.
 */
export type ConversationItemKind = 'message' | 'tool_call' | 'tool_result' | 'placeholder';

export interface ConversationItem {
  role: ConversationRole;
  content: string;
  kind: ConversationItemKind;
  sequenceIndex: number;
  toolName?: string;
  callId?: string;
}

/** Item as produced by a turn, before the store assigns its index. */
export type NewConversationItem = Omit<ConversationItem, 'sequenceIndex'>;

export interface SessionRecord {
  version: 1;
  items: ConversationItem[];
  createdAt: string;
  expiresAt: string;
}

export interface TurnOutput {
  content: string;
  title?: string;
}

export function makeThreadKey(anchorMessageId: number | string, chatId: number | string): ThreadKey {
  return { anchorMessageId, chatId };
}

export function formatThreadKey(key: ThreadKey): string {
  return `bot:${key.anchorMessageId}:${key.chatId}`;
}

export function sameThread(a: ThreadKey, b: ThreadKey): boolean {
  return String(a.anchorMessageId) === String(b.anchorMessageId) && String(a.chatId) === String(b.chatId);
}
