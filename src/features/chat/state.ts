import type { Conversation, Message } from './types.js';

/**
 * Conversation state is an immutable array: every update returns a new one,
 * so a failed turn can hand back the exact pre-turn value.
 */

export function createConversation(systemPrompt: string): Conversation {
  return Object.freeze([Object.freeze<Message>({ role: 'system', content: systemPrompt })]);
}

export function appendMessage(conversation: Conversation, message: Message): Conversation {
  return Object.freeze([...conversation, Object.freeze({ ...message })]);
}

// Completed user/assistant pairs after the system message.
export function turnCount(conversation: Conversation): number {
  return Math.floor(Math.max(0, conversation.length - 1) / 2);
}
