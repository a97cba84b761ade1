import type { CompletionError, Result } from '../../errors.js';
import type { LoggerLike } from '../../util/logger.js';
import { formatTurnEntry } from '../../history.js';
import { isExitCommand } from './helpers.js';
import { appendMessage } from './state.js';
import type { ChatSettings, Conversation, Message } from './types.js';

export type CompletionClient = {
  chatCompletion(
    messages: readonly Message[],
    opts: { model: string; temperature: number; maxTokens: number; logger?: LoggerLike }
  ): Promise<Result<string, CompletionError>>;
};

export type HistoryWriter = {
  append(entry: string): void;
};

export type TurnDeps = {
  settings: ChatSettings;
  ai: CompletionClient;
  history: HistoryWriter;
  logger?: LoggerLike;
};

export type TurnOutcome =
  | { kind: 'skip' }
  | { kind: 'exit' }
  | { kind: 'reply'; text: string; logError?: Error }
  | { kind: 'error'; error: CompletionError };

export type TurnResult = {
  conversation: Conversation;
  outcome: TurnOutcome;
};

/**
 * Process one line of input against the conversation.
 * On a failed completion the returned conversation is the same value that was
 * passed in; the pending user message never survives.
 */
export async function processTurn(conversation: Conversation, line: string, deps: TurnDeps): Promise<TurnResult> {
  const { settings, ai, history, logger } = deps;
  const userText = line.trim();

  if (!userText) return { conversation, outcome: { kind: 'skip' } };
  if (isExitCommand(userText)) return { conversation, outcome: { kind: 'exit' } };

  const pending = appendMessage(conversation, { role: 'user', content: userText });

  logger?.debug?.(
    { messages: pending.length, model: settings.model, temperature: settings.temperature, maxTokens: settings.maxTokens },
    'chat: invoking OpenAI'
  );

  const res = await ai.chatCompletion(pending, {
    model: settings.model,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
    logger,
  });

  if (!res.ok) {
    logger?.warn?.({ kind: res.error.kind, messages: conversation.length }, 'chat: turn rolled back');
    return { conversation, outcome: { kind: 'error', error: res.error } };
  }

  const next = appendMessage(pending, { role: 'assistant', content: res.value });

  try {
    history.append(formatTurnEntry(userText, res.value));
  } catch (e) {
    logger?.error?.(e, 'chat: failed to write history');
    return { conversation: next, outcome: { kind: 'reply', text: res.value, logError: e instanceof Error ? e : new Error(String(e)) } };
  }
  return { conversation: next, outcome: { kind: 'reply', text: res.value } };
}
