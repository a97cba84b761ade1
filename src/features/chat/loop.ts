import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { describeError } from '../../errors.js';
import { bannerLines, formatReply } from './helpers.js';
import { createConversation, turnCount } from './state.js';
import { processTurn, type TurnDeps, type TurnResult } from './turn.js';
import type { Conversation } from './types.js';

export type EndReason = 'exit' | 'interrupt' | 'eof';

export type LoopDeps = TurnDeps & {
  input?: Readable;
  output?: Writable;
};

export type LoopResult = {
  conversation: Conversation;
  reason: EndReason;
};

export const PROMPT = 'You: ';

/**
 * Interactive read-eval-print session. Runs until `exit`/`quit`, Ctrl-C or
 * end of input. Per-turn failures are printed and never escape.
 */
export async function runChatLoop(deps: LoopDeps): Promise<LoopResult> {
  const { settings, logger } = deps;
  const input = deps.input ?? process.stdin;
  const output = deps.output ?? process.stdout;
  const say = (text: string) => {
    output.write(text + '\n');
  };

  for (const line of bannerLines(settings.botName, settings.disclaimer)) say(line);

  let conversation = createConversation(settings.systemPrompt);
  let reason: EndReason = 'eof';
  let closed = false;

  const rl = createInterface({ input, output });
  rl.on('close', () => {
    closed = true;
  });
  // Only fires when the input is a terminal; piped input ends with 'close'.
  rl.on('SIGINT', () => {
    reason = 'interrupt';
    rl.close();
  });

  rl.setPrompt(PROMPT);
  rl.prompt();

  try {
    for await (const line of rl) {
      let res: TurnResult;
      try {
        res = await processTurn(conversation, line, deps);
      } catch (e) {
        // Anything the turn did not map itself still only costs this turn.
        logger?.error?.(e, 'chat: turn failed unexpectedly');
        say(`[Error] API call failed: ${describeError(e)}`);
        if (!closed) rl.prompt();
        continue;
      }
      conversation = res.conversation;
      const { outcome } = res;

      if (outcome.kind === 'exit') {
        reason = 'exit';
        say('Goodbye.');
        break;
      }
      if (outcome.kind === 'reply') {
        say(formatReply(settings.botName, outcome.text));
        if (outcome.logError) say(`[Warn] This turn was not saved to history: ${describeError(outcome.logError)}`);
      } else if (outcome.kind === 'error') {
        say(`[Error] API call failed: ${outcome.error.message}`);
      }

      if (!closed) rl.prompt();
    }
  } finally {
    if (!closed) rl.close();
  }

  if (reason !== 'exit') say('\nExiting.');
  logger?.info?.({ reason, turns: turnCount(conversation) }, 'chat: session ended');
  return { conversation, reason };
}
