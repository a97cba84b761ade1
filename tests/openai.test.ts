import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { OpenAIClient, toCompletionError, type ChatCompletionsApi } from '../src/ai/openai.ts';
import { CompletionError } from '../src/errors.ts';
import type { Message } from '../src/features/chat/types.ts';

const OPTS = { model: 'm1', temperature: 0.2, maxTokens: 800 };
const MESSAGES: Message[] = [
  { role: 'system', content: 'Be concise.' },
  { role: 'user', content: 'Hello' },
];

function completion(content: string | null): OpenAI.Chat.ChatCompletion {
  return {
    id: 'chatcmpl-1',
    object: 'chat.completion',
    created: 0,
    model: 'm1',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

function fakeApi(create: ChatCompletionsApi['chat']['completions']['create']) {
  const createApi = vi.fn((_apiKey: string): ChatCompletionsApi => ({ chat: { completions: { create } } }));
  return createApi;
}

describe('OpenAIClient.chatCompletion', () => {
  it('fails as unauthenticated without touching the network when the key is missing', async () => {
    const create = vi.fn(async () => completion('unused'));
    const createApi = fakeApi(create);
    const client = new OpenAIClient({ env: {}, createApi });

    const res = await client.chatCompletion(MESSAGES, OPTS);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe('unauthenticated');
    expect(res.error.message).toBe('OPENAI_API_KEY environment variable not set');
    expect(createApi).not.toHaveBeenCalled();
    expect(create).not.toHaveBeenCalled();
  });

  it('treats an empty key as missing', async () => {
    const client = new OpenAIClient({ env: { OPENAI_API_KEY: '' }, createApi: fakeApi(async () => completion('x')) });
    expect(client.enabled()).toBe(false);
    const res = await client.chatCompletion(MESSAGES, OPTS);
    expect(res.ok ? null : res.error.kind).toBe('unauthenticated');
  });

  it('sends one non-streaming request and returns the trimmed reply', async () => {
    const create = vi.fn(async (_body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming) => completion('  Hi there.\n'));
    const createApi = fakeApi(create);
    const client = new OpenAIClient({ env: { OPENAI_API_KEY: 'test-secret' }, createApi });

    const res = await client.chatCompletion(MESSAGES, OPTS);

    expect(res).toEqual({ ok: true, value: 'Hi there.' });
    expect(createApi).toHaveBeenCalledWith('test-secret');
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith({
      model: 'm1',
      messages: [
        { role: 'system', content: 'Be concise.' },
        { role: 'user', content: 'Hello' },
      ],
      temperature: 0.2,
      max_tokens: 800,
      stream: false,
    });
  });

  it('reads the key at call time', async () => {
    const env: NodeJS.ProcessEnv = {};
    const client = new OpenAIClient({ env, createApi: fakeApi(async () => completion('ok')) });
    expect((await client.chatCompletion(MESSAGES, OPTS)).ok).toBe(false);
    env.OPENAI_API_KEY = 'test-secret';
    expect(await client.chatCompletion(MESSAGES, OPTS)).toEqual({ ok: true, value: 'ok' });
  });

  it('reports an empty reply as a malformed response', async () => {
    const client = new OpenAIClient({
      env: { OPENAI_API_KEY: 'test-secret' },
      createApi: fakeApi(async () => completion('   ')),
    });
    const res = await client.chatCompletion(MESSAGES, OPTS);
    expect(res.ok ? null : res.error.kind).toBe('malformed_response');
  });

  it.each([
    ['an empty body', {}],
    ['a null body', null],
    ['choices that is not an array', { choices: 'none' }],
    ['an empty choices array', { choices: [] }],
  ])('reports %s as a malformed response', async (_label, body) => {
    const client = new OpenAIClient({
      env: { OPENAI_API_KEY: 'test-secret' },
      createApi: fakeApi(async () => body),
    });
    const res = await client.chatCompletion(MESSAGES, OPTS);
    if (res.ok) throw new Error('expected failure');
    expect(res.error.kind).toBe('malformed_response');
    expect(res.error.message).toBe('OpenAI response had no choices');
  });

  it('maps a timeout and logs it without the key', async () => {
    const logged: unknown[] = [];
    const client = new OpenAIClient({
      env: { OPENAI_API_KEY: 'test-secret' },
      createApi: fakeApi(async () => {
        throw new OpenAI.APIConnectionTimeoutError();
      }),
    });

    const res = await client.chatCompletion(MESSAGES, {
      ...OPTS,
      logger: { error: (obj) => logged.push(obj) },
    });

    if (res.ok) throw new Error('expected failure');
    expect(res.error).toBeInstanceOf(CompletionError);
    expect(res.error.kind).toBe('timeout');
    expect(res.error.message).toBe('Request to OpenAI timed out');
    expect(logged).toHaveLength(1);
    expect(JSON.stringify(logged)).not.toContain('test-secret');
  });
});

describe('toCompletionError', () => {
  it('distinguishes rate limits, auth failures and other HTTP statuses', () => {
    const rate = toCompletionError(new OpenAI.RateLimitError(429, { message: 'slow down' }, 'slow down', {}));
    expect(rate.kind).toBe('rate_limit');
    expect(rate.status).toBe(429);

    const auth = toCompletionError(new OpenAI.AuthenticationError(401, { message: 'bad key' }, 'bad key', {}));
    expect(auth.kind).toBe('unauthenticated');
    expect(auth.status).toBe(401);

    const server = toCompletionError(new OpenAI.InternalServerError(503, { message: 'down' }, 'down', {}));
    expect(server.kind).toBe('http');
    expect(server.status).toBe(503);
  });

  it('maps connection failures and unknown throwables', () => {
    expect(toCompletionError(new OpenAI.APIConnectionError({ message: 'socket hang up' })).kind).toBe('connection');
    const unknown = toCompletionError('boom');
    expect(unknown.kind).toBe('unknown');
    expect(unknown.message).toBe('boom');
  });

  it('passes a CompletionError through untouched', () => {
    const e = new CompletionError('timeout', 'late');
    expect(toCompletionError(e)).toBe(e);
  });
});
