import OpenAI from 'openai';
import { CompletionError, err, ok, type Result } from '../errors.js';
import type { Message } from '../features/chat/types.js';
import type { LoggerLike } from '../util/logger.js';

export type ChatCompletionOpts = {
  model: string;
  temperature: number;
  maxTokens: number;
  logger?: LoggerLike;
};

// The slice of the SDK this client touches; tests hand in a fake. The body is
// checked at run time, so it is typed as unknown here.
export type ChatCompletionsApi = {
  chat: {
    completions: {
      create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<unknown>;
    };
  };
};

export type OpenAIClientOptions = {
  apiKeyVar?: string; // environment variable holding the key, default OPENAI_API_KEY
  env?: NodeJS.ProcessEnv;
  baseURL?: string;
  timeoutMs?: number;
  createApi?: (apiKey: string) => ChatCompletionsApi;
};

export class OpenAIClient {
  private apiKeyVar: string;
  private env: NodeJS.ProcessEnv;
  private createApi: (apiKey: string) => ChatCompletionsApi;

  constructor(opts: OpenAIClientOptions = {}) {
    this.apiKeyVar = opts.apiKeyVar ?? 'OPENAI_API_KEY';
    this.env = opts.env ?? process.env;
    // Single attempt per call: the SDK's own retries are switched off.
    this.createApi =
      opts.createApi ??
      ((apiKey) => new OpenAI({ apiKey, baseURL: opts.baseURL, timeout: opts.timeoutMs, maxRetries: 0 }));
  }

  enabled(): boolean {
    return !!this.env[this.apiKeyVar];
  }

  async chatCompletion(messages: readonly Message[], opts: ChatCompletionOpts): Promise<Result<string, CompletionError>> {
    // Looked up per call so a key exported mid-session is picked up.
    const apiKey = this.env[this.apiKeyVar];
    if (!apiKey) {
      return err(new CompletionError('unauthenticated', `${this.apiKeyVar} environment variable not set`));
    }

    const start = Date.now();
    let resp: unknown;
    try {
      resp = await this.createApi(apiKey).chat.completions.create({
        model: opts.model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: opts.temperature,
        max_tokens: opts.maxTokens,
        stream: false,
      });
    } catch (e) {
      const mapped = toCompletionError(e);
      opts.logger?.error?.(
        { model: opts.model, kind: mapped.kind, status: mapped.status, message: mapped.message },
        'OpenAI API error'
      );
      return err(mapped);
    }

    opts.logger?.debug?.(
      { model: opts.model, took_ms: Date.now() - start, usage: usageOf(resp) },
      'openai: chat completion'
    );

    const txt = replyText(resp);
    if (txt === undefined) {
      return err(new CompletionError('malformed_response', 'OpenAI response had no choices'));
    }
    if (!txt) {
      return err(new CompletionError('malformed_response', 'OpenAI returned an empty response'));
    }
    return ok(txt);
  }
}

function usageOf(resp: unknown): unknown {
  return resp !== null && typeof resp === 'object' && 'usage' in resp ? resp.usage : undefined;
}

// A 2xx body is not trusted to match the SDK types (proxies behind OPENAI_BASE_URL).
function replyText(resp: unknown): string | undefined {
  if (resp === null || typeof resp !== 'object' || !('choices' in resp) || !Array.isArray(resp.choices)) {
    return undefined;
  }
  const first: unknown = resp.choices[0];
  if (first === null || typeof first !== 'object' || !('message' in first)) return undefined;
  const message: unknown = first.message;
  if (message === null || typeof message !== 'object' || !('content' in message)) return undefined;
  return typeof message.content === 'string' ? message.content.trim() : '';
}

export function toCompletionError(e: unknown): CompletionError {
  if (e instanceof CompletionError) return e;
  // Timeout subclasses the connection error, so it is checked first.
  if (e instanceof OpenAI.APIConnectionTimeoutError) {
    return new CompletionError('timeout', 'Request to OpenAI timed out', { cause: e });
  }
  if (e instanceof OpenAI.APIConnectionError) {
    return new CompletionError('connection', `Could not reach OpenAI: ${e.message}`, { cause: e });
  }
  if (e instanceof OpenAI.APIError) {
    const status = e.status;
    if (status === 429) {
      return new CompletionError('rate_limit', `Rate limited by OpenAI: ${e.message}`, { status, cause: e });
    }
    if (status === 401 || status === 403) {
      return new CompletionError('unauthenticated', `OpenAI rejected the API key: ${e.message}`, { status, cause: e });
    }
    return new CompletionError('http', `OpenAI request failed: ${e.message}`, { status, cause: e });
  }
  const message = e instanceof Error ? e.message : String(e);
  return new CompletionError('unknown', message, { cause: e });
}
