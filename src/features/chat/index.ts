import type { Readable, Writable } from 'node:stream';
import type { Config } from '../../env.js';
import { err, ok, type ConfigError, type Result } from '../../errors.js';
import { HistoryLogger } from '../../history.js';
import { OpenAIClient, type ChatCompletionsApi } from '../../ai/openai.js';
import type { LoggerLike } from '../../util/logger.js';
import { loadChatConfig, resolveChatSettings, resolveConfigPath } from './config.js';
import { runChatLoop, type LoopResult } from './loop.js';

export type StartChatOpts = {
  logger?: LoggerLike;
  env?: NodeJS.ProcessEnv;
  input?: Readable;
  output?: Writable;
  createApi?: (apiKey: string) => ChatCompletionsApi;
};

/**
 * Wire config, client and history together and run the session.
 * A config problem comes back as an error before any prompt is shown.
 */
export async function startChat(cfg: Config, opts: StartChatOpts = {}): Promise<Result<LoopResult, ConfigError>> {
  const { logger } = opts;
  const chatCfgPath = resolveConfigPath(cfg.chatConfigPath);

  const loaded = loadChatConfig(chatCfgPath);
  if (!loaded.ok) return err(loaded.error);
  const settings = resolveChatSettings(loaded.value);

  const ai = new OpenAIClient({
    apiKeyVar: cfg.openaiApiKeyVar,
    env: opts.env,
    baseURL: cfg.openaiBaseUrl,
    timeoutMs: cfg.openaiTimeoutMs,
    createApi: opts.createApi,
  });
  if (!ai.enabled()) {
    logger?.warn?.({ env: cfg.openaiApiKeyVar }, 'API key not set; every turn will fail until it is exported');
  }

  const history = new HistoryLogger(resolveConfigPath(cfg.historyPath));
  logger?.info?.({ config: chatCfgPath, history: history.file, model: settings.model }, 'chat: starting session');

  const result = await runChatLoop({ settings, ai, history, logger, input: opts.input, output: opts.output });
  return ok(result);
}
