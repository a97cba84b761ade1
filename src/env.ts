import dotenv from 'dotenv';
dotenv.config();

import { parseLogLevel, type LogLevel } from './util/logger.js';

export type Config = {
  chatConfigPath: string; // JSON chat settings, default config.json
  historyPath: string; // append-only transcript, default conversation_history.md
  logLevel: LogLevel;

  // OpenAI transport (the API key itself is read by the client at call time)
  openaiApiKeyVar: string;
  openaiBaseUrl?: string;
  openaiTimeoutMs?: number;
};

function parsePositiveInt(val: string | undefined): number | undefined {
  if (val == null || val.trim() === '') return undefined;
  const n = Number(val);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    chatConfigPath: env.CHAT_CONFIG || 'config.json',
    historyPath: env.CHAT_HISTORY_FILE || 'conversation_history.md',
    logLevel: parseLogLevel(env.LOG_LEVEL),
    openaiApiKeyVar: 'OPENAI_API_KEY',
    openaiBaseUrl: env.OPENAI_BASE_URL || undefined,
    openaiTimeoutMs: parsePositiveInt(env.OPENAI_TIMEOUT_MS),
  };
}
