import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { ConfigError, describeError, err, ok, type Result } from '../../errors.js';
import type { ChatConfigFile, ChatSettings } from './types.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_TEMPERATURE = 0.2;
export const DEFAULT_MAX_TOKENS = 800;
export const DEFAULT_BOT_NAME = 'Theron RSQ Bot';

export function resolveConfigPath(fp: string, cwd = process.cwd()): string {
  return isAbsolute(fp) ? fp : join(cwd, fp);
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isPositiveInt = (v: unknown): v is number => typeof v === 'number' && Number.isInteger(v) && v > 0;

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return x !== null && typeof x === 'object' && !Array.isArray(x);
}

function field<T>(
  fp: string,
  obj: Record<string, unknown>,
  key: keyof ChatConfigFile,
  guard: (v: unknown) => v is T,
  expected: string
): T | undefined {
  if (!(key in obj)) return undefined;
  const value = obj[key];
  if (!guard(value)) {
    throw new ConfigError('malformed', fp, `Config key "${key}" must be ${expected}: ${fp}`);
  }
  return value;
}

/**
 * Read the chat config file. Unknown keys are ignored and no defaults are
 * filled in here; absent keys come back undefined (see resolveChatSettings).
 */
export function loadChatConfig(fp: string): Result<ChatConfigFile, ConfigError> {
  if (!existsSync(fp)) {
    return err(new ConfigError('missing_file', fp, `Config file not found: ${fp}`));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fp, 'utf8'));
  } catch (e) {
    return err(new ConfigError('malformed', fp, `Config file is not valid JSON: ${fp} (${describeError(e)})`, { cause: e }));
  }
  if (!isPlainObject(parsed)) {
    return err(new ConfigError('malformed', fp, `Config file must contain a JSON object: ${fp}`));
  }

  try {
    return ok({
      system_prompt: field(fp, parsed, 'system_prompt', isString, 'a string'),
      model: field(fp, parsed, 'model', isString, 'a string'),
      temperature: field(fp, parsed, 'temperature', isFiniteNumber, 'a number'),
      max_tokens: field(fp, parsed, 'max_tokens', isPositiveInt, 'a positive integer'),
      bot_name: field(fp, parsed, 'bot_name', isString, 'a string'),
      disclaimer: field(fp, parsed, 'disclaimer', isString, 'a string'),
    });
  } catch (e) {
    if (e instanceof ConfigError) return err(e);
    throw e;
  }
}

export function resolveChatSettings(file: ChatConfigFile): ChatSettings {
  return Object.freeze({
    systemPrompt: file.system_prompt ?? '',
    model: file.model ?? DEFAULT_MODEL,
    temperature: file.temperature ?? DEFAULT_TEMPERATURE,
    maxTokens: file.max_tokens ?? DEFAULT_MAX_TOKENS,
    botName: file.bot_name ?? DEFAULT_BOT_NAME,
    disclaimer: file.disclaimer,
  });
}
