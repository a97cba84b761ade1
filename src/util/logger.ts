export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerLike = {
  debug?: (obj?: unknown, msg?: string) => void;
  info?: (obj?: unknown, msg?: string) => void;
  warn?: (obj?: unknown, msg?: string) => void;
  error?: (obj?: unknown, msg?: string) => void;
};

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function parseLogLevel(val: string | undefined, fallback: LogLevel = 'warn'): LogLevel {
  const v = (val || '').trim().toLowerCase();
  return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : fallback;
}

/**
 * Level-filtered logger on stderr. Chat output owns stdout, so diagnostics
 * must never land there.
 */
export function createConsoleLogger(level: LogLevel, sink: (line: string) => void = (l) => console.error(l)): LoggerLike {
  const emit = (lvl: LogLevel) => (obj?: unknown, msg?: string) => {
    if (SEVERITY[lvl] < SEVERITY[level]) return;
    const parts = [`[${lvl}]`];
    if (msg) parts.push(msg);
    if (obj !== undefined) parts.push(typeof obj === 'string' ? obj : safeJson(obj));
    sink(parts.join(' '));
  };
  return { debug: emit('debug'), info: emit('info'), warn: emit('warn'), error: emit('error') };
}

function safeJson(obj: unknown): string {
  if (obj instanceof Error) return obj.message;
  try {
    return JSON.stringify(obj);
  } catch {
    return String(obj);
  }
}
