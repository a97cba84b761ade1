export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export type ConfigErrorKind = 'missing_file' | 'malformed';

export class ConfigError extends Error {
  readonly kind: ConfigErrorKind;
  readonly path: string;

  constructor(kind: ConfigErrorKind, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.kind = kind;
    this.path = path;
  }
}

export type CompletionErrorKind =
  | 'unauthenticated'
  | 'timeout'
  | 'rate_limit'
  | 'connection'
  | 'http'
  | 'malformed_response'
  | 'unknown';

export class CompletionError extends Error {
  readonly kind: CompletionErrorKind;
  readonly status?: number;

  constructor(kind: CompletionErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'CompletionError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
