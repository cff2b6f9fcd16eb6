const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET',
  // Postgres: connection failures and serialization conflicts
  '08000',
  '08003',
  '08006',
  '40001',
  '40P01',
  '57P01',
]);
const TRANSIENT_PATTERNS = [
  'fetch failed',
  'network error',
  'socket hang up',
  'timeout',
  'too many requests',
  'service unavailable',
  'temporarily unavailable',
  'connection terminated',
];

/** Error thrown by storage adapters so status and code survive into retry classification. */
export class StorageRequestError extends Error {
  readonly status: number | null;
  readonly code: string | null;

  constructor(message: string, options: { status?: number | null; code?: string | null } = {}) {
    super(message);
    this.name = 'StorageRequestError';
    this.status = options.status ?? null;
    this.code = options.code ?? null;
  }
}

function getStatusCode(error: unknown): number | null {
  if (error instanceof StorageRequestError) return error.status;
  const status = (error as { status?: unknown } | null)?.status;
  return typeof status === 'number' ? status : null;
}

function getErrorCode(error: unknown): string | null {
  const code = (error as { code?: unknown } | null)?.code;
  return typeof code === 'string' ? code.toUpperCase() : null;
}

export function isTransientError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status != null && TRANSIENT_STATUSES.has(status)) return true;

  const code = getErrorCode(error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  onRetry?: (attempt: number, error: Error) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs fn, retrying transient storage failures with jittered exponential backoff.
 * Non-transient errors are rethrown on the first attempt.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 250;
  const sleep = options?.sleep ?? defaultSleep;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isTransientError(err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);
      await sleep(baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random()));
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}
