export interface RetryOptions {
  /** Extra attempts after the first one. */
  maxRetries?: number;
  delayMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

// ECONN*/EPIPE come from the socket, the rest are PostgreSQL SQLSTATEs:
// class 08 (connection exception) and 57P01-57P03 (server shutting down
// or not yet accepting connections).
const TRANSIENT_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  '57P01',
  '57P02',
  '57P03',
]);

const TRANSIENT_MESSAGES = [
  'connection terminated',
  'timeout exceeded when trying to connect',
  'client has encountered a connection error',
];

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string') {
    if (TRANSIENT_CODES.has(error.code) || error.code.startsWith('08')) return true;
  }
  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGES.some((snippet) => message.includes(snippet));
}

export async function executeWithRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? 1;
  const delayMs = options.delayMs ?? 100;
  const isRetryable = options.isRetryable ?? isTransientError;

  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;
      if (attempt > maxRetries || !isRetryable(error)) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
}
