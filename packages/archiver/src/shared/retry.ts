export interface RetryOptions {
  /** Used in log lines */
  label: string;
  /** Total attempts including the first one */
  attempts?: number;
  baseDelayMs?: number;
  factor?: number;
  /** Only errors for which this returns true are retried */
  isTransient: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; attempts: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 500;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * 一時的な失敗のみ指数バックオフで再試行する
 *
 * 非一時的な失敗（認可エラー等）は即座に throw
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = options.attempts ?? DEFAULT_RETRY_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  const factor = options.factor ?? 2;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= attempts || !options.isTransient(err)) {
        throw err;
      }
      const delayMs = baseDelayMs * factor ** (attempt - 1);
      options.onRetry?.({ attempt, attempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * fetch / socket レベルの失敗が一時的かどうか
 * (timeout, connection refused/reset)
 */
export function isTransientNetworkError(err: unknown): boolean {
  if (err instanceof Error && err.name === 'TimeoutError') {
    return true;
  }
  const code = errorCode(err);
  if (code && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }
  // undici は TypeError('fetch failed') の cause に元のエラーを入れる
  if (err instanceof Error && err.cause !== undefined && err.cause !== err) {
    return isTransientNetworkError(err.cause);
  }
  return false;
}

/**
 * HTTP ステータスが一時的な失敗を表すか（5xx, 408, 429）
 */
export function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}
