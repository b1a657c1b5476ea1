function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** 重試策略本身（純資料，可放進設定） */
export interface RetryPolicy {
  /** 總嘗試次數（含第一次） */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions extends RetryPolicy {
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  /** 測試時可替換的等待函式 */
  wait?: (ms: number) => Promise<void>;
}

/**
 * 第 attempt 次失敗後的等待時間
 * base * 2^(attempt-1)，上限 maxDelayMs
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * 帶指數退避的重試
 * 用盡 maxAttempts 或遇到不可重試的錯誤時拋出最後的錯誤
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const isRetryable = opts.isRetryable ?? (() => true);
  const wait = opts.wait ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      if (attempt < opts.maxAttempts && isRetryable(err)) {
        const delay = backoffDelay(opts, attempt);
        opts.onRetry?.(attempt, err, delay);
        await wait(delay);
      } else {
        throw err;
      }
    }
  }

  throw lastError;
}
