export interface RetryOptions {
  attempts: number
  backoffMs?: number
  retryable?: (error: unknown) => boolean
}

export async function withRetry<T>(options: RetryOptions, fn: () => Promise<T>): Promise<T> {
  const maxAttempts = Math.max(1, options.attempts)
  const backoffMs = options.backoffMs ?? 400
  let lastError: unknown

  for (let i = 1; i <= maxAttempts; i += 1) {
    try {
      return await fn()
    } catch (error) {
      lastError = error
      if (i === maxAttempts || (options.retryable && !options.retryable(error))) {
        break
      }
      await sleep(i * backoffMs)
    }
  }

  throw lastError
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
