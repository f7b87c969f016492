import type { RetryPolicy } from '../config/schema'

export const NO_RETRY: RetryPolicy = {
  maxRetries: 0,
  initialDelayMs: 0,
  maxDelayMs: 0,
  backoffMultiplier: 1,
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'ENOTFOUND',
  '57P01', // postgres admin_shutdown
  '53300', // postgres too_many_connections
])

const TRANSIENT_STATUS = new Set([401, 408, 429, 500, 502, 503, 504])

function readProperty(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined
}

/**
 * Whether an open failure is worth another attempt: network resets and
 * timeouts, throttling, 5xx responses and expired auth tokens. Errors may
 * also flag themselves with `retryable: true`.
 */
export function isTransientError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false
  if (readProperty(error, 'retryable') === true) return true
  const code = readProperty(error, 'code')
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) return true
  const status = readProperty(error, 'statusCode') ?? readProperty(error, 'status')
  if (typeof status === 'number' && TRANSIENT_STATUS.has(status)) return true
  const cause = readProperty(error, 'cause')
  return cause !== undefined && cause !== error && isTransientError(cause)
}

/**
 * Delay before retry `attempt` (0-based), exponential with ±25% jitter
 */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const baseDelay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt)
  const cappedDelay = Math.min(baseDelay, policy.maxDelayMs)

  const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1)

  return Math.max(0, Math.floor(cappedDelay + jitter))
}

export interface RetryOutcome<T> {
  value: T
  attempts: number
}

export class RetryExhaustedError extends Error {
  constructor(public readonly attempts: number, public readonly lastError: unknown) {
    super(lastError instanceof Error ? lastError.message : String(lastError), { cause: lastError })
    this.name = 'RetryExhaustedError'
  }
}

/**
 * Run an operation, retrying transient failures with backoff
 *
 * @throws RetryExhaustedError carrying the attempt count and last failure
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  isRetryable: (error: unknown) => boolean = isTransientError,
  signal?: AbortSignal
): Promise<RetryOutcome<T>> {
  let lastError: unknown = new Error('Unknown error')

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    try {
      return { value: await operation(attempt), attempts: attempt + 1 }
    } catch (error) {
      lastError = error

      if (attempt === policy.maxRetries || !isRetryable(error) || signal?.aborted) {
        throw new RetryExhaustedError(attempt + 1, lastError)
      }

      const delay = calculateDelay(attempt, policy)
      if (delay > 0) {
        await new Promise(resolve => setTimeout(resolve, delay))
      }
    }
  }

  throw new RetryExhaustedError(policy.maxRetries + 1, lastError)
}
