/**
 * Retry Utility
 *
 * Wraps outbound calls (LLM backends, bridge, Telegram) with exponential
 * backoff. Retries only on transient failures: rate limits (429), server
 * errors (500/502/503/504), and network-level errors (ECONNRESET,
 * ETIMEDOUT, fetch failed).
 *
 * Defaults:
 *   maxRetries: 2  (3 total attempts)
 *   baseDelayMs: 500
 *   maxDelayMs: 5000
 *
 * Usage:
 *   const result = await withRetry(
 *     () => groq.chat.completions.create({...}),
 *     'groq-draft'
 *   )
 */

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504])
const BASE_DELAY_MS = 500
const MAX_DELAY_MS = 5000
const MAX_RETRIES = 2

export interface RetryOptions {
    maxRetries?: number
    baseDelayMs?: number
    maxDelayMs?: number
    sleep?: (ms: number) => Promise<void>
}

function readField(err: object, key: string): unknown {
    return Reflect.get(err, key)
}

/** HTTP status carried by SDK and fetch-wrapper errors, if any. */
export function errorStatus(err: unknown): number | undefined {
    if (!err || typeof err !== 'object') return undefined
    const status = readField(err, 'status') ?? readField(err, 'statusCode')
    return typeof status === 'number' ? status : undefined
}

export function isRetryable(err: unknown): boolean {
    const status = errorStatus(err)
    if (status !== undefined) return RETRYABLE_STATUS.has(status)
    if (err && typeof err === 'object') {
        // Groq SDK wraps 429 in error.error.type
        const inner = readField(err, 'error')
        const errType = inner && typeof inner === 'object' ? readField(inner, 'type') : undefined
        if (errType === 'tokens' || errType === 'requests') return true
    }
    if (err instanceof Error) {
        const msg = err.message
        return (
            msg.includes('ECONNRESET') ||
            msg.includes('ECONNREFUSED') ||
            msg.includes('ETIMEDOUT') ||
            msg.includes('ENOTFOUND') ||
            msg.includes('fetch failed') ||
            msg.includes('socket hang up') ||
            msg.includes('rate_limit') ||
            msg.includes('overloaded')
        )
    }
    return false
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted) return resolve()
        const done = () => {
            clearTimeout(timer)
            signal?.removeEventListener('abort', done)
            resolve()
        }
        const timer = setTimeout(done, ms)
        signal?.addEventListener('abort', done, { once: true })
    })
}

/** Exponential backoff for a zero-based attempt index, capped at maxDelayMs. */
export function backoffDelay(attempt: number, baseDelayMs = BASE_DELAY_MS, maxDelayMs = MAX_DELAY_MS): number {
    return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs)
}

/**
 * Retry an async call with exponential backoff.
 *
 * @param fn    Zero-argument async function wrapping the call
 * @param label Short label for log lines (e.g. 'groq-draft', 'telegram-send')
 */
export async function withRetry<T>(fn: () => Promise<T>, label: string, opts: RetryOptions = {}): Promise<T> {
    const maxRetries = opts.maxRetries ?? MAX_RETRIES
    const sleep = opts.sleep ?? delay
    let lastErr: unknown

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
        try {
            return await fn()
        } catch (err) {
            lastErr = err

            if (attempt === maxRetries || !isRetryable(err)) {
                throw err
            }

            const waitMs = backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs)
            console.warn(
                `[retry] ${label} attempt ${attempt + 1}/${maxRetries} failed` +
                ` (status: ${errorStatus(err) ?? '?'}), retrying in ${waitMs}ms`
            )
            await sleep(waitMs)
        }
    }

    throw lastErr
}
