/**
 * Exponential backoff for generative provider calls.
 *
 * Retries transient failures only: rate limits (429), server errors
 * (500/502/503) and network-level errors (ECONNRESET, ETIMEDOUT, fetch failed).
 *
 *   maxRetries: 2  (3 total attempts)
 *   baseDelayMs: 500
 *   maxDelayMs: 5000
 *
 * An aborted signal stops retrying and rethrows the last error.
 */

const RETRYABLE_STATUS = new Set([429, 500, 502, 503])
const BASE_DELAY_MS = 500
const MAX_DELAY_MS = 5000
const MAX_RETRIES = 2

export function statusOf(err: unknown): number | undefined {
    if (!err || typeof err !== 'object') return undefined
    if ('status' in err && typeof err.status === 'number') return err.status
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode
    return undefined
}

export function isRetryable(err: unknown): boolean {
    const status = statusOf(err)
    if (status !== undefined) return RETRYABLE_STATUS.has(status)
    if (err instanceof Error) {
        if (err.name === 'AbortError') return false
        const msg = err.message
        return (
            msg.includes('ECONNRESET') ||
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

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * @param fn    Zero-argument async function wrapping one provider call
 * @param label Short label for log lines (e.g. 'groq-70b', 'gemini-flash')
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    label: string,
    signal?: AbortSignal,
): Promise<T> {
    let lastErr: unknown

    for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
        try {
            return await fn()
        } catch (err) {
            lastErr = err

            if (attempt === MAX_RETRIES || !isRetryable(err) || signal?.aborted) {
                throw err
            }

            const waitMs = Math.min(BASE_DELAY_MS * Math.pow(2, attempt), MAX_DELAY_MS)
            console.warn(
                `[retry] ${label} attempt ${attempt + 1}/${MAX_RETRIES} failed` +
                ` (status: ${statusOf(err) ?? '?'}), retrying in ${waitMs}ms`
            )
            await delay(waitMs)
        }
    }

    throw lastErr
}
