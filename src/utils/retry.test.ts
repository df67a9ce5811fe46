import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { isRetryable, withRetry } from './retry.js'

describe('withRetry', () => {
    beforeEach(() => {
        vi.useFakeTimers()
        vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    })

    afterEach(() => {
        vi.useRealTimers()
        vi.restoreAllMocks()
    })

    it('returns result immediately on success', async () => {
        const fn = vi.fn().mockResolvedValue('ok')
        const result = await withRetry(fn, 'test')
        expect(result).toBe('ok')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('retries on 429 and succeeds on second attempt', async () => {
        const rateErr = Object.assign(new Error('rate limited'), { status: 429 })
        const fn = vi.fn()
            .mockRejectedValueOnce(rateErr)
            .mockResolvedValueOnce('recovered')

        const promise = withRetry(fn, 'test-429')
        await vi.runAllTimersAsync()

        expect(await promise).toBe('recovered')
        expect(fn).toHaveBeenCalledTimes(2)
    })

    it('retries on 503 up to the limit then throws', async () => {
        const serverErr = Object.assign(new Error('service unavailable'), { status: 503 })
        const fn = vi.fn().mockRejectedValue(serverErr)

        const promise = withRetry(fn, 'test-503').catch(e => e)
        await vi.runAllTimersAsync()

        expect(await promise).toMatchObject({ status: 503 })
        expect(fn).toHaveBeenCalledTimes(3)
    })

    it('does not retry on 401', async () => {
        const authErr = Object.assign(new Error('unauthorized'), { status: 401 })
        const fn = vi.fn().mockRejectedValue(authErr)

        await expect(withRetry(fn, 'test-401')).rejects.toMatchObject({ status: 401 })
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('retries on fetch failed (network error)', async () => {
        const fn = vi.fn()
            .mockRejectedValueOnce(new Error('fetch failed'))
            .mockResolvedValueOnce('back online')

        const promise = withRetry(fn, 'test-network')
        await vi.runAllTimersAsync()

        expect(await promise).toBe('back online')
        expect(fn).toHaveBeenCalledTimes(2)
    })

    it('stops retrying once the signal is aborted', async () => {
        const controller = new AbortController()
        controller.abort()
        const fn = vi.fn().mockRejectedValue(Object.assign(new Error('busy'), { status: 503 }))

        await expect(withRetry(fn, 'test-abort', controller.signal)).rejects.toMatchObject({ status: 503 })
        expect(fn).toHaveBeenCalledTimes(1)
    })
})

describe('isRetryable', () => {
    it('reads statusCode as well as status', () => {
        expect(isRetryable({ statusCode: 502 })).toBe(true)
        expect(isRetryable({ statusCode: 404 })).toBe(false)
    })

    it('never retries an abort', () => {
        const abort = new Error('fetch failed')
        abort.name = 'AbortError'
        expect(isRetryable(abort)).toBe(false)
    })
})
