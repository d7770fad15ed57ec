import type { RetryPolicy } from '../config/schema.js'

export type { RetryPolicy }

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    attempts: 3,
    delayMs: 1000,
    backoff: 'fixed',
    maxDelayMs: 30000,
}

export interface RetryHooks {
    /** Called before sleeping after a failed attempt that will be retried. */
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void
    sleep?: (ms: number) => Promise<void>
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

export function retryDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
    if (policy.backoff === 'fixed') return policy.delayMs
    const delay = Math.min(policy.delayMs * 2 ** (attempt - 1), policy.maxDelayMs)
    return Math.round(delay + delay * 0.1 * random())
}

/**
 * Runs `fn` up to `policy.attempts` times. `attempt` is 1-based; the error of the last
 * attempt is rethrown unchanged.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    hooks: RetryHooks = {}
): Promise<T> {
    const wait = hooks.sleep ?? sleep
    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt)
        } catch (error) {
            if (attempt >= policy.attempts) {
                throw error
            }
            const delay = retryDelay(policy, attempt)
            hooks.onRetry?.(error, attempt, delay)
            await wait(delay)
        }
    }
}
