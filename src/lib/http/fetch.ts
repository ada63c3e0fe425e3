// ============================================================
// Outbound HTTP helpers
// Every outbound request gets an explicit timeout that also
// bounds reading the body. Idempotent reads may additionally be
// retried with a linear backoff.
// ============================================================

import type { HttpConfig } from '@/lib/config'

export class TimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs} ms`)
    this.name = 'TimeoutError'
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function abortedBy(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true })
  })
}

/**
 * fetch() with an AbortController-based timeout covering both the request and
 * `read`, which consumes the response body. A timeout in either phase rejects
 * with TimeoutError; other errors propagate as-is.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController()
  const aborted = abortedBy(controller.signal)
  const timeout = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const response = await Promise.race([
      fetch(url, { ...init, signal: controller.signal }),
      aborted,
    ])
    return await Promise.race([read(response), aborted])
  } catch (error) {
    if (controller.signal.aborted) throw new TimeoutError(url, timeoutMs)
    throw error
  } finally {
    clearTimeout(timeout)
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500
}

type Attempt<T> =
  | { kind: 'retry'; status: number }
  | { kind: 'done'; value: T }
  | { kind: 'failed'; error: unknown }

/**
 * fetchWithTimeout() for idempotent reads: retries network errors, timeouts
 * (including a stalled body), 429 and 5xx responses up to `maxRetries` times.
 * The last response, failed or not, is handed to `read`; errors thrown by
 * `read` itself are not retried.
 */
export async function fetchWithRetry<T>(
  url: string,
  init: RequestInit,
  http: HttpConfig,
  read: (response: Response) => Promise<T>,
  label = 'http'
): Promise<T> {
  let lastError: unknown

  for (let attempt = 0; attempt <= http.maxRetries; attempt++) {
    if (attempt > 0) {
      await sleep(http.retryDelayMs * attempt)
    }

    const attemptRead = async (response: Response): Promise<Attempt<T>> => {
      if (isRetryableStatus(response.status) && attempt < http.maxRetries) {
        await response.body?.cancel()
        return { kind: 'retry', status: response.status }
      }
      try {
        return { kind: 'done', value: await read(response) }
      } catch (error) {
        return { kind: 'failed', error }
      }
    }

    let outcome: Attempt<T>
    try {
      outcome = await fetchWithTimeout(url, init, http.timeoutMs, attemptRead)
    } catch (error) {
      lastError = error
      if (attempt === http.maxRetries) break
      console.warn(
        `[${label}] ${url} failed (${error instanceof Error ? error.message : String(error)}), retry ${attempt + 1}/${http.maxRetries}`
      )
      continue
    }

    if (outcome.kind === 'done') return outcome.value
    if (outcome.kind === 'failed') throw outcome.error
    console.warn(`[${label}] ${url} answered ${outcome.status}, retry ${attempt + 1}/${http.maxRetries}`)
  }

  throw lastError
}

/**
 * Read a response body as text without letting a broken stream mask the
 * original failure.
 */
export async function readBodyText(response: Response): Promise<string> {
  try {
    return await response.text()
  } catch (error) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`
  }
}
