// src/providers/errors.ts
import { ScribeError, describeError, type ErrorDetails } from '../errors.js'

export class ProviderError extends ScribeError {
  readonly provider: string

  constructor(provider: string, message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super('provider', message, { provider, ...details }, options)
    this.provider = provider
  }
}

/** Credential rejected. The provider is dropped for the rest of the run. */
export class AuthError extends ProviderError {}

export class RateLimitError extends ProviderError {}

/** Connection failure or per-call timeout */
export class NetworkError extends ProviderError {}

/** Malformed or empty response */
export class ProviderResponseError extends ProviderError {}

export class NoProviderConfiguredError extends ProviderError {
  constructor(checked: string[]) {
    super(
      'none',
      checked.length > 0
        ? `No AI provider is available (checked: ${checked.join(', ')}). Set ANTHROPIC_API_KEY, OPENAI_API_KEY or GOOGLE_API_KEY, or start Ollama locally.`
        : 'No AI provider is configured in providers.priority',
      { checked }
    )
  }
}

export class ProvidersExhaustedError extends ProviderError {
  readonly failures: ProviderError[]

  constructor(task: string, failures: ProviderError[]) {
    const summary = failures.map(f => `${f.provider}: ${f.name}: ${f.message}`)
    super(
      failures.map(f => f.provider).join(',') || 'none',
      `All eligible providers failed for ${task}${summary.length > 0 ? ` (${summary.join('; ')})` : ''}`,
      { task, failures: summary }
    )
    this.failures = failures
  }
}

export function isRetryable(error: ProviderError): boolean {
  return error instanceof RateLimitError || error instanceof NetworkError
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status
  }
  return undefined
}

const NETWORK_ERROR_NAMES = new Set(['AbortError', 'TimeoutError', 'APIConnectionError', 'APIConnectionTimeoutError', 'FetchError'])
const NETWORK_MESSAGE = /fetch failed|connection error|ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|socket hang up|timed out|timeout/i

export function fromStatus(provider: string, status: number, message: string, cause?: unknown): ProviderError {
  const details = { status }
  if (status === 401 || status === 403) return new AuthError(provider, message, details, { cause })
  if (status === 429) return new RateLimitError(provider, message, details, { cause })
  if (status === 408 || status >= 500) return new NetworkError(provider, message, details, { cause })
  return new ProviderResponseError(provider, message, details, { cause })
}

/**
 * Map whatever a provider SDK threw onto the ProviderError family.
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error

  const message = describeError(error)
  const status = statusOf(error)
  if (status !== undefined) return fromStatus(provider, status, message, error)

  if (error instanceof Error) {
    const causeName = error.cause instanceof Error ? error.cause.name : ''
    if (NETWORK_ERROR_NAMES.has(error.name) || NETWORK_ERROR_NAMES.has(causeName) || NETWORK_MESSAGE.test(message)) {
      return new NetworkError(provider, message, {}, { cause: error })
    }
  }
  return new ProviderResponseError(provider, message, {}, { cause: error })
}
