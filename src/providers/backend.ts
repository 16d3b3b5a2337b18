// src/providers/backend.ts
import { setTimeout as delay } from 'timers/promises'
import type { AIProvider } from './types.js'
import {
  AuthError,
  NoProviderConfiguredError,
  ProviderError,
  ProviderResponseError,
  ProvidersExhaustedError,
  isRetryable,
  toProviderError
} from './errors.js'

export interface RetryPolicy {
  maxRetries: number   // retries after the first attempt, per provider
  baseDelayMs: number
  factor: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 1000,
  factor: 2
}

export type Concurrency = 'parallel' | 'sequential'

export interface BackendOptions {
  retry?: Partial<RetryPolicy>
  concurrency?: Concurrency
  sleep?: (ms: number) => Promise<void>
  onProviderSelected?: (provider: string) => void
  onProviderFailure?: (provider: string, error: ProviderError) => void
  onRetry?: (provider: string, attempt: number, delayMs: number, error: ProviderError) => void
}

export interface GenerationTask<K extends string = string> {
  id: K
  prompt: string
}

export type GenerationOutcome<K extends string = string> =
  | { id: K; ok: true; text: string; provider: string }
  | { id: K; ok: false; error: ProviderError }

type AttemptResult =
  | { ok: true; text: string }
  | { ok: false; error: ProviderError }

/**
 * Owns provider selection, retry and fallback for one run.
 *
 * Providers are tried in priority order with the whole task set. A provider
 * that completes every task is pinned for the rest of the run. When none
 * does, the first provider that completed any task is pinned and its results
 * stand, so the artifacts of a run never mix providers.
 */
export class GenerationBackend {
  private providers: AIProvider[]
  private retry: RetryPolicy
  private concurrency: Concurrency
  private sleep: (ms: number) => Promise<void>
  private options: BackendOptions
  private eligible: AIProvider[] | null = null
  private ineligible = new Set<string>()
  private pinned: AIProvider | null = null

  constructor(providers: AIProvider[], options: BackendOptions = {}) {
    this.providers = providers
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry }
    this.concurrency = options.concurrency ?? 'parallel'
    this.sleep = options.sleep ?? (ms => delay(ms))
    this.options = options
  }

  get pinnedProvider(): string | null {
    return this.pinned?.name ?? null
  }

  /**
   * Run every readiness predicate. Throws NoProviderConfiguredError when
   * nothing is eligible, before any generate call is made.
   */
  async prepare(): Promise<string[]> {
    const checks = await Promise.all(this.providers.map(async provider => ({
      provider,
      ready: await this.checkReady(provider)
    })))
    this.eligible = checks.filter(c => c.ready).map(c => c.provider)
    if (this.eligible.length === 0) {
      throw new NoProviderConfiguredError(this.providers.map(p => p.name))
    }
    return this.eligible.map(p => p.name)
  }

  private async checkReady(provider: AIProvider): Promise<boolean> {
    try {
      return await provider.isReady()
    } catch {
      return false
    }
  }

  async generate(prompt: string): Promise<{ text: string; provider: string }> {
    const [outcome] = await this.generateAll([{ id: 'prompt', prompt }])
    if (!outcome.ok) throw outcome.error
    return { text: outcome.text, provider: outcome.provider }
  }

  async generateAll<K extends string>(tasks: GenerationTask<K>[]): Promise<GenerationOutcome<K>[]> {
    const eligible = this.eligible ?? await this.prepareAndGet()
    const failures = new Map<K, ProviderError[]>(tasks.map(t => [t.id, []]))
    let partial: { provider: AIProvider; results: Array<[GenerationTask<K>, AttemptResult]> } | null = null

    const candidates = this.pinned ? [this.pinned] : eligible
    for (const provider of candidates) {
      if (tasks.length === 0) break
      if (this.ineligible.has(provider.name)) continue

      this.options.onProviderSelected?.(provider.name)
      const results = await this.runOnProvider(provider, tasks)

      for (const [task, result] of results) {
        if (!result.ok) {
          failures.get(task.id)?.push(result.error)
          this.options.onProviderFailure?.(provider.name, result.error)
        }
      }

      if (results.every(([, result]) => result.ok)) {
        this.pinned = provider
        return this.settle(provider, results, failures)
      }
      if (!partial && results.some(([, result]) => result.ok)) {
        partial = { provider, results }
      }
      // Some task failed here: the whole set starts over on the next provider
    }

    if (partial) {
      this.pinned = partial.provider
      return this.settle(partial.provider, partial.results, failures)
    }
    return tasks.map((task): GenerationOutcome<K> => ({
      id: task.id,
      ok: false,
      error: new ProvidersExhaustedError(task.id, failures.get(task.id) ?? [])
    }))
  }

  private settle<K extends string>(
    provider: AIProvider,
    results: Array<[GenerationTask<K>, AttemptResult]>,
    failures: Map<K, ProviderError[]>
  ): GenerationOutcome<K>[] {
    return results.map(([task, result]): GenerationOutcome<K> => result.ok
      ? { id: task.id, ok: true, text: result.text, provider: provider.name }
      : { id: task.id, ok: false, error: new ProvidersExhaustedError(task.id, failures.get(task.id) ?? []) })
  }

  private async prepareAndGet(): Promise<AIProvider[]> {
    await this.prepare()
    return this.eligible ?? []
  }

  private async runOnProvider<K extends string>(
    provider: AIProvider,
    tasks: GenerationTask<K>[]
  ): Promise<Array<[GenerationTask<K>, AttemptResult]>> {
    if (this.concurrency === 'parallel') {
      return Promise.all(tasks.map(async (task): Promise<[GenerationTask<K>, AttemptResult]> => [task, await this.attempt(provider, task)]))
    }

    const results: Array<[GenerationTask<K>, AttemptResult]> = []
    for (const task of tasks) {
      if (this.ineligible.has(provider.name)) {
        results.push([task, { ok: false, error: this.rejectedEarlier(provider) }])
        continue
      }
      results.push([task, await this.attempt(provider, task)])
    }
    return results
  }

  private rejectedEarlier(provider: AIProvider): AuthError {
    return new AuthError(provider.name, `${provider.name} rejected its credentials earlier in this run`)
  }

  private async attempt(provider: AIProvider, task: GenerationTask): Promise<AttemptResult> {
    for (let attempt = 0; ; attempt++) {
      let failure: ProviderError
      try {
        const text = await provider.generate(task.prompt)
        if (text.trim()) return { ok: true, text }
        failure = new ProviderResponseError(provider.name, `Empty response for ${task.id}`)
      } catch (error) {
        failure = toProviderError(provider.name, error)
      }

      if (failure instanceof AuthError) {
        this.ineligible.add(provider.name)
        return { ok: false, error: failure }
      }
      if (!isRetryable(failure) || attempt >= this.retry.maxRetries) {
        return { ok: false, error: failure }
      }
      // Another task may have had its credential rejected meanwhile
      if (this.ineligible.has(provider.name)) {
        return { ok: false, error: this.rejectedEarlier(provider) }
      }

      const waitMs = this.retry.baseDelayMs * this.retry.factor ** attempt
      this.options.onRetry?.(provider.name, attempt + 1, waitMs, failure)
      await this.sleep(waitMs)
      if (this.ineligible.has(provider.name)) {
        return { ok: false, error: this.rejectedEarlier(provider) }
      }
    }
  }
}
