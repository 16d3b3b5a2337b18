// tests/providers/backend.test.ts
import { describe, it, expect, vi } from 'vitest'
import { GenerationBackend } from '../../src/providers/backend.js'
import {
  AuthError,
  NetworkError,
  NoProviderConfiguredError,
  ProviderResponseError,
  ProvidersExhaustedError,
  RateLimitError
} from '../../src/providers/errors.js'
import type { AIProvider } from '../../src/providers/types.js'

function mockProvider(name: string, generate: (prompt: string) => Promise<string>, ready = true): AIProvider & {
  generate: ReturnType<typeof vi.fn>
  isReady: ReturnType<typeof vi.fn>
} {
  return {
    name,
    model: `${name}-model`,
    isReady: vi.fn().mockResolvedValue(ready),
    generate: vi.fn().mockImplementation(generate)
  }
}

const noSleep = () => Promise.resolve()

describe('GenerationBackend', () => {
  describe('prepare', () => {
    it('should return eligible providers in priority order', async () => {
      const backend = new GenerationBackend([
        mockProvider('a', async () => 'x', false),
        mockProvider('b', async () => 'x'),
        mockProvider('c', async () => 'x')
      ])

      expect(await backend.prepare()).toEqual(['b', 'c'])
    })

    it('should throw NoProviderConfiguredError before any generate call', async () => {
      const provider = mockProvider('a', async () => 'x', false)
      const backend = new GenerationBackend([provider])

      await expect(backend.generate('prompt')).rejects.toBeInstanceOf(NoProviderConfiguredError)
      expect(provider.generate).not.toHaveBeenCalled()
    })

    it('should treat a throwing readiness check as not ready', async () => {
      const broken: AIProvider = {
        name: 'broken',
        model: 'm',
        isReady: vi.fn().mockRejectedValue(new Error('boom')),
        generate: vi.fn()
      }
      const backend = new GenerationBackend([broken, mockProvider('ok', async () => 'x')])

      expect(await backend.prepare()).toEqual(['ok'])
    })
  })

  describe('generate', () => {
    it('should use the first eligible provider', async () => {
      const first = mockProvider('first', async () => 'from first')
      const second = mockProvider('second', async () => 'from second')
      const backend = new GenerationBackend([first, second])

      expect(await backend.generate('hello')).toEqual({ text: 'from first', provider: 'first' })
      expect(first.generate).toHaveBeenCalledWith('hello')
      expect(second.generate).not.toHaveBeenCalled()
    })

    it('should retry rate limits with exponential backoff', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined)
      let calls = 0
      const provider = mockProvider('p', async () => {
        calls++
        if (calls < 3) throw new RateLimitError('p', 'slow down')
        return 'done'
      })
      const backend = new GenerationBackend([provider], {
        sleep,
        retry: { maxRetries: 2, baseDelayMs: 100, factor: 3 }
      })

      expect(await backend.generate('x')).toEqual({ text: 'done', provider: 'p' })
      expect(sleep.mock.calls).toEqual([[100], [300]])
    })

    it('should fall back after retries are exhausted', async () => {
      const onRetry = vi.fn()
      const flaky = mockProvider('flaky', async () => { throw new NetworkError('flaky', 'timeout') })
      const stable = mockProvider('stable', async () => 'ok')
      const backend = new GenerationBackend([flaky, stable], { sleep: noSleep, onRetry })

      expect(await backend.generate('x')).toEqual({ text: 'ok', provider: 'stable' })
      expect(flaky.generate).toHaveBeenCalledTimes(3)
      expect(onRetry).toHaveBeenCalledTimes(2)
      expect(onRetry.mock.calls[1].slice(0, 3)).toEqual(['flaky', 2, 2000])
    })

    it('should not retry a malformed response', async () => {
      const bad = mockProvider('bad', async () => { throw new ProviderResponseError('bad', 'garbage') })
      const good = mockProvider('good', async () => 'ok')
      const backend = new GenerationBackend([bad, good], { sleep: noSleep })

      expect((await backend.generate('x')).provider).toBe('good')
      expect(bad.generate).toHaveBeenCalledTimes(1)
    })

    it('should treat an empty response as a failure', async () => {
      const empty = mockProvider('empty', async () => '   ')
      const good = mockProvider('good', async () => 'ok')
      const backend = new GenerationBackend([empty, good], { sleep: noSleep })

      expect((await backend.generate('x')).provider).toBe('good')
    })

    it('should map SDK errors with a status onto the error family', async () => {
      const limited = mockProvider('limited', async () => {
        throw Object.assign(new Error('Too many requests'), { status: 429 })
      })
      const sleep = vi.fn().mockResolvedValue(undefined)
      const backend = new GenerationBackend([limited], { sleep, retry: { maxRetries: 1 } })

      await expect(backend.generate('x')).rejects.toBeInstanceOf(ProvidersExhaustedError)
      expect(limited.generate).toHaveBeenCalledTimes(2)
      expect(sleep).toHaveBeenCalledTimes(1)
    })

    it('should report every provider failure when all are exhausted', async () => {
      const a = mockProvider('a', async () => { throw new ProviderResponseError('a', 'bad a') })
      const b = mockProvider('b', async () => { throw new AuthError('b', 'bad key') })
      const backend = new GenerationBackend([a, b], { sleep: noSleep })

      let caught: unknown
      try {
        await backend.generate('x')
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(ProvidersExhaustedError)
      if (!(caught instanceof ProvidersExhaustedError)) return
      expect(caught.failures.map(f => f.provider)).toEqual(['a', 'b'])
      expect(caught.stage).toBe('provider')
    })
  })

  describe('generateAll', () => {
    it('should run every task on the same provider', async () => {
      const provider = mockProvider('p', async prompt => `echo: ${prompt}`)
      const backend = new GenerationBackend([provider])

      const outcomes = await backend.generateAll([
        { id: 'documentation', prompt: 'doc' },
        { id: 'code-review', prompt: 'review' }
      ])

      expect(outcomes).toEqual([
        { id: 'documentation', ok: true, text: 'echo: doc', provider: 'p' },
        { id: 'code-review', ok: true, text: 'echo: review', provider: 'p' }
      ])
    })

    it('should run tasks concurrently by default', async () => {
      let active = 0
      let peak = 0
      const provider = mockProvider('p', async () => {
        active++
        peak = Math.max(peak, active)
        await new Promise(resolve => setTimeout(resolve, 5))
        active--
        return 'ok'
      })

      await new GenerationBackend([provider]).generateAll([
        { id: 'one', prompt: '1' },
        { id: 'two', prompt: '2' }
      ])

      expect(peak).toBe(2)
    })

    it('should run tasks one at a time in sequential mode', async () => {
      let active = 0
      let peak = 0
      const provider = mockProvider('p', async () => {
        active++
        peak = Math.max(peak, active)
        await new Promise(resolve => setTimeout(resolve, 5))
        active--
        return 'ok'
      })

      await new GenerationBackend([provider], { concurrency: 'sequential' }).generateAll([
        { id: 'one', prompt: '1' },
        { id: 'two', prompt: '2' }
      ])

      expect(peak).toBe(1)
    })

    it('should move the whole task set on when one task exhausts its retries', async () => {
      const primary = mockProvider('primary', async prompt => {
        if (prompt === 'review') throw new RateLimitError('primary', 'slow down')
        return 'primary doc'
      })
      const secondary = mockProvider('secondary', async prompt => `secondary: ${prompt}`)
      const backend = new GenerationBackend([primary, secondary], { sleep: noSleep })

      const outcomes = await backend.generateAll([
        { id: 'documentation', prompt: 'doc' },
        { id: 'code-review', prompt: 'review' }
      ])

      expect(outcomes).toEqual([
        { id: 'documentation', ok: true, text: 'secondary: doc', provider: 'secondary' },
        { id: 'code-review', ok: true, text: 'secondary: review', provider: 'secondary' }
      ])
      // one doc call plus the review with its two retries
      expect(primary.generate).toHaveBeenCalledTimes(4)
      expect(secondary.generate.mock.calls).toEqual([['doc'], ['review']])
      expect(backend.pinnedProvider).toBe('secondary')
    })

    it('should keep the first partial result when no provider completes every task', async () => {
      const primary = mockProvider('primary', async prompt => {
        if (prompt === 'review') throw new ProviderResponseError('primary', 'bad review')
        return 'doc text'
      })
      const secondary = mockProvider('secondary', async () => { throw new ProviderResponseError('secondary', 'down') })
      const backend = new GenerationBackend([primary, secondary], { sleep: noSleep })

      const outcomes = await backend.generateAll([
        { id: 'documentation', prompt: 'doc' },
        { id: 'code-review', prompt: 'review' }
      ])

      expect(outcomes[0]).toEqual({ id: 'documentation', ok: true, text: 'doc text', provider: 'primary' })
      const review = outcomes[1]
      expect(review.ok).toBe(false)
      if (review.ok) return
      expect(review.error).toBeInstanceOf(ProvidersExhaustedError)
      expect(review.error.message).toBe(
        'All eligible providers failed for code-review ' +
        '(primary: ProviderResponseError: bad review; secondary: ProviderResponseError: down)'
      )
      expect(backend.pinnedProvider).toBe('primary')
    })

    it('should stop retrying on a provider whose key was rejected by a concurrent task', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined)
      const locked = mockProvider('locked', async prompt => {
        if (prompt === 'doc') throw new AuthError('locked', 'invalid key')
        throw new NetworkError('locked', 'timeout')
      })
      const open = mockProvider('open', async prompt => `open: ${prompt}`)
      const backend = new GenerationBackend([locked, open], { sleep })

      const outcomes = await backend.generateAll([
        { id: 'documentation', prompt: 'doc' },
        { id: 'code-review', prompt: 'review' }
      ])

      expect(outcomes.map(o => o.ok && o.provider)).toEqual(['open', 'open'])
      expect(locked.generate).toHaveBeenCalledTimes(2)
      expect(sleep).not.toHaveBeenCalled()
    })

    it('should move every task to the next provider when none succeeded', async () => {
      const down = mockProvider('down', async () => { throw new ProviderResponseError('down', 'nope') })
      const up = mockProvider('up', async prompt => `up: ${prompt}`)
      const selected: string[] = []
      const backend = new GenerationBackend([down, up], {
        sleep: noSleep,
        onProviderSelected: name => selected.push(name)
      })

      const outcomes = await backend.generateAll([
        { id: 'documentation', prompt: 'doc' },
        { id: 'code-review', prompt: 'review' }
      ])

      expect(outcomes.map(o => o.ok && o.provider)).toEqual(['up', 'up'])
      expect(up.generate.mock.calls).toEqual([['doc'], ['review']])
      expect(selected).toEqual(['down', 'up'])
    })

    it('should keep using the pinned provider on later calls', async () => {
      let primaryCalls = 0
      const primary = mockProvider('primary', async () => {
        primaryCalls++
        if (primaryCalls > 1) throw new ProviderResponseError('primary', 'gone')
        return 'first'
      })
      const secondary = mockProvider('secondary', async () => 'second')
      const backend = new GenerationBackend([primary, secondary], { sleep: noSleep })

      expect((await backend.generate('a')).provider).toBe('primary')
      await expect(backend.generate('b')).rejects.toBeInstanceOf(ProvidersExhaustedError)
      expect(secondary.generate).not.toHaveBeenCalled()
    })

    it('should mark a provider ineligible after an auth failure', async () => {
      const onProviderFailure = vi.fn()
      const locked = mockProvider('locked', async () => { throw new AuthError('locked', 'invalid key') })
      const open = mockProvider('open', async () => 'ok')
      const backend = new GenerationBackend([locked, open], {
        sleep: noSleep,
        concurrency: 'sequential',
        onProviderFailure
      })

      const outcomes = await backend.generateAll([
        { id: 'one', prompt: '1' },
        { id: 'two', prompt: '2' }
      ])

      expect(outcomes.every(o => o.ok)).toBe(true)
      // The second task is not sent once the credential was rejected
      expect(locked.generate).toHaveBeenCalledTimes(1)
      expect(onProviderFailure).toHaveBeenCalledTimes(2)
      expect(onProviderFailure.mock.calls[0][0]).toBe('locked')
    })
  })
})
