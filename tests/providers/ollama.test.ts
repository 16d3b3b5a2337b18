// tests/providers/ollama.test.ts
import { describe, it, expect, vi, afterEach } from 'vitest'
import { OllamaProvider } from '../../src/providers/ollama.js'
import { NetworkError, ProviderResponseError } from '../../src/providers/errors.js'

const options = {
  baseUrl: 'http://localhost:11434/',
  model: 'llama3.2:3b',
  timeoutMs: 1000,
  maxTokens: 256,
  temperature: 0.3
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

describe('OllamaProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should be ready when the server lists its models', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ models: [] }))
    vi.stubGlobal('fetch', fetchMock)

    expect(await new OllamaProvider(options).isReady()).toBe(true)
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:11434/api/tags')
  })

  it('should release the readiness response body', async () => {
    const response = jsonResponse({ models: [{ name: 'llama3.2:3b' }] })
    const body = response.body
    if (!body) throw new Error('expected a response body')
    const cancel = vi.spyOn(body, 'cancel')
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(response))

    expect(await new OllamaProvider(options).isReady()).toBe(true)
    expect(cancel).toHaveBeenCalledTimes(1)
  })

  it('should not be ready when the server is unreachable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')))

    expect(await new OllamaProvider(options).isReady()).toBe(false)
  })

  it('should post a non-streaming generate request', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ response: 'Generated docs' }))
    vi.stubGlobal('fetch', fetchMock)

    const text = await new OllamaProvider(options).generate('Describe a.py')

    expect(text).toBe('Generated docs')
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('http://localhost:11434/api/generate')
    expect(init.method).toBe('POST')
    expect(JSON.parse(init.body)).toEqual({
      model: 'llama3.2:3b',
      prompt: 'Describe a.py',
      stream: false,
      options: { num_predict: 256, temperature: 0.3 }
    })
  })

  it('should map a server error to a retryable network error', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('overloaded', { status: 503 })))

    await expect(new OllamaProvider(options).generate('x')).rejects.toBeInstanceOf(NetworkError)
  })

  it('should reject a malformed body', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ message: 'no response field' })))

    await expect(new OllamaProvider(options).generate('x')).rejects.toBeInstanceOf(ProviderResponseError)
  })

  it('should reject an empty response', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ response: '' })))

    await expect(new OllamaProvider(options).generate('x')).rejects.toThrow('Empty response from llama3.2:3b')
  })
})
