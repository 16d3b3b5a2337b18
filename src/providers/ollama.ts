// src/providers/ollama.ts
import { z } from 'zod'
import type { AIProvider, GenerationSettings } from './types.js'
import { ProviderResponseError, fromStatus, toProviderError } from './errors.js'

export interface OllamaOptions extends GenerationSettings {
  baseUrl: string
  model: string
  readinessTimeoutMs?: number
}

const generateResponseSchema = z.object({
  response: z.string()
})

/**
 * Locally hosted model served by Ollama. Needs no credential;
 * ready when the server answers on /api/tags.
 */
export class OllamaProvider implements AIProvider {
  name = 'ollama'
  model: string
  private options: OllamaOptions
  private baseUrl: string

  constructor(options: OllamaOptions) {
    this.options = options
    this.model = options.model
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
  }

  async isReady(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(this.options.readinessTimeoutMs ?? 2000)
      })
      await response.body?.cancel()
      return response.ok
    } catch {
      return false
    }
  }

  async generate(prompt: string): Promise<string> {
    let body: unknown
    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          options: {
            num_predict: this.options.maxTokens,
            temperature: this.options.temperature
          }
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      })
      if (!response.ok) {
        const detail = await response.text()
        throw fromStatus(this.name, response.status, `Ollama returned HTTP ${response.status}: ${detail.slice(0, 200)}`)
      }
      body = await response.json()
    } catch (error) {
      throw toProviderError(this.name, error)
    }

    const parsed = generateResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new ProviderResponseError(this.name, 'Malformed response from Ollama', {}, { cause: parsed.error })
    }
    if (!parsed.data.response.trim()) {
      throw new ProviderResponseError(this.name, `Empty response from ${this.model}`)
    }
    return parsed.data.response
  }
}
