// src/providers/anthropic.ts
import Anthropic from '@anthropic-ai/sdk'
import type { AIProvider, ProviderOptions } from './types.js'
import { isConfiguredKey } from './types.js'
import { NetworkError, ProviderResponseError, toProviderError } from './errors.js'

export class AnthropicProvider implements AIProvider {
  name = 'anthropic'
  model: string
  private options: ProviderOptions
  private client: Anthropic | null = null

  constructor(options: ProviderOptions) {
    this.options = options
    this.model = options.model
  }

  async isReady(): Promise<boolean> {
    return isConfiguredKey(this.options.apiKey)
  }

  private getClient(): Anthropic {
    if (!this.client) {
      // Retries belong to the generation backend
      this.client = new Anthropic({
        apiKey: this.options.apiKey,
        timeout: this.options.timeoutMs,
        maxRetries: 0
      })
    }
    return this.client
  }

  async generate(prompt: string): Promise<string> {
    const parts: string[] = []
    let stopReason: string | undefined
    try {
      const response = await this.getClient().messages.create({
        model: this.model,
        max_tokens: this.options.maxTokens,
        temperature: this.options.temperature,
        messages: [{ role: 'user', content: prompt }]
      })
      for (const block of response.content) {
        if (block.type === 'text') parts.push(block.text)
      }
      stopReason = response.stop_reason ?? undefined
    } catch (error) {
      if (error instanceof Anthropic.APIConnectionError) {
        throw new NetworkError(this.name, error.message, {}, { cause: error })
      }
      throw toProviderError(this.name, error)
    }

    const text = parts.join('')
    if (!text.trim()) {
      throw new ProviderResponseError(this.name, `Empty response from ${this.model}`, { stopReason })
    }
    return text
  }
}
