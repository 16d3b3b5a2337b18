// src/providers/openai.ts
import OpenAI from 'openai'
import type { AIProvider, ProviderOptions } from './types.js'
import { isConfiguredKey } from './types.js'
import { NetworkError, ProviderResponseError, toProviderError } from './errors.js'

export class OpenAIProvider implements AIProvider {
  name = 'openai'
  model: string
  private options: ProviderOptions
  private client: OpenAI | null = null

  constructor(options: ProviderOptions) {
    this.options = options
    this.model = options.model
  }

  async isReady(): Promise<boolean> {
    return isConfiguredKey(this.options.apiKey)
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.options.apiKey,
        timeout: this.options.timeoutMs,
        maxRetries: 0
      })
    }
    return this.client
  }

  async generate(prompt: string): Promise<string> {
    let content: string | null | undefined
    try {
      const response = await this.getClient().chat.completions.create({
        model: this.model,
        max_tokens: this.options.maxTokens,
        temperature: this.options.temperature,
        messages: [{ role: 'user', content: prompt }]
      })
      content = response.choices[0]?.message?.content
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionError) {
        throw new NetworkError(this.name, error.message, {}, { cause: error })
      }
      throw toProviderError(this.name, error)
    }

    if (!content || !content.trim()) {
      throw new ProviderResponseError(this.name, `Empty response from ${this.model}`)
    }
    return content
  }
}
