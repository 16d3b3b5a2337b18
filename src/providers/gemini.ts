// src/providers/gemini.ts
import { GoogleGenerativeAI } from '@google/generative-ai'
import type { AIProvider, ProviderOptions } from './types.js'
import { isConfiguredKey } from './types.js'
import { ProviderResponseError, toProviderError } from './errors.js'

export class GeminiProvider implements AIProvider {
  name = 'google'
  model: string
  private options: ProviderOptions

  constructor(options: ProviderOptions) {
    this.options = options
    this.model = options.model
  }

  async isReady(): Promise<boolean> {
    return isConfiguredKey(this.options.apiKey)
  }

  async generate(prompt: string): Promise<string> {
    const client = new GoogleGenerativeAI(this.options.apiKey)
    const model = client.getGenerativeModel(
      {
        model: this.model,
        generationConfig: {
          maxOutputTokens: this.options.maxTokens,
          temperature: this.options.temperature
        }
      },
      { timeout: this.options.timeoutMs }
    )

    let text: string
    try {
      const result = await model.generateContent(prompt)
      // text() throws when the candidate was blocked
      text = result.response.text()
    } catch (error) {
      throw toProviderError(this.name, error)
    }

    if (!text.trim()) {
      throw new ProviderResponseError(this.name, `Empty response from ${this.model}`)
    }
    return text
  }
}
