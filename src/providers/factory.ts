// src/providers/factory.ts
import type { AIProvider, GenerationSettings, ProviderName } from './types.js'
import type { ScribeConfig } from '../config/types.js'
import { AnthropicProvider } from './anthropic.js'
import { OpenAIProvider } from './openai.js'
import { GeminiProvider } from './gemini.js'
import { OllamaProvider } from './ollama.js'

export function getGenerationSettings(config: ScribeConfig): GenerationSettings {
  return {
    timeoutMs: config.generation.timeout_ms,
    maxTokens: config.generation.max_tokens,
    temperature: config.generation.temperature
  }
}

export function createProvider(name: ProviderName, config: ScribeConfig): AIProvider {
  const settings = getGenerationSettings(config)

  switch (name) {
    case 'anthropic': {
      const { api_key, model } = config.providers.anthropic
      return new AnthropicProvider({ ...settings, apiKey: api_key ?? '', model })
    }
    case 'openai': {
      const { api_key, model } = config.providers.openai
      return new OpenAIProvider({ ...settings, apiKey: api_key ?? '', model })
    }
    case 'google': {
      const { api_key, model } = config.providers.google
      return new GeminiProvider({ ...settings, apiKey: api_key ?? '', model })
    }
    case 'ollama': {
      const { base_url, model } = config.providers.ollama
      return new OllamaProvider({ ...settings, baseUrl: base_url, model })
    }
  }
}

/**
 * One provider per entry of `providers.priority`, in that order.
 * Duplicate entries keep their first position.
 */
export function createProviders(config: ScribeConfig): AIProvider[] {
  const names = [...new Set(config.providers.priority)]
  return names.map(name => createProvider(name, config))
}
