// src/providers/types.ts

export type ProviderName = 'anthropic' | 'openai' | 'google' | 'ollama'

export const PROVIDER_NAMES: readonly ProviderName[] = ['anthropic', 'openai', 'google', 'ollama']

/**
 * A generation backend. `isReady` is the readiness predicate
 * (credential present, or local service reachable).
 */
export interface AIProvider {
  name: string
  model: string
  isReady(): Promise<boolean>
  generate(prompt: string): Promise<string>
}

export interface GenerationSettings {
  timeoutMs: number
  maxTokens: number
  temperature: number
}

export interface ProviderOptions extends GenerationSettings {
  apiKey: string
  model: string
}

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  timeoutMs: 120000,
  maxTokens: 8000,
  temperature: 0.3
}

// Keys copied from a .env template are not credentials
const PLACEHOLDER_KEY = /^(your[_-].*|<.*>|changeme|xxx+)$/i

export function isConfiguredKey(key: string | undefined): key is string {
  if (!key) return false
  const trimmed = key.trim()
  return trimmed.length > 0 && !PLACEHOLDER_KEY.test(trimmed)
}
