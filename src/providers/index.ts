// src/providers/index.ts
export * from './types.js'
export * from './errors.js'
export * from './backend.js'
export * from './factory.js'
export { AnthropicProvider } from './anthropic.js'
export { OpenAIProvider } from './openai.js'
export { GeminiProvider } from './gemini.js'
export { OllamaProvider, type OllamaOptions } from './ollama.js'
