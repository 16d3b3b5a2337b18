// src/config/types.ts
import type { ProviderName } from '../providers/types.js'

export interface ApiProviderConfig {
  api_key?: string
  model: string
}

export interface OllamaConfig {
  base_url: string
  model: string
}

export interface JiraConfig {
  url: string
  email: string
  api_token: string
}

export interface AzureDevOpsConfig {
  organization: string
  project: string
  pat: string
  base_url?: string
}

export interface RetryConfig {
  max_retries: number
  base_delay_ms: number
  factor: number
}

export interface GenerationConfig {
  documentation: boolean
  code_review: boolean
  concurrency: 'parallel' | 'sequential'
  timeout_ms: number
  max_tokens: number
  temperature: number
  retry: RetryConfig
}

export interface LimitsConfig {
  max_commits: number
  max_file_chars: number
  max_prompt_chars: number
}

export interface ScribeConfig {
  providers: {
    priority: ProviderName[]
    anthropic: ApiProviderConfig
    openai: ApiProviderConfig
    google: ApiProviderConfig
    ollama: OllamaConfig
  }
  sources: {
    jira?: JiraConfig
    azure_devops?: AzureDevOpsConfig
  }
  generation: GenerationConfig
  prompts: {
    documentation?: string
    code_review?: string
  }
  limits: LimitsConfig
  output: {
    dir: string
  }
}
