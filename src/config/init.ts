// src/config/init.ts
import { writeFileSync, mkdirSync, existsSync } from 'fs'
import { dirname } from 'path'
import { getConfigPath } from './loader.js'
import type { ProviderName } from '../providers/types.js'

export interface ProviderOption {
  id: ProviderName
  name: string
  model: string
  description: string
  envVar?: string
}

export const AVAILABLE_PROVIDERS: ProviderOption[] = [
  {
    id: 'anthropic',
    name: 'Claude Sonnet 4.5',
    model: 'claude-sonnet-4-5',
    description: 'Uses Anthropic API (requires ANTHROPIC_API_KEY)',
    envVar: 'ANTHROPIC_API_KEY'
  },
  {
    id: 'openai',
    name: 'GPT-4o',
    model: 'gpt-4o',
    description: 'Uses OpenAI API (requires OPENAI_API_KEY)',
    envVar: 'OPENAI_API_KEY'
  },
  {
    id: 'google',
    name: 'Gemini 1.5 Pro',
    model: 'gemini-1.5-pro',
    description: 'Uses Google AI API (requires GOOGLE_API_KEY)',
    envVar: 'GOOGLE_API_KEY'
  },
  {
    id: 'ollama',
    name: 'Ollama',
    model: 'llama3.2:3b',
    description: 'Local model served by Ollama on localhost:11434 (no API key needed)'
  }
]

export function generateConfig(selectedProviderIds: ProviderName[]): string {
  const selected = AVAILABLE_PROVIDERS.filter(p => selectedProviderIds.includes(p.id))
  // Keep the order the user picked
  selected.sort((a, b) => selectedProviderIds.indexOf(a.id) - selectedProviderIds.indexOf(b.id))

  let providersSection = `# Generation backends, tried in priority order
providers:
  priority: [${selected.map(p => p.id).join(', ')}]`
  for (const provider of selected) {
    if (provider.id === 'ollama') {
      providersSection += `
  ollama:
    base_url: http://localhost:11434
    model: ${provider.model}`
    } else {
      providersSection += `
  ${provider.id}:
    api_key: \${${provider.envVar}}
    model: ${provider.model}`
    }
  }

  return `# pr-scribe configuration

${providersSection}

# Where issues and pull requests come from
sources:
  jira:
    url: \${JIRA_URL}
    email: \${JIRA_EMAIL}
    api_token: \${JIRA_API_TOKEN}
  azure_devops:
    organization: \${AZDO_ORGANIZATION}
    project: \${AZDO_PROJECT}
    pat: \${AZDO_PAT}

generation:
  documentation: true
  code_review: true
  concurrency: parallel  # or sequential
  timeout_ms: 120000
  max_tokens: 8000
  temperature: 0.3
  retry:
    max_retries: 2
    base_delay_ms: 1000
    factor: 2

# Replace the built-in instructions for either artifact
prompts:
  documentation: null
  code_review: null

limits:
  max_commits: 50
  max_file_chars: 4000
  max_prompt_chars: 60000

output:
  dir: .
`
}

export const DEFAULT_CONFIG = generateConfig(['anthropic', 'openai', 'ollama'])

export function initConfig(baseDir?: string, selectedProviders?: ProviderName[]): string {
  const configPath = getConfigPath(baseDir)

  if (existsSync(configPath)) {
    throw new Error(`Config already exists: ${configPath}`)
  }

  const config = selectedProviders && selectedProviders.length > 0
    ? generateConfig(selectedProviders)
    : DEFAULT_CONFIG

  mkdirSync(dirname(configPath), { recursive: true })
  writeFileSync(configPath, config, 'utf-8')

  return configPath
}
