// src/config/loader.ts
import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { config as loadDotenv } from 'dotenv'
import { ConfigError, describeError } from '../errors.js'
import type { ScribeConfig } from './types.js'

export type Env = Record<string, string | undefined>

export function getConfigPath(baseDir?: string): string {
  return join(baseDir || homedir(), '.pr-scribe', 'config.yaml')
}

const apiProviderSchema = (model: string) => z.object({
  api_key: z.string().optional(),
  model: z.string().min(1).default(model)
}).default({})

const configSchema = z.object({
  providers: z.object({
    priority: z.array(z.enum(['anthropic', 'openai', 'google', 'ollama']))
      .min(1)
      .default(['anthropic', 'openai', 'ollama']),
    anthropic: apiProviderSchema('claude-sonnet-4-5'),
    openai: apiProviderSchema('gpt-4o'),
    google: apiProviderSchema('gemini-1.5-pro'),
    ollama: z.object({
      base_url: z.string().url().default('http://localhost:11434'),
      model: z.string().min(1).default('llama3.2:3b')
    }).default({})
  }).default({}),
  sources: z.object({
    jira: z.object({
      url: z.string().default(''),
      email: z.string().default(''),
      api_token: z.string().default('')
    }).optional(),
    azure_devops: z.object({
      organization: z.string().default(''),
      project: z.string().default(''),
      pat: z.string().default(''),
      base_url: z.string().url().optional()
    }).optional()
  }).default({}),
  generation: z.object({
    documentation: z.boolean().default(true),
    code_review: z.boolean().default(true),
    concurrency: z.enum(['parallel', 'sequential']).default('parallel'),
    timeout_ms: z.number().int().positive().default(120000),
    max_tokens: z.number().int().positive().default(8000),
    temperature: z.number().min(0).max(2).default(0.3),
    retry: z.object({
      max_retries: z.number().int().min(0).default(2),
      base_delay_ms: z.number().min(0).default(1000),
      factor: z.number().min(1).default(2)
    }).default({})
  }).default({}),
  prompts: z.object({
    documentation: z.string().nullish().transform(v => v ?? undefined),
    code_review: z.string().nullish().transform(v => v ?? undefined)
  }).default({}),
  limits: z.object({
    max_commits: z.number().int().min(0).default(50),
    max_file_chars: z.number().int().positive().default(4000),
    max_prompt_chars: z.number().int().positive().default(60000)
  }).default({}),
  output: z.object({
    dir: z.string().min(1).default('.')
  }).default({})
})

/**
 * Replace `${VAR}` in every string of a parsed document.
 * Unset variables expand to an empty string.
 */
export function expandEnvVars(value: unknown, env: Env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '')
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVars(item, env))
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, expandEnvVars(item, env)])
    )
  }
  return value
}

/**
 * Validate an already-parsed document and fill in credentials from the
 * standard environment variables where the document leaves them empty.
 */
export function resolveConfig(raw: unknown, env: Env = process.env, source = 'config'): ScribeConfig {
  const parsed = configSchema.safeParse(expandEnvVars(raw ?? {}, env))
  if (!parsed.success) {
    const paths = parsed.error.issues.map(issue => issue.path.join('.') || '(root)')
    const summary = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid ${source}: ${summary}`, { paths }, { cause: parsed.error })
  }

  const data = parsed.data
  const jira = data.sources.jira
  const azure = data.sources.azure_devops

  return {
    ...data,
    providers: {
      ...data.providers,
      anthropic: { ...data.providers.anthropic, api_key: data.providers.anthropic.api_key || env.ANTHROPIC_API_KEY },
      openai: { ...data.providers.openai, api_key: data.providers.openai.api_key || env.OPENAI_API_KEY },
      google: { ...data.providers.google, api_key: data.providers.google.api_key || env.GOOGLE_API_KEY }
    },
    sources: {
      jira: {
        url: jira?.url || env.JIRA_URL || '',
        email: jira?.email || env.JIRA_EMAIL || '',
        api_token: jira?.api_token || env.JIRA_API_TOKEN || ''
      },
      azure_devops: {
        organization: azure?.organization || env.AZDO_ORGANIZATION || '',
        project: azure?.project || env.AZDO_PROJECT || '',
        pat: azure?.pat || env.AZDO_PAT || '',
        base_url: azure?.base_url
      }
    }
  }
}

export interface LoadConfigOptions {
  env?: Env
  dotenvPath?: string
}

/**
 * Load the YAML config. A missing file is not an error: defaults apply and
 * credentials come from the environment (after `.env` is loaded).
 */
export async function loadConfig(configPath?: string, options: LoadConfigOptions = {}): Promise<ScribeConfig> {
  if (!options.env) {
    loadDotenv({ path: options.dotenvPath ?? join(process.cwd(), '.env') })
  }
  const env = options.env ?? process.env
  const path = configPath || getConfigPath()

  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`, { path: configPath })
    }
    return resolveConfig({}, env, 'default config')
  }

  let raw: unknown
  try {
    raw = parseYaml(await readFile(path, 'utf-8'))
  } catch (error) {
    throw new ConfigError(`Failed to parse ${path}: ${describeError(error)}`, { path }, { cause: error })
  }
  return resolveConfig(raw, env, path)
}
