// tests/config/init.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, readFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { parse } from 'yaml'
import { generateConfig, initConfig } from '../../src/config/init.js'
import { resolveConfig } from '../../src/config/loader.js'
import { parseProviderSelection } from '../../src/commands/init.js'

describe('Config Init', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pr-scribe-init-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('should generate a config the loader accepts', () => {
    const config = resolveConfig(parse(generateConfig(['ollama', 'anthropic'])), { ANTHROPIC_API_KEY: 'test-secret' })

    expect(config.providers.priority).toEqual(['ollama', 'anthropic'])
    expect(config.providers.anthropic.api_key).toBe('test-secret')
    expect(config.providers.ollama.model).toBe('llama3.2:3b')
  })

  it('should write the config under .pr-scribe', async () => {
    const path = initConfig(tempDir, ['openai'])

    expect(path).toBe(join(tempDir, '.pr-scribe', 'config.yaml'))
    const content = await readFile(path, 'utf-8')
    expect(content).toContain('  priority: [openai]')
    expect(content).toContain('    api_key: ${OPENAI_API_KEY}')
  })

  it('should refuse to overwrite an existing config', () => {
    initConfig(tempDir)
    expect(() => initConfig(tempDir)).toThrow('Config already exists')
  })

  it('should parse a numbered provider selection', () => {
    expect(parseProviderSelection('4, 1, 4, 9, x')).toEqual(['ollama', 'anthropic'])
    expect(parseProviderSelection('')).toEqual([])
  })
})
