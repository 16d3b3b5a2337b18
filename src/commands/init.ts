import { Command } from 'commander'
import { initConfig, AVAILABLE_PROVIDERS } from '../config/init.js'
import type { ProviderName } from '../providers/types.js'
import chalk from 'chalk'
import { createInterface } from 'readline'

export function parseProviderSelection(answer: string): ProviderName[] {
  const selections = answer
    .split(',')
    .map(s => s.trim())
    .filter(s => s)
    .map(s => parseInt(s, 10))
    .filter(n => !isNaN(n) && n >= 1 && n <= AVAILABLE_PROVIDERS.length)
    .map(n => AVAILABLE_PROVIDERS[n - 1].id)

  // Remove duplicates, keep first position
  return [...new Set(selections)]
}

async function selectProviders(): Promise<ProviderName[]> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout
  })

  const question = (prompt: string): Promise<string> => {
    return new Promise(resolve => {
      rl.question(prompt, resolve)
    })
  }

  console.log(chalk.cyan('\nSelect generation providers in priority order:\n'))

  AVAILABLE_PROVIDERS.forEach((provider, index) => {
    const apiNote = provider.envVar
      ? chalk.yellow(' [requires API key]')
      : chalk.green(' [local]')
    console.log(`  ${chalk.bold(index + 1)}. ${provider.name}${apiNote}`)
    console.log(`     ${chalk.dim(provider.description)}`)
  })

  console.log()
  const answer = await question(
    chalk.white('Enter provider numbers separated by comma, first tried first (e.g., 1,4): ')
  )

  rl.close()
  return parseProviderSelection(answer)
}

export const initCommand = new Command('init')
  .description('Initialize pr-scribe configuration')
  .option('-y, --yes', 'Use default providers (anthropic, openai, ollama)')
  .action(async (options: { yes?: boolean }) => {
    try {
      let selectedProviders: ProviderName[] | undefined

      if (!options.yes) {
        const picked = await selectProviders()

        if (picked.length === 0) {
          console.log(chalk.yellow('\nNo providers selected. Using defaults (anthropic, openai, ollama)'))
        } else {
          selectedProviders = picked
          console.log(chalk.cyan('\nProvider priority:'))
          AVAILABLE_PROVIDERS
            .filter(p => picked.includes(p.id))
            .sort((a, b) => picked.indexOf(a.id) - picked.indexOf(b.id))
            .forEach(p => console.log(`  - ${p.name} (${p.model})`))

          const envVars = AVAILABLE_PROVIDERS
            .filter(p => picked.includes(p.id) && p.envVar)
            .map(p => p.envVar)
          if (envVars.length > 0) {
            console.log(chalk.yellow('\nNote: You will need to set these environment variables:'))
            envVars.forEach(v => console.log(`  - ${v}`))
          }
        }
      }

      const path = initConfig(undefined, selectedProviders)
      console.log(chalk.green(`\n✓ Config created at: ${path}`))
      console.log(chalk.dim('Jira and Azure DevOps credentials are read from JIRA_* and AZDO_* variables or a .env file.'))
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`))
      }
      process.exit(1)
    }
  })
