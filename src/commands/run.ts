import { Command } from 'commander'
import chalk from 'chalk'
import ora, { type Ora } from 'ora'
import { readFile } from 'fs/promises'
import { marked } from 'marked'
import { markedTerminal } from 'marked-terminal'
import { loadConfig } from '../config/loader.js'
import type { ScribeConfig } from '../config/types.js'
import { ConfigError, ScribeError } from '../errors.js'
import { createProviders } from '../providers/factory.js'
import { PROVIDER_NAMES, type ProviderName } from '../providers/types.js'
import { PromptBuilder } from '../prompt-builder/builder.js'
import type { Task } from '../prompt-builder/types.js'
import { ReviewPipeline } from '../pipeline/pipeline.js'
import type { PipelineStage } from '../pipeline/types.js'
import { ARTIFACT_TITLES, type GeneratedArtifact } from '../reporter/types.js'
import { AzureDevOpsChangeSource } from '../sources/azure-devops.js'
import { JiraIssueSource } from '../sources/jira.js'
import type { IssueSource } from '../sources/types.js'
import { OutputWriter } from '../writer/output-writer.js'

marked.use(markedTerminal({
  reflowText: true,
  width: 80
}))

const PREVIEW_LINES = 20

const STAGE_LABELS: Record<PipelineStage, string> = {
  providers: 'Checking providers',
  fetch: 'Fetching issue and pull request',
  aggregate: 'Aggregating context',
  prompt: 'Building prompts',
  generate: 'Generating',
  write: 'Writing outputs'
}

interface RunOptions {
  config?: string
  issue?: string
  docs: boolean
  review: boolean
  docPrompt?: string
  reviewPrompt?: string
  providers?: string
  sequential?: boolean
  outputDir?: string
  preview?: boolean
}

export function parseChangeId(value: string): number {
  const changeId = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(changeId) || changeId <= 0) {
    throw new ConfigError(`Invalid pull request id: ${value}`, { pr: value })
  }
  return changeId
}

export function parseProviderList(value: string): ProviderName[] {
  const names = value.split(',').map(s => s.trim()).filter(s => s)
  const result: ProviderName[] = []
  for (const name of names) {
    const known = PROVIDER_NAMES.find(p => p === name)
    if (!known) {
      throw new ConfigError(`Unknown provider: ${name} (expected one of ${PROVIDER_NAMES.join(', ')})`, { provider: name })
    }
    result.push(known)
  }
  if (result.length === 0) {
    throw new ConfigError('--providers needs at least one provider name')
  }
  return result
}

export function selectTasks(config: ScribeConfig, options: Pick<RunOptions, 'docs' | 'review'>): Task[] {
  const tasks: Task[] = []
  if (options.docs && config.generation.documentation) tasks.push('documentation')
  if (options.review && config.generation.code_review) tasks.push('code-review')
  return tasks
}

function createIssueSource(config: ScribeConfig): IssueSource | undefined {
  const jira = config.sources.jira
  if (!jira?.url || !jira.email || !jira.api_token) return undefined
  return new JiraIssueSource({ url: jira.url, email: jira.email, apiToken: jira.api_token })
}

function createChangeSource(config: ScribeConfig): AzureDevOpsChangeSource {
  const azure = config.sources.azure_devops
  if (!azure?.organization || !azure.project || !azure.pat) {
    throw new ConfigError('Azure DevOps is not configured (set AZDO_ORGANIZATION, AZDO_PROJECT and AZDO_PAT)')
  }
  return new AzureDevOpsChangeSource({
    organization: azure.organization,
    project: azure.project,
    pat: azure.pat,
    baseUrl: azure.base_url
  })
}

async function readPromptFile(path: string | undefined): Promise<string | undefined> {
  if (!path) return undefined
  try {
    return await readFile(path, 'utf-8')
  } catch (error) {
    throw new ConfigError(`Cannot read prompt file ${path}`, { path }, { cause: error })
  }
}

async function printPreview(artifact: GeneratedArtifact): Promise<void> {
  const lines = artifact.content.trim().split('\n')
  const head = lines.slice(0, PREVIEW_LINES).join('\n')
  console.log(chalk.cyan.bold(`\n┌─ ${ARTIFACT_TITLES[artifact.kind]} `) + chalk.dim(`[${artifact.providerUsed}]`))
  console.log(await marked.parse(head))
  if (lines.length > PREVIEW_LINES) {
    console.log(chalk.dim(`└─ ${lines.length - PREVIEW_LINES} more lines`))
  }
}

function printError(error: unknown): void {
  if (!(error instanceof Error)) {
    console.error(chalk.red(`Error: ${String(error)}`))
    return
  }
  console.error(chalk.red(`Error: ${error.message}`))
  if (error instanceof ScribeError) {
    console.error(chalk.dim(`  stage: ${error.stage}`))
    for (const [key, value] of Object.entries(error.details)) {
      if (value === undefined) continue
      console.error(chalk.dim(`  ${key}: ${Array.isArray(value) ? value.join(', ') : String(value)}`))
    }
  }
}

export const runCommand = new Command('run')
  .description('Generate documentation and a code review for a pull request')
  .argument('<repo>', 'Repository name')
  .argument('<pr>', 'Pull request id')
  .option('-c, --config <path>', 'Path to config file')
  .option('-i, --issue <key>', 'Linked Jira issue key (e.g. PROJ-123)')
  .option('--no-docs', 'Skip the documentation artifact')
  .option('--no-review', 'Skip the code review artifact')
  .option('--doc-prompt <file>', 'Replace the documentation instructions with the contents of a file')
  .option('--review-prompt <file>', 'Replace the code review instructions with the contents of a file')
  .option('-p, --providers <list>', 'Comma-separated provider priority (anthropic,openai,google,ollama)')
  .option('--sequential', 'Generate artifacts one after another instead of concurrently')
  .option('-o, --output-dir <dir>', 'Directory for the output files')
  .option('--preview', 'Print the beginning of each artifact')
  .action(async (repo: string, pr: string, options: RunOptions) => {
    let spinner: Ora = ora('Loading configuration...').start()

    try {
      const loaded = await loadConfig(options.config)
      const config: ScribeConfig = options.providers
        ? { ...loaded, providers: { ...loaded.providers, priority: parseProviderList(options.providers) } }
        : loaded
      const changeId = parseChangeId(pr)
      const tasks = selectTasks(config, options)
      const outputDir = options.outputDir ?? config.output.dir

      const overrides: Partial<Record<Task, string>> = {
        documentation: await readPromptFile(options.docPrompt) ?? config.prompts.documentation,
        'code-review': await readPromptFile(options.reviewPrompt) ?? config.prompts.code_review
      }
      spinner.succeed('Configuration loaded')

      console.log()
      console.log(chalk.bgBlue.white.bold(` ${repo} PR #${changeId} `))
      console.log(chalk.dim(`├─ Issue: ${options.issue ?? 'none'}`))
      console.log(chalk.dim(`├─ Artifacts: ${tasks.length > 0 ? tasks.map(t => chalk.cyan(t)).join(', ') : 'none (raw data only)'}`))
      console.log(chalk.dim(`├─ Providers: ${config.providers.priority.join(' → ')}`))
      console.log(chalk.dim(`└─ Output: ${outputDir}`))
      console.log()

      const pipeline = new ReviewPipeline({
        issueSource: createIssueSource(config),
        changeSource: createChangeSource(config),
        providers: createProviders(config),
        writer: new OutputWriter(outputDir),
        promptBuilder: new PromptBuilder({
          maxCommits: config.limits.max_commits,
          maxFileChars: config.limits.max_file_chars,
          maxPromptChars: config.limits.max_prompt_chars
        }),
        retry: {
          maxRetries: config.generation.retry.max_retries,
          baseDelayMs: config.generation.retry.base_delay_ms,
          factor: config.generation.retry.factor
        },
        concurrency: options.sequential ? 'sequential' : config.generation.concurrency,
        onStageStart: (stage) => {
          spinner = ora(`${STAGE_LABELS[stage]}...`).start()
        },
        onStageComplete: (stage, detail) => {
          spinner.succeed(`${STAGE_LABELS[stage]}: ${chalk.dim(detail)}`)
        },
        onProviderSelected: (provider) => {
          spinner.text = `Generating with ${chalk.cyan(provider)}...`
        },
        onProviderFailure: (provider, error) => {
          spinner.warn(chalk.yellow(`${provider}: ${error.message}`))
          spinner = ora('Generating...').start()
        },
        onRetry: (provider, attempt, delayMs) => {
          spinner.text = `${provider} unavailable, retry ${attempt} in ${(delayMs / 1000).toFixed(1)}s...`
        }
      })

      const report = await pipeline.run({ repo, changeId, issueKey: options.issue, tasks, overrides })

      console.log(chalk.green.bold(`\n${'═'.repeat(50)}`))
      console.log(chalk.green.bold('  Outputs'))
      console.log(chalk.green.bold(`${'═'.repeat(50)}`))
      for (const result of report.writes) {
        if (result.status === 'written') {
          console.log(chalk.green(`  ✓ ${result.path}`))
        } else if (result.status === 'failed') {
          console.log(chalk.red(`  ✗ ${result.path}: ${result.error.message}`))
        }
      }
      for (const failure of report.failures) {
        console.log(chalk.red(`  ✗ ${failure.kind}: ${failure.error.message}`))
      }
      if (report.provider) {
        console.log(chalk.dim(`\n  Generated by ${report.provider}`))
      }

      if (options.preview) {
        for (const artifact of report.artifacts) {
          await printPreview(artifact)
        }
      }
      console.log()
    } catch (error) {
      spinner.fail('Error')
      printError(error)
      process.exit(1)
    }
  })
