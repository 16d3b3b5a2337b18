// src/pipeline/pipeline.ts
import { aggregate } from '../aggregator/aggregator.js'
import type { AnalysisContext } from '../aggregator/types.js'
import { ConfigError } from '../errors.js'
import { GenerationBackend, type GenerationTask } from '../providers/backend.js'
import { PromptBuilder } from '../prompt-builder/builder.js'
import { TASKS, type Task } from '../prompt-builder/types.js'
import { createArtifact } from '../reporter/markdown.js'
import type { GeneratedArtifact } from '../reporter/types.js'
import type { ChangeData, IssueRecord } from '../sources/types.js'
import type { ArtifactFailure, PipelineOptions, PipelineStage, RunReport, RunRequest } from './types.js'

/**
 * Sources -> Aggregator -> Prompt Builder -> Backend -> Writer, once per call.
 * Reports progress only through the option callbacks.
 */
export class ReviewPipeline {
  private options: PipelineOptions
  private promptBuilder: PromptBuilder

  constructor(options: PipelineOptions) {
    this.options = options
    this.promptBuilder = options.promptBuilder ?? new PromptBuilder()
  }

  async run(request: RunRequest): Promise<RunReport> {
    const tasks = [...new Set(request.tasks)]

    // A fresh backend per run: pinning never leaks between runs
    const backend = new GenerationBackend(this.options.providers, {
      retry: this.options.retry,
      concurrency: this.options.concurrency,
      sleep: this.options.sleep,
      onProviderSelected: this.options.onProviderSelected,
      onProviderFailure: this.options.onProviderFailure,
      onRetry: (provider, attempt, delayMs) => this.options.onRetry?.(provider, attempt, delayMs)
    })

    if (tasks.length > 0) {
      await this.stage('providers', () => backend.prepare(), names => names.join(', '))
    }

    const [issue, change] = await this.stage('fetch', () => this.fetch(request), ([fetchedIssue, data]) => {
      const parts = [`${data.commits.length} commits`, `${data.files.length} files`]
      if (fetchedIssue) parts.unshift(`issue ${fetchedIssue.key}`)
      return parts.join(', ')
    })

    const context = await this.stage(
      'aggregate',
      async () => aggregate(issue, change.commits, change.files, { repo: request.repo, changeId: request.changeId }),
      ctx => `${ctx.files.length} files`
    )

    const generationTasks = await this.stage(
      'prompt',
      async () => this.buildPrompts(context, tasks, request.overrides ?? {}),
      built => built.map(t => `${t.id} (${t.prompt.length} chars)`).join(', ') || 'nothing requested'
    )

    const artifacts: GeneratedArtifact[] = []
    const failures: ArtifactFailure[] = []
    if (generationTasks.length > 0) {
      const outcomes = await this.stage('generate', () => backend.generateAll(generationTasks), () => backend.pinnedProvider ?? 'no provider succeeded')
      for (const outcome of outcomes) {
        if (outcome.ok) {
          const artifact = createArtifact(outcome.id, outcome.text, outcome.provider)
          artifacts.push(artifact)
          this.options.onArtifact?.(artifact)
        } else {
          failures.push({ kind: outcome.id, error: outcome.error })
        }
      }
    }

    const writes = await this.stage('write', async () => {
      const results = await this.options.writer.write(context, artifacts)
      for (const result of results) {
        this.options.onWrite?.(result)
      }
      return results
    }, results => `${results.filter(r => r.status === 'written').length} files written`)

    for (const result of writes) {
      if (result.status === 'failed' && isTask(result.target)) {
        failures.push({ kind: result.target, error: result.error })
      }
    }

    const report: RunReport = {
      context,
      provider: backend.pinnedProvider,
      artifacts,
      failures,
      writes
    }

    // Fatal only when every requested artifact failed
    const delivered = tasks.filter(task => !failures.some(f => f.kind === task))
    if (tasks.length > 0 && delivered.length === 0) {
      throw failures[0].error
    }
    return report
  }

  private async fetch(request: RunRequest): Promise<[IssueRecord | undefined, ChangeData]> {
    const { issueSource, changeSource } = this.options
    let issuePromise: Promise<IssueRecord | undefined> = Promise.resolve(undefined)
    if (request.issueKey) {
      if (!issueSource) {
        throw new ConfigError(`Issue ${request.issueKey} requested but no issue source is configured`, {
          issueKey: request.issueKey
        })
      }
      issuePromise = issueSource.fetchIssue(request.issueKey)
    }
    return Promise.all([issuePromise, changeSource.fetchChange(request.repo, request.changeId)])
  }

  private buildPrompts(
    context: AnalysisContext,
    tasks: Task[],
    overrides: Partial<Record<Task, string>>
  ): GenerationTask<Task>[] {
    return tasks.map(task => ({
      id: task,
      prompt: this.promptBuilder.build(context, task, overrides[task])
    }))
  }

  private async stage<T>(stage: PipelineStage, fn: () => Promise<T>, describe: (value: T) => string): Promise<T> {
    this.options.onStageStart?.(stage)
    const value = await fn()
    this.options.onStageComplete?.(stage, describe(value))
    return value
  }
}

function isTask(target: string): target is Task {
  return TASKS.some(task => task === target)
}
