// src/pipeline/types.ts
import type { AnalysisContext } from '../aggregator/types.js'
import type { IssueSource, ChangeSource } from '../sources/types.js'
import type { AIProvider } from '../providers/types.js'
import type { Concurrency, RetryPolicy } from '../providers/backend.js'
import type { ProviderError } from '../providers/errors.js'
import type { PromptBuilder } from '../prompt-builder/builder.js'
import type { Task } from '../prompt-builder/types.js'
import type { GeneratedArtifact } from '../reporter/types.js'
import type { OutputWriter } from '../writer/output-writer.js'
import type { WriteResult } from '../writer/types.js'
import type { ScribeError } from '../errors.js'

export type PipelineStage = 'providers' | 'fetch' | 'aggregate' | 'prompt' | 'generate' | 'write'

export interface RunRequest {
  repo: string
  changeId: number
  issueKey?: string
  tasks: Task[]
  overrides?: Partial<Record<Task, string>>
}

export interface PipelineOptions {
  issueSource?: IssueSource
  changeSource: ChangeSource
  providers: AIProvider[]
  writer: OutputWriter
  promptBuilder?: PromptBuilder
  retry?: Partial<RetryPolicy>
  concurrency?: Concurrency
  sleep?: (ms: number) => Promise<void>
  onStageStart?: (stage: PipelineStage) => void
  onStageComplete?: (stage: PipelineStage, detail: string) => void
  onProviderSelected?: (provider: string) => void
  onProviderFailure?: (provider: string, error: ProviderError) => void
  onRetry?: (provider: string, attempt: number, delayMs: number) => void
  onArtifact?: (artifact: GeneratedArtifact) => void
  onWrite?: (result: WriteResult) => void
}

export interface ArtifactFailure {
  kind: Task
  error: ScribeError
}

export interface RunReport {
  context: AnalysisContext
  provider: string | null
  artifacts: GeneratedArtifact[]
  failures: ArtifactFailure[]
  writes: WriteResult[]
}
