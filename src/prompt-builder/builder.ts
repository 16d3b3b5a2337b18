// src/prompt-builder/builder.ts
import { ScribeError } from '../errors.js'
import type { AnalysisContext } from '../aggregator/types.js'
import type { CommitRecord, FileChange, IssueRecord } from '../sources/types.js'
import { DEFAULT_TEMPLATES } from './templates.js'
import { DEFAULT_LIMITS, type PromptLimits, type Task } from './types.js'

export const TRUNCATION_MARKER = '…truncated…'

export class PromptError extends ScribeError {
  readonly ceiling: number
  readonly attemptedSizes: number[]

  constructor(task: Task, ceiling: number, attemptedSizes: number[], droppedFiles: string[]) {
    const smallest = attemptedSizes.length > 0 ? Math.min(...attemptedSizes) : 0
    super(
      'prompt',
      `${task} prompt cannot fit in ${ceiling} characters (smallest attempt: ${smallest})`,
      { task, ceiling, attemptedSizes, droppedFiles }
    )
    this.ceiling = ceiling
    this.attemptedSizes = attemptedSizes
  }
}

/**
 * Keep the first and last halves of the budget with a marker between them.
 */
export function truncateMiddle(text: string, budget: number): string {
  if (text.length <= budget) return text
  const head = Math.floor(budget / 2)
  const tail = budget - head
  const omitted = text.length - budget
  return `${text.slice(0, head)}\n${TRUNCATION_MARKER} (${omitted} characters omitted)\n${text.slice(text.length - tail)}`
}

/**
 * Pick the `max` most recent commits and return them in their original order.
 * Unparseable timestamps rank below parseable ones; ties go to the later position.
 */
export function selectRecentCommits<T extends Pick<CommitRecord, 'timestamp'>>(
  commits: readonly T[],
  max: number
): { kept: T[]; omitted: number } {
  if (commits.length <= max) return { kept: [...commits], omitted: 0 }

  const ranked = commits.map((commit, index) => {
    const time = Date.parse(commit.timestamp)
    return { index, time: Number.isNaN(time) ? -Infinity : time }
  })
  ranked.sort((a, b) => (b.time - a.time) || (b.index - a.index))

  const keptIndexes = ranked.slice(0, Math.max(0, max)).map(r => r.index).sort((a, b) => a - b)
  return {
    kept: keptIndexes.map(i => commits[i]),
    omitted: commits.length - keptIndexes.length
  }
}

function fenceFor(content: string): string {
  const longestRun = Math.max(0, ...(content.match(/`+/g) ?? []).map(run => run.length))
  return '`'.repeat(Math.max(3, longestRun + 1))
}

function statLine(file: Pick<FileChange, 'path' | 'linesAdded' | 'linesDeleted'>): string {
  return `${file.path} (+${file.linesAdded}/-${file.linesDeleted})`
}

function renderChangeRequest(context: AnalysisContext): string {
  return `## Change Request\nRepository: ${context.repo}\nPull request: #${context.changeId}`
}

function renderIssue(issue: Readonly<IssueRecord>): string {
  const lines = [`## Linked Issue: ${issue.key}`, `Summary: ${issue.summary}`]
  if (issue.description.trim()) {
    lines.push('', 'Description:', issue.description)
  }
  return lines.join('\n')
}

function renderCommits(commits: AnalysisContext['commits'], maxCommits: number): string {
  const { kept, omitted } = selectRecentCommits(commits, maxCommits)
  const lines = [`## Commits (${commits.length})`]
  for (const commit of kept) {
    const firstLine = commit.message.split('\n')[0].trim()
    lines.push(`- ${commit.id.slice(0, 8)} ${firstLine}`)
  }
  if (omitted > 0) {
    lines.push(`+${omitted} more commits omitted`)
  }
  return lines.join('\n')
}

function renderFile(file: Readonly<FileChange>, maxFileChars: number): string {
  const diff = truncateMiddle(file.diff, maxFileChars)
  const fence = fenceFor(diff)
  return `### ${statLine(file)}\n${fence}diff\n${diff}\n${fence}`
}

function renderOmittedNotice(dropped: ReadonlyArray<Readonly<FileChange>>): string {
  const lines = [
    '## Omitted Files',
    `${dropped.length} file(s) were left out to fit the prompt size limit (fewest added lines first):`
  ]
  for (const file of dropped) {
    lines.push(`- ${statLine(file)}`)
  }
  return lines.join('\n')
}

interface FileSection {
  file: Readonly<FileChange>
  index: number
  text: string
}

/**
 * Render the prompt for one task. Identical inputs always give identical output.
 */
export function buildPrompt(
  context: AnalysisContext,
  task: Task,
  overridePrompt?: string,
  limits: PromptLimits = DEFAULT_LIMITS
): string {
  const header = overridePrompt ?? DEFAULT_TEMPLATES[task]

  const leading = [header, renderChangeRequest(context)]
  if (context.issue) {
    leading.push(renderIssue(context.issue))
  }
  if (context.commits.length > 0) {
    leading.push(renderCommits(context.commits, limits.maxCommits))
  }
  leading.push(`## Files Changed (${context.files.length})`)

  const sections: FileSection[] = context.files.map((file, index) => ({
    file,
    index,
    text: renderFile(file, limits.maxFileChars)
  }))
  const dropOrder = [...sections].sort((a, b) =>
    (a.file.linesAdded - b.file.linesAdded) || (b.index - a.index)
  )

  const assemble = (dropped: FileSection[]): string => {
    const droppedSet = new Set(dropped)
    const parts = [...leading, ...sections.filter(s => !droppedSet.has(s)).map(s => s.text)]
    if (dropped.length > 0) {
      parts.push(renderOmittedNotice(dropped.map(s => s.file)))
    }
    return parts.join('\n\n') + '\n'
  }

  const dropped: FileSection[] = []
  let prompt = assemble(dropped)
  const attemptedSizes = [prompt.length]

  while (prompt.length > limits.maxPromptChars && dropped.length < dropOrder.length) {
    dropped.push(dropOrder[dropped.length])
    prompt = assemble(dropped)
    attemptedSizes.push(prompt.length)
  }

  if (prompt.length > limits.maxPromptChars) {
    throw new PromptError(task, limits.maxPromptChars, attemptedSizes, dropped.map(s => s.file.path))
  }

  return prompt
}

export class PromptBuilder {
  private limits: PromptLimits
  private overrides: Partial<Record<Task, string>>

  constructor(limits: Partial<PromptLimits> = {}, overrides: Partial<Record<Task, string>> = {}) {
    this.limits = { ...DEFAULT_LIMITS, ...limits }
    this.overrides = overrides
  }

  build(context: AnalysisContext, task: Task, overridePrompt?: string): string {
    return buildPrompt(context, task, overridePrompt ?? this.overrides[task], this.limits)
  }
}
