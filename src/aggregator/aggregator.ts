// src/aggregator/aggregator.ts
import { z } from 'zod'
import { ScribeError, type ErrorDetails } from '../errors.js'
import type { CommitRecord, FileChange, IssueRecord } from '../sources/types.js'
import type { AggregationFailure, AnalysisContext, ChangeRequestRef } from './types.js'

export class AggregationError extends ScribeError {
  readonly reason: AggregationFailure

  constructor(reason: AggregationFailure, message: string, details: ErrorDetails = {}) {
    super('aggregation', message, { reason, ...details })
    this.reason = reason
  }
}

const count = z.number().int().nonnegative()

const fileSchema = z.object({
  path: z.string().min(1),
  diff: z.string(),
  linesAdded: count,
  linesDeleted: count,
  changeType: z.enum(['add', 'edit', 'delete', 'rename']).optional()
})

const commitSchema = z.object({
  id: z.string().min(1),
  message: z.string(),
  author: z.string().default('unknown'),
  timestamp: z.string().default('')
})

const issueSchema = z.object({
  key: z.string().min(1),
  summary: z.string(),
  description: z.string()
})

function issuePaths(error: z.ZodError): string[] {
  return error.issues.map(i => i.path.join('.') || '(root)')
}

/**
 * Merge issue and change data into one frozen AnalysisContext.
 * Pure: no I/O, no retries. Order and length of commits and files are kept.
 */
export function aggregate(
  issue: IssueRecord | undefined,
  commits: CommitRecord[],
  files: FileChange[],
  ref: ChangeRequestRef
): AnalysisContext {
  const { repo, changeId } = ref
  if (!repo.trim() || !Number.isInteger(changeId) || changeId <= 0) {
    throw new AggregationError('MalformedInput', `Invalid change request reference: ${repo}#${changeId}`, { repo, changeId })
  }

  if (files.length === 0) {
    throw new AggregationError('EmptyFiles', `Pull request #${changeId} in ${repo} has no file changes`, { repo, changeId })
  }

  const seen = new Set<string>()
  const normalizedFiles = files.map((file, index) => {
    const parsed = fileSchema.safeParse(file)
    if (!parsed.success) {
      throw new AggregationError('MalformedFile', `File change at index ${index} is malformed`, {
        repo, changeId, index, fields: issuePaths(parsed.error)
      })
    }
    if (seen.has(parsed.data.path)) {
      throw new AggregationError('DuplicatePath', `Duplicate file path: ${parsed.data.path}`, {
        repo, changeId, path: parsed.data.path
      })
    }
    seen.add(parsed.data.path)
    return Object.freeze(parsed.data)
  })

  const normalizedCommits = commits.map((commit, index) => {
    const parsed = commitSchema.safeParse(commit)
    if (!parsed.success) {
      throw new AggregationError('MalformedCommit', `Commit at index ${index} is malformed`, {
        repo, changeId, index, fields: issuePaths(parsed.error)
      })
    }
    return Object.freeze(parsed.data)
  })

  let normalizedIssue: Readonly<IssueRecord> | undefined
  if (issue) {
    const parsed = issueSchema.safeParse(issue)
    if (!parsed.success) {
      throw new AggregationError('MalformedIssue', 'Issue record is malformed', {
        repo, changeId, fields: issuePaths(parsed.error)
      })
    }
    normalizedIssue = Object.freeze(parsed.data)
  }

  const context: AnalysisContext = {
    ...(normalizedIssue ? { issue: normalizedIssue } : {}),
    repo,
    changeId,
    commits: Object.freeze(normalizedCommits),
    files: Object.freeze(normalizedFiles)
  }
  return Object.freeze(context)
}
