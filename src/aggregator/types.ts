// src/aggregator/types.ts
import type { CommitRecord, FileChange, IssueRecord } from '../sources/types.js'

/** Everything a prompt is built from. Frozen once built. */
export interface AnalysisContext {
  readonly issue?: Readonly<IssueRecord>
  readonly repo: string
  readonly changeId: number
  readonly commits: ReadonlyArray<Readonly<CommitRecord>>
  readonly files: ReadonlyArray<Readonly<FileChange>>
}

export interface ChangeRequestRef {
  repo: string
  changeId: number
}

export type AggregationFailure =
  | 'EmptyFiles'
  | 'MalformedFile'
  | 'MalformedCommit'
  | 'MalformedIssue'
  | 'DuplicatePath'
  | 'MalformedInput'
