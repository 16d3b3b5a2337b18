// src/sources/types.ts

/** Issue tracker ticket linked to the change request */
export interface IssueRecord {
  key: string
  summary: string
  description: string
}

export interface CommitRecord {
  id: string
  message: string
  author: string
  timestamp: string  // ISO-8601, as returned by the source
}

export type ChangeType = 'add' | 'edit' | 'delete' | 'rename'

export interface FileChange {
  path: string
  diff: string         // unified diff, may be tens of thousands of characters
  linesAdded: number
  linesDeleted: number
  changeType?: ChangeType
}

export interface ChangeData {
  commits: CommitRecord[]
  files: FileChange[]
}

export interface IssueSource {
  name: string
  fetchIssue(key: string): Promise<IssueRecord>
}

export interface ChangeSource {
  name: string
  fetchChange(repo: string, changeId: number): Promise<ChangeData>
}
