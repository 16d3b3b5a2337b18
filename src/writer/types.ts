// src/writer/types.ts
import type { ArtifactKind } from '../reporter/types.js'
import type { WriteError } from './output-writer.js'

export type OutputTarget = 'issue' | 'commits' | 'files' | ArtifactKind

export const OUTPUT_FILES: Record<OutputTarget, string> = {
  issue: 'issue_data.json',
  commits: 'pr_commits.json',
  files: 'pr_files_content.json',
  documentation: 'DOCUMENTATION.md',
  'code-review': 'CODE_REVIEW.md'
}

export type WriteResult =
  | { target: OutputTarget; path: string; status: 'written' | 'removed' }
  | { target: OutputTarget; path: string; status: 'failed'; error: WriteError }
