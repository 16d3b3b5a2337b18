// src/reporter/types.ts
import type { Task } from '../prompt-builder/types.js'

export type ArtifactKind = Task

/**
 * One generated document. Created once per requested kind per run.
 */
export interface GeneratedArtifact {
  readonly kind: ArtifactKind
  readonly content: string
  readonly providerUsed: string
}

export const ARTIFACT_TITLES: Record<ArtifactKind, string> = {
  documentation: 'Technical Documentation',
  'code-review': 'Code Review'
}
