// src/prompt-builder/types.ts
export type Task = 'documentation' | 'code-review'

export const TASKS: readonly Task[] = ['documentation', 'code-review']

export interface PromptLimits {
  maxCommits: number      // default 50
  maxFileChars: number    // per-file diff budget, default 4000
  maxPromptChars: number  // whole prompt ceiling, default 60000
}

export const DEFAULT_LIMITS: PromptLimits = {
  maxCommits: 50,
  maxFileChars: 4000,
  maxPromptChars: 60000
}
