export { PromptBuilder, PromptError, buildPrompt, truncateMiddle, selectRecentCommits, TRUNCATION_MARKER } from './builder.js'
export { DEFAULT_TEMPLATES } from './templates.js'
export { DEFAULT_LIMITS, TASKS } from './types.js'
export type { Task, PromptLimits } from './types.js'
