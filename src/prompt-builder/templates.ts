// src/prompt-builder/templates.ts
import type { Task } from './types.js'

const DOCUMENTATION_TEMPLATE = `You are a senior engineer writing technical documentation for a pull request.
Analyze the linked issue (if any), the commits and the file diffs below, then write clear, professional documentation adapted to the kind of change (API, feature, bug fix, refactoring, etc.).

Structure the documentation as follows:

1. **Summary** - A descriptive title and 2-3 sentences on what was implemented or changed
2. **Context** (if applicable) - The goal of the change, the problem it solves and how it relates to the linked issue
3. **Technical Details** - Adapt to the type of change:
   - For APIs/endpoints: HTTP method and route, input parameters with types, response format, status codes, request/response examples
   - For features: how to use it, required configuration, dependencies, code examples
   - For bug fixes: the bug, its root cause and the fix
4. **Usage Examples** (if applicable) - Practical examples taken from the code in this pull request
5. **Additional Notes** (if applicable) - Known limitations, performance considerations, breaking changes, required migrations

Use real examples from the changed code, keep the language clear and format the result in Markdown.`

const CODE_REVIEW_TEMPLATE = `You are a senior engineer reviewing a pull request.
Analyze the code changes below and provide a detailed, constructive code review. Also look for badly named or hard to read variables.

Your review must include:

1. **Summary of Changes** - What was changed and the impact of the changes
2. **Quality Analysis** - Code quality, patterns followed, good practices applied
3. **Potential Problems** - Likely bugs, performance problems, security concerns, edge cases not handled
4. **Improvement Suggestions** - Suggested refactoring, possible optimizations, readability improvements (reference files by path)
5. **Verdict** - Approve / Approve with suggestions / Request changes, with a justification

Format the review in Markdown.`

export const DEFAULT_TEMPLATES: Record<Task, string> = {
  'documentation': DOCUMENTATION_TEMPLATE,
  'code-review': CODE_REVIEW_TEMPLATE
}
