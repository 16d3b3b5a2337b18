// src/reporter/markdown.ts
import type { AnalysisContext } from '../aggregator/types.js'
import { ARTIFACT_TITLES, type ArtifactKind, type GeneratedArtifact } from './types.js'

export function createArtifact(kind: ArtifactKind, content: string, providerUsed: string): GeneratedArtifact {
  return Object.freeze({ kind, content, providerUsed })
}

export class MarkdownReporter {
  generate(artifact: GeneratedArtifact, context: AnalysisContext): string {
    const lines: string[] = []

    // Header
    lines.push(`# ${ARTIFACT_TITLES[artifact.kind]}: ${context.repo} PR #${context.changeId}`)
    lines.push('')
    lines.push(`- Repository: ${context.repo}`)
    lines.push(`- Pull request: #${context.changeId}`)
    if (context.issue) {
      lines.push(`- Issue: ${context.issue.key} (${context.issue.summary})`)
    }
    lines.push(`- Files changed: ${context.files.length} (${this.formatTotals(context)})`)
    lines.push(`- Generated by: ${artifact.providerUsed}`)
    lines.push('')
    lines.push('---')
    lines.push('')

    lines.push(artifact.content.trim())
    lines.push('')

    return lines.join('\n')
  }

  private formatTotals(context: AnalysisContext): string {
    let added = 0
    let deleted = 0
    for (const file of context.files) {
      added += file.linesAdded
      deleted += file.linesDeleted
    }
    return `+${added}/-${deleted}`
  }
}
