// src/writer/output-writer.ts
import { mkdir, rename, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { ScribeError, describeError } from '../errors.js'
import type { AnalysisContext } from '../aggregator/types.js'
import type { GeneratedArtifact } from '../reporter/types.js'
import { MarkdownReporter } from '../reporter/markdown.js'
import { OUTPUT_FILES, type OutputTarget, type WriteResult } from './types.js'

export class WriteError extends ScribeError {
  readonly path: string

  constructor(target: OutputTarget, path: string, cause: unknown) {
    super('write', `Failed to write ${path}: ${describeError(cause)}`, { target, path }, { cause })
    this.path = path
  }
}

export interface OutputWriterOptions {
  reporter?: MarkdownReporter
}

interface PendingWrite {
  target: OutputTarget
  content: string | null   // null removes a stale file
}

/**
 * Persists the raw inputs and the artifacts of one run under fixed names.
 * Each destination is replaced whole; one failing never stops the others.
 */
export class OutputWriter {
  private dir: string
  private reporter: MarkdownReporter

  constructor(dir: string, options: OutputWriterOptions = {}) {
    this.dir = dir
    this.reporter = options.reporter ?? new MarkdownReporter()
  }

  pathFor(target: OutputTarget): string {
    return join(this.dir, OUTPUT_FILES[target])
  }

  async write(context: AnalysisContext, artifacts: readonly GeneratedArtifact[]): Promise<WriteResult[]> {
    const pending: PendingWrite[] = [
      { target: 'issue', content: context.issue ? toJson(context.issue) : null },
      { target: 'commits', content: toJson(context.commits) },
      { target: 'files', content: toJson(context.files) }
    ]
    for (const artifact of artifacts) {
      pending.push({ target: artifact.kind, content: this.reporter.generate(artifact, context) })
    }

    try {
      await mkdir(this.dir, { recursive: true })
    } catch (error) {
      return pending.map(p => this.failed(p.target, error))
    }

    const results: WriteResult[] = []
    for (const item of pending) {
      results.push(await this.writeOne(item))
    }
    return results
  }

  private async writeOne({ target, content }: PendingWrite): Promise<WriteResult> {
    const path = this.pathFor(target)
    try {
      if (content === null) {
        await rm(path, { force: true })
        return { target, path, status: 'removed' }
      }
      await replaceFile(path, content)
      return { target, path, status: 'written' }
    } catch (error) {
      return this.failed(target, error)
    }
  }

  private failed(target: OutputTarget, error: unknown): WriteResult {
    const path = this.pathFor(target)
    return { target, path, status: 'failed', error: new WriteError(target, path, error) }
  }
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n'
}

async function replaceFile(path: string, content: string): Promise<void> {
  const tempPath = `${path}.${process.pid}.tmp`
  try {
    await writeFile(tempPath, content, 'utf-8')
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}
