// src/sources/azure-devops.ts
import { z } from 'zod'
import { createTwoFilesPatch, structuredPatch } from 'diff'
import type { ChangeData, ChangeSource, ChangeType, CommitRecord, FileChange } from './types.js'
import { ChangeAuthError, ChangeNotFoundError, SourceError } from './errors.js'
import { describeError } from '../errors.js'

export interface AzureDevOpsOptions {
  organization: string
  project: string
  pat: string
  baseUrl?: string   // defaults to https://dev.azure.com
  timeoutMs?: number
}

const API_VERSION = '7.0'

const pullRequestSchema = z.object({
  sourceRefName: z.string(),
  targetRefName: z.string()
})

const commitsSchema = z.object({
  value: z.array(z.object({
    commitId: z.string(),
    comment: z.string().optional(),
    author: z.object({
      name: z.string().optional(),
      date: z.string().optional()
    }).optional()
  }))
})

const diffSchema = z.object({
  changes: z.array(z.object({
    changeType: z.string().optional(),
    item: z.object({
      path: z.string().optional(),
      isFolder: z.boolean().optional(),
      objectId: z.string().optional(),
      originalObjectId: z.string().optional()
    }).optional()
  })).default([])
})

export function normalizeChangeType(raw: string | undefined): ChangeType {
  const value = (raw ?? '').toLowerCase()
  if (value.includes('add')) return 'add'
  if (value.includes('delete')) return 'delete'
  if (value.includes('rename') && !value.includes('edit')) return 'rename'
  return 'edit'
}

/**
 * Unified diff plus added/deleted line counts between two file versions
 */
export function diffContents(path: string, before: string, after: string): Pick<FileChange, 'diff' | 'linesAdded' | 'linesDeleted'> {
  const patch = structuredPatch(`a/${path}`, `b/${path}`, before, after)
  let linesAdded = 0
  let linesDeleted = 0
  for (const hunk of patch.hunks) {
    for (const line of hunk.lines) {
      if (line.startsWith('+')) linesAdded++
      else if (line.startsWith('-')) linesDeleted++
    }
  }

  const text = createTwoFilesPatch(`a/${path}`, `b/${path}`, before, after)
  // Drop the "Index:" and "====" preamble, keep from the --- header on
  const headerIndex = text.indexOf('--- ')
  return {
    diff: headerIndex >= 0 ? text.slice(headerIndex) : text,
    linesAdded,
    linesDeleted
  }
}

export class AzureDevOpsChangeSource implements ChangeSource {
  name = 'azure-devops'
  private baseUrl: string
  private project: string
  private authHeader: string
  private timeoutMs: number

  constructor(options: AzureDevOpsOptions) {
    const root = (options.baseUrl ?? 'https://dev.azure.com').replace(/\/+$/, '')
    this.baseUrl = `${root}/${encodeURIComponent(options.organization)}`
    this.project = encodeURIComponent(options.project)
    this.authHeader = 'Basic ' + Buffer.from(`:${options.pat}`).toString('base64')
    this.timeoutMs = options.timeoutMs ?? 30000
  }

  async fetchChange(repo: string, changeId: number): Promise<ChangeData> {
    const [pullRequest, commitsData] = await Promise.all([
      this.getJson(repo, changeId, `pullrequests/${changeId}`, pullRequestSchema),
      this.getJson(repo, changeId, `pullrequests/${changeId}/commits`, commitsSchema)
    ])

    const commits: CommitRecord[] = commitsData.value.map(c => ({
      id: c.commitId,
      message: c.comment ?? '',
      author: c.author?.name ?? 'unknown',
      timestamp: c.author?.date ?? ''
    }))

    const sourceBranch = stripRef(pullRequest.sourceRefName)
    const targetBranch = stripRef(pullRequest.targetRefName)
    const query = `baseVersion=${encodeURIComponent(targetBranch)}&targetVersion=${encodeURIComponent(sourceBranch)}&$top=1000`
    const diff = await this.getJson(repo, changeId, `diffs/commits?${query}`, diffSchema)

    const files: FileChange[] = []
    for (const change of diff.changes) {
      const item = change.item
      if (!item?.path || item.isFolder) continue

      const changeType = normalizeChangeType(change.changeType)
      const path = item.path.replace(/^\/+/, '')

      const before = changeType === 'add' || !item.originalObjectId
        ? ''
        : await this.getBlob(repo, changeId, path, item.originalObjectId)
      const after = changeType === 'delete' || !item.objectId
        ? ''
        : await this.getBlob(repo, changeId, path, item.objectId)

      files.push({ path, changeType, ...diffContents(path, before, after) })
    }

    return { commits, files }
  }

  private repoUrl(repo: string, resource: string): string {
    const separator = resource.includes('?') ? '&' : '?'
    return `${this.baseUrl}/${this.project}/_apis/git/repositories/${encodeURIComponent(repo)}/${resource}${separator}api-version=${API_VERSION}`
  }

  private async request(
    repo: string,
    changeId: number,
    url: string,
    accept: string,
    notFound: () => SourceError = () => new ChangeNotFoundError(repo, changeId)
  ): Promise<Response> {
    let response: Response
    try {
      response = await fetch(url, {
        headers: { Accept: accept, Authorization: this.authHeader },
        signal: AbortSignal.timeout(this.timeoutMs)
      })
    } catch (error) {
      throw new SourceError(
        `Failed to reach Azure DevOps for ${repo}#${changeId}: ${describeError(error)}`,
        { repo, changeId },
        { cause: error }
      )
    }

    if (response.status === 404) throw notFound()
    if (response.status === 401 || response.status === 403) throw new ChangeAuthError(repo, changeId, response.status)
    if (!response.ok) {
      throw new SourceError(
        `Azure DevOps returned HTTP ${response.status} for ${repo}#${changeId}`,
        { repo, changeId, url },
        { status: response.status }
      )
    }
    return response
  }

  private async getJson<T>(repo: string, changeId: number, resource: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const response = await this.request(repo, changeId, this.repoUrl(repo, resource), 'application/json')
    const name = resource.split('?')[0]
    // A rejected PAT can come back as 203 with an HTML sign-in page
    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new SourceError(
        `Azure DevOps returned a non-JSON response for ${name} (HTTP ${response.status})`,
        { repo, changeId },
        { cause: error, status: response.status }
      )
    }
    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      throw new SourceError(
        `Unexpected Azure DevOps response for ${name}`,
        { repo, changeId },
        { cause: parsed.error }
      )
    }
    return parsed.data
  }

  private async getBlob(repo: string, changeId: number, path: string, objectId: string): Promise<string> {
    const url = this.repoUrl(repo, `blobs/${encodeURIComponent(objectId)}?$format=text`)
    const response = await this.request(repo, changeId, url, 'text/plain', () => new SourceError(
      `Blob ${objectId} for ${path} not found in ${repo}#${changeId}`,
      { repo, changeId, path, objectId },
      { status: 404 }
    ))
    return response.text()
  }
}

function stripRef(ref: string): string {
  return ref.replace(/^refs\/heads\//, '')
}
