// src/sources/jira.ts
import { z } from 'zod'
import type { IssueRecord, IssueSource } from './types.js'
import { IssueAuthError, IssueNotFoundError, SourceError } from './errors.js'
import { descriptionToText } from './adf.js'
import { describeError } from '../errors.js'

export interface JiraOptions {
  url: string
  email: string
  apiToken: string
  timeoutMs?: number
}

const issueResponseSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string().nullish(),
    description: z.unknown().optional()
  })
})

export class JiraIssueSource implements IssueSource {
  name = 'jira'
  private baseUrl: string
  private authHeader: string
  private timeoutMs: number

  constructor(options: JiraOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '')
    this.authHeader = 'Basic ' + Buffer.from(`${options.email}:${options.apiToken}`).toString('base64')
    this.timeoutMs = options.timeoutMs ?? 30000
  }

  async fetchIssue(key: string): Promise<IssueRecord> {
    const url = `${this.baseUrl}/rest/api/3/issue/${encodeURIComponent(key)}?fields=summary,description`

    let response: Response
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json', Authorization: this.authHeader },
        signal: AbortSignal.timeout(this.timeoutMs)
      })
    } catch (error) {
      throw new SourceError(`Failed to reach Jira for ${key}: ${describeError(error)}`, { issueKey: key }, { cause: error })
    }

    if (response.status === 404) throw new IssueNotFoundError(key)
    if (response.status === 401 || response.status === 403) throw new IssueAuthError(key, response.status)
    if (!response.ok) {
      throw new SourceError(`Jira returned HTTP ${response.status} for ${key}`, { issueKey: key }, { status: response.status })
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new SourceError(
        `Jira returned a non-JSON response for ${key} (HTTP ${response.status})`,
        { issueKey: key },
        { cause: error, status: response.status }
      )
    }

    const parsed = issueResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new SourceError(`Unexpected Jira response for ${key}`, { issueKey: key }, { cause: parsed.error })
    }

    return {
      key: parsed.data.key,
      summary: parsed.data.fields.summary ?? '',
      description: descriptionToText(parsed.data.fields.description)
    }
  }
}
