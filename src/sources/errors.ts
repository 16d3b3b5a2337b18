// src/sources/errors.ts
import { ScribeError, type ErrorDetails } from '../errors.js'

export class SourceError extends ScribeError {
  readonly status?: number

  constructor(message: string, details: ErrorDetails = {}, options?: { cause?: unknown; status?: number }) {
    super('source', message, details, options)
    this.status = options?.status
  }
}

export class IssueNotFoundError extends SourceError {
  constructor(key: string) {
    super(`Issue ${key} not found`, { issueKey: key }, { status: 404 })
  }
}

export class IssueAuthError extends SourceError {
  constructor(key: string, status: number) {
    super(`Not authorized to read issue ${key} (HTTP ${status})`, { issueKey: key }, { status })
  }
}

export class ChangeNotFoundError extends SourceError {
  constructor(repo: string, changeId: number) {
    super(`Pull request #${changeId} not found in ${repo}`, { repo, changeId }, { status: 404 })
  }
}

export class ChangeAuthError extends SourceError {
  constructor(repo: string, changeId: number, status: number) {
    super(`Not authorized to read pull request #${changeId} in ${repo} (HTTP ${status})`, { repo, changeId }, { status })
  }
}
