// tests/aggregator/aggregator.test.ts
import { describe, it, expect } from 'vitest'
import { aggregate, AggregationError } from '../../src/aggregator/aggregator.js'
import type { CommitRecord, FileChange, IssueRecord } from '../../src/sources/types.js'

const ref = { repo: 'demo', changeId: 42 }

const file = (path: string, linesAdded = 1, linesDeleted = 0): FileChange => ({
  path,
  diff: `--- a/${path}\n+++ b/${path}\n@@ -1 +1 @@\n-old\n+new`,
  linesAdded,
  linesDeleted
})

const commit = (id: string, timestamp: string): CommitRecord => ({
  id,
  message: `commit ${id}`,
  author: 'dev',
  timestamp
})

function captureError(fn: () => unknown): AggregationError {
  try {
    fn()
  } catch (error) {
    if (error instanceof AggregationError) return error
    throw error
  }
  throw new Error('expected aggregate to throw')
}

describe('aggregate', () => {
  it('should build a context without an issue key when no issue is given', () => {
    const context = aggregate(undefined, [], [file('a.py', 3, 1)], ref)

    expect('issue' in context).toBe(false)
    expect(context.repo).toBe('demo')
    expect(context.changeId).toBe(42)
    expect(context.files).toHaveLength(1)
    expect(context.commits).toHaveLength(0)
  })

  it('should preserve commit and file order and length', () => {
    const commits = [
      commit('c3', '2024-03-01T00:00:00Z'),
      commit('c1', '2024-01-01T00:00:00Z'),
      commit('c2', '2024-02-01T00:00:00Z')
    ]
    const files = [file('z.ts'), file('a.ts'), file('m.ts')]

    const context = aggregate(undefined, commits, files, ref)

    expect(context.commits.map(c => c.id)).toEqual(['c3', 'c1', 'c2'])
    expect(context.files.map(f => f.path)).toEqual(['z.ts', 'a.ts', 'm.ts'])
  })

  it('should carry the issue when present', () => {
    const issue: IssueRecord = { key: 'PROJ-1', summary: 'Add login', description: 'Details' }
    const context = aggregate(issue, [], [file('a.ts')], ref)

    expect(context.issue).toEqual(issue)
  })

  it('should deep-freeze the context', () => {
    const context = aggregate(
      { key: 'PROJ-1', summary: 's', description: 'd' },
      [commit('c1', '2024-01-01T00:00:00Z')],
      [file('a.ts')],
      ref
    )

    expect(Object.isFrozen(context)).toBe(true)
    expect(Object.isFrozen(context.files)).toBe(true)
    expect(Object.isFrozen(context.files[0])).toBe(true)
    expect(Object.isFrozen(context.commits[0])).toBe(true)
    expect(Object.isFrozen(context.issue)).toBe(true)
  })

  it('should not be affected by later mutation of the inputs', () => {
    const files = [file('a.ts')]
    const context = aggregate(undefined, [], files, ref)

    files[0].path = 'changed.ts'
    files.push(file('b.ts'))

    expect(context.files.map(f => f.path)).toEqual(['a.ts'])
  })

  it('should reject an empty file list', () => {
    const error = captureError(() => aggregate(undefined, [], [], ref))

    expect(error.reason).toBe('EmptyFiles')
    expect(error.stage).toBe('aggregation')
    expect(error.details.changeId).toBe(42)
  })

  it('should reject negative line counts', () => {
    const error = captureError(() => aggregate(undefined, [], [file('a.ts'), file('b.ts', -1)], ref))

    expect(error.reason).toBe('MalformedFile')
    expect(error.details.index).toBe(1)
    expect(error.details.fields).toEqual(['linesAdded'])
  })

  it('should reject an empty path', () => {
    const error = captureError(() => aggregate(undefined, [], [file('')], ref))

    expect(error.reason).toBe('MalformedFile')
    expect(error.details.fields).toEqual(['path'])
  })

  it('should reject duplicate paths', () => {
    const error = captureError(() => aggregate(undefined, [], [file('a.ts'), file('a.ts')], ref))

    expect(error.reason).toBe('DuplicatePath')
    expect(error.details.path).toBe('a.ts')
  })

  it('should reject a commit without an id', () => {
    const error = captureError(() => aggregate(undefined, [commit('', '2024-01-01')], [file('a.ts')], ref))

    expect(error.reason).toBe('MalformedCommit')
    expect(error.details.index).toBe(0)
  })

  it('should reject an issue without a key', () => {
    const error = captureError(() =>
      aggregate({ key: '', summary: 's', description: '' }, [], [file('a.ts')], ref)
    )

    expect(error.reason).toBe('MalformedIssue')
  })

  it('should reject an invalid change request id', () => {
    const error = captureError(() => aggregate(undefined, [], [file('a.ts')], { repo: 'demo', changeId: 0 }))

    expect(error.reason).toBe('MalformedInput')
  })
})
