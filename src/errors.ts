// src/errors.ts
export type ErrorStage = 'config' | 'source' | 'aggregation' | 'prompt' | 'provider' | 'write'

export type ErrorDetails = Record<string, string | number | boolean | string[] | number[] | undefined>

/**
 * Base class for every failure the pipeline surfaces.
 * `stage` and `details` identify where it happened without re-running.
 */
export class ScribeError extends Error {
  readonly stage: ErrorStage
  readonly details: ErrorDetails

  constructor(stage: ErrorStage, message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.stage = stage
    this.details = details
  }
}

export class ConfigError extends ScribeError {
  constructor(message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super('config', message, details, options)
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
