// src/errors.ts
import { SourceFailure, SourceFailureKind, SourceId, TemplateRole } from './types'

// one provider could not deliver a snapshot; degrades that source only
export class SourceUnavailableError extends Error {
  readonly source: SourceId
  readonly kind: SourceFailureKind
  readonly detail: string

  constructor(source: SourceId, kind: SourceFailureKind, detail: string) {
    super(`${source}: ${kind} (${detail})`)
    this.name = 'SourceUnavailableError'
    this.source = source
    this.kind = kind
    this.detail = detail
  }

  toFailure(): SourceFailure {
    return { source: this.source, kind: this.kind, message: this.detail }
  }
}

export class AllSourcesUnavailableError extends Error {
  readonly symbol: string
  readonly failures: SourceFailure[]

  constructor(symbol: string, failures: SourceFailure[]) {
    super(`all sources unavailable for ${symbol}: ${failures.map((f) => `${f.source}=${f.kind}`).join(', ')}`)
    this.name = 'AllSourcesUnavailableError'
    this.symbol = symbol
    this.failures = failures
  }
}

export class AIGenerationFailedError extends Error {
  readonly reason: string
  readonly transient: boolean

  constructor(reason: string, transient = false) {
    super(`AI generation failed: ${reason}`)
    this.name = 'AIGenerationFailedError'
    this.reason = reason
    this.transient = transient
  }
}

// a template role was never seeded; misconfiguration, never retried
export class TemplateMissingError extends Error {
  readonly role: TemplateRole

  constructor(role: TemplateRole) {
    super(`template missing for role "${role}"`)
    this.name = 'TemplateMissingError'
    this.role = role
  }
}

export class PipelineTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`pipeline run exceeded ${timeoutMs}ms`)
    this.name = 'PipelineTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
