// src/routes/httpErrors.ts
import { Response } from 'express'
import {
  AIGenerationFailedError,
  AllSourcesUnavailableError,
  errorMessage,
  PipelineTimeoutError
} from '../errors'

export function statusFor(e: unknown): number {
  if (e instanceof AllSourcesUnavailableError || e instanceof AIGenerationFailedError) return 502
  if (e instanceof PipelineTimeoutError) return 504
  return 500
}

// log and answer with the mapped status; the caller returns right after
export function sendError(res: Response, context: string, e: unknown): Response {
  // eslint-disable-next-line no-console
  console.error(`${context} error`, errorMessage(e))
  const name = e instanceof Error ? e.name : 'Error'
  return res.status(statusFor(e)).json({ error: errorMessage(e), type: name })
}
