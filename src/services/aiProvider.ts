// src/services/aiProvider.ts
import axios, { AxiosInstance } from 'axios'
import { z } from 'zod'
import debug from 'debug'
import { createHttpClient, isTransientHttpError } from '../http/axiosClient'
import { AIGenerationFailedError } from '../errors'

const log = debug('app:ai')

export interface CompletionRequest {
  system: string
  user: string
}

export interface AIProvider {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>
}

export interface OpenRouterOptions {
  apiKey: string
  baseUrl: string
  model: string
  timeoutMs: number
  maxRetries: number // transient failures only
  retryBaseMs: number
  temperature?: number
  maxTokens?: number
  http?: AxiosInstance
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish()
      })
    )
    .min(1)
})

/**
 * OpenRouter chat completion client.
 * Timeouts, dropped connections, 429 and 5xx are retried with exponential backoff by axios-retry;
 * auth and request errors fail on the first attempt.
 */
export class OpenRouterProvider implements AIProvider {
  private readonly options: OpenRouterOptions
  private readonly http: AxiosInstance

  constructor(options: OpenRouterOptions) {
    this.options = options
    this.http =
      options.http ??
      createHttpClient({
        timeoutMs: options.timeoutMs,
        retries: options.maxRetries,
        retryBaseMs: options.retryBaseMs
      })
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    if (!this.options.apiKey) throw new AIGenerationFailedError('AI provider API key not configured')

    let body: unknown
    try {
      const res = await this.http.post(
        `${this.options.baseUrl}/chat/completions`,
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user }
          ],
          temperature: this.options.temperature ?? 0.7,
          max_tokens: this.options.maxTokens ?? 2000
        },
        {
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            'Content-Type': 'application/json',
            'X-Title': 'Market Digest Service'
          },
          signal
        }
      )
      body = res.data
    } catch (e) {
      if (axios.isAxiosError(e)) {
        const status = e.response?.status
        const reason = status ? `provider returned HTTP ${status}` : `request failed: ${e.code ?? e.message}`
        log('completion failed: %s', reason)
        throw new AIGenerationFailedError(reason, isTransientHttpError(e))
      }
      throw e
    }

    const parsed = completionSchema.safeParse(body)
    if (!parsed.success) throw new AIGenerationFailedError('malformed provider response')
    return parsed.data.choices[0].message?.content ?? ''
  }
}
