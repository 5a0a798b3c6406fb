// src/http/axiosClient.ts
import axios, { AxiosError, AxiosInstance } from 'axios'
import axiosRetry from 'axios-retry'
import { SourceUnavailableError } from '../errors'
import { SourceId } from '../types'

export interface HttpClientOptions {
  timeoutMs?: number
  retries?: number
  retryBaseMs?: number
  headers?: Record<string, string>
}

const USER_AGENT = 'market-digest-service/1.0'

// delay from a Retry-After header (seconds or http date), capped at 30s
function retryAfterMs(error: AxiosError): number | undefined {
  const ra: unknown = error.response?.headers?.['retry-after']
  if (typeof ra !== 'string') return undefined
  const n = parseInt(ra, 10)
  if (!isNaN(n)) return Math.min(n * 1000, 30_000)
  const d = Date.parse(ra)
  if (!isNaN(d)) return Math.min(Math.max(0, d - Date.now()), 30_000)
  return undefined
}

// timeouts, dropped connections, 429 and 5xx are worth another attempt
export function isTransientHttpError(error: AxiosError): boolean {
  if (axios.isCancel(error)) return false
  if (!error.response) return true
  const s = error.response.status
  return s === 429 || (s >= 500 && s < 600)
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const retries = options.retries ?? 2
  const base = options.retryBaseMs ?? 500

  const client = axios.create({
    timeout: options.timeoutMs ?? 15_000,
    headers: { 'User-Agent': USER_AGENT, ...options.headers }
  })

  if (retries > 0) {
    axiosRetry(client, {
      retries,
      // per-attempt timeout, not a budget shared across attempts
      shouldResetTimeout: true,
      retryDelay: (retryCount, error) => {
        const ra = retryAfterMs(error)
        if (ra !== undefined) return ra
        return Math.min(base * Math.pow(2, retryCount - 1), 10_000)
      },
      retryCondition: isTransientHttpError
    })
  }

  return client
}

function isTimeout(error: AxiosError): boolean {
  return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || axios.isCancel(error)
}

// map any request failure onto the source failure taxonomy
export function classifyHttpError(source: SourceId, e: unknown): SourceUnavailableError {
  if (e instanceof SourceUnavailableError) return e
  if (!axios.isAxiosError(e)) {
    const msg = e instanceof Error ? e.message : String(e)
    return new SourceUnavailableError(source, 'MalformedResponse', msg)
  }

  if (isTimeout(e)) return new SourceUnavailableError(source, 'Timeout', e.message)

  const status = e.response?.status
  if (status === undefined) return new SourceUnavailableError(source, 'Unreachable', e.message)
  if (status === 401 || status === 403) return new SourceUnavailableError(source, 'Unauthorized', `HTTP ${status}`)
  if (status === 429) return new SourceUnavailableError(source, 'RateLimited', `HTTP ${status}`)
  if (status === 404 || status >= 500) return new SourceUnavailableError(source, 'Unreachable', `HTTP ${status}`)
  return new SourceUnavailableError(source, 'MalformedResponse', `HTTP ${status}`)
}

// shared client for the market data providers
const client = createHttpClient()

export default client
