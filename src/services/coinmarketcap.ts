// src/services/coinmarketcap.ts
import { AxiosInstance } from 'axios'
import { z } from 'zod'
import debug from 'debug'
import { classifyHttpError, createHttpClient } from '../http/axiosClient'
import { SourceUnavailableError } from '../errors'
import { Coin, MarketSnapshot, SourceClient } from '../types'
import { asNumber } from '../utils/parse'
import { DailyQuota } from './quota'

const log = debug('app:cmc')

const numeric = z.union([z.number(), z.string()]).nullish()

const usdQuoteSchema = z.object({
  price: numeric,
  volume_24h: numeric,
  market_cap: numeric,
  percent_change_1h: numeric,
  percent_change_24h: numeric,
  percent_change_7d: numeric,
  last_updated: z.string().nullish()
})

const coinSchema = z.object({
  symbol: z.string(),
  name: z.string().optional(),
  last_updated: z.string().nullish(),
  quote: z.object({ USD: usdQuoteSchema })
})

const responseSchema = z.object({
  status: z.object({
    error_code: z.number(),
    error_message: z.string().nullish()
  }),
  data: z.record(z.union([coinSchema, z.array(coinSchema)])).nullish()
})

export interface CoinMarketCapOptions {
  apiKey: string
  baseUrl: string
  quota: DailyQuota
  freshnessMs: number
  http?: AxiosInstance
  now?: () => number
}

// status.error_code values documented by CoinMarketCap
function failureForStatus(code: number, message: string): SourceUnavailableError {
  if (code === 1001 || code === 1002 || code === 1006) return new SourceUnavailableError('coinmarketcap', 'Unauthorized', message)
  if (code >= 1008 && code <= 1011) return new SourceUnavailableError('coinmarketcap', 'RateLimited', message)
  return new SourceUnavailableError('coinmarketcap', 'MalformedResponse', message)
}

export class CoinMarketCapClient implements SourceClient<MarketSnapshot> {
  readonly id = 'coinmarketcap' as const
  private readonly options: CoinMarketCapOptions
  private readonly http: AxiosInstance
  private readonly now: () => number

  constructor(options: CoinMarketCapOptions) {
    this.options = options
    this.http = options.http ?? createHttpClient({ retries: 0 })
    this.now = options.now ?? Date.now
  }

  async fetch(coin: Coin, signal?: AbortSignal): Promise<MarketSnapshot> {
    if (!this.options.apiKey) {
      throw new SourceUnavailableError(this.id, 'Unauthorized', 'API key not configured')
    }
    // budget is checked locally before any round-trip
    if (!(await this.options.quota.tryConsume())) {
      throw new SourceUnavailableError(this.id, 'RateLimited', 'daily quota exhausted')
    }

    const symbol = coin.symbol.toUpperCase()
    let body: unknown
    try {
      const res = await this.http.get(`${this.options.baseUrl}/v1/cryptocurrency/quotes/latest`, {
        params: { symbol, convert: 'USD' },
        headers: { 'X-CMC_PRO_API_KEY': this.options.apiKey, Accept: 'application/json' },
        // one quota unit buys exactly one request
        'axios-retry': { retries: 0 },
        signal
      })
      body = res.data
    } catch (e) {
      throw classifyHttpError(this.id, e)
    }

    const parsed = responseSchema.safeParse(body)
    if (!parsed.success) {
      throw new SourceUnavailableError(this.id, 'MalformedResponse', 'unexpected response shape')
    }
    const { status, data } = parsed.data
    if (status.error_code !== 0) {
      throw failureForStatus(status.error_code, status.error_message ?? `error_code ${status.error_code}`)
    }

    const entry = data?.[symbol]
    const quote = Array.isArray(entry) ? entry[0] : entry
    if (!quote) {
      throw new SourceUnavailableError(this.id, 'MalformedResponse', `no quote for ${symbol}`)
    }

    const usd = quote.quote.USD
    const now = this.now()
    const updatedRaw = usd.last_updated ?? quote.last_updated
    const updatedAt = updatedRaw ? Date.parse(updatedRaw) : NaN
    const fresh = Number.isFinite(updatedAt) ? now - updatedAt <= this.options.freshnessMs : false

    log('quote for %s fresh=%s', symbol, fresh)

    return {
      kind: 'market',
      symbol,
      sources: [this.id],
      price: asNumber(usd.price),
      marketCap: asNumber(usd.market_cap),
      volume24h: asNumber(usd.volume_24h),
      percentChange: {
        h1: asNumber(usd.percent_change_1h),
        h24: asNumber(usd.percent_change_24h),
        d7: asNumber(usd.percent_change_7d)
      },
      fetchedAt: now,
      fresh
    }
  }
}
