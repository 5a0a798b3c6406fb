// src/services/dexscreener.ts
import { AxiosInstance } from 'axios'
import debug from 'debug'
import defaultClient, { classifyHttpError } from '../http/axiosClient'
import { SourceUnavailableError } from '../errors'
import { Coin, MarketSnapshot, SourceClient } from '../types'
import { asNumber, asString, field, isRecord } from '../utils/parse'

const log = debug('app:dexscreener')

export interface DexScreenerOptions {
  baseUrl: string
  http?: AxiosInstance
  now?: () => number
}

type RawPair = Record<string, unknown>

// pairs come back either as a bare array (token-pairs) or under `pairs` (search)
function extractPairs(data: unknown): RawPair[] | null {
  const list = Array.isArray(data) ? data : field(data, 'pairs')
  if (list === null) return []
  if (!Array.isArray(list)) return null
  return list.filter(isRecord)
}

function baseSymbol(p: RawPair): string {
  return (asString(field(p.baseToken, 'symbol')) ?? '').toUpperCase()
}

function baseName(p: RawPair): string {
  return (asString(field(p.baseToken, 'name')) ?? '').toUpperCase()
}

function liquidityOf(p: RawPair): number {
  return asNumber(field(p.liquidity, 'usd')) ?? 0
}

// prefer pairs whose base token is the coin, then the deepest pool
export function pickBestPair(pairs: RawPair[], symbol: string): RawPair | undefined {
  const sym = symbol.toUpperCase()
  const relevant = pairs.filter((p) => baseSymbol(p) === sym || (sym.length > 0 && baseName(p).includes(sym)))
  const pool = relevant.length ? relevant : pairs
  let best: RawPair | undefined
  for (const p of pool) {
    if (!best || liquidityOf(p) > liquidityOf(best)) best = p
  }
  return best
}

function mapPairToSnapshot(p: RawPair, symbol: string, now: number): MarketSnapshot {
  const txns24 = field(p.txns, 'h24')
  const base = asString(field(p.baseToken, 'symbol')) ?? '?'
  const quote = asString(field(p.quoteToken, 'symbol')) ?? '?'
  const dex = asString(p.dexId) ?? 'unknown dex'
  const chain = asString(p.chainId) ?? 'unknown chain'

  return {
    kind: 'market',
    symbol,
    sources: ['dexscreener'],
    price: asNumber(p.priceUsd),
    marketCap: asNumber(p.marketCap) ?? asNumber(p.fdv),
    volume24h: asNumber(field(p.volume, 'h24')),
    liquidityUsd: asNumber(field(p.liquidity, 'usd')),
    percentChange: {
      h1: asNumber(field(p.priceChange, 'h1')),
      h24: asNumber(field(p.priceChange, 'h24'))
    },
    buys24h: asNumber(field(txns24, 'buys')),
    sells24h: asNumber(field(txns24, 'sells')),
    pairLabel: `${base}/${quote} on ${dex} (${chain})`,
    fetchedAt: now,
    fresh: true
  }
}

export class DexScreenerClient implements SourceClient<MarketSnapshot> {
  readonly id = 'dexscreener' as const
  private readonly baseUrl: string
  private readonly http: AxiosInstance
  private readonly now: () => number

  constructor(options: DexScreenerOptions) {
    this.baseUrl = options.baseUrl
    this.http = options.http ?? defaultClient
    this.now = options.now ?? Date.now
  }

  private async get(url: string, signal?: AbortSignal, params?: Record<string, string>): Promise<RawPair[]> {
    let data: unknown
    try {
      const res = await this.http.get(url, { params, signal })
      data = res.data
    } catch (e) {
      throw classifyHttpError(this.id, e)
    }
    const pairs = extractPairs(data)
    if (!pairs) throw new SourceUnavailableError(this.id, 'MalformedResponse', 'pairs is not a list')
    return pairs
  }

  async fetch(coin: Coin, signal?: AbortSignal): Promise<MarketSnapshot> {
    const symbol = coin.symbol.toUpperCase()
    let pairs: RawPair[] = []

    // exact token lookup when the coin carries chain + address
    if (coin.chainId && coin.contractAddress) {
      pairs = await this.get(
        `${this.baseUrl}/token-pairs/v1/${encodeURIComponent(coin.chainId)}/${encodeURIComponent(coin.contractAddress)}`,
        signal
      )
    }
    if (!pairs.length) {
      const q = coin.dexSearchQuery || symbol
      pairs = await this.get(`${this.baseUrl}/latest/dex/search`, signal, { q })
    }

    const best = pickBestPair(pairs, symbol)
    if (!best) throw new SourceUnavailableError(this.id, 'MalformedResponse', `no pairs found for ${symbol}`)

    log('DexScreener: %s -> %d pairs', symbol, pairs.length)
    return mapPairToSnapshot(best, symbol, this.now())
  }
}
