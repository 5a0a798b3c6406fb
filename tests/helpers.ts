// tests/helpers.ts
import Redis from 'ioredis'
import RedisMock from 'ioredis-mock'
import {
  AggregateResult,
  Coin,
  MarketSnapshot,
  Mention,
  NewsSnapshot,
  SocialSnapshot,
  SourceClient,
  Snapshot
} from '../src/types'

// ioredis-mock instances share one keyspace per host, so every test flushes it first
export function createTestRedis(): Redis {
  return new RedisMock()
}

export const OWB: Coin = {
  symbol: 'OWB',
  name: 'OpenWorld',
  socialQueries: ['$OWB'],
  active: true
}

export const RNBW: Coin = {
  symbol: 'RNBW',
  name: 'Rainbow',
  dexSearchQuery: 'rainbow token',
  active: true
}

export function marketSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return {
    kind: 'market',
    symbol: 'OWB',
    sources: ['coinmarketcap'],
    price: 0.0123,
    marketCap: 1_250_000,
    volume24h: 84_000.5,
    percentChange: { h1: 0.5, h24: -3.25, d7: 12 },
    fetchedAt: 1_700_000_000_000,
    fresh: true,
    ...overrides
  }
}

export function mention(text: string, publishedAt: number, author = 'trader'): Mention {
  return { text, author, publishedAt }
}

export function socialSnapshot(mentions: Mention[], symbol = 'OWB'): SocialSnapshot {
  return { kind: 'social', symbol, feed: 'https://feed.test', mentions, fetchedAt: 1_700_000_000_000 }
}

export function newsSnapshot(overrides: Partial<NewsSnapshot> = {}): NewsSnapshot {
  return {
    kind: 'news',
    symbol: 'OWB',
    articles: [
      {
        title: 'OpenWorld lists on a new exchange',
        source: 'CoinDesk',
        body: 'The OWB token is now tradable.',
        url: 'https://news.test/owb',
        publishedAt: 1_700_000_000_000
      }
    ],
    matched: true,
    fetchedAt: 1_700_000_000_000,
    ...overrides
  }
}

export function aggregate(coin: Coin, overrides: Partial<AggregateResult> = {}): AggregateResult {
  return { coin, degraded: false, failures: [], ...overrides }
}

// source client whose behaviour is fixed by the test
export function fakeClient<S extends Snapshot>(
  id: SourceClient['id'],
  impl: (coin: Coin, signal?: AbortSignal) => Promise<S>
): SourceClient<S> {
  return { id, fetch: impl }
}

export const tick = () => new Promise((r) => setImmediate(r))
