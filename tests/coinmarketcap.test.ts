// tests/coinmarketcap.test.ts
import nock from 'nock'
nock.disableNetConnect()

import { createHttpClient } from '../src/http/axiosClient'
import { CoinMarketCapClient } from '../src/services/coinmarketcap'
import { DailyQuota } from '../src/services/quota'
import { createTestRedis, OWB } from './helpers'

const BASE = 'https://cmc.test'
const PATH = '/v1/cryptocurrency/quotes/latest'
const NOW = Date.UTC(2024, 0, 15, 12, 0)

function okBody(lastUpdated: string) {
  return {
    status: { error_code: 0, error_message: null },
    data: {
      OWB: [
        {
          symbol: 'OWB',
          name: 'OpenWorld',
          quote: {
            USD: {
              price: 0.0123,
              volume_24h: 84000,
              market_cap: 1250000,
              percent_change_1h: 0.5,
              percent_change_24h: -3.25,
              percent_change_7d: 12,
              last_updated: lastUpdated
            }
          }
        }
      ]
    }
  }
}

describe('CoinMarketCapClient', () => {
  const redis = createTestRedis()

  function client(opts: { apiKey?: string; limit?: number } = {}) {
    return new CoinMarketCapClient({
      apiKey: opts.apiKey ?? 'test-secret',
      baseUrl: BASE,
      quota: new DailyQuota(redis, { name: 'coinmarketcap', limit: opts.limit ?? 10, now: () => NOW }),
      freshnessMs: 15 * 60 * 1000,
      http: createHttpClient({ retries: 2, retryBaseMs: 0 }),
      now: () => NOW
    })
  }

  beforeEach(async () => {
    await redis.flushall()
  })

  afterEach(() => nock.cleanAll())

  afterAll(() => {
    nock.restore()
    redis.disconnect()
  })

  test('maps the USD quote into a market snapshot', async () => {
    const scope = nock(BASE)
      .matchHeader('X-CMC_PRO_API_KEY', 'test-secret')
      .get(PATH)
      .query({ symbol: 'OWB', convert: 'USD' })
      .reply(200, okBody('2024-01-15T11:55:00.000Z'))

    const snap = await client().fetch(OWB)
    expect(snap).toEqual({
      kind: 'market',
      symbol: 'OWB',
      sources: ['coinmarketcap'],
      price: 0.0123,
      marketCap: 1250000,
      volume24h: 84000,
      percentChange: { h1: 0.5, h24: -3.25, d7: 12 },
      fetchedAt: NOW,
      fresh: true
    })
    expect(scope.isDone()).toBe(true)
  })

  test('quotes older than the freshness window are marked stale', async () => {
    nock(BASE).get(PATH).query(true).reply(200, okBody('2024-01-15T11:00:00.000Z'))
    const snap = await client().fetch(OWB)
    expect(snap.fresh).toBe(false)
  })

  test('missing API key fails as Unauthorized without a request', async () => {
    const scope = nock(BASE).get(PATH).query(true).reply(200, okBody('2024-01-15T11:55:00.000Z'))
    await expect(client({ apiKey: '' }).fetch(OWB)).rejects.toMatchObject({
      source: 'coinmarketcap',
      kind: 'Unauthorized'
    })
    expect(scope.isDone()).toBe(false)
  })

  test('exhausted daily quota fails as RateLimited without a request', async () => {
    const scope = nock(BASE).get(PATH).query(true).reply(200, okBody('2024-01-15T11:55:00.000Z'))
    await expect(client({ limit: 0 }).fetch(OWB)).rejects.toMatchObject({
      kind: 'RateLimited',
      detail: 'daily quota exhausted'
    })
    expect(scope.isDone()).toBe(false)
  })

  test('401 is not retried', async () => {
    const scope = nock(BASE)
      .get(PATH)
      .query(true)
      .reply(401, { status: { error_code: 1001, error_message: 'bad key' } })
      .get(PATH)
      .query(true)
      .reply(200, okBody('2024-01-15T11:55:00.000Z'))

    await expect(client().fetch(OWB)).rejects.toMatchObject({ kind: 'Unauthorized' })
    expect(scope.pendingMocks()).toHaveLength(1)
  })

  test('5xx is not retried, so a quota of N allows at most N requests', async () => {
    let hits = 0
    nock(BASE)
      .get(PATH)
      .query(true)
      .times(3)
      .reply(() => {
        hits++
        return [503, 'unavailable']
      })

    const c = client({ limit: 1 })
    await expect(c.fetch(OWB)).rejects.toMatchObject({ kind: 'Unreachable', detail: 'HTTP 503' })
    await expect(c.fetch(OWB)).rejects.toMatchObject({ kind: 'RateLimited', detail: 'daily quota exhausted' })
    expect(hits).toBe(1)
  })

  test('429 is not retried', async () => {
    const scope = nock(BASE)
      .get(PATH)
      .query(true)
      .reply(429, { status: { error_code: 1008, error_message: 'slow down' } }, { 'Retry-After': '1' })
      .get(PATH)
      .query(true)
      .reply(200, okBody('2024-01-15T11:55:00.000Z'))

    await expect(client().fetch(OWB)).rejects.toMatchObject({ kind: 'RateLimited', detail: 'HTTP 429' })
    expect(scope.pendingMocks()).toHaveLength(1)
  })

  test('default http client does not retry', async () => {
    const scope = nock(BASE).get(PATH).query(true).reply(502).get(PATH).query(true).reply(200, okBody('2024-01-15T11:55:00.000Z'))
    const c = new CoinMarketCapClient({
      apiKey: 'test-secret',
      baseUrl: BASE,
      quota: new DailyQuota(redis, { name: 'coinmarketcap', limit: 10, now: () => NOW }),
      freshnessMs: 15 * 60 * 1000,
      now: () => NOW
    })
    await expect(c.fetch(OWB)).rejects.toMatchObject({ kind: 'Unreachable' })
    expect(scope.pendingMocks()).toHaveLength(1)
  })

  test('error codes in the status block are classified', async () => {
    nock(BASE)
      .get(PATH)
      .query(true)
      .reply(200, { status: { error_code: 1008, error_message: 'minute rate limit reached' } })
    await expect(client().fetch(OWB)).rejects.toMatchObject({
      kind: 'RateLimited',
      detail: 'minute rate limit reached'
    })
  })

  test('unexpected body shape is MalformedResponse', async () => {
    nock(BASE).get(PATH).query(true).reply(200, { hello: 'world' })
    await expect(client().fetch(OWB)).rejects.toMatchObject({ kind: 'MalformedResponse' })
  })

  test('symbol missing from data is MalformedResponse', async () => {
    nock(BASE).get(PATH).query(true).reply(200, { status: { error_code: 0 }, data: {} })
    await expect(client().fetch(OWB)).rejects.toMatchObject({
      kind: 'MalformedResponse',
      detail: 'no quote for OWB'
    })
  })
})
