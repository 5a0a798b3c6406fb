// tests/routes.test.ts
import request from 'supertest'
import { AppDeps, createApp } from '../src/app'
import { SourceUnavailableError } from '../src/errors'
import { SourceAggregator } from '../src/services/aggregator'
import { AIProvider } from '../src/services/aiProvider'
import { CoinStore } from '../src/services/coinStore'
import { SummaryComposer } from '../src/services/composer'
import { MemoryStore } from '../src/services/memoryStore'
import { SummaryPipeline } from '../src/services/pipeline'
import { Scheduler } from '../src/services/scheduler'
import { SummaryStore } from '../src/services/summaryStore'
import { MarketSnapshot, ScheduledJob } from '../src/types'
import { createTestRedis, fakeClient, marketSnapshot, OWB, RNBW } from './helpers'

const KEY = 'test-secret'

describe('HTTP API', () => {
  const redis = createTestRedis()
  const coins = new CoinStore(redis)
  const memory = new MemoryStore(redis)
  const summaries = new SummaryStore(redis, 5)

  const market = fakeClient<MarketSnapshot>('dexscreener', async (coin) => {
    if (coin.symbol === 'RNBW') throw new SourceUnavailableError('dexscreener', 'Unreachable', 'HTTP 503')
    return marketSnapshot({ symbol: coin.symbol, sources: ['dexscreener'] })
  })
  const aggregator = new SourceAggregator({ clients: [market], sourceTimeoutMs: 1000 })
  const provider: AIProvider = { complete: async () => 'OWB holds steady.' }
  const composer = new SummaryComposer({ memory, provider, maxPromptChars: 100_000, maxSummaryChars: 4000 })
  const pipeline = new SummaryPipeline({ coins, aggregator, composer, summaries, concurrency: 2, runTimeoutMs: 1000 })

  function app(overrides: Partial<AppDeps> = {}) {
    return createApp({ adminKey: KEY, coins, memory, summaries, aggregator, pipeline, accessLog: false, ...overrides })
  }

  beforeEach(async () => {
    await redis.flushall()
    await memory.seedDefaults()
    await coins.save(OWB)
    await coins.save(RNBW)
  })

  afterAll(() => redis.disconnect())

  describe('health', () => {
    test('reports uptime and job states', async () => {
      const scheduler = new Scheduler({
        slots: [{ name: 'morning', time: '08:00', timezone: 'Europe/Moscow' }],
        store: {
          load: async () => undefined,
          save: async (_job: ScheduledJob) => undefined
        },
        run: async () => true,
        tickMs: 60_000,
        now: () => Date.UTC(2024, 0, 15, 4, 0)
      })
      await scheduler.init()

      const res = await request(app({ scheduler })).get('/health')
      expect(res.status).toBe(200)
      expect(res.body.ok).toBe(true)
      expect(res.body.service).toBe('market-digest-service')
      expect(res.body.jobs).toEqual([
        {
          name: 'morning',
          time: '08:00',
          timezone: 'Europe/Moscow',
          state: 'idle',
          nextFireAt: Date.UTC(2024, 0, 15, 5, 0)
        }
      ])
    })
  })

  describe('summaries', () => {
    test('runs one coin on demand and serves the latest summary', async () => {
      const created = await request(app()).post('/summaries').send({ symbol: 'owb' })
      expect(created.status).toBe(201)
      expect(created.body.summary).toMatchObject({ symbol: 'OWB', reportType: 'on-demand', text: 'OWB holds steady.' })

      const latest = await request(app()).get('/summaries/OWB/latest')
      expect(latest.status).toBe(200)
      expect(latest.body.text).toBe('OWB holds steady.')
    })

    test('runs every active coin and reports each outcome', async () => {
      const res = await request(app()).post('/summaries').send({})
      expect(res.status).toBe(201)
      expect(res.body.ok).toBe(true)
      expect(res.body.report.outcomes.map((o: { symbol: string; ok: boolean }) => `${o.symbol}:${o.ok}`)).toEqual([
        'OWB:true',
        'RNBW:false'
      ])
    })

    test('unknown coin is 404', async () => {
      const res = await request(app()).post('/summaries').send({ symbol: 'NOPE' })
      expect(res.status).toBe(404)
    })

    test('inactive coin is 404', async () => {
      await coins.save({ ...OWB, active: false })
      const res = await request(app()).post('/summaries').send({ symbol: 'OWB' })
      expect(res.status).toBe(404)
    })

    test('coin with no data anywhere is 502', async () => {
      const res = await request(app()).post('/summaries').send({ symbol: 'RNBW' })
      expect(res.status).toBe(502)
      expect(res.body.type).toBe('AllSourcesUnavailableError')
    })

    test('invalid body is 400', async () => {
      const res = await request(app()).post('/summaries').send({ symbol: 5 })
      expect(res.status).toBe(400)
    })

    test('no summary yet is 404', async () => {
      const res = await request(app()).get('/summaries/OWB/latest')
      expect(res.status).toBe(404)
    })
  })

  describe('admin', () => {
    test('requires the admin key', async () => {
      expect((await request(app()).get('/admin/templates')).status).toBe(403)
      expect((await request(app()).get('/admin/templates').set('x-admin-key', 'wrong')).status).toBe(403)
    })

    test('is open when no key is configured', async () => {
      expect((await request(app({ adminKey: '' })).get('/admin/templates')).status).toBe(200)
    })

    test('lists and replaces templates', async () => {
      const list = await request(app()).get('/admin/templates').set('x-admin-key', KEY)
      expect(list.body.items.map((t: { role: string }) => t.role)).toEqual(['system', 'summary-format'])

      const put = await request(app()).put('/admin/templates/system').set('x-admin-key', KEY).send({ text: 'Be brief.' })
      expect(put.status).toBe(200)
      expect(put.body).toMatchObject({ role: 'system', text: 'Be brief.' })
      expect((await memory.getTemplate('system')).text).toBe('Be brief.')
    })

    test('rejects unknown roles and blank templates', async () => {
      const unknown = await request(app()).put('/admin/templates/footer').set('x-admin-key', KEY).send({ text: 'x' })
      expect(unknown.status).toBe(404)
      const blank = await request(app()).put('/admin/templates/system').set('x-admin-key', KEY).send({ text: '  ' })
      expect(blank.status).toBe(400)
    })

    test('edits learned memory', async () => {
      const put = await request(app()).put('/admin/memory/tone').set('x-admin-key', KEY).send({ value: 'dry' })
      expect(put.status).toBe(200)
      expect(put.body).toMatchObject({ key: 'tone', value: 'dry' })

      const list = await request(app()).get('/admin/memory').set('x-admin-key', KEY)
      expect(list.body.items.map((m: { key: string }) => m.key)).toContain('tone')

      expect((await request(app()).delete('/admin/memory/tone').set('x-admin-key', KEY)).status).toBe(200)
      expect((await request(app()).delete('/admin/memory/tone').set('x-admin-key', KEY)).status).toBe(404)
    })

    test('previews an aggregation without the model', async () => {
      const res = await request(app()).post('/admin/aggregate/OWB').set('x-admin-key', KEY)
      expect(res.status).toBe(200)
      expect(res.body.market.sources).toEqual(['dexscreener'])
      expect(res.body.degraded).toBe(false)

      const missing = await request(app()).post('/admin/aggregate/NOPE').set('x-admin-key', KEY)
      expect(missing.status).toBe(404)
    })
  })
})
