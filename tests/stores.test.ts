// tests/stores.test.ts
import { CoinStore } from '../src/services/coinStore'
import { DEFAULT_COINS } from '../src/services/defaults'
import { SummaryStore } from '../src/services/summaryStore'
import { StoredSummary } from '../src/types'
import { createTestRedis, OWB, RNBW } from './helpers'

const redis = createTestRedis()

beforeEach(async () => {
  await redis.flushall()
})

afterAll(() => redis.disconnect())

describe('CoinStore', () => {
  const coins = new CoinStore(redis)

  test('seeds defaults without overwriting edits', async () => {
    await coins.save({ ...OWB, name: 'Renamed' })
    await coins.seedDefaults()
    const all = await coins.listAll()
    expect(all.map((c) => c.symbol)).toEqual(DEFAULT_COINS.map((c) => c.symbol).sort())
    expect((await coins.get('OWB'))?.name).toBe('Renamed')
  })

  test('symbols are stored upper-case and unique', async () => {
    await coins.save({ ...RNBW, symbol: ' rnbw ' })
    await coins.save({ ...RNBW, name: 'Rainbow v2' })
    expect(await coins.listAll()).toEqual([{ ...RNBW, name: 'Rainbow v2' }])
    expect((await coins.get('rnbw'))?.symbol).toBe('RNBW')
  })

  test('only active coins are listed for runs', async () => {
    await coins.save(OWB)
    await coins.save({ ...RNBW, active: false })
    expect((await coins.listActive()).map((c) => c.symbol)).toEqual(['OWB'])
  })

  test('unreadable records are ignored', async () => {
    await coins.save(OWB)
    await redis.hset('coins', 'BAD', '{"symbol":"BAD"}')
    expect((await coins.listAll()).map((c) => c.symbol)).toEqual(['OWB'])
    expect(await coins.get('BAD')).toBeUndefined()
  })
})

describe('SummaryStore', () => {
  const store = new SummaryStore(redis, 2)
  const summary = (text: string, createdAt: number): StoredSummary => ({
    symbol: 'OWB',
    reportType: 'morning',
    text,
    degraded: false,
    createdAt
  })

  test('keeps the newest summaries up to the history limit', async () => {
    await store.save(summary('first', 1))
    await store.save(summary('second', 2))
    await store.save(summary('third', 3))

    expect((await store.list('OWB')).map((s) => s.text)).toEqual(['third', 'second'])
    expect((await store.latest('owb'))?.text).toBe('third')
  })

  test('nothing stored yet', async () => {
    expect(await store.latest('OWB')).toBeUndefined()
  })
})
