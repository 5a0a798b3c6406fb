// src/services/coinStore.ts
import Redis from 'ioredis'
import { z } from 'zod'
import { Coin } from '../types'
import { DEFAULT_COINS } from './defaults'

const COINS_KEY = 'coins'

const coinSchema = z.object({
  symbol: z.string().min(1),
  name: z.string().min(1),
  contractAddress: z.string().optional(),
  chainId: z.string().optional(),
  dexSearchQuery: z.string().optional(),
  socialQueries: z.array(z.string()).optional(),
  active: z.boolean()
})

function parseCoin(raw: string): Coin | undefined {
  try {
    const parsed = coinSchema.safeParse(JSON.parse(raw))
    return parsed.success ? parsed.data : undefined
  } catch {
    return undefined
  }
}

// coin records are edited by the developer tooling; the pipeline only reads them
export class CoinStore {
  private readonly redis: Redis

  constructor(redis: Redis) {
    this.redis = redis
  }

  async seedDefaults(): Promise<void> {
    for (const coin of DEFAULT_COINS) {
      await this.redis.hsetnx(COINS_KEY, coin.symbol, JSON.stringify(coin))
    }
  }

  // symbol is the hash field, so it is unique by construction
  async save(coin: Coin): Promise<Coin> {
    const stored: Coin = { ...coin, symbol: coin.symbol.trim().toUpperCase() }
    await this.redis.hset(COINS_KEY, stored.symbol, JSON.stringify(stored))
    return stored
  }

  async get(symbol: string): Promise<Coin | undefined> {
    const raw = await this.redis.hget(COINS_KEY, symbol.trim().toUpperCase())
    return raw === null ? undefined : parseCoin(raw)
  }

  async listAll(): Promise<Coin[]> {
    const all = await this.redis.hgetall(COINS_KEY)
    return Object.values(all)
      .map(parseCoin)
      .filter((c): c is Coin => !!c)
      .sort((a, b) => a.symbol.localeCompare(b.symbol))
  }

  async listActive(): Promise<Coin[]> {
    return (await this.listAll()).filter((c) => c.active)
  }
}
