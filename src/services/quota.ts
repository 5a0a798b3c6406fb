// src/services/quota.ts
import Redis from 'ioredis'
import debug from 'debug'
import { utcDayKey } from '../utils/time'

const log = debug('app:quota')

// counters outlive their day briefly so a late reader still sees the final count
const KEY_TTL_SECONDS = 2 * 24 * 60 * 60

export interface DailyQuotaOptions {
  name: string
  limit: number
  now?: () => number
}

/**
 * Provider call budget that resets at 00:00 UTC.
 * tryConsume is a single INCR, so concurrent pipelines can never jointly exceed the limit.
 */
export class DailyQuota {
  private readonly redis: Redis
  private readonly name: string
  private readonly limit: number
  private readonly now: () => number

  constructor(redis: Redis, options: DailyQuotaOptions) {
    this.redis = redis
    this.name = options.name
    this.limit = options.limit
    this.now = options.now ?? Date.now
  }

  private key(): string {
    return `quota:${this.name}:${utcDayKey(this.now())}`
  }

  async tryConsume(): Promise<boolean> {
    const key = this.key()
    const used = await this.redis.incr(key)
    if (used === 1) await this.redis.expire(key, KEY_TTL_SECONDS)
    const ok = used <= this.limit
    if (!ok) log('%s quota exhausted (%d/%d)', this.name, used, this.limit)
    return ok
  }

  async used(): Promise<number> {
    const raw = await this.redis.get(this.key())
    return Math.min(Number(raw ?? 0) || 0, this.limit)
  }

  async remaining(): Promise<number> {
    return this.limit - (await this.used())
  }
}
