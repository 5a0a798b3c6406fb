// src/services/summaryStore.ts
import Redis from 'ioredis'
import { z } from 'zod'
import { StoredSummary } from '../types'

const summarySchema = z.object({
  symbol: z.string(),
  reportType: z.enum(['morning', 'evening', 'on-demand']),
  text: z.string(),
  degraded: z.boolean(),
  createdAt: z.number()
})

// produced summaries, newest first, capped per coin; read by the delivery layer
export class SummaryStore {
  private readonly redis: Redis
  private readonly historyLimit: number

  constructor(redis: Redis, historyLimit: number) {
    this.redis = redis
    this.historyLimit = Math.max(1, historyLimit)
  }

  private key(symbol: string): string {
    return `summaries:${symbol.toUpperCase()}`
  }

  async save(summary: StoredSummary): Promise<void> {
    const key = this.key(summary.symbol)
    await this.redis.lpush(key, JSON.stringify(summary))
    await this.redis.ltrim(key, 0, this.historyLimit - 1)
  }

  async list(symbol: string, limit = this.historyLimit): Promise<StoredSummary[]> {
    const raw = await this.redis.lrange(this.key(symbol), 0, limit - 1)
    const out: StoredSummary[] = []
    for (const r of raw) {
      try {
        const parsed = summarySchema.safeParse(JSON.parse(r))
        if (parsed.success) out.push(parsed.data)
      } catch {
        // eslint-disable-next-line no-console
        console.warn(`skipping unreadable summary for ${symbol}`)
      }
    }
    return out
  }

  async latest(symbol: string): Promise<StoredSummary | undefined> {
    const [first] = await this.list(symbol, 1)
    return first
  }
}
