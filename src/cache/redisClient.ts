// src/cache/redisClient.ts
import Redis from 'ioredis'
import debug from 'debug'
import { errorMessage } from '../errors'

const log = debug('app:redis')

export function createRedis(url: string): Redis {
  const redis = new Redis(url, {
    enableReadyCheck: true,
    maxRetriesPerRequest: 50,
    connectTimeout: 10000,
    lazyConnect: true, // create instance but connect explicitly at startup
    retryStrategy(times: number) {
      // exponential backoff with cap
      return Math.min(200 + times * 200, 2000)
    },
    reconnectOnError(err: Error) {
      const m = err.message ?? ''
      return m.includes('ECONNRESET') || m.includes('ECONNREFUSED') || m.includes('EPIPE')
    }
  })

  redis.on('error', (err: Error) => {
    // eslint-disable-next-line no-console
    console.error('Redis error', err.message)
  })
  redis.on('ready', () => log('Redis ready'))

  return redis
}

/**
 * Connect once at startup with a timeout.
 * Unlike a cache, the stores here hold durable state, so failing to connect is fatal for startup.
 */
export async function connectRedis(redis: Redis, timeoutMs = 10_000): Promise<void> {
  if (redis.status === 'ready' || redis.status === 'connecting') return

  let timer: NodeJS.Timeout | undefined
  try {
    await Promise.race([
      redis.connect(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('connect_timeout')), timeoutMs)
      })
    ])
    log('Redis connected')
  } finally {
    if (timer) clearTimeout(timer)
  }
}

export async function closeRedis(redis: Redis): Promise<void> {
  try {
    await redis.quit()
  } catch (e) {
    // eslint-disable-next-line no-console
    console.warn('Redis quit failed, disconnecting', errorMessage(e))
    redis.disconnect()
  }
}
