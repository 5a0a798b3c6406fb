// src/index.ts
import debug from 'debug'
import { createServer } from './app'
import * as config from './config'
import { closeRedis, connectRedis, createRedis } from './cache/redisClient'
import { errorMessage } from './errors'
import { SourceAggregator } from './services/aggregator'
import { OpenRouterProvider } from './services/aiProvider'
import { CoinMarketCapClient } from './services/coinmarketcap'
import { CoinStore } from './services/coinStore'
import { SummaryComposer } from './services/composer'
import { DexScreenerClient } from './services/dexscreener'
import { MemoryStore } from './services/memoryStore'
import { CryptoNewsClient } from './services/news'
import { runSucceeded, SummaryPipeline } from './services/pipeline'
import { DailyQuota } from './services/quota'
import { RedisJobStateStore, Scheduler } from './services/scheduler'
import { SocialFeedClient } from './services/social'
import { SummaryStore } from './services/summaryStore'

const log = debug('app:main')

async function main() {
  const redis = createRedis(config.REDIS_URL)
  await connectRedis(redis)

  const coins = new CoinStore(redis)
  const memory = new MemoryStore(redis)
  const summaries = new SummaryStore(redis, config.SUMMARY_HISTORY_LIMIT)
  await coins.seedDefaults()
  await memory.seedDefaults()

  const aggregator = new SourceAggregator({
    clients: [
      new CoinMarketCapClient({
        apiKey: config.CMC_API_KEY,
        baseUrl: config.CMC_API_URL,
        quota: new DailyQuota(redis, { name: 'coinmarketcap', limit: config.CMC_DAILY_QUOTA }),
        freshnessMs: config.QUOTE_FRESHNESS_MS
      }),
      new DexScreenerClient({ baseUrl: config.DEXSCREENER_API_URL }),
      new SocialFeedClient({
        endpoints: config.SOCIAL_FEED_URLS,
        timeoutMs: config.SOCIAL_FEED_TIMEOUT_MS,
        maxMentions: config.SOCIAL_MAX_MENTIONS
      }),
      new CryptoNewsClient({ baseUrl: config.NEWS_API_URL, maxArticles: config.NEWS_MAX_ARTICLES })
    ],
    sourceTimeoutMs: config.SOURCE_TIMEOUT_MS
  })

  const composer = new SummaryComposer({
    memory,
    provider: new OpenRouterProvider({
      apiKey: config.OPENROUTER_API_KEY,
      baseUrl: config.AI_API_URL,
      model: config.AI_MODEL,
      timeoutMs: config.AI_TIMEOUT_MS,
      maxRetries: config.AI_MAX_RETRIES,
      retryBaseMs: config.AI_RETRY_BASE_MS,
      temperature: config.AI_TEMPERATURE,
      maxTokens: config.AI_MAX_TOKENS
    }),
    maxPromptChars: config.PROMPT_MAX_CHARS,
    maxSummaryChars: config.SUMMARY_MAX_CHARS
  })

  const pipeline = new SummaryPipeline({
    coins,
    aggregator,
    composer,
    summaries,
    concurrency: config.PIPELINE_CONCURRENCY,
    runTimeoutMs: config.PIPELINE_TIMEOUT_MS
  })

  const scheduler = new Scheduler({
    slots: [
      { name: 'morning', time: config.MORNING_TIME, timezone: config.SCHEDULE_TIMEZONE },
      { name: 'evening', time: config.EVENING_TIME, timezone: config.SCHEDULE_TIMEZONE }
    ],
    store: new RedisJobStateStore(redis),
    tickMs: config.SCHEDULER_TICK_SECONDS * 1000,
    run: async (job) => runSucceeded(await pipeline.runAllWithDeadline(job.name))
  })
  await scheduler.start()

  const { httpServer } = createServer({
    adminKey: config.ADMIN_KEY,
    coins,
    memory,
    summaries,
    aggregator,
    pipeline,
    scheduler
  })

  httpServer.listen(config.PORT, () => {
    // eslint-disable-next-line no-console
    console.log(`Server listening on port ${config.PORT}`)
    log('Server started')
  })

  let closing = false
  const shutdown = async (signal: string) => {
    if (closing) return
    closing = true
    log('%s received, shutting down', signal)
    httpServer.close()
    await scheduler.stop()
    await closeRedis(redis)
    process.exit(0)
  }
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((e: unknown) => {
        // eslint-disable-next-line no-console
        console.error('shutdown failed', errorMessage(e))
        process.exit(1)
      })
    })
  }
}

main().catch((e: unknown) => {
  // eslint-disable-next-line no-console
  console.error('startup failed', errorMessage(e))
  process.exit(1)
})
