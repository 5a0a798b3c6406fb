// src/config.ts
import dotenv from 'dotenv'
dotenv.config()

// comma separated env value -> trimmed non-empty entries, order kept
export function parseList(raw: string | undefined): string[] {
  if (!raw) return []
  return raw
    .split(',')
    .map((s) => s.trim().replace(/\/+$/, ''))
    .filter((s) => s.length > 0)
}

function num(name: string, fallback: number): number {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  return Number.isFinite(n) ? n : fallback
}

export const PORT = num('PORT', 3000)
export const REDIS_URL = process.env.REDIS_URL || 'redis://localhost:6379'
export const ADMIN_KEY = process.env.ADMIN_KEY || ''

// CoinMarketCap
export const CMC_API_KEY = process.env.COINMARKETCAP_API_KEY || ''
export const CMC_API_URL = process.env.CMC_API_URL || 'https://pro-api.coinmarketcap.com'
export const CMC_DAILY_QUOTA = num('CMC_DAILY_QUOTA', 300)
export const QUOTE_FRESHNESS_MS = num('QUOTE_FRESHNESS_MS', 15 * 60 * 1000)

// DexScreener
export const DEXSCREENER_API_URL = process.env.DEXSCREENER_API_URL || 'https://api.dexscreener.com'

// social RSS mirrors, tried in this order
export const DEFAULT_SOCIAL_FEED_URLS = [
  'https://nitter.net',
  'https://nitter.privacydev.net',
  'https://nitter.poast.org'
]
const socialOverride = parseList(process.env.SOCIAL_FEED_URLS || process.env.NITTER_INSTANCES)
export const SOCIAL_FEED_URLS = socialOverride.length ? socialOverride : DEFAULT_SOCIAL_FEED_URLS
export const SOCIAL_FEED_TIMEOUT_MS = num('SOCIAL_FEED_TIMEOUT_MS', 8000)
export const SOCIAL_MAX_MENTIONS = num('SOCIAL_MAX_MENTIONS', 15)

// CryptoCompare news, no key needed
export const NEWS_API_URL = process.env.NEWS_API_URL || 'https://min-api.cryptocompare.com'
export const NEWS_MAX_ARTICLES = num('NEWS_MAX_ARTICLES', 8)

export const SOURCE_TIMEOUT_MS = num('SOURCE_TIMEOUT_MS', 30_000)

// AI provider (OpenRouter)
export const OPENROUTER_API_KEY = process.env.OPENROUTER_API_KEY || ''
export const AI_API_URL = process.env.AI_API_URL || 'https://openrouter.ai/api/v1'
export const AI_MODEL = process.env.AI_MODEL || 'google/gemma-3n-e4b-it'
export const AI_TIMEOUT_MS = num('AI_TIMEOUT_MS', 60_000)
export const AI_MAX_RETRIES = num('AI_MAX_RETRIES', 3)
export const AI_RETRY_BASE_MS = num('AI_RETRY_BASE_MS', 1000)
export const AI_TEMPERATURE = num('AI_TEMPERATURE', 0.7)
export const AI_MAX_TOKENS = num('AI_MAX_TOKENS', 2000)

// prompt / output limits (characters)
export const PROMPT_MAX_CHARS = num('PROMPT_MAX_CHARS', 12_000)
export const SUMMARY_MAX_CHARS = num('SUMMARY_MAX_CHARS', 4000)

// schedule: 08:00 and 23:00 Moscow time by default
export const SCHEDULE_TIMEZONE = process.env.SCHEDULE_TIMEZONE || 'Europe/Moscow'
export const MORNING_TIME = process.env.MORNING_TIME || '08:00'
export const EVENING_TIME = process.env.EVENING_TIME || '23:00'
export const SCHEDULER_TICK_SECONDS = num('SCHEDULER_TICK_SECONDS', 60)

// pipeline
export const PIPELINE_TIMEOUT_MS = num('PIPELINE_TIMEOUT_MS', 5 * 60 * 1000)
export const PIPELINE_CONCURRENCY = num('PIPELINE_CONCURRENCY', 3)
export const SUMMARY_HISTORY_LIMIT = num('SUMMARY_HISTORY_LIMIT', 20)
