// src/types.ts
export type SourceId = 'coinmarketcap' | 'dexscreener' | 'social' | 'news'

export type SourceFailureKind = 'Unauthorized' | 'RateLimited' | 'Timeout' | 'MalformedResponse' | 'Unreachable'

export type ReportType = 'morning' | 'evening' | 'on-demand'

// tracked token; symbol is stored upper-case and unique
export interface Coin {
  symbol: string
  name: string
  contractAddress?: string
  chainId?: string
  dexSearchQuery?: string
  socialQueries?: string[]
  active: boolean
}

export interface PercentChange {
  h1?: number
  h24?: number
  d7?: number
}

export interface MarketSnapshot {
  kind: 'market'
  symbol: string
  sources: SourceId[]
  price?: number
  marketCap?: number
  volume24h?: number
  liquidityUsd?: number
  percentChange: PercentChange
  buys24h?: number
  sells24h?: number
  pairLabel?: string
  fetchedAt: number // epoch ms
  fresh: boolean
}

export interface Mention {
  text: string
  author?: string
  link?: string
  publishedAt: number // epoch ms
}

export interface SocialSnapshot {
  kind: 'social'
  symbol: string
  feed: string // base url of the endpoint that answered
  mentions: Mention[] // newest first
  fetchedAt: number
}

export interface NewsArticle {
  title: string
  source?: string
  body?: string // capped
  url?: string
  publishedAt: number // epoch ms
}

export interface NewsSnapshot {
  kind: 'news'
  symbol: string
  articles: NewsArticle[] // newest first
  // false when nothing mentioned the coin and these are general headlines
  matched: boolean
  fetchedAt: number
}

export type Snapshot = MarketSnapshot | SocialSnapshot | NewsSnapshot

export interface SourceFailure {
  source: SourceId
  kind: SourceFailureKind
  message: string
}

export interface AggregateResult {
  coin: Coin
  market?: MarketSnapshot
  social?: SocialSnapshot
  news?: NewsSnapshot
  degraded: boolean
  failures: SourceFailure[]
}

// every provider exposes the same capability; callers never branch on the concrete client
export interface SourceClient<S extends Snapshot = Snapshot> {
  readonly id: SourceId
  fetch(coin: Coin, signal?: AbortSignal): Promise<S>
}

export type TemplateRole = 'system' | 'summary-format'

export interface Template {
  role: TemplateRole
  text: string
  updatedAt: number
}

export interface MemoryEntry {
  key: string
  value: string
  createdAt: number
  updatedAt: number
}

export type JobRunState = 'idle' | 'running' | 'failed'

export interface ScheduledJob {
  name: 'morning' | 'evening'
  time: string // HH:MM, local to timezone
  timezone: string
  lastFiredAt?: number // epoch ms (UTC)
  state: JobRunState
  lastOutcome?: 'success' | 'failed'
  lastError?: string
}

export interface StoredSummary {
  symbol: string
  reportType: ReportType
  text: string
  degraded: boolean
  createdAt: number
}
