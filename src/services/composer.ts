// src/services/composer.ts
import debug from 'debug'
import { AIGenerationFailedError } from '../errors'
import {
  AggregateResult,
  Coin,
  MarketSnapshot,
  Mention,
  MemoryEntry,
  NewsArticle,
  NewsSnapshot,
  ReportType,
  SocialSnapshot
} from '../types'
import { AIProvider, CompletionRequest } from './aiProvider'
import { MemoryStore } from './memoryStore'

const log = debug('app:composer')

// 0 = full precision; each step coarsens every number in the data section
type PrecisionLevel = 0 | 1 | 2
const PRECISION_LEVELS: PrecisionLevel[] = [0, 1, 2]
const PRICE_DIGITS = [8, 4, 2]
const AMOUNT_DECIMALS = [2, 0, 0]
const PERCENT_DECIMALS = [2, 1, 0]

export interface ComposerOptions {
  memory: MemoryStore
  provider: AIProvider
  maxPromptChars: number
  maxSummaryChars: number
}

export interface BuiltPrompt extends CompletionRequest {
  size: number
  droppedMentions: number
  droppedArticles: number
  precision: PrecisionLevel
}

interface CoinData {
  coin: Coin
  result?: AggregateResult
  mentions: Mention[] // kept mentions, newest first
  omitted: number
  articles: NewsArticle[] // kept articles, newest first
  omittedArticles: number
}

function compact(v: number): string {
  const abs = Math.abs(v)
  if (abs >= 1e9) return `${(v / 1e9).toFixed(1)}B`
  if (abs >= 1e6) return `${(v / 1e6).toFixed(1)}M`
  if (abs >= 1e3) return `${(v / 1e3).toFixed(1)}K`
  return v.toFixed(0)
}

export function formatPrice(v: number | undefined, level: PrecisionLevel): string {
  if (v === undefined) return 'unknown'
  return Number(v.toPrecision(PRICE_DIGITS[level])).toString()
}

export function formatAmount(v: number | undefined, level: PrecisionLevel): string {
  if (v === undefined) return 'unknown'
  return level === 2 ? compact(v) : v.toFixed(AMOUNT_DECIMALS[level])
}

export function formatPercent(v: number | undefined, level: PrecisionLevel): string {
  if (v === undefined) return 'unknown'
  return `${v >= 0 ? '+' : ''}${v.toFixed(PERCENT_DECIMALS[level])}%`
}

function marketLines(m: MarketSnapshot, level: PrecisionLevel): string[] {
  const lines = [
    `Market (sources: ${m.sources.join(', ')}):`,
    `- Price USD: ${formatPrice(m.price, level)}`,
    `- Market cap USD: ${formatAmount(m.marketCap, level)}`,
    `- Volume 24h USD: ${formatAmount(m.volume24h, level)}`,
    `- Liquidity USD: ${formatAmount(m.liquidityUsd, level)}`,
    `- Change 1h: ${formatPercent(m.percentChange.h1, level)}`,
    `- Change 24h: ${formatPercent(m.percentChange.h24, level)}`,
    `- Change 7d: ${formatPercent(m.percentChange.d7, level)}`
  ]
  if (m.buys24h !== undefined || m.sells24h !== undefined) {
    lines.push(`- Transactions 24h: ${m.buys24h ?? 'unknown'} buys / ${m.sells24h ?? 'unknown'} sells`)
  } else {
    lines.push('- Transactions 24h: unknown')
  }
  if (m.pairLabel) lines.push(`- Pair: ${m.pairLabel}`)
  if (!m.fresh) lines.push('Note: the quote is stale; treat prices with caution.')
  return lines
}

function mentionLine(m: Mention): string {
  const when = new Date(m.publishedAt).toISOString()
  return m.author ? `- ${when} @${m.author}: ${m.text}` : `- ${when} ${m.text}`
}

function socialLines(s: SocialSnapshot | undefined, kept: Mention[], omitted: number): string[] {
  if (!s) return ['Social mentions: UNAVAILABLE. Do not describe social sentiment.']
  if (!s.mentions.length) return ['Social mentions: none found.']
  const lines = [`Social mentions (feed ${s.feed}):`, ...kept.map(mentionLine)]
  if (omitted > 0) lines.push(`- (${omitted} older mentions omitted)`)
  return lines
}

function articleLines(a: NewsArticle): string[] {
  const lines = [`- ${new Date(a.publishedAt).toISOString()} ${a.title}${a.source ? ` (${a.source})` : ''}`]
  if (a.body) lines.push(`  ${a.body}`)
  if (a.url) lines.push(`  ${a.url}`)
  return lines
}

function newsLines(n: NewsSnapshot | undefined, kept: NewsArticle[], omitted: number): string[] {
  if (!n) return []
  if (!n.articles.length) return ['News: none found.']
  const header = n.matched
    ? `News mentioning ${n.symbol}:`
    : `News: nothing mentions ${n.symbol}; general crypto headlines for context only:`
  const lines = [header, ...kept.flatMap(articleLines)]
  if (omitted > 0) lines.push(`- (${omitted} older articles omitted)`)
  return lines
}

function coinSection(d: CoinData, level: PrecisionLevel): string {
  const lines = [`## ${d.coin.name} (${d.coin.symbol})`]
  const r = d.result
  if (!r) {
    lines.push('No data could be collected for this coin. Do not state any figures for it.')
    return lines.join('\n')
  }
  if (r.market) lines.push(...marketLines(r.market, level))
  else lines.push('Market: UNAVAILABLE. Do not state or estimate prices, volume or changes.')
  lines.push(...socialLines(r.social, d.mentions, d.omitted))
  lines.push(...newsLines(r.news, d.articles, d.omittedArticles))
  if (r.failures.length) {
    lines.push(`Unavailable sources: ${r.failures.map((f) => `${f.source} (${f.kind})`).join(', ')}`)
  }
  return lines.join('\n')
}

function memorySection(entries: MemoryEntry[]): string {
  if (!entries.length) return 'Learned context: none yet.'
  return ['Learned context:', ...entries.map((e) => `- ${e.key}: ${e.value}`)].join('\n')
}

export function fillTemplate(text: string, coins: Coin[], reportType: ReportType): string {
  return text
    .replace(/\{report_type\}/g, reportType)
    .replace(/\{coin_name\}/g, coins.map((c) => c.name).join(', '))
    .replace(/\{coin_symbol\}/g, coins.map((c) => c.symbol).join(', '))
}

export class SummaryComposer {
  private readonly options: ComposerOptions

  constructor(options: ComposerOptions) {
    this.options = options
  }

  /**
   * Assemble system + user messages within maxPromptChars.
   * Oldest social mentions go first, then the oldest news articles, then numeric precision;
   * templates and memory are never cut.
   */
  async buildPrompt(coins: Coin[], results: AggregateResult[], reportType: ReportType): Promise<BuiltPrompt> {
    const { memory, maxPromptChars } = this.options
    const system = (await memory.getTemplate('system')).text
    const format = fillTemplate((await memory.getTemplate('summary-format')).text, coins, reportType)
    const memoryText = memorySection(await memory.listMemory())

    const data: CoinData[] = coins.map((coin) => {
      const result = results.find((r) => r.coin.symbol === coin.symbol)
      return {
        coin,
        result,
        mentions: [...(result?.social?.mentions ?? [])],
        omitted: 0,
        articles: [...(result?.news?.articles ?? [])],
        omittedArticles: 0
      }
    })

    let droppedMentions = 0
    let droppedArticles = 0
    // every mention across all coins, oldest first, then every article, oldest first
    const mentionDrops = data
      .flatMap((d) => d.mentions.map((m) => ({ d, m })))
      .sort((a, b) => a.m.publishedAt - b.m.publishedAt)
      .map(({ d, m }) => () => {
        d.mentions = d.mentions.filter((x) => x !== m)
        d.omitted += 1
        droppedMentions += 1
      })
    const articleDrops = data
      .flatMap((d) => d.articles.map((a) => ({ d, a })))
      .sort((x, y) => x.a.publishedAt - y.a.publishedAt)
      .map(({ d, a }) => () => {
        d.articles = d.articles.filter((x) => x !== a)
        d.omittedArticles += 1
        droppedArticles += 1
      })
    const droppable = [...mentionDrops, ...articleDrops]

    for (const level of PRECISION_LEVELS) {
      for (;;) {
        const dataText = data.map((d) => coinSection(d, level)).join('\n\n')
        const user = `${memoryText}\n\n${dataText}\n\n${format}`
        const size = system.length + user.length
        if (size <= maxPromptChars) {
          if (droppedMentions || droppedArticles || level) {
            log('prompt trimmed: mentions=%d articles=%d precision=%d size=%d', droppedMentions, droppedArticles, level, size)
          }
          return { system, user, size, droppedMentions, droppedArticles, precision: level }
        }
        // precision is only coarsened once nothing is left to drop
        const drop = droppable.shift()
        if (!drop) break
        drop()
      }
    }

    throw new AIGenerationFailedError(`prompt exceeds ${maxPromptChars} characters even after truncation`)
  }

  async compose(
    coins: Coin[],
    results: AggregateResult[],
    reportType: ReportType,
    signal?: AbortSignal
  ): Promise<string> {
    if (!coins.length) throw new Error('compose needs at least one coin')
    const prompt = await this.buildPrompt(coins, results, reportType)
    const raw = await this.options.provider.complete({ system: prompt.system, user: prompt.user }, signal)

    const text = raw.trim()
    if (!text) throw new AIGenerationFailedError('empty response')
    if (text.length > this.options.maxSummaryChars) {
      throw new AIGenerationFailedError(`response exceeds ${this.options.maxSummaryChars} characters`)
    }
    return text
  }
}
