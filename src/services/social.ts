// src/services/social.ts
import { AxiosInstance } from 'axios'
import debug from 'debug'
import { classifyHttpError, createHttpClient } from '../http/axiosClient'
import { SourceUnavailableError } from '../errors'
import { Coin, Mention, SocialSnapshot, SourceClient } from '../types'

const log = debug('app:social')

const MAX_MENTION_CHARS = 280

export interface SocialFeedOptions {
  endpoints: string[] // tried in this order
  timeoutMs: number // per attempt
  maxMentions: number
  http?: AxiosInstance
  now?: () => number
}

// code points outside Unicode decode to U+FFFD
function fromCodePoint(code: number): string {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : '\ufffd'
}

function decodeXmlEntities(s: string): string {
  return s
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, code: string) => fromCodePoint(Number(code)))
    .replace(/&amp;/g, '&')
}

function tagText(item: string, tag: string): string | undefined {
  const re = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`, 'i')
  const m = re.exec(item)
  if (!m) return undefined
  const raw = m[1].trim()
  const cdata = /^<!\[CDATA\[([\s\S]*?)\]\]>$/.exec(raw)
  const text = decodeXmlEntities(cdata ? cdata[1] : raw)
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
  return text || undefined
}

function clip(text: string): string {
  return text.length > MAX_MENTION_CHARS ? `${text.slice(0, MAX_MENTION_CHARS - 3)}...` : text
}

/**
 * Parse RSS items into mentions. Items without text or a parseable date are skipped;
 * whatever subset parses is returned. Returns null when the body is not an RSS document.
 */
export function parseRssMentions(xml: string): Mention[] | null {
  if (!/<rss[\s>]/i.test(xml) && !/<channel[\s>]/i.test(xml)) return null

  const items = Array.from(xml.matchAll(/<item[\s>][\s\S]*?<\/item>/gi)).map((m) => m[0])
  const mentions: Mention[] = []
  for (const item of items) {
    const text = tagText(item, 'title') ?? tagText(item, 'description')
    const pub = tagText(item, 'pubDate')
    const publishedAt = pub ? Date.parse(pub) : NaN
    if (!text || !Number.isFinite(publishedAt)) continue

    const creator = tagText(item, 'dc:creator')
    mentions.push({
      text: clip(text),
      author: creator?.replace(/^@/, ''),
      link: tagText(item, 'link'),
      publishedAt
    })
  }
  return mentions
}

export function searchQuery(coin: Coin): string {
  const queries = coin.socialQueries?.length ? coin.socialQueries : [`$${coin.symbol.toUpperCase()}`]
  return queries.join(' OR ')
}

export class SocialFeedClient implements SourceClient<SocialSnapshot> {
  readonly id = 'social' as const
  private readonly options: SocialFeedOptions
  private readonly http: AxiosInstance
  private readonly now: () => number

  constructor(options: SocialFeedOptions) {
    this.options = options
    // fallback across mirrors replaces per-request retries
    this.http = options.http ?? createHttpClient({ retries: 0, timeoutMs: options.timeoutMs })
    this.now = options.now ?? Date.now
  }

  private async tryEndpoint(base: string, q: string, signal?: AbortSignal): Promise<Mention[]> {
    let body: unknown
    try {
      const res = await this.http.get(`${base}/search/rss`, {
        params: { f: 'tweets', q },
        timeout: this.options.timeoutMs,
        responseType: 'text',
        signal
      })
      body = res.data
    } catch (e) {
      throw classifyHttpError(this.id, e)
    }
    if (typeof body !== 'string') throw new SourceUnavailableError(this.id, 'MalformedResponse', 'non-text body')
    const mentions = parseRssMentions(body)
    if (!mentions) throw new SourceUnavailableError(this.id, 'MalformedResponse', 'not an RSS document')
    return mentions
  }

  async fetch(coin: Coin, signal?: AbortSignal): Promise<SocialSnapshot> {
    const symbol = coin.symbol.toUpperCase()
    const q = searchQuery(coin)
    const attempts: string[] = []

    for (const base of this.options.endpoints) {
      if (signal?.aborted) throw new SourceUnavailableError(this.id, 'Timeout', 'aborted')
      try {
        const mentions = await this.tryEndpoint(base, q, signal)
        mentions.sort((a, b) => b.publishedAt - a.publishedAt)
        log('%s answered for %s with %d mentions', base, symbol, mentions.length)
        return {
          kind: 'social',
          symbol,
          feed: base,
          mentions: mentions.slice(0, this.options.maxMentions),
          fetchedAt: this.now()
        }
      } catch (e) {
        const err = classifyHttpError(this.id, e)
        attempts.push(`${base}: ${err.kind}`)
        log('%s failed for %s: %s', base, symbol, err.detail)
      }
    }

    const detail = attempts.length ? `all feed endpoints failed (${attempts.join('; ')})` : 'no feed endpoints configured'
    throw new SourceUnavailableError(this.id, 'Unreachable', detail)
  }
}
