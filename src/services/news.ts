// src/services/news.ts
import { AxiosInstance } from 'axios'
import { z } from 'zod'
import debug from 'debug'
import defaultClient, { classifyHttpError } from '../http/axiosClient'
import { SourceUnavailableError } from '../errors'
import { Coin, NewsArticle, NewsSnapshot, SourceClient } from '../types'

const log = debug('app:news')

const MAX_BODY_CHARS = 200

export interface CryptoNewsOptions {
  baseUrl: string
  maxArticles: number
  http?: AxiosInstance
  now?: () => number
}

const articleSchema = z.object({
  title: z.string().min(1),
  body: z.string().nullish(),
  url: z.string().nullish(),
  source: z.string().nullish(),
  source_info: z.object({ name: z.string().nullish() }).nullish(),
  published_on: z.number()
})

const responseSchema = z.object({
  Response: z.string().optional(),
  Message: z.string().optional(),
  Data: z.array(z.unknown()).nullish()
})

type RawArticle = z.infer<typeof articleSchema>

export function newsKeywords(coin: Coin): string[] {
  return Array.from(new Set([coin.symbol.toLowerCase(), coin.name.toLowerCase()])).filter(Boolean)
}

function mapArticle(a: RawArticle): NewsArticle {
  const body = a.body?.trim()
  return {
    title: a.title.trim(),
    source: a.source_info?.name || a.source || undefined,
    body: body ? (body.length > MAX_BODY_CHARS ? `${body.slice(0, MAX_BODY_CHARS)}...` : body) : undefined,
    url: a.url || undefined,
    publishedAt: a.published_on * 1000
  }
}

/**
 * Keep articles whose title or body mention one of the keywords.
 * When none does, the top general headlines are returned instead.
 */
export function selectArticles(
  articles: RawArticle[],
  keywords: string[],
  limit: number
): { articles: RawArticle[]; matched: boolean } {
  const lower = keywords.map((k) => k.toLowerCase())
  const hits = articles.filter((a) => {
    const text = `${a.title} ${a.body ?? ''}`.toLowerCase()
    return lower.some((k) => text.includes(k))
  })
  if (hits.length) return { articles: hits.slice(0, limit), matched: true }
  return { articles: articles.slice(0, limit), matched: false }
}

export class CryptoNewsClient implements SourceClient<NewsSnapshot> {
  readonly id = 'news' as const
  private readonly options: CryptoNewsOptions
  private readonly http: AxiosInstance
  private readonly now: () => number

  constructor(options: CryptoNewsOptions) {
    this.options = options
    this.http = options.http ?? defaultClient
    this.now = options.now ?? Date.now
  }

  async fetch(coin: Coin, signal?: AbortSignal): Promise<NewsSnapshot> {
    let body: unknown
    try {
      const res = await this.http.get(`${this.options.baseUrl}/data/v2/news/`, {
        params: { lang: 'EN', extraParams: 'market-digest-service' },
        signal
      })
      body = res.data
    } catch (e) {
      throw classifyHttpError(this.id, e)
    }

    const parsed = responseSchema.safeParse(body)
    if (!parsed.success) {
      throw new SourceUnavailableError(this.id, 'MalformedResponse', 'unexpected response shape')
    }
    if (parsed.data.Response === 'Error') {
      throw new SourceUnavailableError(this.id, 'Unreachable', parsed.data.Message ?? 'news API error')
    }

    // one bad article does not cost the rest
    const raw: RawArticle[] = []
    for (const item of parsed.data.Data ?? []) {
      const a = articleSchema.safeParse(item)
      if (a.success) raw.push(a.data)
    }

    const symbol = coin.symbol.toUpperCase()
    const picked = selectArticles(raw, newsKeywords(coin), this.options.maxArticles)
    log('%s: %d articles matched=%s', symbol, picked.articles.length, picked.matched)

    return {
      kind: 'news',
      symbol,
      articles: picked.articles.map(mapArticle).sort((a, b) => b.publishedAt - a.publishedAt),
      matched: picked.matched,
      fetchedAt: this.now()
    }
  }
}
