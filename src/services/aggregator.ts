// src/services/aggregator.ts
import debug from 'debug'
import { AllSourcesUnavailableError, SourceUnavailableError } from '../errors'
import { classifyHttpError } from '../http/axiosClient'
import { AggregateResult, Coin, MarketSnapshot, NewsSnapshot, Snapshot, SocialSnapshot, SourceClient, SourceFailure } from '../types'
import { mergeMarketSnapshots } from '../utils/merge'

const log = debug('app:aggregator')

export interface AggregatorOptions {
  clients: SourceClient[]
  sourceTimeoutMs: number
}

// helper: run one client under its own abort controller, linked to the run signal.
// When the client does not settle within ms its request is aborted and a Timeout failure is returned.
function withTimeout(client: SourceClient, coin: Coin, ms: number, signal?: AbortSignal): Promise<Snapshot> {
  const controller = new AbortController()
  const onAbort = () => controller.abort()
  if (signal?.aborted) controller.abort()
  else signal?.addEventListener('abort', onAbort, { once: true })

  return new Promise<Snapshot>((resolve, reject) => {
    let done = false
    const finish = () => {
      done = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
    const timer = setTimeout(() => {
      if (!done) {
        finish()
        controller.abort()
        reject(new SourceUnavailableError(client.id, 'Timeout', `no answer within ${ms}ms`))
      }
    }, ms)

    client.fetch(coin, controller.signal).then(
      (v) => {
        if (!done) {
          finish()
          resolve(v)
        }
      },
      (e: unknown) => {
        if (!done) {
          finish()
          reject(e)
        }
      }
    )
  })
}

function logFailure(symbol: string, f: SourceFailure): void {
  // hitting a quota is an expected, degraded state
  if (f.kind === 'RateLimited') {
    log('%s: %s rate limited (%s)', symbol, f.source, f.message)
    return
  }
  // eslint-disable-next-line no-console
  console.warn(`source ${f.source} unavailable for ${symbol}: ${f.kind} (${f.message})`)
}

export class SourceAggregator {
  private readonly clients: SourceClient[]
  private readonly sourceTimeoutMs: number

  constructor(options: AggregatorOptions) {
    if (!options.clients.length) throw new Error('aggregator needs at least one source client')
    this.clients = options.clients
    this.sourceTimeoutMs = options.sourceTimeoutMs
  }

  /**
   * Fetch from every client concurrently; one client's failure never aborts the others.
   * Fails only when every client failed.
   */
  async aggregate(coin: Coin, signal?: AbortSignal): Promise<AggregateResult> {
    const settled = await Promise.allSettled(
      this.clients.map((c) => withTimeout(c, coin, this.sourceTimeoutMs, signal))
    )

    const markets: MarketSnapshot[] = []
    let social: SocialSnapshot | undefined
    let news: NewsSnapshot | undefined
    const failures: SourceFailure[] = []

    settled.forEach((r, i) => {
      const client = this.clients[i]
      if (r.status === 'fulfilled') {
        const snap: Snapshot = r.value
        if (snap.kind === 'market') markets.push(snap)
        else if (snap.kind === 'social') social = snap
        else news = snap
        return
      }
      const failure = classifyHttpError(client.id, r.reason).toFailure()
      failures.push(failure)
      logFailure(coin.symbol, failure)
    })

    if (failures.length === this.clients.length) {
      throw new AllSourcesUnavailableError(coin.symbol, failures)
    }

    const market = markets.length ? markets.reduce((acc, m) => mergeMarketSnapshots(acc, m)) : undefined
    const degraded = failures.length > 0
    log('aggregated %s degraded=%s failures=%d', coin.symbol, degraded, failures.length)

    return { coin, market, social, news, degraded, failures }
  }
}
