// src/services/pipeline.ts
import pLimit from 'p-limit'
import debug from 'debug'
import { errorMessage } from '../errors'
import { Coin, ReportType, StoredSummary } from '../types'
import { withDeadline } from '../utils/deadline'
import { SourceAggregator } from './aggregator'
import { CoinStore } from './coinStore'
import { SummaryComposer } from './composer'
import { SummaryStore } from './summaryStore'

const log = debug('app:pipeline')

export interface PipelineOptions {
  coins: CoinStore
  aggregator: SourceAggregator
  composer: SummaryComposer
  summaries: SummaryStore
  concurrency: number
  runTimeoutMs: number
  now?: () => number
}

export type CoinOutcome =
  | { symbol: string; ok: true; summary: StoredSummary }
  | { symbol: string; ok: false; error: string; errorName: string }

export interface PipelineReport {
  reportType: ReportType
  startedAt: number
  finishedAt: number
  outcomes: CoinOutcome[]
}

// a run fails only when every coin failed; an empty coin list is not a failure
export function runSucceeded(report: PipelineReport): boolean {
  return report.outcomes.length === 0 || report.outcomes.some((o) => o.ok)
}

export class SummaryPipeline {
  private readonly options: PipelineOptions
  private readonly now: () => number

  constructor(options: PipelineOptions) {
    this.options = options
    this.now = options.now ?? Date.now
  }

  // aggregation for the coin settles before composition starts
  async runForCoin(coin: Coin, reportType: ReportType, signal?: AbortSignal): Promise<StoredSummary> {
    const result = await this.options.aggregator.aggregate(coin, signal)
    const text = await this.options.composer.compose([coin], [result], reportType, signal)
    const summary: StoredSummary = {
      symbol: coin.symbol,
      reportType,
      text,
      degraded: result.degraded,
      createdAt: this.now()
    }
    await this.options.summaries.save(summary)
    log('summary stored for %s (%s, degraded=%s)', coin.symbol, reportType, result.degraded)
    return summary
  }

  /**
   * Run every active coin through a fixed-size worker set.
   * A failing coin is reported and produces no summary; the others carry on.
   */
  async runAll(reportType: ReportType, signal?: AbortSignal): Promise<PipelineReport> {
    const startedAt = this.now()
    const coins = await this.options.coins.listActive()
    const limit = pLimit(Math.max(1, this.options.concurrency))

    const outcomes = await Promise.all(
      coins.map((coin) =>
        limit(async (): Promise<CoinOutcome> => {
          try {
            const summary = await this.runForCoin(coin, reportType, signal)
            return { symbol: coin.symbol, ok: true, summary }
          } catch (e) {
            // eslint-disable-next-line no-console
            console.error(`pipeline failed for ${coin.symbol}:`, errorMessage(e))
            return {
              symbol: coin.symbol,
              ok: false,
              error: errorMessage(e),
              errorName: e instanceof Error ? e.name : 'Error'
            }
          }
        })
      )
    )

    const failed = outcomes.filter((o) => !o.ok).length
    log('run %s finished: %d coins, %d failed', reportType, outcomes.length, failed)
    return { reportType, startedAt, finishedAt: this.now(), outcomes }
  }

  // hard wall-clock limit; on expiry in-flight requests are aborted and PipelineTimeoutError is thrown
  runAllWithDeadline(reportType: ReportType, parent?: AbortSignal): Promise<PipelineReport> {
    return withDeadline((signal) => this.runAll(reportType, signal), this.options.runTimeoutMs, parent)
  }

  runForCoinWithDeadline(coin: Coin, reportType: ReportType, parent?: AbortSignal): Promise<StoredSummary> {
    return withDeadline((signal) => this.runForCoin(coin, reportType, signal), this.options.runTimeoutMs, parent)
  }
}
