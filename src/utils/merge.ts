// src/utils/merge.ts
import { MarketSnapshot, SourceId } from '../types'

// sources whose quote fields win when both snapshots carry a value
const QUOTE_PRIORITY: SourceId[] = ['coinmarketcap', 'dexscreener', 'social']

function rank(s: MarketSnapshot): number {
  const ranks = s.sources.map((id) => QUOTE_PRIORITY.indexOf(id))
  return Math.min(...ranks)
}

// merge two market snapshots of the same coin into a new one
// strategy: quote fields from the higher priority source, gaps filled from the other;
// liquidity, transactions and pair come from whichever snapshot has them
export function mergeMarketSnapshots(a: MarketSnapshot, b: MarketSnapshot): MarketSnapshot {
  const [primary, secondary] = rank(a) <= rank(b) ? [a, b] : [b, a]
  const sources = Array.from(new Set([...primary.sources, ...secondary.sources]))

  return {
    kind: 'market',
    symbol: primary.symbol,
    sources,
    price: primary.price ?? secondary.price,
    marketCap: primary.marketCap ?? secondary.marketCap,
    volume24h: primary.volume24h ?? secondary.volume24h,
    liquidityUsd: primary.liquidityUsd ?? secondary.liquidityUsd,
    percentChange: {
      h1: primary.percentChange.h1 ?? secondary.percentChange.h1,
      h24: primary.percentChange.h24 ?? secondary.percentChange.h24,
      d7: primary.percentChange.d7 ?? secondary.percentChange.d7
    },
    buys24h: primary.buys24h ?? secondary.buys24h,
    sells24h: primary.sells24h ?? secondary.sells24h,
    pairLabel: primary.pairLabel ?? secondary.pairLabel,
    fetchedAt: Math.max(primary.fetchedAt, secondary.fetchedAt),
    fresh: primary.fresh && secondary.fresh
  }
}
