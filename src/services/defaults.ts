// src/services/defaults.ts
import { Coin, TemplateRole } from '../types'

// seeded on first start only; later edits are never overwritten
export const DEFAULT_COINS: Coin[] = [
  {
    symbol: 'OWB',
    name: 'OpenWorld',
    dexSearchQuery: 'OWB',
    socialQueries: ['$OWB', '#OWB'],
    active: true
  },
  {
    symbol: 'RNBW',
    name: 'Rainbow',
    dexSearchQuery: 'rainbow token',
    socialQueries: ['$RNBW', '#rainbow', '#RNBW'],
    active: true
  }
]

export const DEFAULT_TEMPLATES: Record<TemplateRole, string> = {
  system: [
    'You are a cryptocurrency market analyst writing short, factual market summaries.',
    'Cover price and daily change, volume and liquidity, buy versus sell pressure, social sentiment and a brief outlook.',
    'Use only the data provided. When a source is marked unavailable or a value is unknown, say so instead of estimating it.',
    'Keep the summary under 2000 characters.'
  ].join('\n'),
  'summary-format': [
    'Write the {report_type} summary for {coin_name} ({coin_symbol}).',
    'Structure it as: headline, price action, volume and liquidity, buy/sell activity, social pulse, outlook.',
    'Use a few emojis as section markers.'
  ].join('\n')
}

export const DEFAULT_MEMORY: Array<{ key: string; value: string }> = [
  { key: 'analysis_style', value: 'Professional, concise, data-driven' },
  { key: 'target_audience', value: 'Traders and holders following OWB and Rainbow' },
  { key: 'language', value: 'English with common crypto terminology' }
]
