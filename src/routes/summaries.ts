// src/routes/summaries.ts
import express, { Request, Response } from 'express'
import { z } from 'zod'
import debug from 'debug'
import { CoinStore } from '../services/coinStore'
import { runSucceeded, SummaryPipeline } from '../services/pipeline'
import { SummaryStore } from '../services/summaryStore'
import { sendError } from './httpErrors'

const log = debug('app:summaries')

const runBody = z.object({ symbol: z.string().trim().min(1).optional() })

export interface SummariesDeps {
  coins: CoinStore
  pipeline: SummaryPipeline
  summaries: SummaryStore
}

export default function summariesRouter(deps: SummariesDeps) {
  const router = express.Router()

  // POST /summaries  { symbol? } -> one coin, or every active coin
  router.post('/', async (req: Request, res: Response) => {
    const body = runBody.safeParse(req.body ?? {})
    if (!body.success) return res.status(400).json({ error: 'invalid body', issues: body.error.issues })

    try {
      const { symbol } = body.data
      if (symbol) {
        const coin = await deps.coins.get(symbol)
        if (!coin || !coin.active) return res.status(404).json({ error: `unknown coin ${symbol}` })
        const summary = await deps.pipeline.runForCoinWithDeadline(coin, 'on-demand')
        log('on-demand summary for %s', coin.symbol)
        return res.status(201).json({ ok: true, summary })
      }

      const report = await deps.pipeline.runAllWithDeadline('on-demand')
      const ok = runSucceeded(report)
      return res.status(ok ? 201 : 502).json({ ok, report })
    } catch (e) {
      return sendError(res, 'summaries run', e)
    }
  })

  // GET /summaries/:symbol/latest
  router.get('/:symbol/latest', async (req: Request, res: Response) => {
    try {
      const summary = await deps.summaries.latest(req.params.symbol)
      if (!summary) return res.status(404).json({ error: 'no summary yet' })
      return res.json(summary)
    } catch (e) {
      return sendError(res, 'summaries read', e)
    }
  })

  return router
}
