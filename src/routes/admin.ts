// src/routes/admin.ts
import express, { NextFunction, Request, Response } from 'express'
import { z } from 'zod'
import debug from 'debug'
import { SourceAggregator } from '../services/aggregator'
import { CoinStore } from '../services/coinStore'
import { isTemplateRole, MemoryStore } from '../services/memoryStore'
import { sendError } from './httpErrors'

const log = debug('app:admin')

const templateBody = z.object({ text: z.string().refine((s) => s.trim().length > 0, 'text must not be empty') })
const memoryBody = z.object({ value: z.string() })

export interface AdminDeps {
  adminKey: string
  memory: MemoryStore
  coins: CoinStore
  aggregator: SourceAggregator
}

export default function adminRouter(deps: AdminDeps) {
  const router = express.Router()

  // optional admin key
  router.use((req: Request, res: Response, next: NextFunction) => {
    if (deps.adminKey && (req.header('x-admin-key') || '') !== deps.adminKey) {
      return res.status(403).json({ error: 'forbidden' })
    }
    return next()
  })

  router.get('/templates', async (_req, res) => {
    try {
      return res.json({ items: await deps.memory.listTemplates() })
    } catch (e) {
      return sendError(res, 'admin templates', e)
    }
  })

  router.put('/templates/:role', async (req, res) => {
    const { role } = req.params
    if (!isTemplateRole(role)) return res.status(404).json({ error: `unknown template role ${role}` })
    const body = templateBody.safeParse(req.body)
    if (!body.success) return res.status(400).json({ error: 'invalid body', issues: body.error.issues })
    try {
      const template = await deps.memory.setTemplate(role, body.data.text)
      log('template %s updated', role)
      return res.json(template)
    } catch (e) {
      return sendError(res, 'admin template update', e)
    }
  })

  router.get('/memory', async (_req, res) => {
    try {
      return res.json({ items: await deps.memory.listMemory() })
    } catch (e) {
      return sendError(res, 'admin memory', e)
    }
  })

  router.put('/memory/:key', async (req, res) => {
    const body = memoryBody.safeParse(req.body)
    if (!body.success) return res.status(400).json({ error: 'invalid body', issues: body.error.issues })
    try {
      return res.json(await deps.memory.upsertMemory(req.params.key, body.data.value))
    } catch (e) {
      return sendError(res, 'admin memory update', e)
    }
  })

  router.delete('/memory/:key', async (req, res) => {
    try {
      const removed = await deps.memory.removeMemory(req.params.key)
      return res.status(removed ? 200 : 404).json({ removed })
    } catch (e) {
      return sendError(res, 'admin memory delete', e)
    }
  })

  // POST /admin/aggregate/:symbol -> merged snapshots without calling the AI
  router.post('/aggregate/:symbol', async (req, res) => {
    try {
      const coin = await deps.coins.get(req.params.symbol)
      if (!coin) return res.status(404).json({ error: `unknown coin ${req.params.symbol}` })
      const result = await deps.aggregator.aggregate(coin)
      log('manual aggregation for %s, degraded=%s', coin.symbol, result.degraded)
      return res.json(result)
    } catch (e) {
      return sendError(res, 'admin aggregate', e)
    }
  })

  return router
}
