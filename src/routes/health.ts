// src/routes/health.ts
import express from 'express'
import { Scheduler } from '../services/scheduler'

// uptime plus the state of every scheduled job
export default function healthRouter(scheduler?: Scheduler) {
  const router = express.Router()

  router.get('/', (_req, res) => {
    const next = scheduler?.nextFireTimes() ?? {}
    return res.json({
      ok: true,
      service: 'market-digest-service',
      uptime_seconds: Math.floor(process.uptime()),
      timestamp: Date.now(),
      jobs: (scheduler?.jobs() ?? []).map((j) => ({ ...j, nextFireAt: next[j.name] }))
    })
  })

  return router
}
