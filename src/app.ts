// src/app.ts
import express from 'express'
import http from 'http'
import cors from 'cors'
import morgan from 'morgan'
import healthRouter from './routes/health'
import summariesRouter from './routes/summaries'
import adminRouter from './routes/admin'
import { SourceAggregator } from './services/aggregator'
import { CoinStore } from './services/coinStore'
import { MemoryStore } from './services/memoryStore'
import { SummaryPipeline } from './services/pipeline'
import { Scheduler } from './services/scheduler'
import { SummaryStore } from './services/summaryStore'

export interface AppDeps {
  adminKey: string
  coins: CoinStore
  memory: MemoryStore
  summaries: SummaryStore
  aggregator: SourceAggregator
  pipeline: SummaryPipeline
  scheduler?: Scheduler
  accessLog?: boolean
}

export function createApp(deps: AppDeps) {
  const app = express()
  app.use(cors())
  app.use(express.json())
  if (deps.accessLog !== false) app.use(morgan('tiny'))

  app.use('/health', healthRouter(deps.scheduler))
  app.use('/summaries', summariesRouter(deps))
  app.use('/admin', adminRouter(deps))

  return app
}

// createServer exported so index.ts owns listen/close
export function createServer(deps: AppDeps) {
  const app = createApp(deps)
  const httpServer = http.createServer(app)
  return { app, httpServer }
}
