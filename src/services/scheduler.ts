// src/services/scheduler.ts
import Redis from 'ioredis'
import { z } from 'zod'
import debug from 'debug'
import { errorMessage } from '../errors'
import { ScheduledJob } from '../types'
import { assertTimeZone, latestOccurrence, LocalTime, nextOccurrence, parseLocalTime } from '../utils/time'

const log = debug('app:scheduler')

const JOBS_KEY = 'scheduler:jobs'

export interface SlotConfig {
  name: ScheduledJob['name']
  time: string // HH:MM
  timezone: string
}

export interface JobStateStore {
  load(name: string): Promise<ScheduledJob | undefined>
  save(job: ScheduledJob): Promise<void>
}

const jobSchema = z.object({
  name: z.enum(['morning', 'evening']),
  time: z.string(),
  timezone: z.string(),
  lastFiredAt: z.number().optional(),
  state: z.enum(['idle', 'running', 'failed']),
  lastOutcome: z.enum(['success', 'failed']).optional(),
  lastError: z.string().optional()
})

export class RedisJobStateStore implements JobStateStore {
  private readonly redis: Redis

  constructor(redis: Redis) {
    this.redis = redis
  }

  async load(name: string): Promise<ScheduledJob | undefined> {
    const raw = await this.redis.hget(JOBS_KEY, name)
    if (raw === null) return undefined
    try {
      const parsed = jobSchema.safeParse(JSON.parse(raw))
      return parsed.success ? parsed.data : undefined
    } catch {
      // eslint-disable-next-line no-console
      console.warn(`job state for ${name} is unreadable, starting fresh`)
      return undefined
    }
  }

  async save(job: ScheduledJob): Promise<void> {
    await this.redis.hset(JOBS_KEY, job.name, JSON.stringify(job))
  }
}

// the work a slot triggers; resolves to false when the run should be recorded as failed
export type SlotRunner = (job: ScheduledJob) => Promise<boolean>

export interface SchedulerOptions {
  slots: SlotConfig[]
  store: JobStateStore
  run: SlotRunner
  tickMs: number
  now?: () => number
}

interface JobEntry {
  job: ScheduledJob
  time: LocalTime
  inFlight?: Promise<void>
}

/**
 * Fires each daily slot once, when wall-clock time in the slot's timezone crosses the trigger time.
 * A slot that passed while the process was down is skipped, never replayed.
 */
export class Scheduler {
  private readonly options: SchedulerOptions
  private readonly now: () => number
  private readonly entries = new Map<string, JobEntry>()
  private lastCheckAt: number | undefined
  private timer: NodeJS.Timeout | null = null
  private initialized = false

  constructor(options: SchedulerOptions) {
    this.options = options
    this.now = options.now ?? Date.now
    for (const slot of options.slots) {
      assertTimeZone(slot.timezone)
      if (this.entries.has(slot.name)) throw new Error(`duplicate slot "${slot.name}"`)
      this.entries.set(slot.name, {
        time: parseLocalTime(slot.time),
        job: { name: slot.name, time: slot.time, timezone: slot.timezone, state: 'idle' }
      })
    }
  }

  // load persisted state; a job left "running" by a dead process is recorded as failed
  async init(): Promise<void> {
    for (const entry of this.entries.values()) {
      const stored = await this.options.store.load(entry.job.name)
      if (!stored) {
        await this.options.store.save(entry.job)
        continue
      }
      entry.job = { ...entry.job, lastFiredAt: stored.lastFiredAt, lastOutcome: stored.lastOutcome, lastError: stored.lastError }
      if (stored.state === 'running') {
        entry.job = { ...entry.job, state: 'failed', lastOutcome: 'failed', lastError: 'interrupted by restart' }
        // eslint-disable-next-line no-console
        console.warn(`job ${entry.job.name} was interrupted by a restart`)
      } else {
        entry.job = { ...entry.job, state: stored.state }
      }
      await this.options.store.save(entry.job)
    }
    this.lastCheckAt = this.now()
    this.initialized = true
    log('scheduler initialized with %d jobs', this.entries.size)
  }

  jobs(): ScheduledJob[] {
    return Array.from(this.entries.values()).map((e) => ({ ...e.job }))
  }

  nextFireTimes(now = this.now()): Record<string, number> {
    const out: Record<string, number> = {}
    for (const e of this.entries.values()) out[e.job.name] = nextOccurrence(e.time, e.job.timezone, now)
    return out
  }

  private async transition(entry: JobEntry, patch: Partial<ScheduledJob>): Promise<void> {
    entry.job = { ...entry.job, ...patch }
    await this.options.store.save(entry.job)
  }

  private async fire(entry: JobEntry, now: number): Promise<void> {
    // lastFiredAt is durable before the run starts, so a restart inside the slot cannot fire it again
    await this.transition(entry, { state: 'running', lastFiredAt: now })
    log('firing %s', entry.job.name)

    let ok = false
    let error: string | undefined
    try {
      ok = await this.options.run({ ...entry.job })
      if (!ok) error = 'every coin failed'
    } catch (e) {
      error = errorMessage(e)
    }

    if (ok) {
      await this.transition(entry, { state: 'idle', lastOutcome: 'success', lastError: undefined })
      log('%s finished', entry.job.name)
    } else {
      await this.transition(entry, { state: 'failed', lastOutcome: 'failed', lastError: error })
      // eslint-disable-next-line no-console
      console.error(`scheduled job ${entry.job.name} failed: ${error}`)
    }
  }

  /**
   * One coordinating check. Starts (does not await) every job whose slot instant lies in
   * (previous check, now] and which has not fired inside that slot yet.
   */
  async check(now = this.now()): Promise<string[]> {
    if (!this.initialized) throw new Error('scheduler not initialized')
    const since = this.lastCheckAt ?? now
    this.lastCheckAt = Math.max(since, now)
    const fired: string[] = []

    for (const entry of this.entries.values()) {
      // failed runs wait for their next natural slot
      if (entry.job.state === 'failed') await this.transition(entry, { state: 'idle' })
      if (entry.job.state === 'running') continue

      const slot = latestOccurrence(entry.time, entry.job.timezone, now)
      const crossed = slot > since && slot <= now
      const alreadyFired = entry.job.lastFiredAt !== undefined && entry.job.lastFiredAt >= slot
      if (!crossed || alreadyFired) continue

      fired.push(entry.job.name)
      entry.inFlight = this.fire(entry, now)
        .catch((e: unknown) => {
          // eslint-disable-next-line no-console
          console.error(`job ${entry.job.name} state update failed`, errorMessage(e))
        })
        .finally(() => {
          entry.inFlight = undefined
        })
    }
    return fired
  }

  // resolves once every run started so far has settled
  async idle(): Promise<void> {
    const running = Array.from(this.entries.values())
      .map((e) => e.inFlight)
      .filter((p): p is Promise<void> => !!p)
    await Promise.all(running)
  }

  // idempotent
  async start(): Promise<void> {
    if (this.timer) return
    if (!this.initialized) await this.init()
    this.timer = setInterval(() => {
      this.check().catch((e: unknown) => {
        // eslint-disable-next-line no-console
        console.error('scheduler check failed', errorMessage(e))
      })
    }, this.options.tickMs)
    log('scheduler started, tickMs=%d', this.options.tickMs)
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    await this.idle()
    log('scheduler stopped')
  }
}
