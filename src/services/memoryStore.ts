// src/services/memoryStore.ts
import Redis from 'ioredis'
import { z } from 'zod'
import debug from 'debug'
import { TemplateMissingError } from '../errors'
import { MemoryEntry, Template, TemplateRole } from '../types'
import { KeyedLock } from '../utils/keyedLock'
import { DEFAULT_MEMORY, DEFAULT_TEMPLATES } from './defaults'

const log = debug('app:memory')

const TEMPLATES_KEY = 'ai:templates'
const MEMORY_KEY = 'ai:memory'

export const TEMPLATE_ROLES: readonly TemplateRole[] = ['system', 'summary-format']

const storedTemplateSchema = z.object({ text: z.string(), updatedAt: z.number() })
const storedMemorySchema = z.object({ value: z.string(), createdAt: z.number(), updatedAt: z.number() })

export function isTemplateRole(v: string): v is TemplateRole {
  return TEMPLATE_ROLES.some((r) => r === v)
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    return undefined
  }
}

export interface MemoryStoreOptions {
  now?: () => number
}

/**
 * Editable prompt templates and free-form learned context.
 * Every mutation resolves only after Redis acknowledged the write.
 */
export class MemoryStore {
  private readonly redis: Redis
  private readonly now: () => number
  private readonly writes = new KeyedLock()

  constructor(redis: Redis, options: MemoryStoreOptions = {}) {
    this.redis = redis
    this.now = options.now ?? Date.now
  }

  // inserts defaults only where nothing is stored yet
  async seedDefaults(): Promise<void> {
    const now = this.now()
    for (const role of TEMPLATE_ROLES) {
      const payload = JSON.stringify({ text: DEFAULT_TEMPLATES[role], updatedAt: now })
      await this.redis.hsetnx(TEMPLATES_KEY, role, payload)
    }
    for (const { key, value } of DEFAULT_MEMORY) {
      await this.redis.hsetnx(MEMORY_KEY, key, JSON.stringify({ value, createdAt: now, updatedAt: now }))
    }
    log('defaults seeded')
  }

  async getTemplate(role: TemplateRole): Promise<Template> {
    const raw = await this.redis.hget(TEMPLATES_KEY, role)
    const parsed = raw === null ? undefined : storedTemplateSchema.safeParse(parseJson(raw))
    if (!parsed || !parsed.success) throw new TemplateMissingError(role)
    return { role, text: parsed.data.text, updatedAt: parsed.data.updatedAt }
  }

  // whole-value swap in one HSET; readers see the old or the new text, never a mix
  async setTemplate(role: TemplateRole, text: string): Promise<Template> {
    if (!text.trim()) throw new Error('template text must not be empty')
    const updatedAt = this.now()
    await this.redis.hset(TEMPLATES_KEY, role, JSON.stringify({ text, updatedAt }))
    log('template %s replaced', role)
    return { role, text, updatedAt }
  }

  async listTemplates(): Promise<Template[]> {
    const out: Template[] = []
    for (const role of TEMPLATE_ROLES) {
      try {
        out.push(await this.getTemplate(role))
      } catch (e) {
        if (!(e instanceof TemplateMissingError)) throw e
      }
    }
    return out
  }

  // ordered by creation time, then key
  async listMemory(): Promise<MemoryEntry[]> {
    const all = await this.redis.hgetall(MEMORY_KEY)
    const entries: MemoryEntry[] = []
    for (const [key, raw] of Object.entries(all)) {
      const parsed = storedMemorySchema.safeParse(parseJson(raw))
      if (!parsed.success) {
        // eslint-disable-next-line no-console
        console.warn(`skipping unreadable memory entry "${key}"`)
        continue
      }
      entries.push({ key, ...parsed.data })
    }
    return entries.sort((a, b) => a.createdAt - b.createdAt || a.key.localeCompare(b.key))
  }

  async getMemory(key: string): Promise<MemoryEntry | undefined> {
    const raw = await this.redis.hget(MEMORY_KEY, key)
    if (raw === null) return undefined
    const parsed = storedMemorySchema.safeParse(parseJson(raw))
    return parsed.success ? { key, ...parsed.data } : undefined
  }

  async upsertMemory(key: string, value: string): Promise<MemoryEntry> {
    const k = key.trim()
    if (!k) throw new Error('memory key must not be empty')
    return this.writes.run(k, async () => {
      const existing = await this.getMemory(k)
      const now = this.now()
      const entry: MemoryEntry = { key: k, value, createdAt: existing?.createdAt ?? now, updatedAt: now }
      await this.redis.hset(MEMORY_KEY, k, JSON.stringify({ value, createdAt: entry.createdAt, updatedAt: now }))
      log('memory %s stored', k)
      return entry
    })
  }

  // true when an entry was removed; removing a missing key is a no-op
  async removeMemory(key: string): Promise<boolean> {
    const k = key.trim()
    return this.writes.run(k, async () => {
      const removed = await this.redis.hdel(MEMORY_KEY, k)
      log('memory %s removed=%d', k, removed)
      return removed > 0
    })
  }
}
