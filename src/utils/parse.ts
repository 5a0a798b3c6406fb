// src/utils/parse.ts
// narrowing helpers for loosely shaped provider payloads

export function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v)
}

export function asNumber(v: unknown): number | undefined {
  if (v == null) return undefined
  if (typeof v !== 'number' && typeof v !== 'string') return undefined
  if (typeof v === 'string' && v.trim() === '') return undefined
  const n = Number(v)
  return Number.isFinite(n) ? n : undefined
}

export function asString(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim() ? v.trim() : undefined
}

export function field(obj: unknown, key: string): unknown {
  return isRecord(obj) ? obj[key] : undefined
}
