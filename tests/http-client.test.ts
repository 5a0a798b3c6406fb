// tests/http-client.test.ts
import nock from 'nock'
nock.disableNetConnect()

import { classifyHttpError, createHttpClient } from '../src/http/axiosClient'
import { SourceUnavailableError } from '../src/errors'
import { parseList } from '../src/config'

const BASE = 'https://api.test'

async function failureFor(status: number) {
  nock(BASE).get('/x').reply(status)
  try {
    await createHttpClient({ retries: 0 }).get(`${BASE}/x`)
  } catch (e) {
    return classifyHttpError('dexscreener', e)
  }
  throw new Error('request unexpectedly succeeded')
}

describe('classifyHttpError', () => {
  afterEach(() => nock.cleanAll())
  afterAll(() => nock.restore())

  test.each<[number, string]>([
    [401, 'Unauthorized'],
    [403, 'Unauthorized'],
    [429, 'RateLimited'],
    [404, 'Unreachable'],
    [500, 'Unreachable'],
    [400, 'MalformedResponse']
  ])('HTTP %i is %s', async (status, kind) => {
    const err = await failureFor(status)
    expect(err.kind).toBe(kind)
    expect(err.detail).toBe(`HTTP ${status}`)
  })

  test('source failures pass through unchanged', () => {
    const failure = new SourceUnavailableError('social', 'Timeout', 'slow')
    expect(classifyHttpError('dexscreener', failure)).toBe(failure)
  })

  test('anything else is a malformed response', () => {
    expect(classifyHttpError('social', new TypeError('x is undefined')).toFailure()).toEqual({
      source: 'social',
      kind: 'MalformedResponse',
      message: 'x is undefined'
    })
  })

  test('Retry-After is honoured between attempts', async () => {
    nock(BASE).get('/y').reply(429, '', { 'Retry-After': '0' }).get('/y').reply(200, { ok: true })
    const res = await createHttpClient({ retries: 1, retryBaseMs: 5000 }).get(`${BASE}/y`)
    expect(res.data).toEqual({ ok: true })
  })
})

describe('parseList', () => {
  test('trims entries, drops blanks and trailing slashes', () => {
    expect(parseList(' https://a.test/, ,https://b.test ')).toEqual(['https://a.test', 'https://b.test'])
    expect(parseList(undefined)).toEqual([])
  })
})
