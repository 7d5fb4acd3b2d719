// tests/explorer.test.ts
import nock from 'nock'
nock.disableNetConnect()

import { getExplorerSupply, parseSupplyBody } from '../src/services/explorer'

describe('parseSupplyBody', () => {
  test('reads a JSON number', () => {
    expect(parseSupplyBody('8000000000000')).toBe(8_000_000_000_000)
  })

  test('tolerates whitespace around a JSON number', () => {
    expect(parseSupplyBody(' 7500000000000\n')).toBe(7_500_000_000_000)
  })

  test('truncates a fractional JSON number', () => {
    expect(parseSupplyBody('1234.9')).toBe(1234)
  })

  test('reads a JSON string of digits', () => {
    expect(parseSupplyBody('"123"')).toBe(123)
  })

  test('falls back to plain-text digits when the body is not JSON', () => {
    // leading zeros are not valid JSON
    expect(parseSupplyBody('007500000000000\n')).toBe(7_500_000_000_000)
  })

  test('rejects objects and prose', () => {
    expect(parseSupplyBody('{"supply": 1}')).toBeUndefined()
    expect(parseSupplyBody('n/a')).toBeUndefined()
    expect(parseSupplyBody('')).toBeUndefined()
  })
})

describe('getExplorerSupply', () => {
  let errorSpy: jest.SpyInstance

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    nock.cleanAll()
    errorSpy.mockRestore()
  })

  afterAll(() => {
    nock.restore()
  })

  test('returns the supply from a JSON-number body', async () => {
    nock('https://explorer.nexa.org').get('/api/coinsupply').reply(200, '8123456789012')
    await expect(getExplorerSupply()).resolves.toBe(8_123_456_789_012)
  })

  test('returns the supply from a plain-text body', async () => {
    nock('https://explorer.nexa.org')
      .get('/api/coinsupply')
      .reply(200, '0008123456789012\n', { 'Content-Type': 'text/plain' })
    await expect(getExplorerSupply()).resolves.toBe(8_123_456_789_012)
  })

  test('returns null and logs on a server error', async () => {
    nock('https://explorer.nexa.org').get('/api/coinsupply').reply(500, 'boom')
    await expect(getExplorerSupply()).resolves.toBeNull()
    expect(errorSpy).toHaveBeenCalledWith('Explorer supply error:', 'Request failed with status code 500')
  })

  test('returns null on an unparseable body', async () => {
    nock('https://explorer.nexa.org').get('/api/coinsupply').reply(200, 'maintenance')
    await expect(getExplorerSupply()).resolves.toBeNull()
    expect(errorSpy).toHaveBeenCalledTimes(1)
  })

  test('returns null on a network error', async () => {
    nock('https://explorer.nexa.org').get('/api/coinsupply').replyWithError('socket hang up')
    await expect(getExplorerSupply()).resolves.toBeNull()
  })
})
