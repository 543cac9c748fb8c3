import { describe, expect, it } from 'vitest'
import { parseSessionEnv } from '../src/config.js'

function parse(env: NodeJS.ProcessEnv) {
  const warnings: string[] = []
  const result = parseSessionEnv(env, (msg) => warnings.push(msg))
  return { result, warnings }
}

describe('parseSessionEnv', () => {
  it('returns nothing for an empty environment', () => {
    expect(parse({})).toEqual({ result: {}, warnings: [] })
  })

  it('reads every variable', () => {
    expect(
      parse({
        STK_CONNECT_HOST: 'sim-host',
        STK_CONNECT_PORT: '6001',
        STK_CONNECT_ASYNC: 'true',
        STK_CONNECT_LOG: 'debug'
      })
    ).toEqual({
      result: { host: 'sim-host', port: 6001, mode: 'async', logLevel: 'debug' },
      warnings: []
    })
  })

  it('selects synchronous framing explicitly', () => {
    expect(parse({ STK_CONNECT_ASYNC: '0' }).result).toEqual({ mode: 'sync' })
  })

  it('skips empty variables silently', () => {
    expect(parse({ STK_CONNECT_HOST: '', STK_CONNECT_PORT: '' })).toEqual({ result: {}, warnings: [] })
  })

  it('warns on an out-of-range port', () => {
    expect(parse({ STK_CONNECT_PORT: '70000' })).toEqual({
      result: {},
      warnings: ['STK_CONNECT_PORT must be an integer between 1 and 65535, got "70000"; ignoring']
    })
  })

  it('warns on a non-numeric port', () => {
    expect(parse({ STK_CONNECT_PORT: '50a1' }).warnings).toHaveLength(1)
  })

  it('warns on an unknown async flag', () => {
    expect(parse({ STK_CONNECT_ASYNC: 'yes' }).warnings).toEqual([
      'STK_CONNECT_ASYNC must be 1, 0, true or false, got "yes"; ignoring'
    ])
  })

  it('warns on an unknown log level', () => {
    expect(parse({ STK_CONNECT_LOG: 'trace' }).warnings).toEqual([
      'STK_CONNECT_LOG must be one of debug, info, warn, error, got "trace"; ignoring'
    ])
  })
})
