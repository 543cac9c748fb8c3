import { describe, expect, it } from 'vitest'
import { resolveClientConfig, validatePort } from '../src/config.js'
import { ConfigError } from '../src/errors.js'

describe('resolveClientConfig', () => {
  it('applies defaults', () => {
    expect(resolveClientConfig()).toEqual({
      endpoint: { host: 'localhost', port: 5001 },
      mode: 'sync',
      ack: true,
      connectAttempts: 5,
      retryDelayMs: 3000,
      sendAttempts: 1,
      timeoutMs: 1000
    })
  })

  it('keeps supplied values', () => {
    expect(
      resolveClientConfig({
        host: 'sim-host',
        port: 6001,
        mode: 'async',
        ack: false,
        connectAttempts: 2,
        retryDelayMs: 0,
        sendAttempts: 3,
        timeoutMs: 250
      })
    ).toEqual({
      endpoint: { host: 'sim-host', port: 6001 },
      mode: 'async',
      ack: false,
      connectAttempts: 2,
      retryDelayMs: 0,
      sendAttempts: 3,
      timeoutMs: 250
    })
  })

  it('rejects an empty host', () => {
    expect(() => resolveClientConfig({ host: '' })).toThrow('Invalid option "host"')
  })

  it.each([
    ['connectAttempts', { connectAttempts: 0 }],
    ['sendAttempts', { sendAttempts: 1.5 }],
    ['retryDelayMs', { retryDelayMs: -1 }],
    ['timeoutMs', { timeoutMs: Number.NaN }]
  ])('rejects an invalid %s', (field, options) => {
    try {
      resolveClientConfig(options)
      expect.fail('Expected ConfigError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      expect(err).toMatchObject({ field })
    }
  })
})

describe('validatePort', () => {
  it('accepts the full range', () => {
    expect(validatePort(1)).toBe(1)
    expect(validatePort(65535)).toBe(65535)
  })

  it('names the field it checks', () => {
    expect(() => validatePort(0, 'startPort')).toThrow('Invalid option "startPort"')
  })
})
