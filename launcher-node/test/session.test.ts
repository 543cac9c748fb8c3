import { NackError } from '@stk-connect/client'
import { afterEach, describe, expect, it } from 'vitest'
import { LicenseError } from '../src/errors.js'
import { Session, type SessionOptions } from '../src/session.js'
import { type FakeConsoleBehaviour, fakeConsoleSpec, freePort, RecordingSessionObserver } from './_harness/console.js'

describe('Session', () => {
  let session: Session | undefined
  let observer: RecordingSessionObserver

  async function launchedSession(
    behaviour: FakeConsoleBehaviour,
    options: SessionOptions = {}
  ): Promise<Session> {
    observer = new RecordingSessionObserver()
    session = new Session(
      {
        host: '127.0.0.1',
        port: await freePort(),
        retryDelayMs: 20,
        pollIntervalMs: 20,
        readyTimeoutMs: 10_000,
        observer,
        ...options
      },
      { buildSpec: (port) => fakeConsoleSpec(port, behaviour, { listen: true }) }
    )
    return session
  }

  afterEach(async () => {
    await session?.close()
    session = undefined
  })

  it('launches the console and sends commands to it', async () => {
    const s = await launchedSession('ready')

    await s.launch()
    await s.connect()
    await s.send('New / Scenario Demo')

    expect(s.launched).toBe(true)
    expect(s.connectionState).toBe('connected')
    expect(observer.ofType('ack')).toEqual([{ type: 'ack', command: 'New / Scenario Demo' }])
  })

  it('forwards pending console diagnostics when a command is rejected', async () => {
    const s = await launchedSession('ready')
    await s.launch()
    await s.connect()

    const err = await s.send('Fail now').then(
      () => undefined,
      (reason: unknown) => reason
    )

    expect(err).toBeInstanceOf(NackError)
    expect(err).toMatchObject({ command: 'Fail now', code: '1' })
    expect(observer.ofType('diagnostic').filter((event) => event.source === 'nack')).toEqual([
      { type: 'diagnostic', line: 'STK/CON: Error processing command: Fail now', source: 'nack' }
    ])
  })

  it('stops the console on close', async () => {
    const s = await launchedSession('ready')
    await s.launch()
    await s.connect()

    await s.close()

    expect(s.launched).toBe(false)
    expect(s.connectionState).toBe('closed')
  })

  it('keeps the console running on disconnect', async () => {
    const s = await launchedSession('ready')
    await s.launch()
    await s.connect()

    s.disconnect()

    expect(s.launched).toBe(true)
    expect(s.connectionState).toBe('closed')
  })

  it('follows the port a launch shifted to', async () => {
    const firstPort = await freePort()
    observer = new RecordingSessionObserver()
    session = new Session(
      {
        host: '127.0.0.1',
        port: firstPort,
        retryDelayMs: 20,
        runAttempts: 2,
        portDelta: 1,
        launchRetryDelayMs: 10,
        pollIntervalMs: 20,
        readyTimeoutMs: 10_000,
        observer
      },
      {
        buildSpec: (port) => fakeConsoleSpec(port, 'ready', { bindBelow: firstPort + 1, listen: true })
      }
    )

    await session.launch()
    await session.connect()

    expect(session.connectPort).toBe(firstPort + 1)
    expect(observer.ofType('connected')).toEqual([
      { type: 'connected', endpoint: { host: '127.0.0.1', port: firstPort + 1 }, attempts: 1 }
    ])
  })

  it('propagates a license failure without a running console', async () => {
    const s = await launchedSession('license')

    await expect(s.launch()).rejects.toThrow(LicenseError)
    expect(s.launched).toBe(false)
  })
})
