/**
 * SocketTransport: owns the TCP connection to the Connect socket.
 *
 * - Connect with a fixed-delay retry on "connection refused" only
 * - Length-delimited reads (`readExact`) that never return short
 * - Best-effort idle reads (`readUntilIdle`) for responses of unknown length
 * - Writes that honour stream backpressure
 *
 * Incoming bytes accumulate in an internal buffer from `data` events; reads
 * consume from the front of that buffer.
 *
 * @remarks
 * **Single-reader assumption**: exactly one read may be outstanding. A second
 * read started before the first settles throws ConnectionStateError.
 *
 * @module
 */
import { createConnection, type Socket } from 'node:net'
import { setTimeout as sleep } from 'node:timers/promises'
import type { Endpoint } from '../config.js'
import { ConnectError, ConnectionClosedError, ConnectionStateError } from '../errors.js'
import { type ConnectObserver, noopObserver } from '../observer.js'

/**
 * Opens a socket to the endpoint. Resolves once connected.
 */
export type DialFn = (endpoint: Endpoint) => Promise<Socket>

/**
 * Connect retry policy.
 */
export interface TransportConnectOptions {
  /** Total attempt budget, including the first */
  readonly maxAttempts: number
  /** Fixed delay between attempts */
  readonly retryDelayMs: number
  readonly observer?: ConnectObserver
  /** Socket factory, defaults to {@link dialSocket} */
  readonly dial?: DialFn
}

type PendingRead =
  | {
      readonly kind: 'exact'
      readonly size: number
      readonly resolve: (data: Buffer) => void
      readonly reject: (err: Error) => void
    }
  | {
      readonly kind: 'idle'
      readonly timer: NodeJS.Timeout
      readonly resolve: (data: Buffer) => void
    }

/**
 * Open a TCP connection, resolving on `connect` and rejecting on the first `error`.
 */
export function dialSocket(endpoint: Endpoint): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = createConnection({ host: endpoint.host, port: endpoint.port })

    const onConnect = () => {
      socket.off('error', onError)
      resolve(socket)
    }
    const onError = (err: Error) => {
      socket.off('connect', onConnect)
      socket.destroy()
      reject(err)
    }

    socket.once('connect', onConnect)
    socket.once('error', onError)
  })
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

/**
 * True for ECONNREFUSED, including the aggregate error raised when every
 * address family of a host name refused.
 */
export function isConnectionRefused(err: unknown): boolean {
  if (errorCode(err) === 'ECONNREFUSED') return true
  return (
    err instanceof AggregateError &&
    err.errors.length > 0 &&
    err.errors.every((inner) => isConnectionRefused(inner))
  )
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Hand `data` to the socket once. Settles exactly once: after `drain` when the
 * socket's write buffer is full, otherwise on the next tick.
 *
 * @throws ConnectionStateError if the socket is already closed, or closes first
 * @throws Error the socket's own error, if it fails first
 */
function writeWithBackpressure(socket: Socket, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (socket.destroyed || socket.writableEnded || socket.writableFinished) {
      reject(new ConnectionStateError('closed', 'send'))
      return
    }

    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      cleanup()
      fn()
    }

    const onError = (err: Error) => settle(() => reject(err))
    const onClose = () => settle(() => reject(new ConnectionStateError('closed', 'send')))
    const onDrain = () => settle(() => resolve())

    const cleanup = () => {
      socket.off('error', onError)
      socket.off('close', onClose)
      socket.off('drain', onDrain)
    }

    // write() may emit 'error' before it returns
    socket.on('error', onError)
    socket.on('close', onClose)

    if (socket.write(data)) {
      setImmediate(() => settle(() => resolve()))
    } else {
      socket.on('drain', onDrain)
    }
  })
}

/**
 * Transport over one connected socket.
 *
 * Lifecycle:
 * 1. {@link SocketTransport.connect} dials with retry
 * 2. `send` / `readExact` / `readUntilIdle`, strictly one exchange at a time
 * 3. `close()` releases the socket (idempotent)
 */
export class SocketTransport {
  private buffer: Buffer = Buffer.alloc(0)
  private pending: PendingRead | null = null
  /** Set once the peer ended the stream or the socket failed */
  private ended = false
  private failure: Error | null = null
  private closed = false

  constructor(
    private readonly socket: Socket,
    readonly endpoint: Endpoint,
    /** Number of dial attempts it took to connect */
    readonly attempts: number
  ) {
    socket.setNoDelay(true)
    socket.on('data', this.onData)
    socket.on('end', this.onEnd)
    socket.on('close', this.onEnd)
    socket.on('error', this.onError)
  }

  /**
   * Dial the endpoint, retrying with a fixed delay while the connection is refused.
   *
   * The remote application needs a warm-up window after launch, so the delay
   * is constant rather than exponential.
   *
   * @throws ConnectError after `maxAttempts` refusals, or immediately on any other error
   */
  static async connect(endpoint: Endpoint, options: TransportConnectOptions): Promise<SocketTransport> {
    const observer = options.observer ?? noopObserver
    const dial = options.dial ?? dialSocket

    for (let attempt = 1; ; attempt++) {
      observer.observe({
        type: 'connect_attempt',
        endpoint,
        attempt,
        maxAttempts: options.maxAttempts
      })

      try {
        const socket = await dial(endpoint)
        observer.observe({ type: 'connected', endpoint, attempts: attempt })
        return new SocketTransport(socket, endpoint, attempt)
      } catch (err) {
        if (!isConnectionRefused(err)) {
          throw new ConnectError(endpoint, attempt, err)
        }
        observer.observe({ type: 'connect_refused', endpoint, attempt, message: errorMessage(err) })
        if (attempt >= options.maxAttempts) {
          throw new ConnectError(endpoint, attempt, err)
        }
      }

      await sleep(options.retryDelayMs)
    }
  }

  /**
   * True until `close()` is called or the peer goes away.
   */
  get isOpen(): boolean {
    return !this.closed && !this.ended
  }

  /**
   * Write bytes in one call. Partial writes are not retried.
   *
   * @throws ConnectionStateError if the transport is closed
   */
  async send(data: Buffer): Promise<void> {
    if (this.closed) {
      throw new ConnectionStateError('closed', 'send')
    }
    await writeWithBackpressure(this.socket, data)
  }

  /**
   * Read exactly `size` bytes, waiting as long as it takes.
   *
   * @throws ConnectionClosedError if the stream ends first
   * @throws ConnectionStateError if closed or another read is outstanding
   */
  readExact(size: number): Promise<Buffer> {
    this.assertReadable('read')

    if (this.buffer.length >= size) {
      return Promise.resolve(this.take(size))
    }
    if (this.ended) {
      return Promise.reject(new ConnectionClosedError(size, this.buffer.length, this.failure ?? undefined))
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { kind: 'exact', size, resolve, reject }
    })
  }

  /**
   * Collect bytes until none arrive for `timeoutMs`.
   *
   * Returns everything already buffered plus everything received before the
   * quiet period elapsed; an empty buffer if nothing arrives at all.
   *
   * @remarks
   * Best-effort: a remote that pauses longer than `timeoutMs` mid-response is
   * cut short. Callers needing deterministic completion use `readExact` with
   * declared lengths instead.
   */
  readUntilIdle(timeoutMs: number): Promise<Buffer> {
    this.assertReadable('read until idle')

    if (this.ended) {
      return Promise.resolve(this.take(this.buffer.length))
    }

    return new Promise<Buffer>((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null
        resolve(this.take(this.buffer.length))
      }, timeoutMs)
      this.pending = { kind: 'idle', timer, resolve }
    })
  }

  /**
   * Release the socket. Safe to call any number of times.
   * An outstanding read is rejected (exact) or settled with what was collected (idle).
   */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.settleOnEnd()
    this.socket.off('data', this.onData)
    this.socket.off('end', this.onEnd)
    this.socket.off('close', this.onEnd)
    this.socket.destroy()
  }

  private assertReadable(operation: string): void {
    if (this.closed) {
      throw new ConnectionStateError('closed', operation)
    }
    if (this.pending !== null) {
      throw new ConnectionStateError('connected', `${operation} while another read is outstanding`)
    }
  }

  private take(size: number): Buffer {
    const data = this.buffer.subarray(0, size)
    this.buffer = this.buffer.subarray(size)
    return data
  }

  private readonly onData = (chunk: Buffer): void => {
    this.buffer = Buffer.concat([this.buffer, chunk])

    const pending = this.pending
    if (pending === null) return

    if (pending.kind === 'idle') {
      pending.timer.refresh()
      return
    }

    if (this.buffer.length >= pending.size) {
      this.pending = null
      pending.resolve(this.take(pending.size))
    }
  }

  private readonly onEnd = (): void => {
    this.ended = true
    this.settleOnEnd()
  }

  private readonly onError = (err: Error): void => {
    this.failure = err
    this.ended = true
    this.settleOnEnd()
  }

  /** Settle an outstanding read once no more bytes can arrive. */
  private settleOnEnd(): void {
    const pending = this.pending
    if (pending === null) return
    this.pending = null

    if (pending.kind === 'idle') {
      clearTimeout(pending.timer)
      pending.resolve(this.take(this.buffer.length))
      return
    }

    pending.reject(
      new ConnectionClosedError(pending.size, this.buffer.length, this.failure ?? undefined)
    )
  }
}
