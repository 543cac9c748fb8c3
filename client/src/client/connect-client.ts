/**
 * ConnectClient: the request/acknowledgement cycle shared by both framing variants.
 *
 * A client owns at most one connection. Exchanges are strictly sequential:
 * one command, then its acknowledgement and response, before the next.
 * Pipelining commands is not supported.
 *
 * Variants supply the framing-specific pieces:
 * - the handshake commands sent right after the socket connects
 * - how an acknowledgement is read
 * - how single and multi-part messages are read
 *
 * @module
 */
import {
  type ClientConfig,
  type ClientOptions,
  type ConnectMode,
  type Endpoint,
  resolveClientConfig,
  validatePort
} from '../config.js'
import {
  ConfigError,
  type ConnectionState,
  ConnectionStateError,
  MalformedHeaderError,
  NackError
} from '../errors.js'
import { type ConnectObserver, noopObserver } from '../observer.js'
import { type DialFn, SocketTransport } from '../transport/socket-transport.js'
import { buildCommand, splitReportBuffer } from '../wire/frame.js'
import {
  buildReportCreateCommand,
  buildReportReturningCommand,
  type ReportFileParams,
  type ReportParams
} from '../wire/report-command.js'

/** Disables acknowledgements on the remote. Sent without reading an ack. */
export const ACK_OFF_COMMAND = 'ConControl / AckOff'

/**
 * Result of one acknowledgement read.
 */
export type AckOutcome = { readonly type: 'ack' } | { readonly type: 'nack'; readonly code?: string }

/**
 * Collaborators that tests or embedders may replace.
 */
export interface ConnectClientDeps {
  /** Socket factory for the transport */
  readonly dial?: DialFn
}

export interface SendOptions {
  /** NACK attempt budget for this command; defaults to the configured `sendAttempts` */
  readonly attempts?: number
}

export interface ReadOptions {
  /** Idle timeout for this read; defaults to the configured `timeoutMs` */
  readonly timeoutMs?: number
}

/**
 * Base of the two framing variants. Use {@link createConnectClient} to construct one.
 */
export abstract class ConnectClient<TMessage> {
  readonly config: ClientConfig
  protected readonly observer: ConnectObserver
  private readonly dial: DialFn | undefined
  private endpointValue: Endpoint
  private transport: SocketTransport | null = null
  private state: ConnectionState = 'unconnected'

  protected constructor(
    readonly mode: ConnectMode,
    options: ClientOptions = {},
    deps: ConnectClientDeps = {}
  ) {
    this.config = resolveClientConfig({ ...options, mode })
    this.endpointValue = this.config.endpoint
    this.observer = options.observer ?? noopObserver
    this.dial = deps.dial
  }

  /**
   * Commands the variant must send right after the socket connects,
   * before any other traffic.
   */
  protected abstract handshakeCommands(): readonly string[]

  /** Read one acknowledgement from the wire. */
  protected abstract receiveAck(): Promise<AckOutcome>

  /** Read one framed message. */
  abstract readSingleMessage(): Promise<TMessage>

  /** Read a multi-part response and return its payloads in order. */
  abstract readMultiMessage(): Promise<string[]>

  get endpoint(): Endpoint {
    return this.endpointValue
  }

  get connectionState(): ConnectionState {
    return this.state
  }

  /**
   * Dial attempts the current connection took, or undefined when not connected.
   */
  get connectAttempts(): number | undefined {
    return this.transport?.attempts
  }

  /**
   * Change the remote endpoint. Only allowed while disconnected.
   *
   * @throws ConnectionStateError while connected
   * @throws ConfigError on an invalid port or empty host
   */
  setEndpoint(endpoint: Endpoint): void {
    if (this.state === 'connected') {
      throw new ConnectionStateError(this.state, 'change endpoint')
    }
    if (endpoint.host === '') {
      throw new ConfigError('host', 'must be a non-empty string')
    }
    this.endpointValue = { host: endpoint.host, port: validatePort(endpoint.port) }
  }

  /**
   * Connect the socket with retry, then perform the handshake.
   *
   * Handshake commands are acknowledged (the remote starts with acknowledgements
   * on). When acknowledgement is configured off, `ConControl / AckOff` follows
   * without an ack read. A failed handshake closes the connection.
   *
   * @throws ConnectionStateError if already connected
   * @throws ConnectError when the connect budget is exhausted
   */
  async connect(): Promise<void> {
    if (this.state === 'connected') {
      throw new ConnectionStateError(this.state, 'connect')
    }

    this.transport = await SocketTransport.connect(this.endpointValue, {
      maxAttempts: this.config.connectAttempts,
      retryDelayMs: this.config.retryDelayMs,
      observer: this.observer,
      dial: this.dial
    })
    this.state = 'connected'

    try {
      for (const command of this.handshakeCommands()) {
        await this.exchange(command, 1, true)
      }
      if (!this.config.ack) {
        await this.exchange(ACK_OFF_COMMAND, 1, false)
      }
    } catch (err) {
      this.close()
      throw err
    }
  }

  /**
   * Send a command and, when acknowledgement is enabled, wait for it.
   *
   * On NACK the whole send is repeated until the attempt budget runs out.
   * The remote has processed the command only if this resolves with
   * acknowledgement enabled.
   *
   * @throws NackError carrying the command after the last rejected attempt
   * @throws CommandFramingError if the command contains a newline
   */
  async send(command: string, options: SendOptions = {}): Promise<void> {
    const attempts = options.attempts ?? this.config.sendAttempts
    if (!Number.isInteger(attempts) || attempts < 1) {
      throw new ConfigError('attempts', 'must be a positive integer')
    }
    await this.exchange(command, attempts, this.config.ack)
  }

  /**
   * Read one acknowledgement for a command sent by other means.
   *
   * @throws NackError if the remote rejected it
   */
  async readAck(command: string): Promise<void> {
    const outcome = await this.guard(() => this.receiveAck())
    if (outcome.type === 'nack') {
      this.observer.observe({ type: 'nack', command, attempt: 1, code: outcome.code })
      throw new NackError(command, 1, outcome.code)
    }
    this.observer.observe({ type: 'ack', command })
  }

  /**
   * Read whatever arrives until the socket has been quiet for the idle timeout.
   * Empty when nothing arrives.
   */
  async read(options: ReadOptions = {}): Promise<Buffer> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs
    const data = await this.io('read').readUntilIdle(timeoutMs)
    this.observer.observe({ type: 'idle_read', bytes: data.length, timeoutMs })
    return data
  }

  /**
   * Create a report and write it to a file on the remote.
   * Only the acknowledgement is read.
   */
  async report(params: ReportFileParams): Promise<void> {
    await this.send(buildReportCreateCommand(params))
  }

  /**
   * Create a report and return its rows over the socket.
   *
   * @remarks
   * An empty result means no bytes arrived within the idle timeout. That is
   * indistinguishable from a report that is legitimately empty; the protocol
   * offers no way to tell them apart.
   *
   * Rows are whatever arrived before the socket went quiet. A remote that
   * pauses longer than the timeout mid-report yields the rows received so
   * far; the rest stays on the socket. Never throws on partial data.
   */
  async reportReturning(params: ReportParams, options: ReadOptions = {}): Promise<string[]> {
    await this.send(buildReportReturningCommand(params))
    const buffer = await this.read(options)
    if (buffer.length === 0) {
      return []
    }
    return splitReportBuffer(buffer.toString('utf-8'))
  }

  /**
   * Release the connection. Safe to call any number of times.
   */
  close(): void {
    const transport = this.transport
    if (transport === null) return
    this.transport = null
    this.state = 'closed'
    transport.close()
    this.observer.observe({ type: 'closed', endpoint: transport.endpoint })
  }

  /**
   * Alias of {@link close}.
   */
  disconnect(): void {
    this.close()
  }

  toString(): string {
    return `${this.constructor.name}(${this.endpointValue.host}:${this.endpointValue.port})`
  }

  /**
   * The live transport.
   *
   * @throws ConnectionStateError when not connected
   */
  protected io(operation = 'perform I/O'): SocketTransport {
    if (this.transport === null) {
      throw new ConnectionStateError(this.state, operation)
    }
    return this.transport
  }

  /**
   * Run a wire-parsing operation. A malformed header means the stream is out
   * of sync with no defined recovery, so the connection is closed before the
   * error propagates.
   */
  protected async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (err instanceof MalformedHeaderError && this.transport !== null) {
        this.observer.observe({ type: 'desync', message: err.message })
        this.close()
      }
      throw err
    }
  }

  private async exchange(command: string, attempts: number, expectAck: boolean): Promise<void> {
    const frame = buildCommand(command)

    for (let attempt = 1; ; attempt++) {
      await this.io('send').send(frame)
      this.observer.observe({ type: 'command_sent', command, attempt })

      if (!expectAck) return

      const outcome = await this.guard(() => this.receiveAck())
      if (outcome.type === 'ack') {
        this.observer.observe({ type: 'ack', command })
        return
      }

      this.observer.observe({ type: 'nack', command, attempt, code: outcome.code })
      if (attempt >= attempts) {
        throw new NackError(command, attempt, outcome.code)
      }
    }
  }
}

/**
 * Connect, run `fn`, and close the connection on every path.
 */
export async function withConnection<C extends ConnectClient<unknown>, T>(
  client: C,
  fn: (client: C) => Promise<T>
): Promise<T> {
  await client.connect()
  try {
    return await fn(client)
  } finally {
    client.close()
  }
}
