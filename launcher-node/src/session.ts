/**
 * Session: an optional console launch plus one Connect client.
 *
 * The session owns both the child process and the connection; `close()`
 * releases both. When the remote rejects a command, the console's pending
 * diagnostic lines are forwarded to the observer before the error propagates.
 *
 * @module
 */
import {
  type AnyConnectClient,
  type ClientOptions,
  type ConnectClientDeps,
  type ConnectionState,
  createConnectClient,
  DEFAULT_PORT,
  NackError,
  type ReadOptions,
  type ReportFileParams,
  type ReportParams,
  type SendOptions
} from '@stk-connect/client'
import { noopSessionObserver, type SessionObserver } from './events.js'
import { resolveConfigDir, resolveInstallDir } from './install-dir.js'
import { buildLaunchSpec } from './launch-spec.js'
import { launchWithRetry, type LaunchSpec, type ProcessSupervisor } from './supervisor.js'

export interface SessionOptions extends Omit<ClientOptions, 'observer'> {
  /** Console install directory; see {@link resolveInstallDir} */
  readonly installDir?: string
  /** Console configuration directory; see {@link resolveConfigDir} */
  readonly configDir?: string
  readonly vendorId?: string
  /** Launch attempt budget (default 1) */
  readonly runAttempts?: number
  /** Port shift after a bind failure (default 1000) */
  readonly portDelta?: number
  /** Delay between launch attempts */
  readonly launchRetryDelayMs?: number
  readonly readyTimeoutMs?: number
  readonly pollIntervalMs?: number
  readonly observer?: SessionObserver
}

export interface SessionDeps extends ConnectClientDeps {
  /** Replaces the platform launch spec */
  readonly buildSpec?: (port: number) => LaunchSpec
}

export class Session {
  private readonly client: AnyConnectClient
  private readonly observer: SessionObserver
  private supervisor: ProcessSupervisor | null = null
  private port: number

  constructor(
    private readonly options: SessionOptions = {},
    private readonly deps: SessionDeps = {}
  ) {
    this.observer = options.observer ?? noopSessionObserver
    this.port = options.port ?? DEFAULT_PORT
    this.client = createConnectClient(
      {
        host: options.host,
        port: options.port,
        mode: options.mode,
        ack: options.ack,
        connectAttempts: options.connectAttempts,
        retryDelayMs: options.retryDelayMs,
        sendAttempts: options.sendAttempts,
        timeoutMs: options.timeoutMs,
        observer: this.observer
      },
      { dial: deps.dial }
    )
  }

  /** Port the client connects to; updated by a launch that shifted ports. */
  get connectPort(): number {
    return this.port
  }

  get connectionState(): ConnectionState {
    return this.client.connectionState
  }

  /** True while a launched console is running. */
  get launched(): boolean {
    return this.supervisor?.running ?? false
  }

  /**
   * Launch the console and wait until it accepts connections.
   *
   * @throws LicenseError, LaunchError, InstallDirNotFoundError
   */
  async launch(): Promise<void> {
    const buildSpec = this.deps.buildSpec ?? this.platformSpecBuilder()
    const result = await launchWithRetry({
      port: this.port,
      buildSpec,
      runAttempts: this.options.runAttempts,
      portDelta: this.options.portDelta,
      retryDelayMs: this.options.launchRetryDelayMs,
      readyTimeoutMs: this.options.readyTimeoutMs,
      pollIntervalMs: this.options.pollIntervalMs,
      observer: this.observer
    })
    this.supervisor = result.supervisor
    this.port = result.port
  }

  /**
   * Connect the client to the (possibly launched) console.
   */
  async connect(): Promise<void> {
    if (this.client.endpoint.port !== this.port) {
      this.client.setEndpoint({ host: this.client.endpoint.host, port: this.port })
    }
    await this.client.connect()
  }

  async send(command: string, options?: SendOptions): Promise<void> {
    await this.forwardingDiagnostics(() => this.client.send(command, options))
  }

  async report(params: ReportFileParams): Promise<void> {
    await this.forwardingDiagnostics(() => this.client.report(params))
  }

  async reportReturning(params: ReportParams, options?: ReadOptions): Promise<string[]> {
    return this.forwardingDiagnostics(() => this.client.reportReturning(params, options))
  }

  /**
   * Close the connection; a launched console keeps running.
   */
  disconnect(): void {
    this.client.close()
  }

  /**
   * Close the connection and stop a launched console.
   */
  async close(): Promise<void> {
    this.client.close()
    const supervisor = this.supervisor
    this.supervisor = null
    if (supervisor !== null) {
      await supervisor.stop()
    }
  }

  private platformSpecBuilder(): (port: number) => LaunchSpec {
    const installDir = resolveInstallDir({ dir: this.options.installDir })
    const configDir = resolveConfigDir({ dir: this.options.configDir })
    return (port) =>
      buildLaunchSpec({ installDir, configDir, port, vendorId: this.options.vendorId })
  }

  private async forwardingDiagnostics<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (err instanceof NackError && this.supervisor !== null) {
        for (const line of this.supervisor.drainDiagnostics()) {
          this.observer.observe({ type: 'diagnostic', line, source: 'nack' })
        }
      }
      throw err
    }
  }
}
