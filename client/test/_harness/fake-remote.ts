/**
 * Fake Connect remote for testing.
 *
 * An in-process TCP server on loopback that:
 * - records every command line it receives, per connection, in arrival order
 * - hands each command to a responder that may write raw reply bytes
 *
 * No assertions. No test logic.
 */
import { createServer, type Server, type Socket } from 'node:net'
import type { Endpoint } from '../../src/config.js'
import { encodeAsyncHeader, encodeSyncHeader, splitCommands } from '../../src/wire/frame.js'

/**
 * Writes a reply to the connection that sent the command.
 */
export type Reply = (data: Buffer | string) => void

/**
 * Called once per received command line.
 */
export type Responder = (command: string, reply: Reply, socket: Socket) => void

export class FakeRemote {
  readonly commands: string[] = []
  private readonly sockets = new Set<Socket>()
  private connectionCount = 0

  private constructor(
    private readonly server: Server,
    private responder: Responder
  ) {}

  /**
   * Start listening on an ephemeral loopback port.
   */
  static async start(responder: Responder = () => {}): Promise<FakeRemote> {
    const server = createServer()
    const remote = new FakeRemote(server, responder)
    server.on('connection', (socket) => remote.accept(socket))
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(0, '127.0.0.1', () => {
        server.off('error', reject)
        resolve()
      })
    })
    return remote
  }

  get endpoint(): Endpoint {
    const address = this.server.address()
    if (address === null || typeof address === 'string') {
      throw new Error('fake remote is not listening on a TCP port')
    }
    return { host: '127.0.0.1', port: address.port }
  }

  /** Connections accepted so far. */
  get connections(): number {
    return this.connectionCount
  }

  setResponder(responder: Responder): void {
    this.responder = responder
  }

  /**
   * Resolve once at least `count` commands have been received.
   */
  async waitForCommands(count: number, timeoutMs = 2_000): Promise<void> {
    const deadline = Date.now() + timeoutMs
    while (this.commands.length < count) {
      if (Date.now() > deadline) {
        throw new Error(`expected ${count} command(s), got ${this.commands.length}`)
      }
      await new Promise((resolve) => setTimeout(resolve, 5))
    }
  }

  /**
   * Write raw bytes to every open connection, outside any command exchange.
   */
  broadcast(data: Buffer | string): void {
    for (const socket of this.sockets) {
      socket.write(data)
    }
  }

  /**
   * Close every connection and stop listening.
   */
  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy()
    }
    this.sockets.clear()
    await new Promise<void>((resolve) => this.server.close(() => resolve()))
  }

  private accept(socket: Socket): void {
    this.connectionCount++
    this.sockets.add(socket)
    socket.on('close', () => this.sockets.delete(socket))
    socket.on('error', () => this.sockets.delete(socket))

    let pending = ''
    socket.on('data', (chunk: Buffer) => {
      const { commands, rest } = splitCommands(pending + chunk.toString('utf-8'))
      pending = rest
      for (const command of commands) {
        this.commands.push(command)
        this.responder(command, (data) => socket.write(data), socket)
      }
    })
  }
}

/** Synchronous positive acknowledgement. */
export const ACK = 'ACK'

/** Synchronous negative acknowledgement with a status byte. */
export function nack(code = '1'): string {
  return `NAC${code}`
}

/**
 * One synchronous message: 40-byte header plus body.
 */
export function syncMessage(name: string, data: string): Buffer {
  const body = Buffer.from(data, 'utf-8')
  return Buffer.concat([encodeSyncHeader(name, body.length), body])
}

/**
 * One asynchronous packet: 42-byte header plus body.
 */
export function asyncPacket(
  asyncType: string,
  data = '',
  fields: { identifier?: number; totalPackets?: number; packetNumber?: number } = {}
): Buffer {
  const body = Buffer.from(data, 'utf-8')
  return Buffer.concat([encodeAsyncHeader({ asyncType, dataLength: body.length, ...fields }), body])
}
