/**
 * Synchronous framing variant.
 *
 * - Acknowledgement: `ACK`, or `NAC` followed by one status byte
 * - Query responses: 40-byte `"<name> <length>"` header, then `length` bytes
 * - Multi-part responses: a message whose body is a decimal count, then that
 *   many messages
 *
 * @module
 */
import type { ClientOptions } from '../config.js'
import { MalformedHeaderError } from '../errors.js'
import {
  NACK_CODE_SIZE,
  parseSimpleAck,
  parseSyncHeader,
  SIMPLE_ACK_SIZE,
  SYNC_HEADER_SIZE,
  type SyncMessage
} from '../wire/frame.js'
import { type AckOutcome, ConnectClient, type ConnectClientDeps } from './connect-client.js'

function parseCount(message: SyncMessage): number {
  const text = message.data.trim()
  if (!/^\d+$/.test(text)) {
    throw new MalformedHeaderError('sync_header', `${message.name} count is not numeric`, message.data)
  }
  return Number.parseInt(text, 10)
}

export class SyncConnectClient extends ConnectClient<SyncMessage> {
  constructor(options: Omit<ClientOptions, 'mode'> = {}, deps: ConnectClientDeps = {}) {
    super('sync', options, deps)
  }

  protected handshakeCommands(): readonly string[] {
    return []
  }

  /**
   * @remarks
   * Exactly one status byte is read after `NAC`. A remote sending a longer
   * code would leave bytes behind and desynchronize the stream.
   */
  protected async receiveAck(): Promise<AckOutcome> {
    const token = parseSimpleAck(await this.io('read ack').readExact(SIMPLE_ACK_SIZE))
    if (token === 'ACK') {
      return { type: 'ack' }
    }
    const code = await this.io('read ack').readExact(NACK_CODE_SIZE)
    return { type: 'nack', code: code.toString('latin1') }
  }

  async readSingleMessage(): Promise<SyncMessage> {
    return this.guard(async () => {
      const io = this.io('read message')
      const header = parseSyncHeader(await io.readExact(SYNC_HEADER_SIZE))
      const body = await io.readExact(header.length)
      this.observer.observe({ type: 'message', name: header.name, length: header.length })
      return { ...header, data: body.toString('utf-8') }
    })
  }

  async readMultiMessage(): Promise<string[]> {
    const countMessage = await this.readSingleMessage()
    const count = await this.guard(async () => parseCount(countMessage))

    const payloads: string[] = []
    for (let i = 0; i < count; i++) {
      const message = await this.readSingleMessage()
      payloads.push(message.data)
    }
    return payloads
  }
}
