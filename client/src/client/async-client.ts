/**
 * Asynchronous framing variant.
 *
 * Every response, acknowledgements included, is wrapped in the 42-byte
 * header. Multi-packet responses are reassembled by packet number.
 * The mode is switched on by `ConControl / AsyncOn`, sent as the first
 * command after the socket connects.
 *
 * @module
 */
import type { ClientOptions } from '../config.js'
import { MalformedHeaderError } from '../errors.js'
import { ASYNC_HEADER_SIZE, type AsyncMessage, parseAsyncHeader } from '../wire/frame.js'
import { type AckOutcome, ConnectClient, type ConnectClientDeps } from './connect-client.js'
import { reassembleMessageGroup } from './message-group.js'

/** Switches the remote to asynchronous framing. */
export const ASYNC_ON_COMMAND = 'ConControl / AsyncOn'

export class AsyncConnectClient extends ConnectClient<AsyncMessage> {
  constructor(options: Omit<ClientOptions, 'mode'> = {}, deps: ConnectClientDeps = {}) {
    super('async', options, deps)
  }

  protected handshakeCommands(): readonly string[] {
    return [ASYNC_ON_COMMAND]
  }

  protected async receiveAck(): Promise<AckOutcome> {
    const { header, data } = await this.readSingleMessage()
    switch (header.asyncType) {
      case 'ACK':
        return { type: 'ack' }
      case 'NACK':
        return { type: 'nack', code: data === '' ? undefined : data }
      default:
        throw new MalformedHeaderError(
          'async_header',
          `expected ACK or NACK, got type "${header.asyncType}"`,
          header.raw
        )
    }
  }

  async readSingleMessage(): Promise<AsyncMessage> {
    return this.guard(async () => {
      const io = this.io('read message')
      const header = parseAsyncHeader(await io.readExact(ASYNC_HEADER_SIZE))
      const body = await io.readExact(header.dataLength)
      this.observer.observe({ type: 'message', name: header.asyncType, length: header.dataLength })
      return { header, data: body.toString('utf-8') }
    })
  }

  /**
   * Read every packet of one group. The first packet announces the total;
   * payloads are placed by packet number, whatever order they arrive in.
   */
  async readMultiMessage(): Promise<string[]> {
    const first = await this.readSingleMessage()
    const packets: AsyncMessage[] = [first]
    for (let i = 1; i < first.header.totalPackets; i++) {
      packets.push(await this.readSingleMessage())
    }
    return this.guard(async () => reassembleMessageGroup(packets))
  }
}
