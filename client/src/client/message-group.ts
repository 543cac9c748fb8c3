/**
 * Reassembly of multi-packet asynchronous responses.
 *
 * Packets carry `totalPackets` and a 1-based `packetNumber`. Payloads are
 * placed by packet number, never by arrival order.
 *
 * @module
 */
import { MalformedHeaderError } from '../errors.js'
import type { AsyncMessage } from '../wire/frame.js'

/**
 * Place packet payloads into a dense group indexed by packet number.
 *
 * A final empty payload (terminal slot holding `""`) is dropped.
 *
 * @param packets - Every packet of one group, in any order
 * @returns Payloads ordered by packet number
 * @throws MalformedHeaderError if the packets disagree on the total, a packet
 *   number falls outside 1..total, or a slot is left empty
 */
export function reassembleMessageGroup(packets: readonly AsyncMessage[]): string[] {
  const [first] = packets
  if (first === undefined) {
    throw new MalformedHeaderError('message_group', 'no packets received')
  }

  const total = first.header.totalPackets
  if (total < 1) {
    throw new MalformedHeaderError('message_group', `totalPackets is ${total}`, first.header.raw)
  }

  const slots: (string | undefined)[] = new Array<string | undefined>(total).fill(undefined)

  for (const packet of packets) {
    const { header } = packet
    if (header.totalPackets !== total) {
      throw new MalformedHeaderError(
        'message_group',
        `packet announces ${header.totalPackets} packets, group has ${total}`,
        header.raw
      )
    }
    if (header.packetNumber < 1 || header.packetNumber > total) {
      throw new MalformedHeaderError(
        'message_group',
        `packet number ${header.packetNumber} outside 1..${total}`,
        header.raw
      )
    }
    slots[header.packetNumber - 1] = packet.data
  }

  const group: string[] = []
  for (const [index, slot] of slots.entries()) {
    if (slot === undefined) {
      throw new MalformedHeaderError('message_group', `packet ${index + 1} of ${total} missing`)
    }
    group.push(slot)
  }

  if (group[group.length - 1] === '') {
    group.pop()
  }
  return group
}
