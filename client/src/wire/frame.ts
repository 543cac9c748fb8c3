/**
 * Connect wire framing.
 *
 * Commands travel as single `\n`-terminated lines. Responses use one of two
 * disciplines:
 * - synchronous: a 3-byte `ACK` / `NAC`+status token, and for queries a 40-byte
 *   ASCII header `"<name> <decimal length>"` followed by the body
 * - asynchronous: every response wrapped in a 42-byte fixed-field header whose
 *   numeric fields are ASCII decimal, followed by `dataLength` body bytes
 *
 * Pure byte/structure translation. No I/O.
 *
 * @module
 */

import { CommandFramingError, MalformedHeaderError } from '../errors.js'

/** Line terminator for every command on the wire. */
export const COMMAND_TERMINATOR = '\n'

/** Size of the synchronous acknowledgement token (`ACK` or `NAC`). */
export const SIMPLE_ACK_SIZE = 3

/**
 * Size of the status byte that follows `NAC`.
 *
 * @remarks
 * The remote is assumed to send single-digit codes. A multi-byte code would
 * leave its tail in the stream and desynchronize the next read; the protocol
 * gives no way to detect that.
 */
export const NACK_CODE_SIZE = 1

/** Size of the synchronous query header. */
export const SYNC_HEADER_SIZE = 40

/** Size of the asynchronous message header. */
export const ASYNC_HEADER_SIZE = 42

/** Sync marker opening every asynchronous header. */
export const ASYNC_SYNC_MARKER = 'AGI'

/** Width of the padded async type field. */
export const ASYNC_TYPE_WIDTH = 15

/**
 * Marker that precedes each row group of a returning report in async mode:
 * the first 24 bytes of a `REPORT_RM` header (sync through padded type).
 */
export const REPORT_RM_MARKER = 'AGI421009REPORT_RM      '

/**
 * Width of the unparsed sub-header following each report marker
 * (identifier, total packets, packet number, data length).
 */
export const REPORT_ROW_PREFIX_SIZE = 18

/**
 * Synchronous acknowledgement token.
 */
export type SimpleAckToken = 'ACK' | 'NAC'

/**
 * Decoded 42-byte asynchronous header.
 */
export interface AsyncHeader {
  readonly sync: string
  readonly headerLength: number
  readonly majorVersion: number
  readonly minorVersion: number
  readonly typeLength: number
  /** First `typeLength` characters of the padded type field */
  readonly asyncType: string
  readonly identifier: number
  readonly totalPackets: number
  /** 1-based position of this packet within its group */
  readonly packetNumber: number
  readonly dataLength: number
  /** Header as received, latin1-decoded */
  readonly raw: string
}

/**
 * Fields needed to build an asynchronous header.
 */
export interface AsyncHeaderFields {
  readonly asyncType: string
  readonly dataLength: number
  readonly identifier?: number
  readonly totalPackets?: number
  readonly packetNumber?: number
  readonly headerLength?: number
  readonly majorVersion?: number
  readonly minorVersion?: number
}

/**
 * Decoded 40-byte synchronous header.
 */
export interface SyncHeader {
  readonly name: string
  readonly length: number
}

/**
 * A synchronous message: header fields plus the decoded body.
 */
export interface SyncMessage extends SyncHeader {
  readonly data: string
}

/**
 * An asynchronous packet: header plus the decoded body.
 */
export interface AsyncMessage {
  readonly header: AsyncHeader
  readonly data: string
}

/**
 * Frame a command as a single wire line.
 *
 * @param text - Command text without terminator
 * @returns UTF-8 bytes of `text` followed by `\n`
 * @throws CommandFramingError if `text` contains a newline
 */
export function buildCommand(text: string): Buffer {
  if (text.includes(COMMAND_TERMINATOR)) {
    throw new CommandFramingError(text)
  }
  return Buffer.from(text + COMMAND_TERMINATOR, 'utf-8')
}

/**
 * Split received command bytes into complete lines.
 * Bytes after the last terminator are returned as `rest`.
 */
export function splitCommands(buffer: string): { commands: string[]; rest: string } {
  const parts = buffer.split(COMMAND_TERMINATOR)
  const rest = parts.pop() ?? ''
  return { commands: parts, rest }
}

/**
 * Decode a synchronous acknowledgement token.
 *
 * @param token - At least the first 3 bytes of the response
 * @returns `ACK`, or `NAC` when the caller must read {@link NACK_CODE_SIZE} more bytes
 * @throws MalformedHeaderError for any other value
 */
export function parseSimpleAck(token: Uint8Array): SimpleAckToken {
  const text = Buffer.from(token.subarray(0, SIMPLE_ACK_SIZE)).toString('latin1')
  if (text === 'ACK' || text === 'NAC') {
    return text
  }
  throw new MalformedHeaderError('simple_ack', 'expected ACK or NAC', text)
}

function parseDecimal(raw: string, field: string, start: number, end: number): number {
  const text = raw.slice(start, end)
  if (!/^\d+$/.test(text)) {
    throw new MalformedHeaderError('async_header', `${field} is not numeric`, raw)
  }
  return Number.parseInt(text, 10)
}

/**
 * Decode a 42-byte asynchronous header.
 *
 * @param bytes - Header bytes; only the first 42 are read
 * @throws MalformedHeaderError on short input, wrong sync marker, a non-numeric
 *   numeric field or a type length wider than the type field
 */
export function parseAsyncHeader(bytes: Uint8Array): AsyncHeader {
  if (bytes.length < ASYNC_HEADER_SIZE) {
    throw new MalformedHeaderError(
      'async_header',
      `expected ${ASYNC_HEADER_SIZE} bytes, got ${bytes.length}`,
      Buffer.from(bytes).toString('latin1')
    )
  }

  const raw = Buffer.from(bytes.subarray(0, ASYNC_HEADER_SIZE)).toString('latin1')
  const sync = raw.slice(0, 3)
  if (sync !== ASYNC_SYNC_MARKER) {
    throw new MalformedHeaderError('async_header', `sync marker is not ${ASYNC_SYNC_MARKER}`, raw)
  }

  const typeLength = parseDecimal(raw, 'typeLength', 7, 9)
  if (typeLength > ASYNC_TYPE_WIDTH) {
    throw new MalformedHeaderError(
      'async_header',
      `typeLength ${typeLength} exceeds ${ASYNC_TYPE_WIDTH}`,
      raw
    )
  }

  return {
    sync,
    headerLength: parseDecimal(raw, 'headerLength', 3, 5),
    majorVersion: parseDecimal(raw, 'majorVersion', 5, 6),
    minorVersion: parseDecimal(raw, 'minorVersion', 6, 7),
    typeLength,
    asyncType: raw.slice(9, 9 + typeLength),
    identifier: parseDecimal(raw, 'identifier', 24, 30),
    totalPackets: parseDecimal(raw, 'totalPackets', 30, 34),
    packetNumber: parseDecimal(raw, 'packetNumber', 34, 38),
    dataLength: parseDecimal(raw, 'dataLength', 38, 42),
    raw
  }
}

function padDecimal(value: number, width: number, field: string): string {
  const text = String(value)
  if (!Number.isInteger(value) || value < 0 || text.length > width) {
    throw new RangeError(`${field} ${value} does not fit in ${width} decimal digit(s)`)
  }
  return text.padStart(width, '0')
}

/**
 * Build a 42-byte asynchronous header.
 *
 * Defaults: header length 42, version 1.0, identifier 1, a single packet.
 *
 * @throws RangeError if a field does not fit its fixed width or the type is not ASCII
 */
export function encodeAsyncHeader(fields: AsyncHeaderFields): Buffer {
  const { asyncType } = fields
  if (asyncType.length > ASYNC_TYPE_WIDTH || !/^[\x20-\x7e]*$/.test(asyncType)) {
    throw new RangeError(`asyncType must be at most ${ASYNC_TYPE_WIDTH} printable ASCII characters`)
  }

  const header =
    ASYNC_SYNC_MARKER +
    padDecimal(fields.headerLength ?? ASYNC_HEADER_SIZE, 2, 'headerLength') +
    padDecimal(fields.majorVersion ?? 1, 1, 'majorVersion') +
    padDecimal(fields.minorVersion ?? 0, 1, 'minorVersion') +
    padDecimal(asyncType.length, 2, 'typeLength') +
    asyncType.padEnd(ASYNC_TYPE_WIDTH, ' ') +
    padDecimal(fields.identifier ?? 1, 6, 'identifier') +
    padDecimal(fields.totalPackets ?? 1, 4, 'totalPackets') +
    padDecimal(fields.packetNumber ?? 1, 4, 'packetNumber') +
    padDecimal(fields.dataLength, 4, 'dataLength')

  return Buffer.from(header, 'latin1')
}

/**
 * Decode a 40-byte synchronous header `"<name> <decimal length>"`.
 *
 * @throws MalformedHeaderError unless the header holds exactly a name and a decimal length
 */
export function parseSyncHeader(bytes: Uint8Array): SyncHeader {
  const raw = Buffer.from(bytes.subarray(0, SYNC_HEADER_SIZE)).toString('latin1')
  if (bytes.length < SYNC_HEADER_SIZE) {
    throw new MalformedHeaderError(
      'sync_header',
      `expected ${SYNC_HEADER_SIZE} bytes, got ${bytes.length}`,
      raw
    )
  }

  const parts = raw.replace(/\0+$/, '').trim().split(/\s+/)
  const [name, length] = parts
  if (parts.length !== 2 || name === '' || !/^\d+$/.test(length)) {
    throw new MalformedHeaderError('sync_header', 'expected "<name> <length>"', raw)
  }

  return { name, length: Number.parseInt(length, 10) }
}

/**
 * Build a 40-byte synchronous header.
 *
 * @throws RangeError if the name contains whitespace or the header does not fit
 */
export function encodeSyncHeader(name: string, length: number): Buffer {
  if (name === '' || /\s/.test(name)) {
    throw new RangeError('header name must be a non-empty token without whitespace')
  }
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`length ${length} must be a non-negative integer`)
  }
  const text = `${name} ${length}`
  if (text.length > SYNC_HEADER_SIZE) {
    throw new RangeError(`header "${text}" exceeds ${SYNC_HEADER_SIZE} bytes`)
  }
  return Buffer.from(text.padEnd(SYNC_HEADER_SIZE, ' '), 'latin1')
}

/**
 * Split a free-form report buffer into rows.
 *
 * Splits on the literal `marker`, drops the segment before the first marker,
 * and strips the fixed-width sub-header from every remaining segment.
 */
export function splitReportBuffer(
  buffer: string,
  marker: string = REPORT_RM_MARKER,
  prefixWidth: number = REPORT_ROW_PREFIX_SIZE
): string[] {
  return buffer
    .split(marker)
    .slice(1)
    .map((segment) => segment.slice(prefixWidth))
}
