import { describe, expect, it } from 'vitest'
import { CommandFramingError, MalformedHeaderError } from '../../src/errors.js'
import {
  ASYNC_HEADER_SIZE,
  buildCommand,
  encodeAsyncHeader,
  encodeSyncHeader,
  parseAsyncHeader,
  parseSimpleAck,
  parseSyncHeader,
  REPORT_RM_MARKER,
  REPORT_ROW_PREFIX_SIZE,
  SYNC_HEADER_SIZE,
  splitCommands,
  splitReportBuffer
} from '../../src/wire/frame.js'

describe('buildCommand', () => {
  it('appends a single newline', () => {
    expect(buildCommand('Unload / *').toString('utf-8')).toBe('Unload / *\n')
  })

  it('encodes as UTF-8', () => {
    expect(buildCommand('Rename */Place/Zürich')).toEqual(
      Buffer.from('Rename */Place/Zürich\n', 'utf-8')
    )
  })

  it('rejects an embedded newline', () => {
    expect(() => buildCommand('Unload / *\nNew / Scenario')).toThrow(CommandFramingError)
  })
})

describe('splitCommands', () => {
  it('returns complete lines and the unterminated rest', () => {
    expect(splitCommands('a\nb\nc')).toEqual({ commands: ['a', 'b'], rest: 'c' })
  })

  it('returns an empty rest when the buffer ends on a terminator', () => {
    expect(splitCommands('a\n')).toEqual({ commands: ['a'], rest: '' })
  })
})

describe('parseSimpleAck', () => {
  it('recognises ACK', () => {
    expect(parseSimpleAck(Buffer.from('ACK'))).toBe('ACK')
  })

  it('recognises the NAC prefix', () => {
    expect(parseSimpleAck(Buffer.from('NAC'))).toBe('NAC')
  })

  it('only looks at the first 3 bytes', () => {
    expect(parseSimpleAck(Buffer.from('NAC1'))).toBe('NAC')
  })

  it('rejects anything else', () => {
    try {
      parseSimpleAck(Buffer.from('XYZ'))
      expect.fail('Expected MalformedHeaderError')
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedHeaderError)
      expect(err).toMatchObject({ frame: 'simple_ack', raw: 'XYZ' })
    }
  })
})

describe('encodeAsyncHeader', () => {
  it('builds a 42-byte ACK header with defaults', () => {
    const header = encodeAsyncHeader({ asyncType: 'ACK', dataLength: 0 })

    expect(header.length).toBe(ASYNC_HEADER_SIZE)
    expect(header.toString('latin1')).toBe('AGI421003ACK            000001000100010000')
  })

  it('zero-pads every numeric field', () => {
    const header = encodeAsyncHeader({
      asyncType: 'REPORT_RM',
      identifier: 42,
      totalPackets: 3,
      packetNumber: 2,
      dataLength: 120
    })

    expect(header.toString('latin1')).toBe('AGI421009REPORT_RM      000042000300020120')
  })

  it('produces the report marker as its first 24 bytes', () => {
    const header = encodeAsyncHeader({ asyncType: 'REPORT_RM', dataLength: 5 })
    expect(header.subarray(0, 24).toString('latin1')).toBe(REPORT_RM_MARKER)
  })

  it('rejects a type wider than 15 characters', () => {
    expect(() => encodeAsyncHeader({ asyncType: 'X'.repeat(16), dataLength: 0 })).toThrow(RangeError)
  })

  it('rejects a data length that does not fit 4 digits', () => {
    expect(() => encodeAsyncHeader({ asyncType: 'ACK', dataLength: 10_000 })).toThrow(
      'dataLength 10000 does not fit in 4 decimal digit(s)'
    )
  })
})

describe('parseAsyncHeader', () => {
  it('decodes every field of an ACK header', () => {
    const header = parseAsyncHeader(Buffer.from('AGI421003ACK            000001000100010000'))

    expect(header).toEqual({
      sync: 'AGI',
      headerLength: 42,
      majorVersion: 1,
      minorVersion: 0,
      typeLength: 3,
      asyncType: 'ACK',
      identifier: 1,
      totalPackets: 1,
      packetNumber: 1,
      dataLength: 0,
      raw: 'AGI421003ACK            000001000100010000'
    })
  })

  it('takes only typeLength characters of the padded type field', () => {
    const header = parseAsyncHeader(Buffer.from('AGI421004NACK           000007000100010002'))

    expect(header.asyncType).toBe('NACK')
    expect(header.identifier).toBe(7)
    expect(header.dataLength).toBe(2)
  })

  it('reads only the first 42 bytes', () => {
    const bytes = Buffer.concat([encodeAsyncHeader({ asyncType: 'ACK', dataLength: 3 }), Buffer.from('abc')])
    expect(parseAsyncHeader(bytes).dataLength).toBe(3)
  })

  it('rejects a wrong sync marker', () => {
    expect(() => parseAsyncHeader(Buffer.from('XYZ421003ACK            000001000100010000'))).toThrow(
      'sync marker is not AGI'
    )
  })

  it('rejects a non-numeric field', () => {
    expect(() => parseAsyncHeader(Buffer.from('AGI421003ACK            0000010001000100ab'))).toThrow(
      'dataLength is not numeric'
    )
  })

  it('rejects a type length wider than the type field', () => {
    const raw = `AGI421016${'X'.repeat(15)}000001000100010000`
    expect(() => parseAsyncHeader(Buffer.from(raw))).toThrow('typeLength 16 exceeds 15')
  })

  it('rejects short input', () => {
    expect(() => parseAsyncHeader(Buffer.from('AGI42100001ACK     000001000100010000'))).toThrow(
      'expected 42 bytes, got 37'
    )
  })
})

describe('sync header', () => {
  it('pads "<name> <length>" to 40 bytes', () => {
    const header = encodeSyncHeader('GetTime', 27)

    expect(header.length).toBe(SYNC_HEADER_SIZE)
    expect(header.toString('latin1')).toBe('GetTime 27'.padEnd(40, ' '))
  })

  it('parses name and length', () => {
    expect(parseSyncHeader(encodeSyncHeader('GetTime', 27))).toEqual({ name: 'GetTime', length: 27 })
  })

  it('tolerates NUL padding', () => {
    const raw = Buffer.from('AllInstanceNames 12'.padEnd(40, '\0'), 'latin1')
    expect(parseSyncHeader(raw)).toEqual({ name: 'AllInstanceNames', length: 12 })
  })

  it('rejects a header without a decimal length', () => {
    expect(() => parseSyncHeader(Buffer.from('GetTime abc'.padEnd(40, ' ')))).toThrow(
      MalformedHeaderError
    )
  })

  it('rejects a name with whitespace when encoding', () => {
    expect(() => encodeSyncHeader('Get Time', 1)).toThrow(RangeError)
  })
})

describe('splitReportBuffer', () => {
  it('drops the pre-marker segment and each 18-byte sub-header', () => {
    const buffer =
      'junk' +
      REPORT_RM_MARKER +
      '000001000200010005' +
      'row-1' +
      REPORT_RM_MARKER +
      '000001000200020005' +
      'row-2'

    expect(splitReportBuffer(buffer)).toEqual(['row-1', 'row-2'])
  })

  it('returns no rows for an empty buffer', () => {
    expect(splitReportBuffer('')).toEqual([])
  })

  it('uses the default sub-header width of 18', () => {
    expect(REPORT_ROW_PREFIX_SIZE).toBe(18)
  })

  it('accepts a custom marker and prefix width', () => {
    expect(splitReportBuffer('x|ab1|cd2', '|', 2)).toEqual(['1', '2'])
  })
})
