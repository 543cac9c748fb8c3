/**
 * Command-line parsing for `stk-connect`.
 *
 * Extracted from the CLI entrypoint so it can be tested
 * without triggering main() side-effects.
 *
 * @module
 */
import { parseArgs } from 'node:util'
import type { ReportParams } from '@stk-connect/client'
import type { SessionOptions } from './session.js'

export const USAGE = `Usage:
  stk-connect [options] send <command>
  stk-connect [options] report-rm <objectPath> <style> [report options]

Options:
  --host <host>              Connect host (default localhost)
  --port <port>              Connect port (default 5001)
  --async                    Use asynchronous framing
  --no-ack                   Turn acknowledgements off
  --connect-attempts <n>     Socket connect attempts (default 5)
  --send-attempts <n>        Attempts per command on NACK (default 1)
  --timeout <seconds>        Idle timeout for report reads (default 1)
  --launch                   Launch the console before connecting
  --install-dir <dir>        Console install directory
  --config-dir <dir>         Console configuration directory
  --vendor-id <id>           License vendor id
  --verbose                  Write debug diagnostics to stderr
  -h, --help                 Show this help

Report options:
  --time-period <value>  --time-step <value>  --access-object <path>
  --additional-data <value>  --summary <value>  --all-lines <value>
`

/**
 * Invalid command line. The CLI exits with code 3.
 */
export class CliArgsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliArgsError'
  }
}

export interface CliSettings extends SessionOptions {
  readonly launch: boolean
  readonly verbose: boolean
}

export type CliCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'send'; readonly command: string; readonly settings: CliSettings }
  | { readonly kind: 'report-rm'; readonly report: ReportParams; readonly settings: CliSettings }

const OPTIONS = {
  host: { type: 'string' },
  port: { type: 'string' },
  async: { type: 'boolean' },
  'no-ack': { type: 'boolean' },
  'connect-attempts': { type: 'string' },
  'send-attempts': { type: 'string' },
  timeout: { type: 'string' },
  launch: { type: 'boolean' },
  'install-dir': { type: 'string' },
  'config-dir': { type: 'string' },
  'vendor-id': { type: 'string' },
  verbose: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
  'time-period': { type: 'string' },
  'time-step': { type: 'string' },
  'access-object': { type: 'string' },
  'additional-data': { type: 'string' },
  summary: { type: 'string' },
  'all-lines': { type: 'string' }
} as const

const REPORT_ONLY = [
  'time-period',
  'time-step',
  'access-object',
  'additional-data',
  'summary',
  'all-lines'
] as const

function integerOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  if (!/^\d+$/.test(value)) {
    throw new CliArgsError(`--${name} must be a non-negative integer, got "${value}"`)
  }
  return Number.parseInt(value, 10)
}

function secondsOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const seconds = Number(value)
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new CliArgsError(`--${name} must be a non-negative number of seconds, got "${value}"`)
  }
  return Math.round(seconds * 1000)
}

function parseStrict(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true })
  } catch (err) {
    throw new CliArgsError(err instanceof Error ? err.message : String(err))
  }
}

/**
 * Parse `argv` (without the node and script entries).
 *
 * @throws CliArgsError on unknown options, missing operands or malformed numbers
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = parseStrict(argv)
  if (values.help === true) {
    return { kind: 'help' }
  }

  const settings: CliSettings = {
    host: values.host,
    port: integerOption('port', values.port),
    mode: values.async === true ? 'async' : undefined,
    ack: values['no-ack'] === true ? false : undefined,
    connectAttempts: integerOption('connect-attempts', values['connect-attempts']),
    sendAttempts: integerOption('send-attempts', values['send-attempts']),
    timeoutMs: secondsOption('timeout', values.timeout),
    installDir: values['install-dir'],
    configDir: values['config-dir'],
    vendorId: values['vendor-id'],
    launch: values.launch === true,
    verbose: values.verbose === true
  }

  const [subcommand, ...operands] = positionals
  if (subcommand === undefined) {
    throw new CliArgsError('missing subcommand')
  }
  switch (subcommand) {
    case 'send': {
      const command = operands.join(' ')
      if (command === '') {
        throw new CliArgsError('send requires a command')
      }
      const stray = REPORT_ONLY.find((name) => values[name] !== undefined)
      if (stray !== undefined) {
        throw new CliArgsError(`--${stray} only applies to report-rm`)
      }
      return { kind: 'send', command, settings }
    }
    case 'report-rm': {
      const [objectPath, style, ...extra] = operands
      if (objectPath === undefined || style === undefined) {
        throw new CliArgsError('report-rm requires <objectPath> <style>')
      }
      if (extra.length > 0) {
        throw new CliArgsError(`unexpected operand "${extra[0]}"`)
      }
      return {
        kind: 'report-rm',
        report: {
          objectPath,
          style,
          timePeriod: values['time-period'],
          timeStep: values['time-step'],
          accessObjectPath: values['access-object'],
          additionalData: values['additional-data'],
          summary: values.summary,
          allLines: values['all-lines']
        },
        settings
      }
    }
    default:
      throw new CliArgsError(`unknown subcommand "${subcommand}"`)
  }
}
