#!/usr/bin/env -S node --import tsx
/**
 * CLI entrypoint for stk-connect.
 *
 * Usage:
 *   stk-connect [options] send <command>
 *   stk-connect [options] report-rm <objectPath> <style> [report options]
 *
 * Environment (overridden by options):
 * - STK_CONNECT_HOST, STK_CONNECT_PORT
 * - STK_CONNECT_ASYNC (1 or true selects asynchronous framing)
 * - STK_CONNECT_LOG (debug | info | warn | error)
 *
 * Report rows are written to stdout, one per line.
 * Stderr is used for diagnostics.
 *
 * Exit codes:
 * - 0: Command acknowledged (or sent, with acknowledgements off)
 * - 1: Protocol failure (connect, NACK, desync, launch)
 * - 3: Invalid arguments or options
 *
 * @module
 */
import { ConfigError } from '@stk-connect/client'
import { CliArgsError, type CliCommand, parseCliArgs, USAGE } from '../cli-args.js'
import { parseSessionEnv } from '../config.js'
import { Session } from '../session.js'
import { createStderrObserver } from '../stderr-observer.js'

/**
 * Write an error message to stderr and exit with code 3 (invalid input).
 */
function fatalError(message: string): never {
  process.stderr.write(`Error: ${message}\n`)
  process.stderr.write(USAGE)
  process.exit(3)
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Run the parsed command against a session. Returns the exit code.
 */
async function run(command: Exclude<CliCommand, { kind: 'help' }>): Promise<number> {
  const env = parseSessionEnv(process.env, (msg) => process.stderr.write(`Warning: ${msg}\n`))
  const { settings } = command
  const observer = createStderrObserver({
    level: settings.verbose ? 'debug' : (env.logLevel ?? 'warn')
  })

  let session: Session
  try {
    session = new Session({
      ...settings,
      host: settings.host ?? env.host,
      port: settings.port ?? env.port,
      mode: settings.mode ?? env.mode,
      observer
    })
  } catch (err) {
    if (err instanceof ConfigError) {
      fatalError(err.message)
    }
    throw err
  }

  try {
    if (settings.launch) {
      await session.launch()
    }
    await session.connect()

    switch (command.kind) {
      case 'send':
        await session.send(command.command)
        break
      case 'report-rm':
        for (const row of await session.reportReturning(command.report)) {
          process.stdout.write(`${row}\n`)
        }
        break
    }
    return 0
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return 1
  } finally {
    await session.close()
  }
}

/**
 * Main entry point.
 */
async function main(): Promise<never> {
  let command: CliCommand
  try {
    command = parseCliArgs(process.argv.slice(2))
  } catch (err) {
    if (err instanceof CliArgsError) {
      fatalError(err.message)
    }
    throw err
  }

  if (command.kind === 'help') {
    process.stdout.write(USAGE)
    process.exit(0)
  }

  process.exit(await run(command))
}

main().catch((err: unknown) => {
  process.stderr.write(`Error: ${errorMessage(err)}\n`)
  process.exit(1)
})
