/**
 * Stand-in for the simulation console, run by tests through tsx.
 *
 * Args: --port <p> --behaviour ready|license|exit|silent [--bind-below <n>] [--listen]
 *
 * - ready: prints the readiness marker (after listening, with --listen);
 *   ports below --bind-below print the bind failure instead
 * - license: prints the license failure
 * - exit: prints a line and exits with code 2
 * - silent: prints nothing
 *
 * With --listen the fixture serves the synchronous Connect discipline on
 * 127.0.0.1: `ACK` for every command, `NAC1` for commands starting with
 * `Fail` (after a diagnostic line on stderr).
 *
 * Stays alive until killed.
 */
import { createServer } from 'node:net'
import { parseArgs } from 'node:util'

const { values } = parseArgs({
  options: {
    port: { type: 'string' },
    behaviour: { type: 'string' },
    'bind-below': { type: 'string' },
    listen: { type: 'boolean' }
  }
})

const port = Number(values.port ?? '0')
const bindBelow = Number(values['bind-below'] ?? '0')

function log(line: string): void {
  process.stderr.write(`${line}\n`)
}

function serve(): void {
  const server = createServer((socket) => {
    let pending = ''
    socket.on('error', () => socket.destroy())
    socket.on('data', (chunk: Buffer) => {
      const lines = (pending + chunk.toString('utf-8')).split('\n')
      pending = lines.pop() ?? ''
      for (const command of lines) {
        if (command.startsWith('Fail')) {
          log(`STK/CON: Error processing command: ${command}`)
          setTimeout(() => socket.write('NAC1'), 100)
        } else {
          socket.write('ACK')
        }
      }
    })
  })
  server.listen(port, '127.0.0.1', () => log('STK/CON: Accepting connection requests'))
}

log('Loading plugins')

switch (values.behaviour) {
  case 'ready':
    if (port < bindBelow) {
      log('STK/CON: Error binding to socket, error = 98')
    } else if (values.listen === true) {
      serve()
    } else {
      log('STK/CON: Accepting connection requests')
    }
    break
  case 'license':
    log('STK Engine Runtime license not found')
    break
  case 'exit':
    log('fatal: cannot load engine')
    process.exit(2)
    break
  default:
    break
}

setInterval(() => {}, 1_000)
