/**
 * The console's diagnostic stream.
 *
 * A stream listener splits the child's stderr into lines and pushes them onto
 * a {@link LineQueue}; the launch loop polls that queue without blocking.
 *
 * @module
 */
import type { Readable } from 'node:stream'

/** Printed once the Connect socket is listening. */
export const READY_MARKER = 'STK/CON: Accepting connection requests'

/** Printed when no runtime license can be checked out. */
export const LICENSE_MARKER = 'STK Engine Runtime license not found'

/** Printed when the Connect socket cannot bind its port. */
export const BIND_ERROR_MARKER = 'STK/CON: Error binding to socket, error'

/**
 * What a diagnostic line says about the launch.
 */
export type DiagnosticKind = 'ready' | 'license-error' | 'bind-error' | 'other'

/**
 * Classify a line by the markers it contains. Failures take precedence over readiness.
 */
export function classifyDiagnosticLine(line: string): DiagnosticKind {
  if (line.includes(LICENSE_MARKER)) return 'license-error'
  if (line.includes(BIND_ERROR_MARKER)) return 'bind-error'
  if (line.includes(READY_MARKER)) return 'ready'
  return 'other'
}

/**
 * FIFO of complete lines read from a stream.
 *
 * Bytes are decoded as UTF-8 and split on `\n`; a trailing `\r` and other
 * trailing whitespace is trimmed. A partial last line is emitted when the
 * stream ends.
 */
export class LineQueue {
  private readonly lines: string[] = []
  private partial = ''
  private endedValue = false

  /**
   * Fill a new queue from `stream` until it ends.
   */
  static fromStream(stream: Readable): LineQueue {
    const queue = new LineQueue()
    stream.setEncoding('utf-8')
    stream.on('data', (chunk: string) => queue.push(chunk))
    stream.on('end', () => queue.end())
    stream.on('close', () => queue.end())
    return queue
  }

  /** True once the source stream has ended. */
  get ended(): boolean {
    return this.endedValue
  }

  get size(): number {
    return this.lines.length
  }

  /**
   * Append raw text; complete lines become available to {@link poll}.
   */
  push(text: string): void {
    const parts = (this.partial + text).split('\n')
    this.partial = parts.pop() ?? ''
    for (const part of parts) {
      this.lines.push(part.trimEnd())
    }
  }

  /**
   * Mark the source ended, flushing any partial line.
   */
  end(): void {
    if (this.endedValue) return
    this.endedValue = true
    if (this.partial !== '') {
      this.lines.push(this.partial.trimEnd())
      this.partial = ''
    }
  }

  /**
   * Next line, or undefined when none is waiting.
   */
  poll(): string | undefined {
    return this.lines.shift()
  }

  /**
   * Remove and return every waiting line.
   */
  drain(): string[] {
    return this.lines.splice(0, this.lines.length)
  }
}
