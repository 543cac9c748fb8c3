/**
 * Observer that records every event for later inspection.
 */
import type { ConnectEvent, ConnectEventType, ConnectObserver } from '../../src/observer.js'

export class RecordingObserver implements ConnectObserver {
  readonly events: ConnectEvent[] = []

  observe(event: ConnectEvent): void {
    this.events.push(event)
  }

  /** Event types in order. */
  types(): ConnectEventType[] {
    return this.events.map((event) => event.type)
  }

  ofType<T extends ConnectEventType>(type: T): Extract<ConnectEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<ConnectEvent, { type: T }> => event.type === type)
  }
}
