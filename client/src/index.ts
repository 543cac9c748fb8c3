/**
 * stk-connect client
 *
 * Drives the simulation application's Connect command socket: framing,
 * connect-with-retry transport, and the synchronous and asynchronous
 * acknowledgement disciplines.
 *
 * @packageDocumentation
 */

// Clients
export {
  ACK_OFF_COMMAND,
  ASYNC_ON_COMMAND,
  type AckOutcome,
  type AnyConnectClient,
  AsyncConnectClient,
  ConnectClient,
  type ConnectClientDeps,
  createConnectClient,
  type ReadOptions,
  reassembleMessageGroup,
  type SendOptions,
  SyncConnectClient,
  withConnection
} from './client/index.js'

// Configuration
export {
  type ClientConfig,
  type ClientOptions,
  type ConnectMode,
  DEFAULT_CONNECT_ATTEMPTS,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_SEND_ATTEMPTS,
  DEFAULT_TIMEOUT_MS,
  type Endpoint,
  resolveClientConfig,
  validatePort
} from './config.js'

// Errors
export {
  CommandFramingError,
  ConfigError,
  ConnectError,
  ConnectionClosedError,
  type ConnectionState,
  ConnectionStateError,
  type FrameKind,
  MalformedHeaderError,
  NackError
} from './errors.js'

// Observer
export {
  type ConnectEvent,
  type ConnectEventType,
  type ConnectObserver,
  eventLevel,
  formatEvent,
  type LogLevel,
  noopObserver
} from './observer.js'

// Transport (re-export for advanced usage)
export {
  type DialFn,
  dialSocket,
  isConnectionRefused,
  SocketTransport,
  type TransportConnectOptions
} from './transport/index.js'

// Wire
export * from './wire/index.js'
