export {
  type DialFn,
  dialSocket,
  isConnectionRefused,
  SocketTransport,
  type TransportConnectOptions
} from './socket-transport.js'
