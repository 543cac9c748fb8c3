export { ASYNC_ON_COMMAND, AsyncConnectClient } from './async-client.js'
export {
  ACK_OFF_COMMAND,
  type AckOutcome,
  ConnectClient,
  type ConnectClientDeps,
  type ReadOptions,
  type SendOptions,
  withConnection
} from './connect-client.js'
export { type AnyConnectClient, createConnectClient } from './create-client.js'
export { reassembleMessageGroup } from './message-group.js'
export { SyncConnectClient } from './sync-client.js'
