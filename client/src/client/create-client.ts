/**
 * Variant selection.
 *
 * The framing variant is a closed set chosen once, at construction, from the
 * `mode` tag. Nothing downstream inspects which variant it holds; behaviour
 * that differs lives in the variant's own methods.
 *
 * @module
 */
import type { ClientOptions } from '../config.js'
import { ConfigError } from '../errors.js'
import { AsyncConnectClient } from './async-client.js'
import type { ConnectClientDeps } from './connect-client.js'
import { SyncConnectClient } from './sync-client.js'

/**
 * Either framing variant.
 */
export type AnyConnectClient = SyncConnectClient | AsyncConnectClient

/**
 * Construct the client variant named by `options.mode` (default `sync`).
 * Does not connect.
 *
 * @throws ConfigError if an option is invalid
 */
export function createConnectClient(
  options: ClientOptions & { readonly mode: 'async' },
  deps?: ConnectClientDeps
): AsyncConnectClient
export function createConnectClient(
  options?: ClientOptions & { readonly mode?: 'sync' },
  deps?: ConnectClientDeps
): SyncConnectClient
export function createConnectClient(options?: ClientOptions, deps?: ConnectClientDeps): AnyConnectClient
export function createConnectClient(
  options: ClientOptions = {},
  deps: ConnectClientDeps = {}
): AnyConnectClient {
  const { mode = 'sync', ...rest } = options
  switch (mode) {
    case 'sync':
      return new SyncConnectClient(rest, deps)
    case 'async':
      return new AsyncConnectClient(rest, deps)
    default:
      throw new ConfigError('mode', `must be "sync" or "async", got "${String(mode)}"`)
  }
}
