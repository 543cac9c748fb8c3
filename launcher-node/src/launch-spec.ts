/**
 * Console command lines per platform.
 *
 * @module
 */
import { posix, win32 } from 'node:path'
import { LaunchError } from './errors.js'
import type { LaunchSpec } from './supervisor.js'

/** Port the desktop application always listens on. */
export const DESKTOP_PORT = 5001

export interface LaunchConfig {
  readonly installDir: string
  readonly configDir: string
  readonly port: number
  /** License vendor id, needed by some Linux installs */
  readonly vendorId?: string
  /** Defaults to `process.platform` */
  readonly platform?: NodeJS.Platform
  /** Base environment; defaults to `process.env` */
  readonly env?: NodeJS.ProcessEnv
}

/**
 * Build the launch spec for this platform.
 *
 * Linux runs the headless `connectconsole` on the requested port with
 * readiness monitoring. Windows runs the desktop application, which always
 * listens on {@link DESKTOP_PORT} and prints no readiness markers.
 *
 * @throws LaunchError on any other platform
 */
export function buildLaunchSpec(config: LaunchConfig): LaunchSpec {
  const platform = config.platform ?? process.platform
  const env = config.env ?? process.env

  switch (platform) {
    case 'linux': {
      const binDir = posix.join(config.installDir, 'bin')
      const command = posix.join(binDir, 'connectconsole')
      const args = ['--port', String(config.port), '--noGraphics']
      if (config.vendorId !== undefined && config.vendorId !== '') {
        args.push('--vendorid', config.vendorId)
      }
      const libraryPath = env.LD_LIBRARY_PATH
      return {
        command,
        args,
        env: {
          ...env,
          STK_INSTALL_DIR: config.installDir,
          STK_CONFIG_DIR: config.configDir,
          LD_LIBRARY_PATH: libraryPath ? `${binDir}:${libraryPath}` : binDir
        },
        port: config.port,
        monitorReadiness: true
      }
    }
    case 'win32':
      return {
        command: win32.join(config.installDir, 'bin', 'AgUiApplication.exe'),
        args: ['/pers', 'STK'],
        env: { ...env },
        port: DESKTOP_PORT,
        monitorReadiness: false
      }
    default:
      throw new LaunchError(`Launching the console is not supported on ${platform}`, '', 0)
  }
}
