/**
 * Locating the console install and configuration directories.
 *
 * Order: explicit option, then `STK_INSTALL_DIR` / `STK_CONFIG_DIR`, then
 * the platform defaults.
 *
 * @module
 */
import { statSync } from 'node:fs'
import { homedir } from 'node:os'
import { posix, win32 } from 'node:path'
import { InstallDirNotFoundError } from './errors.js'

export interface DirectoryOptions {
  /** Explicit directory; wins over everything else */
  readonly dir?: string
  /** Defaults to `process.env` */
  readonly env?: NodeJS.ProcessEnv
  /** Defaults to `process.platform` */
  readonly platform?: NodeJS.Platform
  /** Defaults to `os.homedir()` */
  readonly homeDir?: string
  /** File check; defaults to a stat check */
  readonly isFile?: (path: string) => boolean
}

const WINDOWS_VERSIONS = ['STK 12', 'STK 11', 'STK 10']

function fileExists(path: string): boolean {
  try {
    return statSync(path).isFile()
  } catch {
    return false
  }
}

function pathApi(platform: NodeJS.Platform): typeof posix {
  return platform === 'win32' ? win32 : posix
}

function expandHome(path: string, homeDir: string, platform: NodeJS.Platform): string {
  const api = pathApi(platform)
  if (path === '~') return homeDir
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return api.join(homeDir, path.slice(2))
  }
  return api.resolve(path)
}

/**
 * Resolve the install directory holding `bin/connectconsole` (Linux) or
 * `bin\AgUiApplication.exe` (Windows).
 *
 * An explicit or environment directory is returned without probing.
 *
 * @throws InstallDirNotFoundError when no default location holds the console
 */
export function resolveInstallDir(options: DirectoryOptions = {}): string {
  const platform = options.platform ?? process.platform
  const env = options.env ?? process.env
  const homeDir = options.homeDir ?? homedir()
  const isFile = options.isFile ?? fileExists

  const configured = options.dir ?? env.STK_INSTALL_DIR
  if (configured !== undefined && configured !== '') {
    return expandHome(configured, homeDir, platform)
  }

  const candidates: { dir: string; binary: string }[] = []
  if (platform === 'win32') {
    const programFiles = env.PROGRAMFILES ?? 'C:\\Program Files'
    for (const version of WINDOWS_VERSIONS) {
      const dir = win32.join(programFiles, 'AGI', version)
      candidates.push({ dir, binary: win32.join(dir, 'bin', 'AgUiApplication.exe') })
    }
  } else {
    const dir = posix.join(homeDir, 'stk')
    candidates.push({ dir, binary: posix.join(dir, 'bin', 'connectconsole') })
  }

  const found = candidates.find((candidate) => isFile(candidate.binary))
  if (found === undefined) {
    throw new InstallDirNotFoundError(candidates.map((candidate) => candidate.dir))
  }
  return found.dir
}

/**
 * Resolve the configuration directory (default `~/STK`).
 */
export function resolveConfigDir(options: DirectoryOptions = {}): string {
  const platform = options.platform ?? process.platform
  const env = options.env ?? process.env
  const homeDir = options.homeDir ?? homedir()

  const configured = options.dir ?? env.STK_CONFIG_DIR
  if (configured !== undefined && configured !== '') {
    return expandHome(configured, homeDir, platform)
  }
  return pathApi(platform).join(homeDir, 'STK')
}
