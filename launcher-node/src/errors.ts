/**
 * Launch-time failures of the simulation console.
 *
 * Detected from the child's diagnostic stream or its exit. Only a bind
 * failure is retried (on a shifted port); everything else propagates.
 *
 * @module
 */

/**
 * The console reported that no runtime license is available. Never retried.
 */
export class LicenseError extends Error {
  constructor(public readonly line: string) {
    super(`Simulation engine license not found: ${line}`)
    this.name = 'LicenseError'
  }
}

/**
 * The console could not bind its Connect socket to the requested port.
 */
export class BindError extends Error {
  constructor(
    public readonly port: number,
    public readonly line: string
  ) {
    super(`Console could not bind to port ${port}`)
    this.name = 'BindError'
  }
}

/**
 * The console exited, never became ready, or the launch budget ran out.
 */
export class LaunchError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    /** Attempts made before giving up */
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(message)
    this.name = 'LaunchError'
    this.cause = cause
  }
}

/**
 * No install directory was given and none of the platform defaults holds the console.
 */
export class InstallDirNotFoundError extends Error {
  constructor(public readonly searched: readonly string[]) {
    super(
      `Install directory not provided as an option or STK_INSTALL_DIR, and not found in: ${searched.join(', ')}`
    )
    this.name = 'InstallDirNotFoundError'
  }
}
