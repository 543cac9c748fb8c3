import { describe, expect, it } from 'vitest'
import { LaunchError } from '../src/errors.js'
import { buildLaunchSpec } from '../src/launch-spec.js'

describe('buildLaunchSpec', () => {
  describe('linux', () => {
    it('runs the headless console on the requested port', () => {
      const spec = buildLaunchSpec({
        platform: 'linux',
        installDir: '/opt/stk',
        configDir: '/home/sim/STK',
        port: 6001,
        env: { PATH: '/usr/bin' }
      })

      expect(spec).toEqual({
        command: '/opt/stk/bin/connectconsole',
        args: ['--port', '6001', '--noGraphics'],
        env: {
          PATH: '/usr/bin',
          STK_INSTALL_DIR: '/opt/stk',
          STK_CONFIG_DIR: '/home/sim/STK',
          LD_LIBRARY_PATH: '/opt/stk/bin'
        },
        port: 6001,
        monitorReadiness: true
      })
    })

    it('passes the vendor id', () => {
      const spec = buildLaunchSpec({
        platform: 'linux',
        installDir: '/opt/stk',
        configDir: '/home/sim/STK',
        port: 5001,
        vendorId: 'TEST-VENDOR',
        env: {}
      })

      expect(spec.args).toEqual(['--port', '5001', '--noGraphics', '--vendorid', 'TEST-VENDOR'])
    })

    it('prefixes an existing library path', () => {
      const spec = buildLaunchSpec({
        platform: 'linux',
        installDir: '/opt/stk',
        configDir: '/home/sim/STK',
        port: 5001,
        env: { LD_LIBRARY_PATH: '/usr/local/lib' }
      })

      expect(spec.env.LD_LIBRARY_PATH).toBe('/opt/stk/bin:/usr/local/lib')
    })
  })

  describe('windows', () => {
    it('runs the desktop application on its fixed port without monitoring', () => {
      const spec = buildLaunchSpec({
        platform: 'win32',
        installDir: 'C:\\Program Files\\AGI\\STK 12',
        configDir: 'C:\\Users\\sim\\STK',
        port: 6001,
        env: {}
      })

      expect(spec).toEqual({
        command: 'C:\\Program Files\\AGI\\STK 12\\bin\\AgUiApplication.exe',
        args: ['/pers', 'STK'],
        env: {},
        port: 5001,
        monitorReadiness: false
      })
    })
  })

  it('rejects other platforms', () => {
    expect(() =>
      buildLaunchSpec({ platform: 'darwin', installDir: '/opt/stk', configDir: '/tmp', port: 5001 })
    ).toThrow(LaunchError)
  })
})
