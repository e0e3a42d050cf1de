import os from 'node:os'
import path from 'node:path'
import { describe, expect, it } from 'vitest'
import { buildAcademyConfigFromEnv } from './config.js'

describe('buildAcademyConfigFromEnv', () => {
    it('falls back to defaults under the home directory', () => {
        const cfg = buildAcademyConfigFromEnv({})
        const dataDir = path.join(os.homedir(), 'RigData')
        expect(cfg.dataDir).toBe(dataDir)
        expect(cfg.configFile).toBe(path.join(dataDir, 'Academy', 'AcademyConfig.csv'))
        expect(cfg.logDir).toBe(path.join(dataDir, 'Academy', 'logs'))
        expect(cfg.engine).toEqual({
            command: 'rig-engine',
            args: [],
            readyMarker: 'engine ready',
            startTimeoutMs: 30_000,
            stopGraceMs: 10_000,
        })
        expect(cfg.watcher).toEqual({ pollIntervalMs: 500, completeMarker: 'protocol complete', failedMarker: 'protocol failed' })
        expect(cfg.ws).toEqual({ maxBufferedBytes: 1024 * 1024, resyncCheckMs: 1000, localAddresses: [], logsSnapshot: 200 })
        expect(cfg.serial.manufacturerHint).toBe('duino')
        expect(cfg.relay).toEqual({ path: null, baudRate: 9600, ackTimeoutMs: 10_000 })
    })

    it('reads overrides and clamps out-of-range numbers', () => {
        const cfg = buildAcademyConfigFromEnv({
            RIG_DATA_DIR: '/srv/rigs',
            ENGINE_COMMAND: ' /opt/engine/bin/run ',
            ENGINE_ARGS: '--headless  --quiet',
            ENGINE_START_TIMEOUT_MS: '5',
            WATCHER_POLL_MS: 'soon',
            ACADEMY_LOCAL_ADDRESSES: '10.0.0.7, 10.0.0.8,',
            SERIAL_PORT_MANUFACTURER_HINT: '',
            SYNC_RELAY_PATH: ' EMU ',
            SYNC_RELAY_BAUD: '115200',
        })
        expect(cfg.configFile).toBe(path.join('/srv/rigs', 'Academy', 'AcademyConfig.csv'))
        expect(cfg.engine.command).toBe('/opt/engine/bin/run')
        expect(cfg.engine.args).toEqual(['--headless', '--quiet'])
        expect(cfg.engine.startTimeoutMs).toBe(100)
        expect(cfg.watcher.pollIntervalMs).toBe(500)
        expect(cfg.ws.localAddresses).toEqual(['10.0.0.7', '10.0.0.8'])
        expect(cfg.serial.manufacturerHint).toBe('')
        expect(cfg.relay.path).toBe('EMU')
        expect(cfg.relay.baudRate).toBe(115200)
    })
})
