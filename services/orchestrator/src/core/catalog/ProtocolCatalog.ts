// services/orchestrator/src/core/catalog/ProtocolCatalog.ts
import fs from 'node:fs/promises'
import path from 'node:path'
import type { CalibrationStatus } from '@rig-academy/protocol'

/**
 * Read-only view of the rig data directory:
 *
 *   <dataDir>/Protocols/<protocol>/<protocol>.m
 *   <dataDir>/Data/<subject>/<protocol>/
 *   <dataDir>/Data/<subject>/<protocol>/Session Settings/<settings>.mat
 *   <dataDir>/Calibration Files/LiquidCalibration_<boxId>.mat
 */
export interface ProtocolCatalog {
    hasProtocol(protocol: string): Promise<boolean>
    hasSubject(subject: string, protocol: string): Promise<boolean>
    hasSettings(subject: string, protocol: string, settingsFile: string): Promise<boolean>
    calibrationStatus(boxId: string): Promise<CalibrationStatus>
}

export const DEFAULT_SETTINGS_FILE = 'DefaultSettings'

/** A single path segment: no separators, no traversal. */
export function isSafeName(name: string): boolean {
    if (!name || name.trim() !== name) return false
    if (name === '.' || name.includes('..')) return false
    return !/[\\/\0]/.test(name)
}

async function exists(p: string, kind: 'file' | 'dir'): Promise<boolean> {
    try {
        const st = await fs.stat(p)
        return kind === 'file' ? st.isFile() : st.isDirectory()
    } catch {
        return false
    }
}

export class FileProtocolCatalog implements ProtocolCatalog {
    constructor(private readonly dataDir: string) {}

    async hasProtocol(protocol: string): Promise<boolean> {
        if (!isSafeName(protocol)) return false
        return exists(path.join(this.dataDir, 'Protocols', protocol, `${protocol}.m`), 'file')
    }

    async hasSubject(subject: string, protocol: string): Promise<boolean> {
        if (!isSafeName(subject) || !isSafeName(protocol)) return false
        return exists(path.join(this.dataDir, 'Data', subject, protocol), 'dir')
    }

    async hasSettings(subject: string, protocol: string, settingsFile: string): Promise<boolean> {
        if (!isSafeName(subject) || !isSafeName(protocol) || !isSafeName(settingsFile)) return false
        const file = settingsFile.endsWith('.mat') ? settingsFile : `${settingsFile}.mat`
        return exists(path.join(this.dataDir, 'Data', subject, protocol, 'Session Settings', file), 'file')
    }

    async calibrationStatus(boxId: string): Promise<CalibrationStatus> {
        if (!isSafeName(boxId)) return 'unknown'
        const file = path.join(this.dataDir, 'Calibration Files', `LiquidCalibration_${boxId}.mat`)
        try {
            const st = await fs.stat(file)
            return st.isFile() ? 'present' : 'missing'
        } catch (err) {
            return err instanceof Error && 'code' in err && err.code === 'ENOENT' ? 'missing' : 'unknown'
        }
    }
}
