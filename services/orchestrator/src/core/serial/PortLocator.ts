// services/orchestrator/src/core/serial/PortLocator.ts
import { SerialPort } from 'serialport'

/** Subset of `SerialPort.list()` entries the academy cares about. */
export interface PortSummary {
    path: string
    manufacturer?: string
    serialNumber?: string
    vendorId?: string
    productId?: string
}

export interface PortLister {
    list(): Promise<PortSummary[]>
}

export const EMULATOR_LOCATOR = 'EMU'

export class SerialPortLister implements PortLister {
    async list(): Promise<PortSummary[]> {
        const ports = await SerialPort.list()
        return ports.map(p => ({
            path: p.path,
            manufacturer: p.manufacturer,
            serialNumber: p.serialNumber,
            vendorId: p.vendorId,
            productId: p.productId,
        }))
    }
}

function looksLikePath(locator: string): boolean {
    return locator.startsWith('/dev/') || /^COM\d+$/i.test(locator)
}

/**
 * Maps a registry serial locator to something the engine can open.
 *
 *  - `EMU`         -> `EMU` (engine emulator, no hardware)
 *  - `/dev/...`    -> used as is
 *  - `COM3`        -> used as is
 *  - anything else -> USB serial number, matched among candidate ports
 */
export class PortLocator {
    constructor(
        private readonly lister: PortLister,
        private readonly manufacturerHint: string
    ) {}

    /** Ports whose manufacturer contains the hint (case-insensitive). Empty hint = every port. */
    async listCandidates(): Promise<PortSummary[]> {
        const all = await this.lister.list()
        const hint = this.manufacturerHint.trim().toLowerCase()
        if (!hint) return all
        return all.filter(p => (p.manufacturer ?? '').toLowerCase().includes(hint))
    }

    /** Resolved path, or null when the locator matches no attached port. */
    async resolve(serialLocator: string): Promise<string | null> {
        const loc = serialLocator.trim()
        if (loc === EMULATOR_LOCATOR) return EMULATOR_LOCATOR
        if (looksLikePath(loc)) return loc

        const candidates = await this.listCandidates()
        const hit = candidates.find(p => p.serialNumber === loc)
        return hit ? hit.path : null
    }
}
