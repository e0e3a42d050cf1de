import { describe, expect, it } from 'vitest'
import { EmulatorTransport, RelayEmulator } from './RelayEmulator.js'
import { SyncRelayService } from './SyncRelayService.js'
import type { RelayEvent, RelayTransport } from './types.js'

function harness(ackTimeoutMs = 1000) {
    const emulator = new RelayEmulator()
    const transport = new EmulatorTransport(emulator)
    const events: RelayEvent[] = []
    let clock = 0
    const relay = new SyncRelayService(
        { ackTimeoutMs },
        { transport, events: { publish: (e) => { events.push(e) } }, now: () => clock }
    )
    return {
        emulator,
        relay,
        events,
        setClock: (t: number) => {
            clock = t
        },
    }
}

/** Accepts writes and never answers. */
class SilentTransport implements RelayTransport {
    readonly description = 'silent'
    readonly written: number[][] = []
    async open(): Promise<void> {}
    async write(bytes: Uint8Array): Promise<void> {
        this.written.push([...bytes])
    }
    onData(): () => void {
        return () => {}
    }
    async close(): Promise<void> {}
}

describe('SyncRelayService', () => {
    it('connects, records edges with host time and drains them', async () => {
        const { emulator, relay, setClock } = harness()
        await relay.open()
        await relay.connect()
        await relay.startChannel(3)
        expect(relay.status()).toEqual({ open: true, connected: true, activeChannels: [3], pendingEvents: 0 })

        emulator.advance(10)
        setClock(1000)
        emulator.setInput(3, 1)
        emulator.advance(5)
        setClock(2000)
        emulator.setInput(3, 0)

        expect(relay.status().pendingEvents).toBe(2)
        expect(relay.takeSyncTimes(3, 1500)).toEqual([{ channel: 3, level: 1, elapsed: 10, hostTime: 1000 }])
        expect(relay.takeSyncTimes(3)).toEqual([{ channel: 3, level: 0, elapsed: 15, hostTime: 2000 }])
        expect(relay.takeSyncTimes(3)).toEqual([])

        expect(await relay.stopChannel(3)).toBe(15)
        expect(relay.status().activeChannels).toEqual([])

        await relay.disconnect()
        expect(relay.status().connected).toBe(false)
        await relay.close()
        expect(relay.status().open).toBe(false)
    })

    it('starting a channel again clears its earlier edges', async () => {
        const { emulator, relay } = harness()
        await relay.open()
        await relay.connect()
        await relay.startChannel(0)
        emulator.setInput(0, 1)
        await relay.startChannel(0)
        expect(relay.takeSyncTimes(0)).toEqual([])
    })

    it('rejects channel commands before connect and out-of-range channels', async () => {
        const { relay } = harness()
        await relay.open()
        await expect(relay.startChannel(3)).rejects.toMatchObject({ code: 'InvalidState' })
        await relay.connect()
        await expect(relay.startChannel(13)).rejects.toMatchObject({ code: 'BadRequest' })
        expect(() => relay.takeSyncTimes(-1)).toThrow('relay channel must be 0..12')
        await expect(relay.reboot()).rejects.toMatchObject({ code: 'InvalidState' })
    })

    it('refuses to write before the link is open', async () => {
        const { relay } = harness()
        await expect(relay.connect()).rejects.toMatchObject({ code: 'InvalidState', message: 'relay link is not open' })
    })

    it('times out when the board does not answer', async () => {
        const transport = new SilentTransport()
        const relay = new SyncRelayService({ ackTimeoutMs: 20 }, { transport, events: { publish: () => {} } })
        await relay.open()

        await expect(relay.connect()).rejects.toMatchObject({
            code: 'Timeout',
            message: 'relay did not acknowledge connect within 20 ms',
        })
        expect(transport.written).toEqual([[0x41]])
    })

    it('publishes lifecycle and edge events', async () => {
        const { emulator, relay, events } = harness()
        await relay.open()
        await relay.connect()
        await relay.startChannel(1)
        emulator.setInput(1, 1)
        await relay.stopChannel(1)

        expect(events.map((e) => e.kind)).toEqual([
            'relay-opened',
            'relay-connected',
            'relay-channel-started',
            'relay-ttl',
            'relay-channel-stopped',
        ])
    })
})
