import { describe, expect, it } from 'vitest'
import { encodeCommand, RelayFrameDecoder } from './codec.js'
import { RelayEmulator } from './RelayEmulator.js'

const A = encodeCommand({ op: 'connect' })
const Z = encodeCommand({ op: 'disconnect' })
const Y = encodeCommand({ op: 'reboot' })
const S3 = encodeCommand({ op: 'start', channel: 3 })
const E3 = encodeCommand({ op: 'stop', channel: 3 })

describe('relay codec', () => {
    it('encodes channel commands as tag + u16 LE', () => {
        expect([...S3]).toEqual([0x53, 0x03, 0x00])
        expect([...encodeCommand({ op: 'stop', channel: 12 })]).toEqual([0x45, 0x0c, 0x00])
        expect([...A]).toEqual([0x41])
    })

    it('holds a split channel frame until it is complete', () => {
        const dec = new RelayFrameDecoder()
        const frame = Buffer.from([0x54, 0x02, 0x00, 0x01, 0x10, 0x27, 0x00, 0x00])

        expect(dec.push(frame.subarray(0, 5))).toEqual([])
        expect(dec.push(frame.subarray(5))).toEqual([{ kind: 'ttl', channel: 2, state: 1, elapsed: 10_000 }])
    })

    it('decodes status bytes and flags unknown ones', () => {
        const dec = new RelayFrameDecoder()
        expect(dec.push(Buffer.from([0x41, 0x00, 0x5a]))).toEqual([
            { kind: 'connected' },
            { kind: 'unknown', byte: 0 },
            { kind: 'disconnected' },
        ])
    })
})

describe('RelayEmulator', () => {
    it('replays connect, start, an edge at +150 and stop at +200', () => {
        const relay = new RelayEmulator()

        expect([...relay.receive(A)]).toEqual([0x41])
        expect([...relay.receive(S3)]).toEqual([0x53, 0x03, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00])

        relay.advance(150)
        expect([...relay.setInput(3, 1)]).toEqual([0x54, 0x03, 0x00, 0x01, 0x96, 0x00, 0x00, 0x00])

        relay.advance(50)
        expect([...relay.receive(E3)]).toEqual([0x45, 0x03, 0x00, 0x00, 0xc8, 0x00, 0x00, 0x00])

        const dec = new RelayFrameDecoder()
        expect(dec.push(relay.receive(S3))).toEqual([{ kind: 'started', channel: 3, state: 1, elapsed: 0 }])
    })

    it('ignores everything but A and Y before connect', () => {
        const relay = new RelayEmulator()
        expect(relay.receive(S3).length).toBe(0)
        expect(relay.receive(E3).length).toBe(0)
        expect(relay.receive(Z).length).toBe(0)
        expect(relay.setInput(3, 1).length).toBe(0)
        expect(relay.isConnected).toBe(false)
    })

    it('waits for the rest of a split command', () => {
        const relay = new RelayEmulator()
        relay.receive(A)
        expect(relay.receive(S3.subarray(0, 1)).length).toBe(0)
        expect([...relay.receive(S3.subarray(1))]).toEqual([0x53, 0x03, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00])
    })

    it('emits edges only for started channels and only on change', () => {
        const relay = new RelayEmulator()
        relay.receive(A)
        expect(relay.setInput(4, 1).length).toBe(0)

        relay.receive(S3)
        relay.advance(7)
        expect(relay.setInput(3, 1).length).toBe(8)
        expect(relay.setInput(3, 1).length).toBe(0)
        expect(relay.setInput(3, 0).length).toBe(8)
    })

    it('clears channels on disconnect and reboots only while disconnected', () => {
        const relay = new RelayEmulator()
        relay.receive(A)
        relay.receive(S3)
        relay.advance(30)

        relay.receive(Y)
        expect(relay.rebootCount).toBe(0)

        expect([...relay.receive(Z)]).toEqual([0x5a])
        expect(relay.setInput(3, 1).length).toBe(0)

        relay.receive(Y)
        expect(relay.rebootCount).toBe(1)
        expect(relay.ticks).toBe(0)
    })

    it('forwards output to listeners', () => {
        const relay = new RelayEmulator()
        const seen: number[][] = []
        const off = relay.onOutput((b) => {
            seen.push([...b])
        })
        relay.receive(A)
        off()
        relay.receive(Z)
        expect(seen).toEqual([[0x41]])
    })
})
