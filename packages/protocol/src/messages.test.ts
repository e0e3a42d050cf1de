import { describe, expect, it } from 'vitest'
import { parseClientMessage, parseServerMessage } from './messages.js'
import { AcademyError, toWireError } from './errors.js'

describe('parseClientMessage', () => {
    it('accepts a well-formed command and defaults args to an empty object', () => {
        const res = parseClientMessage(
            JSON.stringify({ type: 'command', requestId: 'r1', device: ' B1 ', verb: 'start' })
        )
        expect(res).toEqual({
            ok: true,
            value: { type: 'command', requestId: 'r1', device: 'B1', verb: 'start', args: {} },
        })
    })

    it('allows listPorts without a device', () => {
        const res = parseClientMessage(JSON.stringify({ type: 'command', requestId: 'r2', verb: 'listPorts' }))
        expect(res.ok).toBe(true)
        if (res.ok && res.value.type === 'command') expect(res.value.device).toBe('')
    })

    it('rejects unknown verbs, missing devices and non-object args', () => {
        expect(parseClientMessage(JSON.stringify({ type: 'command', requestId: 'r', device: 'B1', verb: 'explode' })))
            .toEqual({ ok: false, error: 'command.verb unknown: explode' })
        expect(parseClientMessage(JSON.stringify({ type: 'command', requestId: 'r', verb: 'start' })))
            .toEqual({ ok: false, error: 'command.device (string) required' })
        expect(parseClientMessage(JSON.stringify({ type: 'command', requestId: 'r', device: 'B1', verb: 'start', args: [1] })))
            .toEqual({ ok: false, error: 'command.args must be an object' })
    })

    it('reports malformed JSON without throwing', () => {
        const res = parseClientMessage('{nope')
        expect(res.ok).toBe(false)
    })
})

describe('parseServerMessage', () => {
    const snapshot = {
        seq: 3,
        device: {
            boxId: 'B1',
            serialLocator: 'A7005IDU',
            state: 'Idle',
            guiVisible: true,
            lastError: null,
            calibration: 'present',
        },
        activeSession: null,
        lastSession: null,
    }

    it('coerces device snapshots', () => {
        const res = parseServerMessage(JSON.stringify({ type: 'device.snapshot', snapshot }))
        expect(res).toEqual({ ok: true, value: { type: 'device.snapshot', snapshot } })
    })

    it('drops malformed entries from a fleet snapshot', () => {
        const res = parseServerMessage(JSON.stringify({
            type: 'fleet.snapshot',
            devices: [snapshot, { seq: 1, device: { boxId: 'B2', serialLocator: 'x', state: 'Flying' } }],
        }))
        expect(res.ok && res.value.type === 'fleet.snapshot' && res.value.devices.map(d => d.device.boxId))
            .toEqual(['B1'])
    })

    it('maps unknown error codes on failed acks to Internal', () => {
        const res = parseServerMessage(JSON.stringify({
            type: 'command.ack',
            requestId: 'r9',
            ok: false,
            error: { code: 'Meltdown', message: 'boom' },
        }))
        expect(res).toEqual({
            ok: true,
            value: { type: 'command.ack', requestId: 'r9', ok: false, error: { code: 'Internal', message: 'boom' } },
        })
    })
})

describe('toWireError', () => {
    it('keeps the code of academy errors and wraps anything else as Internal', () => {
        expect(toWireError(new AcademyError('DeviceBusy', 'B1 is running'))).toEqual({
            code: 'DeviceBusy',
            message: 'B1 is running',
        })
        expect(toWireError(new Error('disk full'))).toEqual({ code: 'Internal', message: 'disk full' })
        expect(toWireError('odd')).toEqual({ code: 'Internal', message: 'odd' })
    })
})
