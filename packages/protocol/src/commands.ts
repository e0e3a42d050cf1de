// packages/protocol/src/commands.ts

export const COMMAND_VERBS = [
    'start',
    'stop',
    'setConsoleVisible',
    'calibrate',
    'runProtocol',
    'stopProtocol',
    'query',
    'addDevice',
    'removeDevice',
    'changeLocator',
    'listPorts',
] as const

export type CommandVerb = (typeof COMMAND_VERBS)[number]

export type ConnectionRole = 'Local' | 'Remote'

/** Verbs that drive the rig's own screen or hardware and need an operator at the machine. */
export const LOCAL_ONLY_VERBS: ReadonlySet<CommandVerb> = new Set<CommandVerb>([
    'setConsoleVisible',
    'calibrate',
])

export interface RunProtocolArgs {
    protocol: string
    subject: string
    /** Defaults to `DefaultSettings` when omitted. */
    settingsFile?: string
}

export function isCommandVerb(v: unknown): v is CommandVerb {
    return typeof v === 'string' && (COMMAND_VERBS as readonly string[]).includes(v)
}
