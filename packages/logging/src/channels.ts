import { type ChannelColor, LogChannel } from './types.js'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.orchestrator]: { emoji: '🛰️', color: 'blue' },
    [LogChannel.app]:          { emoji: '📦', color: 'blue' },
    [LogChannel.request]:      { emoji: '📝', color: 'purple' },
    [LogChannel.websocket]:    { emoji: '🔗', color: 'cyan' },
    [LogChannel.registry]:     { emoji: '🗂️', color: 'white' },
    [LogChannel.router]:       { emoji: '🧭', color: 'green' },
    // One worker per box; the box id travels in the message
    [LogChannel.worker]:       { emoji: '🛠️', color: 'red' },
    [LogChannel.engine]:       { emoji: '⚙️', color: 'magenta' },
    [LogChannel.watcher]:      { emoji: '👀', color: 'yellow' },
    [LogChannel.relay]:        { emoji: '⏱️', color: 'green' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.orchestrator]: 30,
    [LogChannel.app]:          30,
    [LogChannel.request]:      30,
    [LogChannel.websocket]:    30,
    [LogChannel.registry]:     30,
    [LogChannel.router]:       30,
    [LogChannel.worker]:       30,
    [LogChannel.engine]:       30,
    [LogChannel.watcher]:      30,
    [LogChannel.relay]:        30,
}
