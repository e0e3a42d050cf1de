import pino, { type Logger, type LoggerOptions, type LogFn } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET, CUSTOM_LEVELS, CHANNEL_AS_LEVEL } from './channels.js'

// levelKey is honoured at runtime but missing from the typings
type PinoOptionsExt = LoggerOptions<LogChannel> & { levelKey?: string }

type Extra = Record<string, unknown>

const KNOWN_CHANNELS = new Set<string>(Object.values(LogChannel))

function isLogChannel(v: unknown): v is LogChannel {
    return typeof v === 'string' && KNOWN_CHANNELS.has(v)
}

function channelOf(arg: unknown): LogChannel | undefined {
    if (typeof arg !== 'object' || arg === null || !('channel' in arg)) return undefined
    return isLogChannel(arg.channel) ? arg.channel : undefined
}

function prefixFor(ch: LogChannel): string {
    const meta = CHANNELS[ch]
    return `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`
}

/**
 * pino logger with one custom level per channel (so `info` lines carry the
 * channel's emoji and color) plus an optional fan-out of every line to a
 * ClientLogBuffer for WebSocket clients.
 *
 * Env: LOG_LEVEL (default info), PRETTY_LOGS (default true).
 */
export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    const options: PinoOptionsExt = {
        levelKey: 'lvl',                          // hide default 'level' from pino-pretty
        level: LOG_LEVEL,
        base: { service },
        customLevels: CUSTOM_LEVELS,
        useOnlyCustomLevels: false,
        formatters: {
            level() { return { lvl: '' } },      // suppress textual level in JSON
            log(obj) { return obj }
        },
        hooks: {
            logMethod(args: unknown[], method: LogFn): void {
                const ch = channelOf(args[0])
                if (ch) {
                    const prefix = prefixFor(ch)
                    if (typeof args[1] === 'string') args[1] = `${prefix} ${args[1]}`
                    else if (typeof args[0] === 'string') args[0] = `${prefix} ${args[0]}`
                    else args.push(prefix)
                }
                Reflect.apply(method, this, args)
            }
        }
    }

    const base: Logger<LogChannel> = PRETTY
        ? pino(options, pinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel,lvl'
        }))
        : pino(options)

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        const meta = CHANNELS[channel]
        clientBuf.push({ ts: Date.now(), channel, emoji: meta.emoji, color: meta.color, level, message })
    }

    const write = (ch: LogChannel, level: ClientLogLevel, msg: string, extra?: Extra): void => {
        const obj = extra ? { channel: ch, ...extra } : { channel: ch }
        if (level === 'info' && CHANNEL_AS_LEVEL) base[ch](obj, msg)
        else base[level](obj, msg)
        fanout(ch, level, msg)
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg, extra) => write(ch, 'debug', msg, extra),
        info: (msg, extra) => write(ch, 'info', msg, extra),
        warn: (msg, extra) => write(ch, 'warn', msg, extra),
        error: (msg, extra) => write(ch, 'error', msg, extra),
        fatal: (msg, extra) => write(ch, 'fatal', msg, extra),
    })

    return { base, channel }
}
