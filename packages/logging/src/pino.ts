import { pino, type Logger, type LoggerOptions } from 'pino'
import { PinoPretty } from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, channelPrefix } from './channels.js'

function envPretty(): boolean {
    return String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
}

export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const PRETTY = envPretty()
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        formatters: {
            level(label) { return { level: label } }
        }
    }

    const base: Logger = PRETTY
        ? pino(options, PinoPretty({
            translateTime: 'SYS:standard',
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel'
        }))
        : pino(options)

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        // keep the client buffer aligned with what the server actually emits
        if (!base.isLevelEnabled(level)) return
        const meta = CHANNELS[channel]
        clientBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const channel = (ch: LogChannel): ChannelLogger => {
        const prefix = channelPrefix(ch, PRETTY)
        const write = (level: ClientLogLevel, msg: string, extra?: Record<string, unknown>): void => {
            const obj = extra ? { channel: ch, ...extra } : { channel: ch }
            base[level](obj, `${prefix} ${msg}`)
            fanout(ch, level, msg)
        }

        return {
            debug: (msg, extra) => write('debug', msg, extra),
            info: (msg, extra) => write('info', msg, extra),
            warn: (msg, extra) => write('warn', msg, extra),
            error: (msg, extra) => write('error', msg, extra),
            fatal: (msg, extra) => write('fatal', msg, extra)
        }
    }

    return { base, channel }
}
