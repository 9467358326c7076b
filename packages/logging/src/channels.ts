import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.controller]:    { emoji: '📡', color: 'blue' },
    [LogChannel.app]:           { emoji: '📦', color: 'blue' },
    [LogChannel.request]:       { emoji: '📝', color: 'purple' },
    // Power state machine transitions and timeouts
    [LogChannel.adapter_state]: { emoji: '🔋', color: 'green' },
    [LogChannel.subscribers]:   { emoji: '👂', color: 'cyan' },
    [LogChannel.hal]:           { emoji: '🛠️', color: 'red' },
    [LogChannel.profiles]:      { emoji: '🧩', color: 'yellow' },
    [LogChannel.properties]:    { emoji: '🗂️', color: 'magenta' },
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

export function channelPrefix(ch: LogChannel, colorize: boolean): string {
    const meta = CHANNELS[ch]
    const tag = `${meta.emoji} [${ch}]:`
    return colorize ? `${ANSI[meta.color]}${tag}${RESET}` : tag
}
