import {
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogListener
} from './types.js'

function defaultLimit(): number {
    const n = Number.parseInt(String(process.env.CLIENT_LOGS_TO_KEEP ?? ''), 10)
    return Number.isFinite(n) && n > 0 ? n : 500
}

/**
 * Fixed-capacity ring of the most recent client-facing log lines.
 * Listeners see every entry as it is pushed; a throwing listener is
 * reported as a process warning and the others still run.
 */
export function makeClientBuffer(limit: number = defaultLimit()): ClientLogBuffer {
    const capacity = Math.max(1, Math.trunc(limit))
    const ring: Array<ClientLog | undefined> = new Array(capacity)
    let head = 0
    let count = 0
    const listeners = new Set<ClientLogListener>()

    const push = (log: ClientLog): void => {
        ring[(head + count) % capacity] = log
        if (count < capacity) count++
        else head = (head + 1) % capacity

        for (const listener of listeners) {
            try {
                listener(log)
            } catch (err) {
                process.emitWarning(`client log listener failed: ${String(err)}`)
            }
        }
    }

    const getLatest = (n: number): ClientLog[] => {
        const take = Math.min(Math.max(0, Math.trunc(n)), count)
        const out: ClientLog[] = []
        for (let i = count - take; i < count; i++) {
            const entry = ring[(head + i) % capacity]
            if (entry) out.push(entry)
        }
        return out
    }

    const subscribe = (listener: ClientLogListener): () => void => {
        listeners.add(listener)
        return () => { listeners.delete(listener) }
    }

    return { push, getLatest, subscribe, size: () => count }
}
