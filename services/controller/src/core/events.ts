/**
 * Services never log directly: they publish typed events into a sink and the
 * hosting plugin decides what becomes a log line or a state update.
 */
export interface EventSink<E> {
    publish(evt: E): void
}

export function now(): number {
    return Date.now()
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
