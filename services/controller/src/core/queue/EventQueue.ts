export type QueueHandler<T extends string> = (event: T) => void

export interface EventQueueOptions<T extends string> {
    /** Consumer invoked for each event, one at a time. */
    handler: QueueHandler<T>

    /** Called when the handler throws. The queue keeps draining afterwards. */
    onHandlerError?: (err: unknown, event: T) => void

    /** Called for each event refused because the queue has quit. */
    onDrop?: (event: T) => void
}

type QueuePhase = 'idle' | 'running' | 'quit'

/**
 * Single-consumer FIFO keyed by event type.
 *
 * Draining happens on a microtask so that `post()` never re-enters the
 * handler; events posted while one is being handled are appended and picked
 * up by the same drain pass. Events posted before `start()` wait for it;
 * after `quit()` every post is refused through `onDrop`.
 */
export class EventQueue<T extends string> {
    private readonly handler: QueueHandler<T>
    private readonly onHandlerError?: (err: unknown, event: T) => void
    private readonly onDrop?: (event: T) => void

    private items: T[] = []
    private deferred: T[] = []
    private readonly timers = new Map<T, Set<NodeJS.Timeout>>()

    private phase: QueuePhase = 'idle'
    private draining = false
    private scheduled = false
    private current: T | null = null
    private idleWaiters: Array<() => void> = []

    constructor(opts: EventQueueOptions<T>) {
        this.handler = opts.handler
        this.onHandlerError = opts.onHandlerError
        this.onDrop = opts.onDrop
    }

    /* ---- lifecycle ------------------------------------------------------- */

    /** Begins draining, including anything posted beforehand. A quit queue stays quit. */
    public start(): void {
        if (this.phase !== 'idle') return
        this.phase = 'running'
        this.scheduleDrain()
    }

    /** Discards everything pending (queued, deferred and armed timers) and stops. */
    public quit(): void {
        this.phase = 'quit'
        this.items = []
        this.deferred = []
        for (const set of this.timers.values()) {
            for (const t of set) clearTimeout(t)
        }
        this.timers.clear()
        this.resolveIdle()
    }

    public isRunning(): boolean {
        return this.phase === 'running'
    }

    /* ---- producers ------------------------------------------------------- */

    public post(event: T): void {
        if (this.phase === 'quit') {
            this.onDrop?.(event)
            return
        }
        this.items.push(event)
        this.scheduleDrain()
    }

    /** Delivers `event` to the tail of the queue no earlier than `delayMs` from now. */
    public postDelayed(event: T, delayMs: number): void {
        if (this.phase === 'quit') {
            this.onDrop?.(event)
            return
        }
        const set = this.timers.get(event) ?? new Set<NodeJS.Timeout>()
        const timer = setTimeout(() => {
            set.delete(timer)
            if (set.size === 0) this.timers.delete(event)
            this.post(event)
        }, Math.max(0, delayMs))
        set.add(timer)
        this.timers.set(event, set)
    }

    /** Removes every not-yet-delivered entry of this type: armed timers and queued copies. */
    public cancel(event: T): void {
        const set = this.timers.get(event)
        if (set) {
            for (const t of set) clearTimeout(t)
            this.timers.delete(event)
        }
        this.items = this.items.filter(e => e !== event)
    }

    /**
     * Postpones the event currently being handled until `releaseDeferred()`.
     * Only valid from inside the handler.
     */
    public defer(event: T): void {
        if (this.current === null) {
            throw new Error(`defer(${event}) called outside of event processing`)
        }
        this.deferred.push(event)
    }

    /** Moves deferred events to the front of the queue in the order they arrived. */
    public releaseDeferred(): number {
        const count = this.deferred.length
        if (count === 0) return 0
        this.items = [...this.deferred, ...this.items]
        this.deferred = []
        this.scheduleDrain()
        return count
    }

    /* ---- introspection --------------------------------------------------- */

    public hasTimer(event: T): boolean {
        return (this.timers.get(event)?.size ?? 0) > 0
    }

    /**
     * Resolves once nothing is queued or being processed. Armed timers do not
     * count, and neither do events waiting for `start()`.
     */
    public idle(): Promise<void> {
        if (!this.draining && !this.scheduled && (this.phase !== 'running' || this.items.length === 0)) {
            return Promise.resolve()
        }
        return new Promise<void>(resolve => { this.idleWaiters.push(resolve) })
    }

    /* ---- drain ----------------------------------------------------------- */

    private scheduleDrain(): void {
        if (this.phase !== 'running' || this.draining || this.scheduled) return
        if (this.items.length === 0) return
        this.scheduled = true
        queueMicrotask(() => this.drain())
    }

    private drain(): void {
        this.scheduled = false
        this.draining = true
        try {
            while (this.phase === 'running') {
                const event = this.items.shift()
                if (event === undefined) break
                this.current = event
                try {
                    this.handler(event)
                } catch (err) {
                    this.onHandlerError?.(err, event)
                } finally {
                    this.current = null
                }
            }
        } finally {
            this.draining = false
        }
        this.resolveIdle()
    }

    private resolveIdle(): void {
        if (this.draining || this.scheduled) return
        if (this.phase === 'running' && this.items.length > 0) return
        const waiters = this.idleWaiters
        this.idleWaiters = []
        for (const w of waiters) w()
    }
}
