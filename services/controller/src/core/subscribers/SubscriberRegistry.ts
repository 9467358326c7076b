import { errorMessage, now } from '../events.js'
import type { AdapterSubState } from '../adapter-state/types.js'
import { makeVendorFilter, matchVendorFilter } from './filters.js'
import type {
  InterfaceAvailability,
  ObserverCallback,
  RadioObserver,
  Subscription,
  SubscriberEvent,
  SubscriberRegistryDeps,
  UnregisterCause,
  VendorEventFilter,
} from './types.js'

/** OFF is down, POWERED and ON are up, PENDING says nothing. */
function availabilityOf(state: AdapterSubState): InterfaceAvailability | null {
  switch (state) {
    case 'OFF':
      return 'down'
    case 'POWERED':
    case 'ON':
      return 'up'
    case 'PENDING':
      return null
  }
}

/**
 * Reference-counted observer registry.
 *
 * Every mutation runs synchronously on the event loop, so a read-modify-write
 * never interleaves with another one. Broadcasts walk a snapshot taken at the
 * start of the pass; observers added or removed meanwhile do not change it.
 */
export class SubscriberRegistry {
  private readonly deps: SubscriberRegistryDeps
  private readonly subscriptions = new Map<RadioObserver, Subscription>()
  private previousState: AdapterSubState = 'OFF'

  constructor(deps: SubscriberRegistryDeps) {
    this.deps = deps
  }

  /* ---------------------------------------------------------------------- */
  /*  Membership                                                             */
  /* ---------------------------------------------------------------------- */

  public register(observer: RadioObserver, filter?: VendorEventFilter): boolean {
    if (observer.isAlive?.() === false) {
      this.publish({ kind: 'observer-register-refused', at: now(), reason: 'observer is not alive' })
      return false
    }

    const wasHeld = this.areLocksHeld()
    const replaced = this.subscriptions.has(observer)

    const sub: Subscription = {
      observer,
      filter: filter ? makeVendorFilter(filter.mask, filter.value) : null,
      seenStableState: false,
      pendingUpdate: false,
    }
    this.subscriptions.set(observer, sub)

    if (availabilityOf(this.previousState) === 'up') {
      sub.pendingUpdate = true
      setImmediate(() => this.deliverInitialReady(sub))
    }

    this.publish({ kind: 'observer-registered', at: now(), count: this.subscriptions.size, replaced })
    this.reevaluatePowerHold(wasHeld)
    return true
  }

  public unregister(observer: RadioObserver): boolean {
    return this.remove(observer, 'explicit')
  }

  /** Transport death notification. */
  public onObserverDied(observer: RadioObserver): void {
    this.remove(observer, 'died')
  }

  public setFilter(observer: RadioObserver, mask: Uint8Array | null, value: Uint8Array | null): boolean {
    const sub = this.subscriptions.get(observer)
    if (!sub) return false

    if (mask === null || value === null) {
      sub.filter = null
      this.publish({ kind: 'observer-filter-updated', at: now(), length: 0, cleared: true })
      return true
    }

    sub.filter = makeVendorFilter(mask, value)
    this.publish({
      kind: 'observer-filter-updated',
      at: now(),
      length: sub.filter.mask.length,
      cleared: false,
    })
    return true
  }

  public areLocksHeld(): boolean {
    return this.subscriptions.size > 0
  }

  public count(): number {
    return this.subscriptions.size
  }

  public isRegistered(observer: RadioObserver): boolean {
    return this.subscriptions.has(observer)
  }

  public getPreviousState(): AdapterSubState {
    return this.previousState
  }

  /* ---------------------------------------------------------------------- */
  /*  Broadcasts                                                             */
  /* ---------------------------------------------------------------------- */

  public onStateUpdate(state: AdapterSubState): void {
    const next = availabilityOf(state)
    if (next === null) return
    if (next === availabilityOf(this.previousState)) return

    this.previousState = state
    let receivers = 0

    for (const sub of this.snapshot()) {
      sub.pendingUpdate = false
      if (next === 'up') {
        this.deliver('onInterfaceReady', () => sub.observer.onInterfaceReady())
        sub.seenStableState = true
        receivers++
      } else if (sub.seenStableState) {
        this.deliver('onInterfaceDown', () => sub.observer.onInterfaceDown())
        receivers++
        this.remove(sub.observer, 'interface-down')
      }
    }

    this.publish({ kind: 'interface-broadcast', at: now(), state, availability: next, receivers })
  }

  public onVendorEvent(payload: Uint8Array): void {
    let receivers = 0
    for (const sub of this.snapshot()) {
      if (sub.filter === null) continue
      if (!matchVendorFilter(payload, sub.filter)) continue
      this.deliver('onVendorEvent', () => sub.observer.onVendorEvent(payload))
      receivers++
    }
    this.publish({ kind: 'vendor-event-dispatched', at: now(), length: payload.length, receivers })
  }

  public onVendorCommandComplete(opcode: number, payload: Uint8Array): void {
    let receivers = 0
    for (const sub of this.snapshot()) {
      this.deliver('onVendorCommandComplete', () => sub.observer.onVendorCommandComplete(opcode, payload))
      receivers++
    }
    this.publish({ kind: 'vendor-command-dispatched', at: now(), opcode, receivers })
  }

  /* ---------------------------------------------------------------------- */
  /*  Internals                                                              */
  /* ---------------------------------------------------------------------- */

  private remove(observer: RadioObserver, cause: UnregisterCause): boolean {
    const wasHeld = this.areLocksHeld()
    if (!this.subscriptions.delete(observer)) return false
    this.publish({ kind: 'observer-unregistered', at: now(), count: this.subscriptions.size, cause })
    this.reevaluatePowerHold(wasHeld)
    return true
  }

  private reevaluatePowerHold(wasHeld: boolean): void {
    const held = this.areLocksHeld()
    if (held === wasHeld) return
    const message = held ? 'POWER_ON' : 'POWER_OFF'
    this.publish({ kind: 'power-hold-changed', at: now(), held, message })
    this.deps.requestPower(message)
  }

  private deliverInitialReady(sub: Subscription): void {
    // a broadcast may have run or the observer may have left in the meantime
    if (!sub.pendingUpdate) return
    if (this.subscriptions.get(sub.observer) !== sub) return
    sub.pendingUpdate = false
    sub.seenStableState = true
    this.deliver('onInterfaceReady', () => sub.observer.onInterfaceReady())
  }

  private snapshot(): Subscription[] {
    return Array.from(this.subscriptions.values())
  }

  private deliver(callback: ObserverCallback, call: () => void | Promise<void>): void {
    const fail = (err: unknown): void => {
      this.publish({ kind: 'observer-delivery-failed', at: now(), callback, error: errorMessage(err) })
    }
    try {
      const result = call()
      if (result instanceof Promise) {
        void result.catch(fail)
      }
    } catch (err) {
      fail(err)
    }
  }

  private publish(evt: SubscriberEvent): void {
    this.deps.events.publish(evt)
  }
}
