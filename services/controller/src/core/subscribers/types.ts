import type { EventSink } from '../events.js'
import type { AdapterSubState, PowerHoldMessage } from '../adapter-state/types.js'

/**
 * A subsystem that wants interface and vendor notifications. Registering one
 * also holds the radio powered until it unregisters.
 */
export interface RadioObserver {
  onInterfaceReady(): void | Promise<void>
  onInterfaceDown(): void | Promise<void>
  onVendorEvent(payload: Uint8Array): void | Promise<void>
  onVendorCommandComplete(opcode: number, payload: Uint8Array): void | Promise<void>
  /** Transport liveness; a dead observer cannot register. */
  isAlive?(): boolean
}

/** Byte mask/value pair of equal length; `value` is stored pre-masked. */
export interface VendorEventFilter {
  mask: Uint8Array
  value: Uint8Array
}

export interface Subscription {
  observer: RadioObserver
  filter: VendorEventFilter | null
  /** Set once the observer has been told the interface is up. */
  seenStableState: boolean
  /** True while the initial "interface ready" scheduled at registration is still owed. */
  pendingUpdate: boolean
}

/** Collapsed view of the adapter used to decide what observers hear. */
export type InterfaceAvailability = 'up' | 'down'

export type UnregisterCause = 'explicit' | 'died' | 'interface-down'

export type ObserverCallback =
  | 'onInterfaceReady'
  | 'onInterfaceDown'
  | 'onVendorEvent'
  | 'onVendorCommandComplete'

export type SubscriberEvent =
  | { kind: 'observer-registered'; at: number; count: number; replaced: boolean }
  | { kind: 'observer-register-refused'; at: number; reason: string }
  | { kind: 'observer-unregistered'; at: number; count: number; cause: UnregisterCause }
  | { kind: 'observer-filter-updated'; at: number; length: number; cleared: boolean }
  | { kind: 'power-hold-changed'; at: number; held: boolean; message: PowerHoldMessage }
  | { kind: 'interface-broadcast'; at: number; state: AdapterSubState; availability: InterfaceAvailability; receivers: number }
  | { kind: 'vendor-event-dispatched'; at: number; length: number; receivers: number }
  | { kind: 'vendor-command-dispatched'; at: number; opcode: number; receivers: number }
  | { kind: 'observer-delivery-failed'; at: number; callback: ObserverCallback; error: string }

export type SubscriberEventSink = EventSink<SubscriberEvent>

export interface SubscriberRegistryDeps {
  events: SubscriberEventSink
  /** Posts POWER_ON / POWER_OFF into the adapter state machine's queue. */
  requestPower: (msg: PowerHoldMessage) => void
}
