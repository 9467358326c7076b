import type { EventSink } from '../../core/events.js'
import type { RadioHalStatus } from '../../core/adapter-state/types.js'

/* -------------------------------------------------------------------------- */
/*  Config                                                                     */
/* -------------------------------------------------------------------------- */

export interface RadioHalConfig {
  kind: 'simulated'

  /** Delay between processStart() and the started callback. */
  startDelayMs: number

  /** Delay between enable() and the 'on' status report. */
  enableDelayMs: number

  /** Delay between disable() and the 'off' status report. */
  disableDelayMs: number

  /** Failure injection: enable() returns false. */
  failEnable: boolean

  /** Failure injection: disable() returns false. */
  failDisable: boolean
}

/* -------------------------------------------------------------------------- */
/*  Callbacks into the controller                                              */
/* -------------------------------------------------------------------------- */

export interface RadioHalCallbacks {
  started(): void
  stateChanged(status: RadioHalStatus): void
  vendorEvent(payload: Uint8Array): void
  vendorCommandComplete(opcode: number, payload: Uint8Array): void
}

/* -------------------------------------------------------------------------- */
/*  Events                                                                     */
/* -------------------------------------------------------------------------- */

export type RadioHalPhase = 'idle' | 'starting' | 'started' | 'enabling' | 'enabled' | 'disabling'

export type RadioHalEvent =
  | { kind: 'hal-process-start'; at: number }
  | { kind: 'hal-process-started'; at: number }
  | { kind: 'hal-enable-requested'; at: number; accepted: boolean }
  | { kind: 'hal-disable-requested'; at: number; accepted: boolean }
  | { kind: 'hal-status'; at: number; status: RadioHalStatus }
  | { kind: 'hal-vendor-events'; at: number; enabled: boolean }
  | { kind: 'hal-vendor-event'; at: number; length: number; delivered: boolean }
  | { kind: 'hal-force-cleanup'; at: number }

export type RadioHalEventSink = EventSink<RadioHalEvent>

export interface RadioHalDeps {
  events: RadioHalEventSink
  callbacks: RadioHalCallbacks
}
