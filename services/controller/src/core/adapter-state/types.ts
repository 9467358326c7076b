import type { EventSink } from '../events.js'

/* -------------------------------------------------------------------------- */
/*  States & messages                                                          */
/* -------------------------------------------------------------------------- */

/** Internal power state of the machine. */
export type AdapterSubState = 'OFF' | 'PENDING' | 'POWERED' | 'ON'

/** User-visible lifecycle state, as reported through the properties collaborator. */
export type AdapterLifecycleState = 'OFF' | 'TURNING_ON' | 'ON' | 'TURNING_OFF'

export const ADAPTER_MESSAGES = [
  'USER_TURN_ON',
  'USER_TURN_OFF',
  'POWER_ON',
  'POWER_OFF',
  'STARTED',
  'ENABLED_READY',
  'BEGIN_DISABLE',
  'DISABLED',
  'STOPPED',
  'START_TIMEOUT',
  'ENABLE_TIMEOUT',
  'DISABLE_TIMEOUT',
  'STOP_TIMEOUT',
  'SET_SCAN_MODE_TIMEOUT',
] as const

export type AdapterMessage = (typeof ADAPTER_MESSAGES)[number]

/** Messages the subscriber registry posts when its power hold changes. */
export type PowerHoldMessage = Extract<AdapterMessage, 'POWER_ON' | 'POWER_OFF'>

/** Radio status as reported by the hardware layer's state-change callback. */
export type RadioHalStatus = 'on' | 'off' | 'unknown'

export type FatalReason = 'stop-timeout' | 'disable-timeout'

/* -------------------------------------------------------------------------- */
/*  Collaborator contracts                                                     */
/* -------------------------------------------------------------------------- */

export interface RadioHal {
  /** Begins bringing up the radio process; completion arrives as STARTED. */
  processStart(): void
  /** Completion arrives as ENABLED_READY (or DISABLED on init failure). */
  enable(): boolean
  /** Completion arrives as DISABLED. */
  disable(): boolean
  setVendorEventsEnabled(enabled: boolean): boolean
  /** Forced teardown after the disable path timed out. */
  forceCleanup(): void
}

export interface AdapterPropertiesPort {
  getState(): AdapterLifecycleState
  setState(state: AdapterLifecycleState): void
  onRadioReady(): void
  /** Clears scan mode; completion arrives as BEGIN_DISABLE. */
  onRadioDisable(): void
}

export interface AdapterServicePort {
  updateStateMachineState(state: AdapterSubState): void
  updateAdapterState(prev: AdapterLifecycleState, next: AdapterLifecycleState): void
  autoConnect(): void
  /** True when a stop is in progress and STOPPED will follow. */
  stopProfileServices(): boolean
  isPowerLockHeld(): boolean
}

export interface AdapterCollaborators {
  hal: RadioHal
  properties: AdapterPropertiesPort
  service: AdapterServicePort
}

/* -------------------------------------------------------------------------- */
/*  Config                                                                     */
/* -------------------------------------------------------------------------- */

export interface AdapterTimeoutsConfig {
  /** STARTED must arrive within this window after processStart(). */
  startMs: number
  /** ENABLED_READY must arrive within this window after enable(). */
  enableMs: number
  /** DISABLED must arrive within this window after disable(). Fatal when exceeded. */
  disableMs: number
  /** STOPPED must arrive within this window after profile stop began. Fatal when exceeded. */
  stopMs: number
  /** BEGIN_DISABLE must arrive within this window after onRadioDisable(). */
  scanModeMs: number
}

export interface AdapterStateConfig {
  timeouts: AdapterTimeoutsConfig
}

/* -------------------------------------------------------------------------- */
/*  Events                                                                     */
/* -------------------------------------------------------------------------- */

export type AdapterStateEvent =
  | {
      kind: 'adapter-message-handled'
      at: number
      message: AdapterMessage
      state: AdapterSubState
    }
  | {
      kind: 'adapter-message-ignored'
      at: number
      message: AdapterMessage
      state: AdapterSubState
      reason: string
    }
  | {
      kind: 'adapter-message-deferred'
      at: number
      message: AdapterMessage
      state: AdapterSubState
    }
  | {
      kind: 'adapter-message-rejected'
      at: number
      message: AdapterMessage
      state: AdapterSubState
    }
  | {
      kind: 'adapter-message-dropped'
      at: number
      message: AdapterMessage
    }
  | {
      kind: 'adapter-deferred-replayed'
      at: number
      count: number
      state: AdapterSubState
    }
  | {
      kind: 'adapter-transition'
      at: number
      from: AdapterSubState
      to: AdapterSubState
    }
  | {
      kind: 'adapter-state-notified'
      at: number
      prev: AdapterLifecycleState
      next: AdapterLifecycleState
    }
  | {
      kind: 'adapter-flags'
      at: number
      turningOn: boolean
      turningOff: boolean
    }
  | {
      kind: 'adapter-recoverable-error'
      at: number
      error: string
      message?: AdapterMessage
    }
  | {
      kind: 'adapter-fatal-error'
      at: number
      error: string
      reason: FatalReason
    }
  | {
      kind: 'adapter-detached'
      at: number
    }

export type AdapterStateEventSink = EventSink<AdapterStateEvent>

export interface AdapterStateDeps extends AdapterCollaborators {
  events: AdapterStateEventSink
  /** Invoked once when a fatal outcome is reached; the host translates it into process exit. */
  onFatal: (reason: FatalReason) => void
}
