import type { EventSink } from '../core/events.js'
import type { AdapterLifecycleState, AdapterSubState } from '../core/adapter-state/types.js'

/* -------------------------------------------------------------------------- */
/*  Properties                                                                 */
/* -------------------------------------------------------------------------- */

export type ScanMode = 'none' | 'connectable' | 'connectable-discoverable'

export interface AdapterPropertiesConfig {
  /** How long clearing scan mode takes before BEGIN_DISABLE is reported. */
  scanModeClearDelayMs: number
}

export type AdapterPropertiesEvent =
  | { kind: 'properties-state'; at: number; state: AdapterLifecycleState }
  | { kind: 'scan-mode-changed'; at: number; mode: ScanMode }

export interface AdapterPropertiesDeps {
  events: EventSink<AdapterPropertiesEvent>
  /** Called once scan mode has been cleared after onRadioDisable(). */
  onScanModeCleared: () => void
}

/* -------------------------------------------------------------------------- */
/*  Owning service                                                             */
/* -------------------------------------------------------------------------- */

export type ProfilesPhase = 'idle' | 'running' | 'stopping'

export interface AdapterServiceConfig {
  /** Profile services brought up once the radio is ON. */
  profiles: string[]
  profileStopDelayMs: number
  /** Peers auto-connected when the radio reaches ON. */
  bondedPeers: string[]
}

export type AdapterServiceEvent =
  | { kind: 'adapter-substate-changed'; at: number; state: AdapterSubState }
  | { kind: 'adapter-state-changed'; at: number; prev: AdapterLifecycleState; next: AdapterLifecycleState }
  | { kind: 'auto-connect'; at: number; peers: string[] }
  | { kind: 'profiles-started'; at: number; profiles: string[] }
  | { kind: 'profiles-stopping'; at: number; profiles: string[] }
  | { kind: 'profiles-stopped'; at: number }
  | { kind: 'listener-failed'; at: number; error: string }

/** The part of the subscriber registry the owning service relies on. */
export interface RegistryPort {
  onStateUpdate(state: AdapterSubState): void
  areLocksHeld(): boolean
}

export type AdapterStateListener = (prev: AdapterLifecycleState, next: AdapterLifecycleState) => void

export interface AdapterServiceDeps {
  registry: RegistryPort
  events: EventSink<AdapterServiceEvent>
  /** Called once every profile service has stopped. */
  onProfilesStopped: () => void
}
