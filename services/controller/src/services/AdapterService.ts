import { errorMessage, now } from '../core/events.js'
import type {
  AdapterLifecycleState,
  AdapterServicePort,
  AdapterSubState,
} from '../core/adapter-state/types.js'
import type {
  AdapterServiceConfig,
  AdapterServiceDeps,
  AdapterStateListener,
  ProfilesPhase,
} from './types.js'

/**
 * Owning service seen by the state machine: forwards sub-state changes to
 * the subscriber registry, runs the profile services while the radio is ON
 * and broadcasts user-visible state changes to listeners.
 */
export class AdapterService implements AdapterServicePort {
  private readonly cfg: AdapterServiceConfig
  private readonly deps: AdapterServiceDeps
  private readonly listeners = new Set<AdapterStateListener>()

  private subState: AdapterSubState = 'OFF'
  private profiles: ProfilesPhase = 'idle'
  private stopTimer: NodeJS.Timeout | null = null

  constructor(cfg: AdapterServiceConfig, deps: AdapterServiceDeps) {
    this.cfg = cfg
    this.deps = deps
  }

  /* ---- AdapterServicePort ---------------------------------------------- */

  public updateStateMachineState(state: AdapterSubState): void {
    this.subState = state
    this.deps.events.publish({ kind: 'adapter-substate-changed', at: now(), state })
    this.deps.registry.onStateUpdate(state)
    if (state === 'ON') this.startProfileServices()
  }

  public updateAdapterState(prev: AdapterLifecycleState, next: AdapterLifecycleState): void {
    this.deps.events.publish({ kind: 'adapter-state-changed', at: now(), prev, next })
    for (const l of this.listeners) {
      try {
        l(prev, next)
      } catch (err) {
        this.deps.events.publish({ kind: 'listener-failed', at: now(), error: errorMessage(err) })
      }
    }
  }

  public autoConnect(): void {
    this.deps.events.publish({ kind: 'auto-connect', at: now(), peers: [...this.cfg.bondedPeers] })
  }

  public stopProfileServices(): boolean {
    if (this.profiles === 'stopping') return true
    if (this.profiles === 'idle') return false

    this.profiles = 'stopping'
    this.deps.events.publish({ kind: 'profiles-stopping', at: now(), profiles: [...this.cfg.profiles] })
    this.stopTimer = setTimeout(() => {
      this.stopTimer = null
      this.profiles = 'idle'
      this.deps.events.publish({ kind: 'profiles-stopped', at: now() })
      this.deps.onProfilesStopped()
    }, this.cfg.profileStopDelayMs)
    return true
  }

  public isPowerLockHeld(): boolean {
    return this.deps.registry.areLocksHeld()
  }

  /* ---- listeners & queries --------------------------------------------- */

  public onAdapterStateChange(listener: AdapterStateListener): () => void {
    this.listeners.add(listener)
    return () => { this.listeners.delete(listener) }
  }

  public getSubState(): AdapterSubState {
    return this.subState
  }

  public getProfilesPhase(): ProfilesPhase {
    return this.profiles
  }

  public stop(): void {
    if (this.stopTimer) {
      clearTimeout(this.stopTimer)
      this.stopTimer = null
    }
    this.listeners.clear()
  }

  /* ---- internals ------------------------------------------------------- */

  private startProfileServices(): void {
    if (this.profiles !== 'idle' || this.cfg.profiles.length === 0) return
    this.profiles = 'running'
    this.deps.events.publish({ kind: 'profiles-started', at: now(), profiles: [...this.cfg.profiles] })
  }
}
