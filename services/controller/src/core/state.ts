import { EventEmitter } from 'node:events'
import type {
  AdapterLifecycleState,
  AdapterSubState,
  FatalReason,
} from './adapter-state/types.js'
import type { RadioHalPhase } from '../devices/radio-hal/types.js'
import type { ProfilesPhase, ScanMode } from '../services/types.js'

export interface RadioSnapshot {
  version: number
  subState: AdapterSubState
  adapterState: AdapterLifecycleState
  turningOn: boolean
  turningOff: boolean
  powerHeld: boolean
  observers: number
  scanMode: ScanMode
  halPhase: RadioHalPhase
  vendorEvents: boolean
  profiles: ProfilesPhase
  fatal: FatalReason | null
  lastError: string | null
  errorHistory: Array<{ at: number; message: string }>
  updatedAt: number
}

export type RadioSnapshotPatch = Partial<Omit<RadioSnapshot, 'version' | 'updatedAt' | 'errorHistory'>>

function initialSnapshot(): RadioSnapshot {
  return {
    version: 0,
    subState: 'OFF',
    adapterState: 'OFF',
    turningOn: false,
    turningOff: false,
    powerHeld: false,
    observers: 0,
    scanMode: 'none',
    halPhase: 'idle',
    vendorEvents: false,
    profiles: 'idle',
    fatal: null,
    lastError: null,
    errorHistory: [],
    updatedAt: Date.now(),
  }
}

/**
 * Read model for the HTTP surface. Every update bumps `version` and emits
 * `change` with the new snapshot.
 */
export class RadioStateStore {
  public readonly events = new EventEmitter()
  private state: RadioSnapshot = initialSnapshot()
  private readonly maxErrorHistory: number

  constructor(opts: { maxErrorHistory?: number } = {}) {
    this.maxErrorHistory = opts.maxErrorHistory ?? 25
  }

  public getSnapshot(): RadioSnapshot {
    return { ...this.state, errorHistory: [...this.state.errorHistory] }
  }

  public update(patch: RadioSnapshotPatch): void {
    this.commit({ ...this.state, ...patch })
  }

  public recordError(message: string, at: number): void {
    const errorHistory = [...this.state.errorHistory, { at, message }]
    while (errorHistory.length > this.maxErrorHistory) errorHistory.shift()
    this.commit({ ...this.state, lastError: message, errorHistory })
  }

  private commit(next: RadioSnapshot): void {
    this.state = { ...next, version: this.state.version + 1, updatedAt: Date.now() }
    this.events.emit('change', this.getSnapshot())
  }
}
