import { now } from '../../core/events.js'
import type { RadioHal } from '../../core/adapter-state/types.js'
import type {
  RadioHalCallbacks,
  RadioHalConfig,
  RadioHalDeps,
  RadioHalEvent,
  RadioHalEventSink,
  RadioHalPhase,
} from './types.js'

/**
 * In-process stand-in for the radio hardware layer. Each lifecycle call
 * returns immediately and reports completion through the callbacks after the
 * configured delay.
 */
export class SimulatedRadioHal implements RadioHal {
  private readonly cfg: RadioHalConfig
  private readonly events: RadioHalEventSink
  private readonly callbacks: RadioHalCallbacks

  private phase: RadioHalPhase = 'idle'
  private vendorEventsEnabled = false
  private failEnable: boolean
  private failDisable: boolean
  private readonly timers = new Set<NodeJS.Timeout>()

  constructor(cfg: RadioHalConfig, deps: RadioHalDeps) {
    this.cfg = cfg
    this.events = deps.events
    this.callbacks = deps.callbacks
    this.failEnable = cfg.failEnable
    this.failDisable = cfg.failDisable
  }

  /* ---------------------------------------------------------------------- */
  /*  RadioHal                                                               */
  /* ---------------------------------------------------------------------- */

  public processStart(): void {
    this.phase = 'starting'
    this.emit({ kind: 'hal-process-start', at: now() })
    this.later(this.cfg.startDelayMs, () => {
      this.phase = 'started'
      this.emit({ kind: 'hal-process-started', at: now() })
      this.callbacks.started()
    })
  }

  public enable(): boolean {
    const accepted = !this.failEnable
    this.emit({ kind: 'hal-enable-requested', at: now(), accepted })
    if (!accepted) return false

    this.phase = 'enabling'
    this.later(this.cfg.enableDelayMs, () => {
      this.phase = 'enabled'
      this.report('on')
    })
    return true
  }

  public disable(): boolean {
    const accepted = !this.failDisable
    this.emit({ kind: 'hal-disable-requested', at: now(), accepted })
    if (!accepted) return false

    this.phase = 'disabling'
    this.later(this.cfg.disableDelayMs, () => {
      this.phase = 'idle'
      this.vendorEventsEnabled = false
      this.report('off')
    })
    return true
  }

  public setVendorEventsEnabled(enabled: boolean): boolean {
    this.vendorEventsEnabled = enabled
    this.emit({ kind: 'hal-vendor-events', at: now(), enabled })
    return true
  }

  public forceCleanup(): void {
    this.clearTimers()
    this.phase = 'idle'
    this.vendorEventsEnabled = false
    this.emit({ kind: 'hal-force-cleanup', at: now() })
  }

  /* ---------------------------------------------------------------------- */
  /*  Simulation controls                                                    */
  /* ---------------------------------------------------------------------- */

  /** Emits a vendor event if the controller has enabled them. */
  public emitVendorEvent(payload: Uint8Array): boolean {
    const delivered = this.vendorEventsEnabled
    this.emit({ kind: 'hal-vendor-event', at: now(), length: payload.length, delivered })
    if (delivered) this.callbacks.vendorEvent(payload)
    return delivered
  }

  public completeVendorCommand(opcode: number, payload: Uint8Array): void {
    this.callbacks.vendorCommandComplete(opcode, payload)
  }

  public setFailures(failures: { enable?: boolean; disable?: boolean }): void {
    if (failures.enable !== undefined) this.failEnable = failures.enable
    if (failures.disable !== undefined) this.failDisable = failures.disable
  }

  public getPhase(): RadioHalPhase {
    return this.phase
  }

  public isPowered(): boolean {
    return this.phase === 'enabled' || this.phase === 'disabling'
  }

  public areVendorEventsEnabled(): boolean {
    return this.vendorEventsEnabled
  }

  public stop(): void {
    this.clearTimers()
  }

  /* ---------------------------------------------------------------------- */
  /*  Internals                                                              */
  /* ---------------------------------------------------------------------- */

  private report(status: 'on' | 'off'): void {
    this.emit({ kind: 'hal-status', at: now(), status })
    this.callbacks.stateChanged(status)
  }

  private later(ms: number, fn: () => void): void {
    const t = setTimeout(() => {
      this.timers.delete(t)
      fn()
    }, ms)
    this.timers.add(t)
  }

  private clearTimers(): void {
    for (const t of this.timers) clearTimeout(t)
    this.timers.clear()
  }

  private emit(evt: RadioHalEvent): void {
    this.events.publish(evt)
  }
}
