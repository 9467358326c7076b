import { now } from '../core/events.js'
import type { AdapterLifecycleState, AdapterPropertiesPort } from '../core/adapter-state/types.js'
import type {
  AdapterPropertiesConfig,
  AdapterPropertiesDeps,
  ScanMode,
} from './types.js'

/** User-visible adapter state plus scan mode. */
export class AdapterProperties implements AdapterPropertiesPort {
  private readonly cfg: AdapterPropertiesConfig
  private readonly deps: AdapterPropertiesDeps

  private state: AdapterLifecycleState = 'OFF'
  private scanMode: ScanMode = 'none'
  private clearTimer: NodeJS.Timeout | null = null

  constructor(cfg: AdapterPropertiesConfig, deps: AdapterPropertiesDeps) {
    this.cfg = cfg
    this.deps = deps
  }

  public getState(): AdapterLifecycleState {
    return this.state
  }

  public setState(state: AdapterLifecycleState): void {
    this.state = state
    this.deps.events.publish({ kind: 'properties-state', at: now(), state })
  }

  public getScanMode(): ScanMode {
    return this.scanMode
  }

  public onRadioReady(): void {
    this.cancelClear()
    this.setScanMode('connectable')
  }

  public onRadioDisable(): void {
    this.cancelClear()
    this.clearTimer = setTimeout(() => {
      this.clearTimer = null
      this.setScanMode('none')
      this.deps.onScanModeCleared()
    }, this.cfg.scanModeClearDelayMs)
  }

  public stop(): void {
    this.cancelClear()
  }

  private setScanMode(mode: ScanMode): void {
    if (this.scanMode === mode) return
    this.scanMode = mode
    this.deps.events.publish({ kind: 'scan-mode-changed', at: now(), mode })
  }

  private cancelClear(): void {
    if (this.clearTimer) {
      clearTimeout(this.clearTimer)
      this.clearTimer = null
    }
  }
}
