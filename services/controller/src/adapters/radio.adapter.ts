// services/controller/src/adapters/radio.adapter.ts

import type { RadioStateStore } from '../core/state.js'
import type { RadioEvent } from '../stack.js'

/** Folds radio events into the snapshot the HTTP routes read. */
export class RadioStateAdapter {
  constructor(private readonly store: RadioStateStore) {}

  public handle(evt: RadioEvent): void {
    switch (evt.kind) {
      /* ---------------- State machine ----------------------------------- */
      case 'adapter-transition':
        this.store.update({ subState: evt.to })
        break

      case 'adapter-flags':
        this.store.update({ turningOn: evt.turningOn, turningOff: evt.turningOff })
        break

      case 'adapter-state-notified':
        this.store.update({ adapterState: evt.next })
        break

      case 'adapter-recoverable-error':
        this.store.recordError(evt.error, evt.at)
        break

      case 'adapter-fatal-error':
        this.store.update({ fatal: evt.reason })
        this.store.recordError(evt.error, evt.at)
        break

      /* ---------------- Subscribers ------------------------------------- */
      case 'observer-registered':
      case 'observer-unregistered':
        this.store.update({ observers: evt.count })
        break

      case 'power-hold-changed':
        this.store.update({ powerHeld: evt.held })
        break

      case 'observer-delivery-failed':
        this.store.recordError(`${evt.callback} failed: ${evt.error}`, evt.at)
        break

      /* ---------------- Hardware ---------------------------------------- */
      case 'hal-process-start':
        this.store.update({ halPhase: 'starting' })
        break

      case 'hal-process-started':
        this.store.update({ halPhase: 'started' })
        break

      case 'hal-enable-requested':
        if (evt.accepted) this.store.update({ halPhase: 'enabling' })
        break

      case 'hal-disable-requested':
        if (evt.accepted) this.store.update({ halPhase: 'disabling' })
        break

      case 'hal-status':
        this.store.update({ halPhase: evt.status === 'on' ? 'enabled' : 'idle' })
        break

      case 'hal-vendor-events':
        this.store.update({ vendorEvents: evt.enabled })
        break

      case 'hal-force-cleanup':
        this.store.update({ halPhase: 'idle', vendorEvents: false })
        break

      /* ---------------- Properties & profiles --------------------------- */
      case 'scan-mode-changed':
        this.store.update({ scanMode: evt.mode })
        break

      case 'profiles-started':
        this.store.update({ profiles: 'running' })
        break

      case 'profiles-stopping':
        this.store.update({ profiles: 'stopping' })
        break

      case 'profiles-stopped':
        this.store.update({ profiles: 'idle' })
        break

      default:
        // remaining kinds are log-only
        break
    }
  }
}
