import { AdapterStateMachine } from './core/adapter-state/AdapterStateMachine.js'
import { buildAdapterStateConfigFromEnv } from './core/adapter-state/utils.js'
import type { AdapterStateConfig, AdapterStateEvent, FatalReason } from './core/adapter-state/types.js'
import { envBool } from './core/env.js'
import type { EventSink } from './core/events.js'
import { SubscriberRegistry } from './core/subscribers/SubscriberRegistry.js'
import type { SubscriberEvent } from './core/subscribers/types.js'
import { SimulatedRadioHal } from './devices/radio-hal/SimulatedRadioHal.js'
import type { RadioHalConfig, RadioHalEvent } from './devices/radio-hal/types.js'
import { buildRadioHalConfigFromEnv } from './devices/radio-hal/utils.js'
import { AdapterProperties } from './services/AdapterProperties.js'
import { AdapterService } from './services/AdapterService.js'
import type {
  AdapterPropertiesConfig,
  AdapterPropertiesEvent,
  AdapterServiceConfig,
  AdapterServiceEvent,
} from './services/types.js'
import {
  buildAdapterPropertiesConfigFromEnv,
  buildAdapterServiceConfigFromEnv,
} from './services/utils.js'

export type RadioEvent =
  | AdapterStateEvent
  | SubscriberEvent
  | RadioHalEvent
  | AdapterServiceEvent
  | AdapterPropertiesEvent

export type RadioEventSink = EventSink<RadioEvent>

export interface RadioConfig {
  adapter: AdapterStateConfig
  hal: RadioHalConfig
  service: AdapterServiceConfig
  properties: AdapterPropertiesConfig
  /** Send a user turn-on as soon as the stack starts. */
  autoEnable: boolean
}

export function buildRadioConfigFromEnv(env: NodeJS.ProcessEnv): RadioConfig {
  return {
    adapter: buildAdapterStateConfigFromEnv(env),
    hal: buildRadioHalConfigFromEnv(env),
    service: buildAdapterServiceConfigFromEnv(env),
    properties: buildAdapterPropertiesConfigFromEnv(env),
    autoEnable: envBool(env, 'RADIO_AUTO_ENABLE', false),
  }
}

export interface RadioStackDeps {
  events: RadioEventSink
  onFatal: (reason: FatalReason) => void
}

export interface RadioStack {
  machine: AdapterStateMachine
  registry: SubscriberRegistry
  service: AdapterService
  properties: AdapterProperties
  hal: SimulatedRadioHal
  start(): void
  stop(): void
}

/**
 * Builds and cross-wires the radio controller.
 *
 * The registry and the collaborators call back into the machine, which is
 * itself built from them; those callbacks go through `send`, which is bound
 * once the machine exists.
 */
export function buildRadioStack(cfg: RadioConfig, deps: RadioStackDeps): RadioStack {
  let machine: AdapterStateMachine | null = null
  const send: AdapterStateMachine['send'] = (msg) => {
    machine?.send(msg)
  }

  const registry = new SubscriberRegistry({
    events: deps.events,
    requestPower: send,
  })

  const hal = new SimulatedRadioHal(cfg.hal, {
    events: deps.events,
    callbacks: {
      started: () => send('STARTED'),
      stateChanged: (status) => machine?.stateChangeCallback(status),
      vendorEvent: (payload) => registry.onVendorEvent(payload),
      vendorCommandComplete: (opcode, payload) => registry.onVendorCommandComplete(opcode, payload),
    },
  })

  const properties = new AdapterProperties(cfg.properties, {
    events: deps.events,
    onScanModeCleared: () => send('BEGIN_DISABLE'),
  })

  const service = new AdapterService(cfg.service, {
    registry,
    events: deps.events,
    onProfilesStopped: () => send('STOPPED'),
  })

  const built = new AdapterStateMachine(cfg.adapter, {
    hal,
    properties,
    service,
    events: deps.events,
    onFatal: deps.onFatal,
  })
  machine = built

  let stopped = false

  return {
    machine: built,
    registry,
    service,
    properties,
    hal,
    start(): void {
      built.start()
      if (cfg.autoEnable) built.send('USER_TURN_ON')
    },
    stop(): void {
      if (stopped) return
      stopped = true
      built.quit()
      built.cleanup()
      hal.stop()
      properties.stop()
      service.stop()
    },
  }
}
