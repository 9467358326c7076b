import { AdapterStateMachine } from './AdapterStateMachine.js'
import {
  ADAPTER_MESSAGES,
  type AdapterLifecycleState,
  type AdapterMessage,
  type AdapterPropertiesPort,
  type AdapterServicePort,
  type AdapterStateEvent,
  type AdapterSubState,
  type FatalReason,
  type RadioHal,
} from './types.js'

const TIMEOUTS = { startMs: 5000, enableMs: 8000, disableMs: 8000, stopMs: 5000, scanModeMs: 2000 }

class Harness {
  enableOk = true
  disableOk = true
  vendorOk = true
  lockHeld = false
  stopInProgress = false
  startThrows = false
  lifecycle: AdapterLifecycleState = 'OFF'

  readonly notifications: string[] = []
  readonly subStates: AdapterSubState[] = []
  readonly calls: string[] = []
  readonly events: AdapterStateEvent[] = []
  readonly fatal: FatalReason[] = []
  readonly machine: AdapterStateMachine

  constructor() {
    const hal: RadioHal = {
      processStart: () => {
        if (this.startThrows) throw new Error('hal offline')
        this.calls.push('processStart')
      },
      enable: () => {
        this.calls.push('enable')
        return this.enableOk
      },
      disable: () => {
        this.calls.push('disable')
        return this.disableOk
      },
      setVendorEventsEnabled: (enabled) => {
        this.calls.push(`vendorEvents:${enabled}`)
        return this.vendorOk
      },
      forceCleanup: () => {
        this.calls.push('forceCleanup')
      },
    }
    const properties: AdapterPropertiesPort = {
      getState: () => this.lifecycle,
      setState: (s) => {
        this.lifecycle = s
      },
      onRadioReady: () => {
        this.calls.push('onRadioReady')
      },
      onRadioDisable: () => {
        this.calls.push('onRadioDisable')
      },
    }
    const service: AdapterServicePort = {
      updateStateMachineState: (s) => {
        this.subStates.push(s)
      },
      updateAdapterState: (prev, next) => {
        this.notifications.push(`${prev}->${next}`)
      },
      autoConnect: () => {
        this.calls.push('autoConnect')
      },
      stopProfileServices: () => {
        this.calls.push('stopProfileServices')
        return this.stopInProgress
      },
      isPowerLockHeld: () => this.lockHeld,
    }

    this.machine = new AdapterStateMachine(
      { timeouts: TIMEOUTS },
      {
        hal,
        properties,
        service,
        events: { publish: (e) => { this.events.push(e) } },
        onFatal: (r) => { this.fatal.push(r) },
      }
    )
    this.machine.start()
  }

  async send(...msgs: AdapterMessage[]): Promise<void> {
    for (const m of msgs) this.machine.send(m)
    await this.machine.idle()
  }

  async advance(ms: number): Promise<void> {
    vi.advanceTimersByTime(ms)
    await this.machine.idle()
  }

  async toOn(): Promise<void> {
    await this.send('USER_TURN_ON', 'STARTED', 'ENABLED_READY')
  }

  async toPowered(): Promise<void> {
    await this.send('POWER_ON', 'STARTED', 'ENABLED_READY')
  }

  clear(): void {
    this.notifications.length = 0
    this.calls.length = 0
    this.events.length = 0
  }

  /** One entry per classified message, e.g. `deferred USER_TURN_OFF@PENDING`. */
  outcomes(): string[] {
    const out: string[] = []
    for (const e of this.events) {
      switch (e.kind) {
        case 'adapter-message-handled':
          out.push(`handled ${e.message}@${e.state}`)
          break
        case 'adapter-message-ignored':
          out.push(`ignored ${e.message}@${e.state}`)
          break
        case 'adapter-message-deferred':
          out.push(`deferred ${e.message}@${e.state}`)
          break
        case 'adapter-message-rejected':
          out.push(`rejected ${e.message}@${e.state}`)
          break
        case 'adapter-message-dropped':
          out.push(`dropped ${e.message}`)
          break
        case 'adapter-fatal-error':
          out.push(`fatal ${e.reason}`)
          break
        default:
          break
      }
    }
    return out
  }

  errors(): string[] {
    const out: string[] = []
    for (const e of this.events) {
      if (e.kind === 'adapter-recoverable-error') out.push(e.error)
    }
    return out
  }
}

describe('AdapterStateMachine', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('user turn-on', () => {
    it('walks OFF -> PENDING -> ON with TURNING_ON then ON', async () => {
      const h = new Harness()
      expect(h.subStates).toEqual(['OFF'])

      await h.send('USER_TURN_ON')
      expect(h.machine.getState()).toBe('PENDING')
      expect(h.machine.isTurningOn()).toBe(true)
      expect(h.machine.isUserOperation()).toBe(true)
      expect(h.machine.hasTimer('START_TIMEOUT')).toBe(true)
      expect(h.notifications).toEqual(['OFF->TURNING_ON'])
      expect(h.calls).toEqual(['processStart'])

      await h.send('STARTED')
      expect(h.machine.hasTimer('START_TIMEOUT')).toBe(false)
      expect(h.machine.hasTimer('ENABLE_TIMEOUT')).toBe(true)

      await h.send('ENABLED_READY')
      expect(h.machine.getState()).toBe('ON')
      expect(h.machine.isTurningOn()).toBe(false)
      expect(h.machine.isUserOperation()).toBe(false)
      expect(h.machine.hasTimer('ENABLE_TIMEOUT')).toBe(false)
      expect(h.notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->ON'])
      expect(h.calls).toEqual(['processStart', 'enable', 'vendorEvents:true', 'onRadioReady', 'autoConnect'])
      expect(h.subStates).toEqual(['OFF', 'PENDING', 'ON'])
      expect(h.lifecycle).toBe('ON')
    })

    it('ignores a duplicate user turn-on while one is in flight', async () => {
      const h = new Harness()
      await h.send('USER_TURN_ON', 'USER_TURN_ON')
      expect(h.outcomes()).toEqual(['handled USER_TURN_ON@OFF', 'ignored USER_TURN_ON@PENDING'])
      expect(h.notifications).toEqual(['OFF->TURNING_ON'])
    })

    it('returns to OFF and notifies OFF when enable fails', async () => {
      const h = new Harness()
      h.enableOk = false
      await h.send('USER_TURN_ON', 'STARTED')
      expect(h.machine.getState()).toBe('OFF')
      expect(h.machine.isTurningOn()).toBe(false)
      expect(h.machine.hasTimer('ENABLE_TIMEOUT')).toBe(false)
      expect(h.notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->OFF'])
      expect(h.errors()).toEqual(['radio enable failed'])
    })

    it('treats DISABLED during turn-on as an initialization failure', async () => {
      const h = new Harness()
      await h.send('USER_TURN_ON', 'STARTED', 'DISABLED')
      expect(h.machine.getState()).toBe('OFF')
      expect(h.machine.hasTimer('ENABLE_TIMEOUT')).toBe(false)
      expect(h.calls).toContain('stopProfileServices')
      expect(h.notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->OFF'])
      expect(h.errors()).toEqual(['radio failed to initialize'])
    })

    it('logs a vendor-event registration failure and still comes up', async () => {
      const h = new Harness()
      h.vendorOk = false
      await h.toOn()
      expect(h.machine.getState()).toBe('ON')
      expect(h.errors()).toEqual(['unable to enable vendor events'])
    })
  })

  describe('user turn-off', () => {
    it('walks ON -> PENDING -> OFF through profile stop', async () => {
      const h = new Harness()
      await h.toOn()
      h.clear()
      h.stopInProgress = true

      await h.send('USER_TURN_OFF')
      expect(h.machine.getState()).toBe('PENDING')
      expect(h.machine.isTurningOff()).toBe(true)
      expect(h.machine.hasTimer('SET_SCAN_MODE_TIMEOUT')).toBe(true)
      expect(h.notifications).toEqual(['ON->TURNING_OFF'])
      expect(h.calls).toEqual(['onRadioDisable'])

      await h.send('BEGIN_DISABLE')
      expect(h.machine.hasTimer('SET_SCAN_MODE_TIMEOUT')).toBe(false)
      expect(h.machine.hasTimer('DISABLE_TIMEOUT')).toBe(true)
      expect(h.calls).toEqual(['onRadioDisable', 'vendorEvents:false', 'disable'])

      await h.send('DISABLED')
      expect(h.machine.getState()).toBe('PENDING')
      expect(h.machine.hasTimer('DISABLE_TIMEOUT')).toBe(false)
      expect(h.machine.hasTimer('STOP_TIMEOUT')).toBe(true)

      await h.send('STOPPED')
      expect(h.machine.getState()).toBe('OFF')
      expect(h.machine.isTurningOff()).toBe(false)
      expect(h.machine.hasTimer('STOP_TIMEOUT')).toBe(false)
      expect(h.notifications).toEqual(['ON->TURNING_OFF', 'TURNING_OFF->OFF'])
      expect(h.subStates.slice(-2)).toEqual(['PENDING', 'OFF'])
      expect(h.fatal).toEqual([])
    })

    it('completes immediately when no profile was running', async () => {
      const h = new Harness()
      await h.toOn()
      await h.send('USER_TURN_OFF', 'BEGIN_DISABLE', 'DISABLED')
      expect(h.machine.getState()).toBe('OFF')
      expect(h.machine.hasTimer('STOP_TIMEOUT')).toBe(false)
      expect(h.notifications.slice(-1)).toEqual(['TURNING_OFF->OFF'])
    })

    it('disables anyway when clearing scan mode times out', async () => {
      const h = new Harness()
      await h.toOn()
      await h.send('USER_TURN_OFF')
      h.clear()

      await h.advance(1999)
      expect(h.calls).toEqual([])

      await h.advance(1)
      expect(h.calls).toEqual(['vendorEvents:false', 'disable'])
      expect(h.machine.hasTimer('DISABLE_TIMEOUT')).toBe(true)
      expect(h.errors()).toEqual(['timed out clearing scan mode, disabling anyway'])
    })

    it('returns to POWERED without a user-visible change while a power lock is held', async () => {
      const h = new Harness()
      await h.toOn()
      h.lockHeld = true
      await h.send('USER_TURN_OFF', 'BEGIN_DISABLE')

      expect(h.machine.getState()).toBe('POWERED')
      expect(h.machine.isTurningOff()).toBe(false)
      expect(h.machine.hasTimer('DISABLE_TIMEOUT')).toBe(false)
      expect(h.calls).not.toContain('disable')
      expect(h.notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->ON', 'ON->TURNING_OFF'])
      expect(h.subStates.slice(-1)).toEqual(['POWERED'])
    })

    it('goes back to ON when the radio refuses to disable', async () => {
      const h = new Harness()
      await h.toOn()
      h.disableOk = false
      h.clear()
      await h.send('USER_TURN_OFF', 'BEGIN_DISABLE')

      expect(h.machine.getState()).toBe('ON')
      expect(h.machine.hasTimer('DISABLE_TIMEOUT')).toBe(false)
      expect(h.notifications).toEqual(['ON->TURNING_OFF', 'TURNING_OFF->ON'])
      expect(h.calls).toEqual(['onRadioDisable', 'vendorEvents:false', 'disable', 'autoConnect'])
      expect(h.errors()).toEqual(['radio disable failed'])
    })
  })

  describe('automatic power hold', () => {
    it('reaches POWERED with no user-visible notification', async () => {
      const h = new Harness()
      await h.toPowered()
      expect(h.machine.getState()).toBe('POWERED')
      expect(h.notifications).toEqual([])
      expect(h.calls).toEqual(['processStart', 'enable', 'vendorEvents:true'])
      expect(h.subStates).toEqual(['OFF', 'PENDING', 'POWERED'])
    })

    it('powers back down silently on POWER_OFF', async () => {
      const h = new Harness()
      await h.toPowered()
      await h.send('POWER_OFF')
      expect(h.machine.getState()).toBe('PENDING')
      expect(h.machine.isTurningOff()).toBe(true)
      expect(h.machine.isUserOperation()).toBe(false)
      expect(h.machine.hasTimer('DISABLE_TIMEOUT')).toBe(true)

      await h.send('DISABLED')
      expect(h.machine.getState()).toBe('OFF')
      expect(h.notifications).toEqual([])
    })

    it('stays POWERED when disable fails', async () => {
      const h = new Harness()
      await h.toPowered()
      h.disableOk = false
      await h.send('POWER_OFF')
      expect(h.machine.getState()).toBe('POWERED')
      expect(h.machine.isTurningOff()).toBe(false)
      expect(h.machine.hasTimer('DISABLE_TIMEOUT')).toBe(false)
      expect(h.errors()).toEqual(['radio disable failed'])
    })

    it('upgrades to ON on a user turn-on', async () => {
      const h = new Harness()
      await h.toPowered()
      h.clear()
      await h.send('USER_TURN_ON')
      expect(h.machine.getState()).toBe('ON')
      expect(h.notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->ON'])
      expect(h.calls).toEqual(['onRadioReady', 'autoConnect'])
    })

    it('upgrades an automatic turn-on without resetting its timer', async () => {
      const h = new Harness()
      await h.send('POWER_ON')
      await h.advance(3000)

      await h.send('USER_TURN_ON')
      expect(h.machine.isUserOperation()).toBe(true)
      expect(h.notifications).toEqual(['OFF->TURNING_ON'])
      expect(h.outcomes().slice(-1)).toEqual(['handled USER_TURN_ON@PENDING'])

      await h.advance(1999)
      expect(h.machine.getState()).toBe('PENDING')

      await h.advance(1)
      expect(h.machine.getState()).toBe('OFF')
      expect(h.notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->OFF'])
      expect(h.fatal).toEqual([])
    })
  })

  describe('deferral', () => {
    it('replays a turn-off requested during turn-on once ON is reached', async () => {
      const h = new Harness()
      await h.send('USER_TURN_ON', 'USER_TURN_OFF')
      expect(h.outcomes()).toEqual(['handled USER_TURN_ON@OFF', 'deferred USER_TURN_OFF@PENDING'])

      await h.send('STARTED', 'ENABLED_READY')
      expect(h.machine.getState()).toBe('PENDING')
      expect(h.machine.isTurningOff()).toBe(true)
      expect(h.notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->ON', 'ON->TURNING_OFF'])
      expect(h.calls).toContain('onRadioDisable')

      const replayed = h.events.filter(e => e.kind === 'adapter-deferred-replayed')
      expect(replayed).toHaveLength(1)
      expect(replayed[0]).toMatchObject({ count: 1, state: 'ON' })
    })

    it('replays several deferred messages in the order they arrived', async () => {
      const h = new Harness()
      await h.send('POWER_ON', 'USER_TURN_OFF', 'POWER_OFF', 'STARTED', 'ENABLED_READY')

      expect(h.outcomes()).toEqual([
        'handled POWER_ON@OFF',
        'deferred USER_TURN_OFF@PENDING',
        'deferred POWER_OFF@PENDING',
        'handled STARTED@PENDING',
        'handled ENABLED_READY@PENDING',
        'ignored USER_TURN_OFF@POWERED',
        'handled POWER_OFF@POWERED',
      ])
      expect(h.machine.getState()).toBe('PENDING')
      expect(h.machine.isTurningOff()).toBe(true)
    })
  })

  describe('timeouts', () => {
    it('recovers from a start timeout without notifying an automatic request', async () => {
      const h = new Harness()
      await h.send('POWER_ON')
      await h.advance(5000)
      expect(h.machine.getState()).toBe('OFF')
      expect(h.notifications).toEqual([])
      expect(h.errors()).toEqual(['timed out waiting for radio start'])
      expect(h.fatal).toEqual([])
    })

    it('recovers from an enable timeout and notifies OFF for a user request', async () => {
      const h = new Harness()
      await h.send('USER_TURN_ON', 'STARTED')
      await h.advance(7999)
      expect(h.machine.getState()).toBe('PENDING')

      await h.advance(1)
      expect(h.machine.getState()).toBe('OFF')
      expect(h.notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->OFF'])
      expect(h.fatal).toEqual([])
    })

    it('is fatal when the radio never reports disabled', async () => {
      const h = new Harness()
      await h.toOn()
      await h.send('USER_TURN_OFF', 'BEGIN_DISABLE')
      await h.advance(8000)

      expect(h.fatal).toEqual(['disable-timeout'])
      expect(h.machine.getFatalReason()).toBe('disable-timeout')
      expect(h.machine.getState()).toBe('OFF')
      expect(h.calls).toContain('forceCleanup')
      expect(h.notifications.slice(-1)).toEqual(['TURNING_OFF->OFF'])
      expect(h.outcomes().slice(-1)).toEqual(['fatal disable-timeout'])

      const before = h.events.length
      await h.send('USER_TURN_ON')
      expect(h.events).toHaveLength(before + 1)
      expect(h.outcomes().slice(-1)).toEqual(['dropped USER_TURN_ON'])
      expect(h.machine.getState()).toBe('OFF')
      expect(h.calls).not.toContain('processStart')
    })

    it('is fatal when profile services never stop', async () => {
      const h = new Harness()
      await h.toOn()
      h.stopInProgress = true
      await h.send('USER_TURN_OFF', 'BEGIN_DISABLE', 'DISABLED')
      await h.advance(4999)
      expect(h.fatal).toEqual([])

      await h.advance(1)
      expect(h.fatal).toEqual(['stop-timeout'])
      expect(h.calls).not.toContain('forceCleanup')
      expect(h.notifications.slice(-1)).toEqual(['TURNING_OFF->OFF'])
    })

    it('notifies OFF on a fatal timeout even for an automatic power-down', async () => {
      const h = new Harness()
      await h.toPowered()
      await h.send('POWER_OFF')
      await h.advance(8000)
      expect(h.fatal).toEqual(['disable-timeout'])
      expect(h.notifications).toEqual(['OFF->OFF'])
    })
  })

  describe('hardware status callback', () => {
    it('maps on/off onto ENABLED_READY/DISABLED and reports anything else', async () => {
      const h = new Harness()
      await h.send('POWER_ON', 'STARTED')

      h.machine.stateChangeCallback('on')
      await h.machine.idle()
      expect(h.machine.getState()).toBe('POWERED')

      h.machine.stateChangeCallback('unknown')
      expect(h.errors()).toEqual(['unexpected radio status=unknown'])

      h.machine.stateChangeCallback('off')
      await h.machine.idle()
      expect(h.outcomes().slice(-1)).toEqual(['rejected DISABLED@POWERED'])
    })
  })

  describe('classification', () => {
    const setups: Array<[string, (h: Harness) => Promise<void>]> = [
      ['OFF', async () => {}],
      ['PENDING', async (h) => { await h.send('POWER_ON') }],
      ['POWERED', async (h) => { await h.toPowered() }],
      ['ON', async (h) => { await h.toOn() }],
    ]

    it('classifies every message exactly once in every state', async () => {
      for (const [, setup] of setups) {
        for (const msg of ADAPTER_MESSAGES) {
          const h = new Harness()
          await setup(h)
          h.clear()
          await h.send(msg)
          expect(h.outcomes()).toHaveLength(1)
        }
      }
    })

    it('rejects messages a state does not expect', async () => {
      const off = new Harness()
      await off.send('STARTED')
      expect(off.outcomes()).toEqual(['rejected STARTED@OFF'])
      expect(off.machine.getState()).toBe('OFF')

      const on = new Harness()
      await on.toOn()
      on.clear()
      await on.send('BEGIN_DISABLE')
      expect(on.outcomes()).toEqual(['rejected BEGIN_DISABLE@ON'])
    })
  })

  describe('cleanup', () => {
    it('drops every message after collaborators are detached', async () => {
      const h = new Harness()
      await h.toOn()
      h.clear()

      h.machine.cleanup()
      await h.send('USER_TURN_OFF')

      expect(h.calls).toEqual([])
      expect(h.notifications).toEqual([])
      expect(h.events.map(e => e.kind)).toEqual(['adapter-detached', 'adapter-message-dropped'])
      expect(h.machine.getState()).toBe('ON')
    })

    it('keeps processing after a collaborator throws', async () => {
      const h = new Harness()
      h.startThrows = true
      await h.send('POWER_ON')
      expect(h.errors()).toEqual(['handler failed: hal offline'])
      expect(h.machine.getState()).toBe('OFF')
      expect(h.machine.isTurningOn()).toBe(false)
      expect(h.machine.hasTimer('START_TIMEOUT')).toBe(false)
      expect(h.events.some(e => e.kind === 'adapter-flags')).toBe(false)

      h.startThrows = false
      await h.send('POWER_ON')
      expect(h.machine.getState()).toBe('PENDING')
      expect(h.machine.isTurningOn()).toBe(true)
      expect(h.machine.hasTimer('START_TIMEOUT')).toBe(true)
    })

    it('keeps timers armed before a failed handler', async () => {
      const h = new Harness()
      h.machine.sendDelayed('START_TIMEOUT', 60_000)
      h.startThrows = true
      await h.send('USER_TURN_ON')

      expect(h.errors()).toEqual(['handler failed: hal offline'])
      expect(h.machine.isUserOperation()).toBe(false)
      expect(h.machine.hasTimer('START_TIMEOUT')).toBe(true)
    })

    it('holds messages sent before start and handles them once started', async () => {
      const events: AdapterStateEvent[] = []
      const calls: string[] = []
      const idleHal: RadioHal = {
        processStart: () => { calls.push('processStart') },
        enable: () => true,
        disable: () => true,
        setVendorEventsEnabled: () => true,
        forceCleanup: () => {},
      }
      const machine = new AdapterStateMachine(
        { timeouts: TIMEOUTS },
        {
          hal: idleHal,
          properties: {
            getState: () => 'OFF',
            setState: () => {},
            onRadioReady: () => {},
            onRadioDisable: () => {},
          },
          service: {
            updateStateMachineState: () => {},
            updateAdapterState: () => {},
            autoConnect: () => {},
            stopProfileServices: () => false,
            isPowerLockHeld: () => true,
          },
          events: { publish: (e) => { events.push(e) } },
          onFatal: () => {},
        }
      )

      machine.send('POWER_ON')
      await machine.idle()
      expect(calls).toEqual([])
      expect(machine.getState()).toBe('OFF')

      machine.start()
      await machine.idle()
      expect(calls).toEqual(['processStart'])
      expect(machine.getState()).toBe('PENDING')
      expect(events.some(e => e.kind === 'adapter-message-dropped')).toBe(false)
      machine.quit()
    })
  })
})
