import { buildRadioConfigFromEnv, buildRadioStack, type RadioConfig, type RadioEvent } from './stack.js'
import type { FatalReason } from './core/adapter-state/types.js'
import type { RadioObserver } from './core/subscribers/types.js'

function testConfig(overrides: Partial<RadioConfig['hal']> = {}): RadioConfig {
  const cfg = buildRadioConfigFromEnv({
    RADIO_HAL_START_DELAY_MS: '100',
    RADIO_HAL_ENABLE_DELAY_MS: '200',
    RADIO_HAL_DISABLE_DELAY_MS: '50',
    RADIO_PROFILE_STOP_DELAY_MS: '30',
    RADIO_SCAN_MODE_CLEAR_DELAY_MS: '10',
    RADIO_PROFILES: 'a2dp,gatt',
  })
  return { ...cfg, hal: { ...cfg.hal, ...overrides } }
}

function makeObserver() {
  const calls: string[] = []
  const observer: RadioObserver = {
    onInterfaceReady: () => { calls.push('ready') },
    onInterfaceDown: () => { calls.push('down') },
    onVendorEvent: (p) => { calls.push(`vendor:${Buffer.from(p).toString('hex')}`) },
    onVendorCommandComplete: (op) => { calls.push(`complete:${op}`) },
  }
  return { observer, calls }
}

function makeStack(cfg: RadioConfig = testConfig()) {
  const events: RadioEvent[] = []
  const fatal: FatalReason[] = []
  const stack = buildRadioStack(cfg, {
    events: { publish: (e) => { events.push(e) } },
    onFatal: (r) => { fatal.push(r) },
  })
  const notifications: string[] = []
  stack.service.onAdapterStateChange((prev, next) => { notifications.push(`${prev}->${next}`) })
  stack.start()

  const settle = async (ms = 1000): Promise<void> => {
    await vi.advanceTimersByTimeAsync(ms)
    await stack.machine.idle()
  }

  return { stack, events, fatal, notifications, settle }
}

describe('radio stack', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('turns the radio on and off for a user request', async () => {
    const { stack, notifications, fatal, settle } = makeStack()

    stack.machine.send('USER_TURN_ON')
    await settle()
    expect(stack.machine.getState()).toBe('ON')
    expect(stack.properties.getState()).toBe('ON')
    expect(stack.properties.getScanMode()).toBe('connectable')
    expect(stack.service.getProfilesPhase()).toBe('running')
    expect(stack.hal.areVendorEventsEnabled()).toBe(true)
    expect(notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->ON'])

    stack.machine.send('USER_TURN_OFF')
    await settle()
    expect(stack.machine.getState()).toBe('OFF')
    expect(stack.properties.getScanMode()).toBe('none')
    expect(stack.service.getProfilesPhase()).toBe('idle')
    expect(stack.hal.getPhase()).toBe('idle')
    expect(notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->ON', 'ON->TURNING_OFF', 'TURNING_OFF->OFF'])
    expect(fatal).toEqual([])
  })

  it('powers the radio for an observer and releases it when the observer leaves', async () => {
    const { stack, notifications, settle } = makeStack()
    const { observer, calls } = makeObserver()

    expect(stack.registry.register(observer)).toBe(true)
    await settle()
    expect(stack.machine.getState()).toBe('POWERED')
    expect(calls).toEqual(['ready'])
    expect(notifications).toEqual([])

    stack.registry.setFilter(observer, Uint8Array.from([0xf0]), Uint8Array.from([0x30]))
    stack.hal.emitVendorEvent(Uint8Array.from([0x35]))
    stack.hal.emitVendorEvent(Uint8Array.from([0x25]))
    stack.hal.completeVendorCommand(9, Uint8Array.from([]))
    expect(calls).toEqual(['ready', 'vendor:35', 'complete:9'])

    stack.registry.unregister(observer)
    await settle()
    expect(stack.machine.getState()).toBe('OFF')
    expect(stack.hal.areVendorEventsEnabled()).toBe(false)
    expect(notifications).toEqual([])
  })

  it('keeps the radio powered for an observer when the user turns it off', async () => {
    const { stack, notifications, settle } = makeStack()
    const { observer, calls } = makeObserver()

    stack.registry.register(observer)
    await settle()
    stack.machine.send('USER_TURN_ON')
    await settle()
    expect(stack.machine.getState()).toBe('ON')
    expect(notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->ON'])

    stack.machine.send('USER_TURN_OFF')
    await settle()
    expect(stack.machine.getState()).toBe('POWERED')
    expect(stack.hal.isPowered()).toBe(true)
    expect(calls).toEqual(['ready'])
    expect(notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->ON', 'ON->TURNING_OFF'])

    stack.registry.unregister(observer)
    await settle()
    expect(stack.machine.getState()).toBe('OFF')
    expect(stack.service.getProfilesPhase()).toBe('idle')
  })

  it('reports a fatal outcome when the radio never finishes disabling', async () => {
    const { stack, fatal, settle } = makeStack(testConfig({ disableDelayMs: 100_000 }))

    stack.machine.send('USER_TURN_ON')
    await settle()
    stack.machine.send('USER_TURN_OFF')
    await settle(10_000)

    expect(fatal).toEqual(['disable-timeout'])
    expect(stack.machine.getState()).toBe('OFF')
    expect(stack.hal.getPhase()).toBe('idle')
  })

  it('recovers to OFF when the radio refuses to enable', async () => {
    const { stack, notifications, fatal, settle } = makeStack(testConfig({ failEnable: true }))

    stack.machine.send('USER_TURN_ON')
    await settle()

    expect(stack.machine.getState()).toBe('OFF')
    expect(notifications).toEqual(['OFF->TURNING_ON', 'TURNING_ON->OFF'])
    expect(fatal).toEqual([])
  })

  it('turns on at start when auto-enable is configured', async () => {
    const { stack, settle } = makeStack({ ...testConfig(), autoEnable: true })
    await settle()
    expect(stack.machine.getState()).toBe('ON')
  })

  it('powers the radio for an observer registered before start', async () => {
    const events: RadioEvent[] = []
    const stack = buildRadioStack(testConfig(), {
      events: { publish: (e) => { events.push(e) } },
      onFatal: () => {},
    })
    const { observer, calls } = makeObserver()

    expect(stack.registry.register(observer)).toBe(true)
    expect(stack.registry.areLocksHeld()).toBe(true)

    stack.start()
    await vi.advanceTimersByTimeAsync(1000)
    await stack.machine.idle()

    expect(stack.machine.getState()).toBe('POWERED')
    expect(stack.hal.isPowered()).toBe(true)
    expect(calls).toEqual(['ready'])
    expect(events.some(e => e.kind === 'adapter-message-handled' && e.message === 'POWER_ON')).toBe(true)
    stack.stop()
  })

  it('drops everything once stopped', async () => {
    const { stack, events, settle } = makeStack()
    stack.stop()
    stack.stop()
    stack.machine.send('USER_TURN_ON')
    await settle()

    expect(stack.machine.getState()).toBe('OFF')
    expect(events.filter(e => e.kind === 'adapter-detached')).toHaveLength(1)
    expect(events.flatMap(e => (e.kind === 'adapter-message-dropped' ? [e.message] : []))).toEqual(['USER_TURN_ON'])
  })
})
