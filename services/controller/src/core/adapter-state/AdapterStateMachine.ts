import { EventQueue } from '../queue/EventQueue.js'
import { errorMessage, now } from '../events.js'
import {
  ADAPTER_MESSAGES,
  type AdapterCollaborators,
  type AdapterLifecycleState,
  type AdapterMessage,
  type AdapterStateConfig,
  type AdapterStateDeps,
  type AdapterStateEvent,
  type AdapterStateEventSink,
  type AdapterSubState,
  type FatalReason,
  type RadioHalStatus,
} from './types.js'

/* -------------------------------------------------------------------------- */
/*  Internal types                                                             */
/* -------------------------------------------------------------------------- */

type Attachment =
  | { kind: 'active'; collaborators: AdapterCollaborators }
  | { kind: 'detached' }

type Step =
  | { outcome: 'handled' }
  | { outcome: 'ignored'; reason: string }
  | { outcome: 'deferred' }
  | { outcome: 'rejected' }
  | { outcome: 'fatal'; reason: FatalReason; error: string }

const HANDLED: Step = { outcome: 'handled' }
const DEFERRED: Step = { outcome: 'deferred' }
const REJECTED: Step = { outcome: 'rejected' }

function ignored(reason: string): Step {
  return { outcome: 'ignored', reason }
}

/**
 * Adapter power state machine.
 *
 * OFF -> PENDING -> POWERED | ON and back through PENDING to OFF. Every
 * message is classified (handled, ignored, deferred, rejected, dropped or
 * fatal) and published to the event sink. Transitions requested by a handler
 * take effect after it returns: exit actions, then entry actions, then any
 * deferred messages go back to the front of the queue.
 */
export class AdapterStateMachine {
  private readonly cfg: AdapterStateConfig
  private readonly events: AdapterStateEventSink
  private readonly onFatal: (reason: FatalReason) => void
  private readonly queue: EventQueue<AdapterMessage>

  private attachment: Attachment
  private state: AdapterSubState = 'OFF'
  private destination: AdapterSubState | null = null
  private started = false
  private fatalReason: FatalReason | null = null

  private turningOn = false
  private turningOff = false
  private userOperation = false

  constructor(cfg: AdapterStateConfig, deps: AdapterStateDeps) {
    this.cfg = cfg
    this.events = deps.events
    this.onFatal = deps.onFatal
    this.attachment = {
      kind: 'active',
      collaborators: { hal: deps.hal, properties: deps.properties, service: deps.service },
    }
    this.queue = new EventQueue<AdapterMessage>({
      handler: (msg) => this.processMessage(msg),
      onDrop: (msg) => {
        this.publish({ kind: 'adapter-message-dropped', at: now(), message: msg })
      },
      onHandlerError: (err, msg) => {
        this.publish({
          kind: 'adapter-recoverable-error',
          at: now(),
          error: `handler failed: ${errorMessage(err)}`,
          message: msg,
        })
      },
    })
  }

  /* ---------------------------------------------------------------------- */
  /*  Lifecycle                                                              */
  /* ---------------------------------------------------------------------- */

  public start(): void {
    if (this.started) return
    this.started = true
    this.queue.start()
    if (this.attachment.kind === 'active') {
      this.enter('OFF', this.attachment.collaborators)
    }
  }

  /** Stops processing immediately; pending and delayed messages are discarded, later ones dropped. */
  public quit(): void {
    this.queue.quit()
  }

  /** Detaches collaborators. Any message processed afterwards is dropped. */
  public cleanup(): void {
    if (this.attachment.kind === 'detached') return
    this.attachment = { kind: 'detached' }
    this.publish({ kind: 'adapter-detached', at: now() })
  }

  /* ---------------------------------------------------------------------- */
  /*  Inputs                                                                 */
  /* ---------------------------------------------------------------------- */

  public send(msg: AdapterMessage): void {
    this.queue.post(msg)
  }

  public sendDelayed(msg: AdapterMessage, delayMs: number): void {
    this.queue.postDelayed(msg, delayMs)
  }

  /** Maps the hardware layer's radio status report onto queue messages. */
  public stateChangeCallback(status: RadioHalStatus): void {
    switch (status) {
      case 'off':
        this.send('DISABLED')
        break
      case 'on':
        this.send('ENABLED_READY')
        break
      default:
        this.publish({
          kind: 'adapter-recoverable-error',
          at: now(),
          error: `unexpected radio status=${status}`,
        })
        break
    }
  }

  /* ---------------------------------------------------------------------- */
  /*  Queries                                                                */
  /* ---------------------------------------------------------------------- */

  public getState(): AdapterSubState {
    return this.state
  }

  public isTurningOn(): boolean {
    return this.turningOn
  }

  public isTurningOff(): boolean {
    return this.turningOff
  }

  public isUserOperation(): boolean {
    return this.userOperation
  }

  public getFatalReason(): FatalReason | null {
    return this.fatalReason
  }

  public hasTimer(msg: AdapterMessage): boolean {
    return this.queue.hasTimer(msg)
  }

  /** Resolves once every queued message has been processed. */
  public idle(): Promise<void> {
    return this.queue.idle()
  }

  /* ---------------------------------------------------------------------- */
  /*  Dispatch                                                               */
  /* ---------------------------------------------------------------------- */

  private processMessage(msg: AdapterMessage): void {
    if (this.attachment.kind === 'detached') {
      this.publish({ kind: 'adapter-message-dropped', at: now(), message: msg })
      return
    }
    const c = this.attachment.collaborators
    const from = this.state
    const flagsBefore = `${this.turningOn}/${this.turningOff}`
    const saved = { turningOn: this.turningOn, turningOff: this.turningOff, userOperation: this.userOperation }
    const armedBefore = new Set(ADAPTER_MESSAGES.filter((m) => this.queue.hasTimer(m)))

    let step: Step
    try {
      switch (from) {
        case 'OFF':
          step = this.processOff(msg, c)
          break
        case 'PENDING':
          step = this.processPending(msg, c)
          break
        case 'POWERED':
          step = this.processPowered(msg, c)
          break
        case 'ON':
          step = this.processOn(msg, c)
          break
      }
    } catch (err) {
      // roll back the failed step, including timers it armed
      this.destination = null
      this.turningOn = saved.turningOn
      this.turningOff = saved.turningOff
      this.userOperation = saved.userOperation
      for (const m of ADAPTER_MESSAGES) {
        if (!armedBefore.has(m) && this.queue.hasTimer(m)) this.queue.cancel(m)
      }
      throw err
    }

    this.classify(msg, from, step)
    this.performTransition(c)

    if (`${this.turningOn}/${this.turningOff}` !== flagsBefore) {
      this.publish({
        kind: 'adapter-flags',
        at: now(),
        turningOn: this.turningOn,
        turningOff: this.turningOff,
      })
    }

    if (step.outcome === 'fatal') {
      this.terminate(step.reason, step.error)
    }
  }

  private classify(msg: AdapterMessage, state: AdapterSubState, step: Step): void {
    const at = now()
    switch (step.outcome) {
      case 'handled':
        this.publish({ kind: 'adapter-message-handled', at, message: msg, state })
        break
      case 'ignored':
        this.publish({ kind: 'adapter-message-ignored', at, message: msg, state, reason: step.reason })
        break
      case 'deferred':
        this.publish({ kind: 'adapter-message-deferred', at, message: msg, state })
        break
      case 'rejected':
        this.publish({ kind: 'adapter-message-rejected', at, message: msg, state })
        break
      case 'fatal':
        // published by terminate() once the transition to OFF has completed
        break
    }
  }

  /* ---- OFF ------------------------------------------------------------- */

  private processOff(msg: AdapterMessage, c: AdapterCollaborators): Step {
    switch (msg) {
      case 'USER_TURN_ON':
        this.notify(c, 'TURNING_ON')
        this.userOperation = true
        this.beginPowerOn(c)
        return HANDLED
      case 'POWER_ON':
        this.beginPowerOn(c)
        return HANDLED
      case 'USER_TURN_OFF':
      case 'POWER_OFF':
        return ignored('already off')
      default:
        return REJECTED
    }
  }

  /* ---- PENDING --------------------------------------------------------- */

  private processPending(msg: AdapterMessage, c: AdapterCollaborators): Step {
    const turningOn = this.turningOn
    const turningOff = this.turningOff
    const isUser = this.userOperation

    switch (msg) {
      case 'USER_TURN_ON':
        if (turningOn && isUser) return ignored('user turn-on already in progress')
        if (turningOn) {
          // upgrade the automatic power-on; timers keep running
          this.userOperation = true
          this.notify(c, 'TURNING_ON')
          return HANDLED
        }
        this.queue.defer(msg)
        return DEFERRED

      case 'USER_TURN_OFF':
        if (turningOff) return ignored('turn-off already in progress')
        this.queue.defer(msg)
        return DEFERRED

      case 'POWER_ON':
        if (turningOn) return ignored('turn-on already in progress')
        this.queue.defer(msg)
        return DEFERRED

      case 'POWER_OFF':
        if (turningOff) return ignored('turn-off already in progress')
        this.queue.defer(msg)
        return DEFERRED

      case 'STARTED':
        this.queue.cancel('START_TIMEOUT')
        if (!c.hal.enable()) {
          this.recoverable('radio enable failed', msg)
          this.notify(c, 'OFF')
          this.turningOn = false
          this.transitionTo('OFF')
        } else {
          this.queue.postDelayed('ENABLE_TIMEOUT', this.cfg.timeouts.enableMs)
        }
        return HANDLED

      case 'ENABLED_READY':
        this.queue.cancel('ENABLE_TIMEOUT')
        if (!c.hal.setVendorEventsEnabled(true)) {
          this.recoverable('unable to enable vendor events', msg)
        }
        this.turningOn = false
        if (isUser) {
          c.properties.onRadioReady()
          this.transitionTo('ON')
          this.notify(c, 'ON')
        } else {
          this.transitionTo('POWERED')
        }
        return HANDLED

      case 'SET_SCAN_MODE_TIMEOUT':
        this.recoverable('timed out clearing scan mode, disabling anyway', msg)
        this.beginDisable(c)
        return HANDLED

      case 'BEGIN_DISABLE':
        this.beginDisable(c)
        return HANDLED

      case 'DISABLED':
        if (turningOn) {
          this.queue.cancel('ENABLE_TIMEOUT')
          this.recoverable('radio failed to initialize', msg)
          this.turningOn = false
          this.transitionTo('OFF')
          c.service.stopProfileServices()
          if (isUser) this.notify(c, 'OFF')
          return HANDLED
        }
        this.queue.cancel('DISABLE_TIMEOUT')
        this.queue.postDelayed('STOP_TIMEOUT', this.cfg.timeouts.stopMs)
        if (!c.service.stopProfileServices()) {
          this.completeStop(c, isUser)
        }
        return HANDLED

      case 'STOPPED':
        this.completeStop(c, isUser)
        return HANDLED

      case 'START_TIMEOUT':
      case 'ENABLE_TIMEOUT':
        this.recoverable(msg === 'START_TIMEOUT'
          ? 'timed out waiting for radio start'
          : 'timed out waiting for radio enable', msg)
        this.turningOn = false
        this.transitionTo('OFF')
        if (isUser) this.notify(c, 'OFF')
        return HANDLED

      case 'STOP_TIMEOUT':
        this.turningOff = false
        this.transitionTo('OFF')
        this.notify(c, 'OFF')
        return { outcome: 'fatal', reason: 'stop-timeout', error: 'timed out stopping profile services' }

      case 'DISABLE_TIMEOUT':
        this.turningOff = false
        c.hal.forceCleanup()
        this.transitionTo('OFF')
        this.notify(c, 'OFF')
        return { outcome: 'fatal', reason: 'disable-timeout', error: 'timed out waiting for radio disable' }

      default:
        return REJECTED
    }
  }

  /* ---- ON -------------------------------------------------------------- */

  private processOn(msg: AdapterMessage, c: AdapterCollaborators): Step {
    switch (msg) {
      case 'USER_TURN_OFF':
        this.notify(c, 'TURNING_OFF')
        this.turningOff = true
        this.userOperation = true
        this.transitionTo('PENDING')
        this.queue.postDelayed('SET_SCAN_MODE_TIMEOUT', this.cfg.timeouts.scanModeMs)
        c.properties.onRadioDisable()
        return HANDLED
      case 'USER_TURN_ON':
      case 'POWER_ON':
        return ignored('already on')
      case 'POWER_OFF':
        return ignored('radio is in use')
      default:
        return REJECTED
    }
  }

  /* ---- POWERED --------------------------------------------------------- */

  private processPowered(msg: AdapterMessage, c: AdapterCollaborators): Step {
    switch (msg) {
      case 'USER_TURN_ON':
        this.notify(c, 'TURNING_ON')
        c.properties.onRadioReady()
        this.transitionTo('ON')
        this.notify(c, 'ON')
        return HANDLED
      case 'USER_TURN_OFF':
        return ignored('not turned on by user')
      case 'POWER_ON':
        return ignored('already powered')
      case 'POWER_OFF':
        if (!c.hal.setVendorEventsEnabled(false)) {
          this.recoverable('unable to disable vendor events', msg)
        }
        if (!c.hal.disable()) {
          this.recoverable('radio disable failed', msg)
          return HANDLED
        }
        this.queue.postDelayed('DISABLE_TIMEOUT', this.cfg.timeouts.disableMs)
        this.turningOff = true
        this.userOperation = false
        this.transitionTo('PENDING')
        return HANDLED
      default:
        return REJECTED
    }
  }

  /* ---------------------------------------------------------------------- */
  /*  Shared steps                                                           */
  /* ---------------------------------------------------------------------- */

  private beginPowerOn(c: AdapterCollaborators): void {
    this.turningOn = true
    this.transitionTo('PENDING')
    this.queue.postDelayed('START_TIMEOUT', this.cfg.timeouts.startMs)
    c.hal.processStart()
  }

  private beginDisable(c: AdapterCollaborators): void {
    this.queue.cancel('SET_SCAN_MODE_TIMEOUT')

    if (c.service.isPowerLockHeld()) {
      // an observer still holds the radio: stay powered, no user-visible change
      this.turningOff = false
      this.transitionTo('POWERED')
      return
    }

    if (!c.hal.setVendorEventsEnabled(false)) {
      this.recoverable('unable to disable vendor events', 'BEGIN_DISABLE')
    }
    this.queue.postDelayed('DISABLE_TIMEOUT', this.cfg.timeouts.disableMs)
    if (!c.hal.disable()) {
      this.queue.cancel('DISABLE_TIMEOUT')
      this.recoverable('radio disable failed', 'BEGIN_DISABLE')
      this.turningOff = false
      this.transitionTo('ON')
      this.notify(c, 'ON')
    }
  }

  private completeStop(c: AdapterCollaborators, isUser: boolean): void {
    this.queue.cancel('STOP_TIMEOUT')
    this.turningOff = false
    this.transitionTo('OFF')
    if (isUser) this.notify(c, 'OFF')
  }

  /* ---------------------------------------------------------------------- */
  /*  Transitions & notifications                                            */
  /* ---------------------------------------------------------------------- */

  private transitionTo(next: AdapterSubState): void {
    this.destination = next
  }

  private performTransition(c: AdapterCollaborators): void {
    const next = this.destination
    this.destination = null
    if (next === null || next === this.state) return

    const from = this.state
    if (from === 'PENDING') this.userOperation = false

    this.state = next
    this.publish({ kind: 'adapter-transition', at: now(), from, to: next })
    this.enter(next, c)

    const replayed = this.queue.releaseDeferred()
    if (replayed > 0) {
      this.publish({ kind: 'adapter-deferred-replayed', at: now(), count: replayed, state: next })
    }
  }

  private enter(state: AdapterSubState, c: AdapterCollaborators): void {
    c.service.updateStateMachineState(state)
    if (state === 'ON') c.service.autoConnect()
  }

  private notify(c: AdapterCollaborators, next: AdapterLifecycleState): void {
    const prev = c.properties.getState()
    c.properties.setState(next)
    c.service.updateAdapterState(prev, next)
    this.publish({ kind: 'adapter-state-notified', at: now(), prev, next })
  }

  private recoverable(error: string, msg: AdapterMessage): void {
    this.publish({ kind: 'adapter-recoverable-error', at: now(), error, message: msg })
  }

  private terminate(reason: FatalReason, error: string): void {
    this.fatalReason = reason
    this.publish({ kind: 'adapter-fatal-error', at: now(), error, reason })
    this.queue.quit()
    this.onFatal(reason)
  }

  private publish(evt: AdapterStateEvent): void {
    this.events.publish(evt)
  }
}
