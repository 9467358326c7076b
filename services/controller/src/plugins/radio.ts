// services/controller/src/plugins/radio.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
    type ClientLogBuffer,
} from '@radiod/logging'

import type { FatalReason } from '../core/adapter-state/types.js'
import { RadioStateStore } from '../core/state.js'
import { RadioStateAdapter } from '../adapters/radio.adapter.js'
import {
    buildRadioConfigFromEnv,
    buildRadioStack,
    type RadioConfig,
    type RadioEvent,
    type RadioEventSink,
    type RadioStack,
} from '../stack.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        radio: RadioStack
        radioState: RadioStateStore
        clientBuf: ClientLogBuffer
    }
}

export interface RadioPluginOptions {
    /** Defaults to the process environment. */
    config?: RadioConfig
    /** Host hook for unrecoverable outcomes; the server turns it into process exit. */
    onFatal?: (reason: FatalReason) => void
}

// ---- Event sink using controller logging -----------------------------------

const hex = (n: number): string => `0x${n.toString(16)}`

export class RadioLoggerEventSink implements RadioEventSink {
    private readonly logState: ChannelLogger
    private readonly logSubs: ChannelLogger
    private readonly logHal: ChannelLogger
    private readonly logProfiles: ChannelLogger
    private readonly logProps: ChannelLogger

    constructor(clientBuf?: ClientLogBuffer) {
        const { channel } = createLogger('radio', clientBuf)
        this.logState = channel(LogChannel.adapter_state)
        this.logSubs = channel(LogChannel.subscribers)
        this.logHal = channel(LogChannel.hal)
        this.logProfiles = channel(LogChannel.profiles)
        this.logProps = channel(LogChannel.properties)
    }

    publish(evt: RadioEvent): void {
        switch (evt.kind) {
            /* ---- state machine ---- */
            case 'adapter-message-handled':
                this.logState.debug(`kind=${evt.kind} message=${evt.message} state=${evt.state}`)
                break
            case 'adapter-message-ignored':
                this.logState.debug(`kind=${evt.kind} message=${evt.message} state=${evt.state} reason="${evt.reason}"`)
                break
            case 'adapter-message-deferred':
                this.logState.info(`kind=${evt.kind} message=${evt.message} state=${evt.state}`)
                break
            case 'adapter-deferred-replayed':
                this.logState.info(`kind=${evt.kind} count=${evt.count} state=${evt.state}`)
                break
            case 'adapter-message-rejected':
                this.logState.warn(`kind=${evt.kind} message=${evt.message} state=${evt.state}`)
                break
            case 'adapter-message-dropped':
                this.logState.error(`kind=${evt.kind} message=${evt.message} reason=detached`)
                break
            case 'adapter-transition':
                this.logState.info(`kind=${evt.kind} from=${evt.from} to=${evt.to}`)
                break
            case 'adapter-state-notified':
                this.logState.info(`kind=${evt.kind} prev=${evt.prev} next=${evt.next}`)
                break
            case 'adapter-flags':
                this.logState.debug(`kind=${evt.kind} turningOn=${evt.turningOn} turningOff=${evt.turningOff}`)
                break
            case 'adapter-recoverable-error':
                this.logState.warn(`kind=${evt.kind} message=${evt.message ?? 'none'} error="${evt.error}"`)
                break
            case 'adapter-fatal-error':
                this.logState.fatal(`kind=${evt.kind} reason=${evt.reason} error="${evt.error}"`)
                break
            case 'adapter-detached':
                this.logState.info(`kind=${evt.kind}`)
                break

            /* ---- subscribers ---- */
            case 'observer-registered':
                this.logSubs.info(`kind=${evt.kind} count=${evt.count} replaced=${evt.replaced}`)
                break
            case 'observer-register-refused':
                this.logSubs.warn(`kind=${evt.kind} reason="${evt.reason}"`)
                break
            case 'observer-unregistered':
                this.logSubs.info(`kind=${evt.kind} count=${evt.count} cause=${evt.cause}`)
                break
            case 'observer-filter-updated':
                this.logSubs.debug(`kind=${evt.kind} length=${evt.length} cleared=${evt.cleared}`)
                break
            case 'power-hold-changed':
                this.logSubs.info(`kind=${evt.kind} held=${evt.held} message=${evt.message}`)
                break
            case 'interface-broadcast':
                this.logSubs.info(`kind=${evt.kind} state=${evt.state} availability=${evt.availability} receivers=${evt.receivers}`)
                break
            case 'vendor-event-dispatched':
                this.logSubs.debug(`kind=${evt.kind} length=${evt.length} receivers=${evt.receivers}`)
                break
            case 'vendor-command-dispatched':
                this.logSubs.debug(`kind=${evt.kind} opcode=${hex(evt.opcode)} receivers=${evt.receivers}`)
                break
            case 'observer-delivery-failed':
                this.logSubs.warn(`kind=${evt.kind} callback=${evt.callback} error="${evt.error}"`)
                break

            /* ---- hardware ---- */
            case 'hal-process-start':
            case 'hal-process-started':
            case 'hal-force-cleanup':
                this.logHal.info(`kind=${evt.kind}`)
                break
            case 'hal-enable-requested':
            case 'hal-disable-requested':
                if (evt.accepted) this.logHal.info(`kind=${evt.kind} accepted=true`)
                else this.logHal.error(`kind=${evt.kind} accepted=false`)
                break
            case 'hal-status':
                this.logHal.info(`kind=${evt.kind} status=${evt.status}`)
                break
            case 'hal-vendor-events':
                this.logHal.debug(`kind=${evt.kind} enabled=${evt.enabled}`)
                break
            case 'hal-vendor-event':
                // high frequency
                break

            /* ---- owning service ---- */
            case 'adapter-substate-changed':
                this.logProfiles.debug(`kind=${evt.kind} state=${evt.state}`)
                break
            case 'adapter-state-changed':
                this.logProfiles.info(`kind=${evt.kind} prev=${evt.prev} next=${evt.next}`)
                break
            case 'auto-connect':
                this.logProfiles.info(`kind=${evt.kind} peers=${evt.peers.length > 0 ? evt.peers.join(',') : 'none'}`)
                break
            case 'profiles-started':
            case 'profiles-stopping':
                this.logProfiles.info(`kind=${evt.kind} profiles=${evt.profiles.join(',')}`)
                break
            case 'profiles-stopped':
                this.logProfiles.info(`kind=${evt.kind}`)
                break
            case 'listener-failed':
                this.logProfiles.warn(`kind=${evt.kind} error="${evt.error}"`)
                break

            /* ---- properties ---- */
            case 'properties-state':
                this.logProps.debug(`kind=${evt.kind} state=${evt.state}`)
                break
            case 'scan-mode-changed':
                this.logProps.info(`kind=${evt.kind} mode=${evt.mode}`)
                break
        }
    }
}

// ---- Fanout sink: logger + state adapter -----------------------------------

export class FanoutRadioEventSink implements RadioEventSink {
    private readonly sinks: RadioEventSink[]

    constructor(...sinks: RadioEventSink[]) {
        this.sinks = sinks
    }

    publish(evt: RadioEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                process.emitWarning(`radio event sink failed kind=${evt.kind} err=${String(err)}`)
            }
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const radioPlugin: FastifyPluginAsync<RadioPluginOptions> = async (app: FastifyInstance, opts) => {
    const { channel } = createLogger('radio-plugin', app.clientBuf)
    const logPlugin = channel(LogChannel.app)

    // 1) Build config
    const cfg = opts.config ?? buildRadioConfigFromEnv(process.env)
    logPlugin.info(
        `radio config startMs=${cfg.adapter.timeouts.startMs} enableMs=${cfg.adapter.timeouts.enableMs} ` +
        `disableMs=${cfg.adapter.timeouts.disableMs} stopMs=${cfg.adapter.timeouts.stopMs} ` +
        `scanModeMs=${cfg.adapter.timeouts.scanModeMs} autoEnable=${cfg.autoEnable}`
    )

    // 2) Instantiate sinks
    const store = new RadioStateStore()
    const stateAdapter = new RadioStateAdapter(store)
    const events = new FanoutRadioEventSink(
        new RadioLoggerEventSink(app.clientBuf),
        { publish: (evt: RadioEvent) => stateAdapter.handle(evt) }
    )

    // 3) Build the stack
    const onFatal = opts.onFatal ?? ((reason: FatalReason) => {
        logPlugin.fatal(`radio reached an unrecoverable state reason=${reason}`)
    })
    const stack = buildRadioStack(cfg, { events, onFatal })

    app.decorate('radio', stack)
    app.decorate('radioState', store)

    // 4) Lifecycle hooks
    app.addHook('onReady', async () => {
        logPlugin.info('starting radio controller')
        stack.start()
    })

    app.addHook('onClose', async () => {
        logPlugin.info('stopping radio controller')
        stack.stop()
    })
}

export default fp(radioPlugin, { name: 'radio' })
