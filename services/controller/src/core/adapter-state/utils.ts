import { clampInt, envInt } from '../env.js'
import type { AdapterStateConfig } from './types.js'

export const DEFAULT_ADAPTER_TIMEOUTS = {
  startMs: 5000,
  enableMs: 8000,
  disableMs: 8000,
  stopMs: 5000,
  scanModeMs: 2000,
} as const

function timeout(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  return clampInt(envInt(env, name, fallback), 1, 600_000)
}

export function buildAdapterStateConfigFromEnv(env: NodeJS.ProcessEnv): AdapterStateConfig {
  return {
    timeouts: {
      startMs: timeout(env, 'RADIO_START_TIMEOUT_MS', DEFAULT_ADAPTER_TIMEOUTS.startMs),
      enableMs: timeout(env, 'RADIO_ENABLE_TIMEOUT_MS', DEFAULT_ADAPTER_TIMEOUTS.enableMs),
      disableMs: timeout(env, 'RADIO_DISABLE_TIMEOUT_MS', DEFAULT_ADAPTER_TIMEOUTS.disableMs),
      stopMs: timeout(env, 'RADIO_STOP_TIMEOUT_MS', DEFAULT_ADAPTER_TIMEOUTS.stopMs),
      scanModeMs: timeout(env, 'RADIO_SCAN_MODE_TIMEOUT_MS', DEFAULT_ADAPTER_TIMEOUTS.scanModeMs),
    },
  }
}
