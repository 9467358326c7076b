import { clampInt, envInt, envList } from '../core/env.js'
import type { AdapterPropertiesConfig, AdapterServiceConfig } from './types.js'

export function buildAdapterServiceConfigFromEnv(env: NodeJS.ProcessEnv): AdapterServiceConfig {
  return {
    profiles: envList(env, 'RADIO_PROFILES', ['a2dp', 'hfp', 'gatt']),
    profileStopDelayMs: clampInt(envInt(env, 'RADIO_PROFILE_STOP_DELAY_MS', 200), 0, 120_000),
    bondedPeers: envList(env, 'RADIO_BONDED_PEERS', []),
  }
}

export function buildAdapterPropertiesConfigFromEnv(env: NodeJS.ProcessEnv): AdapterPropertiesConfig {
  return {
    scanModeClearDelayMs: clampInt(envInt(env, 'RADIO_SCAN_MODE_CLEAR_DELAY_MS', 100), 0, 60_000),
  }
}
