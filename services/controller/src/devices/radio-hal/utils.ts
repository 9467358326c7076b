import { clampInt, envBool, envInt } from '../../core/env.js'
import type { RadioHalConfig } from './types.js'

export function buildRadioHalConfigFromEnv(env: NodeJS.ProcessEnv): RadioHalConfig {
  const delay = (name: string, fallback: number): number =>
    clampInt(envInt(env, name, fallback), 0, 120_000)

  return {
    kind: 'simulated',
    startDelayMs: delay('RADIO_HAL_START_DELAY_MS', 250),
    enableDelayMs: delay('RADIO_HAL_ENABLE_DELAY_MS', 500),
    disableDelayMs: delay('RADIO_HAL_DISABLE_DELAY_MS', 300),
    failEnable: envBool(env, 'RADIO_HAL_FAIL_ENABLE', false),
    failDisable: envBool(env, 'RADIO_HAL_FAIL_DISABLE', false),
  }
}
