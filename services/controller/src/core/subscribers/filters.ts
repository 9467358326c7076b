import type { VendorEventFilter } from './types.js'

/**
 * Normalizes a mask/value pair: both are cut to the shorter length and the
 * value is masked so matching is a plain byte compare.
 */
export function makeVendorFilter(mask: Uint8Array, value: Uint8Array): VendorEventFilter {
  const len = Math.min(mask.length, value.length)
  const m = Uint8Array.from(mask.subarray(0, len))
  const v = Uint8Array.from(value.subarray(0, len))
  for (let i = 0; i < len; i++) {
    v[i] = (v[i] ?? 0) & (m[i] ?? 0)
  }
  return { mask: m, value: v }
}

/** Payloads shorter than the mask never match; trailing payload bytes are ignored. */
export function matchVendorFilter(payload: Uint8Array, filter: VendorEventFilter): boolean {
  const { mask, value } = filter
  if (payload.length < mask.length) return false
  for (let i = 0; i < mask.length; i++) {
    if (((payload[i] ?? 0) & (mask[i] ?? 0)) !== value[i]) return false
  }
  return true
}
