/* -------------------------------------------------------------------------- */
/*  Env parsing helpers (strict + predictable)                                 */
/* -------------------------------------------------------------------------- */

export function envString(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: string
): string {
  const v = env[name]
  if (v == null) return fallback
  const t = String(v).trim()
  return t.length === 0 ? fallback : t
}

export function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]
  if (raw == null || raw.trim() === '') return fallback
  const t = raw.trim()
  if (!/^-?\d+$/.test(t)) return fallback
  const n = Number.parseInt(t, 10)
  return Number.isFinite(n) ? n : fallback
}

export function envBool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name]
  if (raw == null || raw.trim() === '') return fallback
  const v = raw.trim().toLowerCase()
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false
  return fallback
}

/** Comma separated list; blanks are dropped. */
export function envList(env: NodeJS.ProcessEnv, name: string, fallback: string[]): string[] {
  const raw = env[name]
  if (raw == null) return fallback
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

export function clampInt(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min
  return Math.max(min, Math.min(max, Math.trunc(n)))
}
