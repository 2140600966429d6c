/**
 * General utility helpers for world-sync
 */

/**
 * Format a wait duration in whole seconds the way rate-limit messages show it:
 * `45s`, `4m05s`, `1h02m03s`.
 * @param seconds - Duration in seconds
 */
export function formatWaitTime(seconds: number): string {
  const total = Math.max(0, Math.trunc(seconds))
  const pad = (n: number): string => String(n).padStart(2, '0')
  if (total < 60) return `${String(total)}s`
  if (total < 3600) {
    return `${String(Math.floor(total / 60))}m${pad(total % 60)}s`
  }
  const hours = Math.floor(total / 3600)
  const minutes = Math.floor((total % 3600) / 60)
  return `${String(hours)}h${pad(minutes)}m${pad(total % 60)}s`
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto = Object.getPrototypeOf(value) as unknown
  return proto === Object.prototype || proto === null
}

/**
 * Deep copy a JSON value with every object's keys in sorted order.
 * Array order is preserved.
 */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeysDeep)
  if (!isPlainObject(value)) return value
  const sorted: Record<string, unknown> = {}
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeysDeep(value[key])
  }
  return sorted
}

/**
 * Return "s" unless count is exactly one.
 */
export function plural(count: number): string {
  return count === 1 ? '' : 's'
}
