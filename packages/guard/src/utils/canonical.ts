import crypto from 'crypto'

/**
 * Canonical JSON: object keys sorted recursively, no whitespace.
 * bigint values are written as decimal strings so parameter sets built in code
 * hash the same as the JSON files they were read from.
 */
export function canonicalize(obj: unknown): string {
  if (obj === null || obj === undefined) return 'null'
  if (typeof obj === 'bigint') return JSON.stringify(obj.toString())
  if (typeof obj !== 'object') return JSON.stringify(obj)
  if (Array.isArray(obj)) return '[' + obj.map(canonicalize).join(',') + ']'
  const record: Record<string, unknown> = { ...obj }
  const keys = Object.keys(record).sort()
  return '{' + keys.map(k => JSON.stringify(k) + ':' + canonicalize(record[k])).join(',') + '}'
}

/** sha256 of the canonical form, 0x-prefixed so it fits a bytes32 slot. */
export function hashParams(params: unknown): string {
  return '0x' + crypto.createHash('sha256').update(canonicalize(params)).digest('hex')
}
