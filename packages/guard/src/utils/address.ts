import type { Address } from '@leasehold/dto'

export function addrKey(a: Address): string {
  return a.toLowerCase()
}

export function sameAddress(a: Address | undefined, b: Address | undefined): boolean {
  if (!a || !b) return false
  return a.toLowerCase() === b.toLowerCase()
}
