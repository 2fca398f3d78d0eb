/**
 * Wire-level shapes shared by the guard and its clients.
 * Addresses are 0x-prefixed hex and compared case-insensitively; amounts are wei-style bigints.
 */

export type Address = string

export type EntityId = bigint

/** A call the vault is asked to make. Every field is explicit. */
export interface Action {
  destination: Address
  value: bigint
  payload: string // 0x-prefixed calldata, '0x' for a value-only transfer
}

/** Off-line signed operator delegation. */
export interface OperatorPermit {
  entityId: EntityId
  renter: Address
  operator: Address
  expiry: number // when the delegation ends (unix seconds)
  nonce: bigint
  deadline: number // last moment the signature may be submitted
}

export interface PolicyDecision {
  allowed: boolean
  reason?: string
  policyType?: string
}
