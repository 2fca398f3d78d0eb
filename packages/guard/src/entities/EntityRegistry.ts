/**
 * EntityRegistry
 * - Owns every entity record: ownership, lease, operator delegation, permit nonce, status
 * - Lease and operator expiry are evaluated lazily: a grant is live while now <= expiry
 * - Records are replaced on write, never mutated in place, so a snapshot handed out stays stable
 */

import { Address, EntityId, EntityStatus } from '@leasehold/dto'
import { EntityStateError } from '@leasehold/reasons'
import { KeyValueStore, Namespace, entityKey } from '../store/KeyValueStore'
import { Clock, systemClock } from '../utils/clock'
import { EntityStatusMachine } from './statusMachine'

export type EntityRecord = {
  id: EntityId
  owner: Address
  vault: Address
  status: EntityStatus
  renter?: Address
  leaseExpiry: number
  operator?: Address
  operatorExpiry: number
  operatorNonce: bigint
  templateId?: EntityId
  paramsHash?: string
  lastActionAt?: number
}

export type NewEntity = {
  owner: Address
  templateId?: EntityId
  paramsHash?: string
}

/** Read side the policy engine needs. */
export interface EntityDirectory {
  exists(id: EntityId): boolean
  ownerOf(id: EntityId): Address | undefined
  renterOf(id: EntityId): Address | undefined
  vaultOf(id: EntityId): Address | undefined
  isInstance(id: EntityId): boolean
}

export class EntityRegistry implements EntityDirectory {
  private rows: Namespace<EntityRecord>
  private nextId = 1n
  private machine = new EntityStatusMachine()

  constructor(
    store: KeyValueStore,
    private readonly vaultAddressFor: (id: EntityId) => Address,
    private readonly clock: Clock = systemClock
  ) {
    this.rows = store.claim<EntityRecord>('entities')
  }

  create(input: NewEntity): EntityRecord {
    const id = this.nextId++
    const row: EntityRecord = {
      id,
      owner: input.owner,
      vault: this.vaultAddressFor(id),
      status: EntityStatus.ACTIVE,
      leaseExpiry: 0,
      operatorExpiry: 0,
      operatorNonce: 0n,
      templateId: input.templateId,
      paramsHash: input.paramsHash
    }
    this.rows.set(entityKey(id), row)
    return row
  }

  /** Undo a create whose surrounding mint failed. Only the most recent id can be discarded. */
  discard(id: EntityId): void {
    if (id !== this.nextId - 1n) throw new Error(`can only discard the latest entity (${this.nextId - 1n}), got ${id}`)
    this.rows.delete(entityKey(id))
    this.nextId = id
  }

  get(id: EntityId): EntityRecord | undefined {
    return this.rows.get(entityKey(id))
  }

  require(id: EntityId): EntityRecord {
    const row = this.get(id)
    if (!row) throw new EntityStateError('ENTITY_NOT_FOUND', { context: { entityId: id.toString() } })
    return row
  }

  exists(id: EntityId): boolean {
    return this.rows.has(entityKey(id))
  }

  count(): number {
    return this.rows.keys().length
  }

  ownerOf(id: EntityId): Address | undefined {
    return this.get(id)?.owner
  }

  vaultOf(id: EntityId): Address | undefined {
    return this.get(id)?.vault
  }

  isInstance(id: EntityId): boolean {
    return this.get(id)?.templateId !== undefined
  }

  /** Active renter, or undefined once the lease has lapsed. */
  renterOf(id: EntityId): Address | undefined {
    const row = this.get(id)
    if (!row?.renter) return undefined
    return this.clock.now() <= row.leaseExpiry ? row.renter : undefined
  }

  /** Live operator: its own grant and the lease under it must both still run. */
  operatorOf(id: EntityId): Address | undefined {
    const row = this.get(id)
    if (!row?.operator) return undefined
    const now = this.clock.now()
    if (now > row.operatorExpiry || now > row.leaseExpiry) return undefined
    return row.operator
  }

  /** A new lease always drops the previous delegation. */
  setLease(id: EntityId, renter: Address, expiry: number): EntityRecord {
    return this.patch(id, { renter, leaseExpiry: expiry, operator: undefined, operatorExpiry: 0 })
  }

  extendLease(id: EntityId, expiry: number): EntityRecord {
    return this.patch(id, { leaseExpiry: expiry })
  }

  setOperator(id: EntityId, operator: Address, expiry: number): EntityRecord {
    return this.patch(id, { operator, operatorExpiry: expiry })
  }

  clearOperator(id: EntityId): EntityRecord {
    return this.patch(id, { operator: undefined, operatorExpiry: 0 })
  }

  bumpNonce(id: EntityId): EntityRecord {
    return this.patch(id, { operatorNonce: this.require(id).operatorNonce + 1n })
  }

  /** New owner starts clean: no renter, no operator, and outstanding permits are void. */
  transfer(id: EntityId, to: Address): EntityRecord {
    const row = this.require(id)
    return this.patch(id, {
      owner: to,
      renter: undefined,
      leaseExpiry: 0,
      operator: undefined,
      operatorExpiry: 0,
      operatorNonce: row.operatorNonce + 1n
    })
  }

  setStatus(id: EntityId, to: EntityStatus): EntityRecord {
    const from = this.require(id).status
    if (!this.machine.can(from, to)) {
      throw new EntityStateError('ENTITY_BAD_TRANSITION', { context: { from, to } })
    }
    return this.patch(id, { status: to })
  }

  touch(id: EntityId, ts: number): EntityRecord {
    return this.patch(id, { lastActionAt: ts })
  }

  private patch(id: EntityId, changes: Partial<Omit<EntityRecord, 'id'>>): EntityRecord {
    const next: EntityRecord = { ...this.require(id), ...changes }
    this.rows.set(entityKey(id), next)
    return next
  }
}
