/**
 * AccessRouter
 * The single entry point: resolves who the caller is to an entity, gates the action through the
 * policy engine, forwards it through the entity's vault, then lets policies commit.
 *
 * execute(caller, entityId, action)
 *   schema -> lock(entity) -> status -> role -> validate (skipped for a plain-entity owner)
 *   -> vault.forward -> engine.commit -> touch + audit
 *
 * Rejections are ReasonedRejection subclasses, logged, counted and audited before they are rethrown.
 */

import { ulid } from 'ulid'
import { Action, Address, CallerRole, EntityId, EntityStatus, OperatorPermit } from '@leasehold/dto'
import {
  AuthorizationError,
  DelegationError,
  EntityStateError,
  ExecutionError,
  LeaseExpiredError,
  PolicyViolation,
  ReasonedRejection,
  isRejection,
  reason
} from '@leasehold/reasons'
import { AuditTrail } from '../audit/AuditTrail'
import { instructionIdOf } from '../decoder/decodeAction'
import { PermitDomainConfig, recoverPermitSigner } from '../delegation/operatorPermit'
import { CommitFailure, PolicyEngine } from '../engine/PolicyEngine'
import { EntityRecord, EntityRegistry } from '../entities/EntityRegistry'
import { entityKey } from '../store/KeyValueStore'
import { sameAddress } from '../utils/address'
import { hashParams } from '../utils/canonical'
import { Clock, systemClock } from '../utils/clock'
import { logAction, logRejection } from '../utils/logger'
import { countAction, countRejection } from '../utils/metrics'
import { CallExecutor } from '../vault/CallExecutor'
import { Vault } from '../vault/Vault'
import { EntityLock } from './EntityLock'
import { parseAction } from './actionSchema'

export type AccessRouterOptions = {
  address: Address
  admin: Address
  minter: Address
  entities: EntityRegistry
  engine: PolicyEngine
  executor: CallExecutor
  domain: Omit<PermitDomainConfig, 'verifyingContract'>
  clock?: Clock
  audit?: AuditTrail
}

export type ExecutionReceipt = {
  corrId: string
  entityId: EntityId
  role: CallerRole
  instructionId: string
  returnData: string
  commitFailures: CommitFailure[]
}

export type WithdrawalReceipt = { entityId: EntityId; to: Address; amount: bigint; balance: bigint }

export class AccessRouter {
  readonly address: Address
  private readonly admin: Address
  private readonly minter: Address
  private readonly entities: EntityRegistry
  private readonly engine: PolicyEngine
  private readonly executor: CallExecutor
  private readonly clock: Clock
  private readonly audit: AuditTrail
  private readonly lock = new EntityLock()
  private readonly vaults: Map<string, Vault> = new Map()
  readonly domain: PermitDomainConfig

  constructor(opts: AccessRouterOptions) {
    this.address = opts.address
    this.admin = opts.admin
    this.minter = opts.minter
    this.entities = opts.entities
    this.engine = opts.engine
    this.executor = opts.executor
    this.clock = opts.clock ?? systemClock
    this.audit = opts.audit ?? new AuditTrail()
    this.domain = { ...opts.domain, verifyingContract: opts.address }
  }

  // ---- minting ----

  mint(caller: Address, owner: Address): EntityRecord {
    if (!sameAddress(caller, this.admin) && !sameAddress(caller, this.minter)) {
      throw new AuthorizationError('AUTH_NOT_MINTER')
    }
    const row = this.entities.create({ owner })
    this.openVault(row)
    this.audit.emit('EntityMinted', { entityId: row.id, owner: row.owner, vault: row.vault })
    return row
  }

  /**
   * Mints an instance already leased to `renter`, who is also its owner, and binds it to a frozen template.
   * If binding fails the entity is discarded and nothing is emitted.
   */
  mintInstance(
    caller: Address,
    templateId: EntityId,
    renter: Address,
    leaseExpiry: number,
    params: Record<string, unknown> = {}
  ): EntityRecord {
    if (!sameAddress(caller, this.minter)) throw new AuthorizationError('AUTH_NOT_MINTER')
    this.assertFutureLease(leaseExpiry)
    const created = this.entities.create({ owner: renter, templateId, paramsHash: hashParams(params) })
    try {
      this.entities.setLease(created.id, renter, leaseExpiry)
      this.engine.bindInstance(caller, created.id, templateId)
    } catch (e) {
      this.entities.discard(created.id)
      throw e
    }
    const row = this.entities.require(created.id)
    this.openVault(row)
    this.audit.emit('EntityMinted', {
      entityId: row.id,
      owner: row.owner,
      vault: row.vault,
      templateId,
      paramsHash: row.paramsHash
    })
    this.audit.emit('LeaseAssigned', { entityId: row.id, renter, expiry: leaseExpiry })
    return row
  }

  // ---- leases and delegation ----

  setLease(caller: Address, entityId: EntityId, renter: Address, expiry: number): EntityRecord {
    const row = this.requireOperable(entityId)
    this.assertOwnerOrMinter(row, caller)
    this.assertFutureLease(expiry)
    const next = this.entities.setLease(entityId, renter, expiry)
    this.audit.emit('LeaseAssigned', { entityId, renter, expiry })
    return next
  }

  extendLease(caller: Address, entityId: EntityId, expiry: number): EntityRecord {
    const row = this.requireOperable(entityId)
    this.assertOwnerOrMinter(row, caller)
    const renter = this.entities.renterOf(entityId)
    if (!renter) throw new LeaseExpiredError({ context: { entityId: entityId.toString() } })
    if (expiry <= row.leaseExpiry) {
      throw new ReasonedRejection(reason('LEASE_INVALID_EXPIRY', { message: 'extension must move expiry forward' }))
    }
    const next = this.entities.extendLease(entityId, expiry)
    this.audit.emit('LeaseAssigned', { entityId, renter, expiry })
    return next
  }

  setOperator(caller: Address, entityId: EntityId, operator: Address, expiry: number): EntityRecord {
    const row = this.requireOperable(entityId)
    this.assertActiveRenter(row, caller)
    this.assertDelegationWindow(row, expiry)
    const next = this.entities.setOperator(entityId, operator, expiry)
    this.audit.emit('OperatorSet', { entityId, operator, expiry, viaPermit: false })
    return next
  }

  clearOperator(caller: Address, entityId: EntityId): EntityRecord {
    const row = this.entities.require(entityId)
    if (!sameAddress(row.owner, caller) && !sameAddress(this.entities.renterOf(entityId), caller)) {
      throw new AuthorizationError('AUTH_NO_ROLE')
    }
    const next = this.entities.clearOperator(entityId)
    this.audit.emit('OperatorCleared', { entityId, by: caller })
    return next
  }

  /** Checks run in a fixed order so each failure maps to exactly one code. */
  setOperatorWithSig(submitter: Address, permit: OperatorPermit, signature: string): EntityRecord {
    const row = this.requireOperable(permit.entityId)
    if (this.clock.now() > permit.deadline) throw new DelegationError('DELEGATION_SIGNATURE_EXPIRED')
    if (!sameAddress(submitter, permit.operator)) throw new DelegationError('DELEGATION_SUBMITTER_MISMATCH')
    const renter = this.entities.renterOf(permit.entityId)
    if (!renter || !sameAddress(renter, permit.renter)) throw new DelegationError('DELEGATION_RENTER_MISMATCH')
    if (permit.nonce !== row.operatorNonce) {
      throw new DelegationError('DELEGATION_REPLAYED', {
        context: { expected: row.operatorNonce.toString(), got: permit.nonce.toString() }
      })
    }
    const signer = recoverPermitSigner(this.domain, permit, signature)
    if (!sameAddress(signer, renter)) throw new DelegationError('DELEGATION_BAD_SIGNATURE')
    this.assertDelegationWindow(row, permit.expiry)

    this.entities.setOperator(permit.entityId, permit.operator, permit.expiry)
    const next = this.entities.bumpNonce(permit.entityId)
    this.audit.emit('OperatorSet', {
      entityId: permit.entityId,
      operator: permit.operator,
      expiry: permit.expiry,
      viaPermit: true
    })
    return next
  }

  operatorNonce(entityId: EntityId): bigint {
    return this.entities.require(entityId).operatorNonce
  }

  transferOwnership(caller: Address, entityId: EntityId, to: Address): EntityRecord {
    const row = this.entities.require(entityId)
    if (row.status === EntityStatus.TERMINATED) throw new EntityStateError('ENTITY_TERMINATED')
    if (!sameAddress(row.owner, caller)) throw new AuthorizationError('AUTH_NOT_OWNER')
    const next = this.entities.transfer(entityId, to)
    this.audit.emit('OwnershipTransferred', { entityId, from: row.owner, to })
    return next
  }

  // ---- status ----

  pause(caller: Address, entityId: EntityId): EntityRecord {
    this.assertAdmin(caller)
    const next = this.entities.setStatus(entityId, EntityStatus.PAUSED)
    this.audit.emit('EntityPaused', { entityId, by: caller })
    return next
  }

  unpause(caller: Address, entityId: EntityId): EntityRecord {
    this.assertAdmin(caller)
    const next = this.entities.setStatus(entityId, EntityStatus.ACTIVE)
    this.audit.emit('EntityUnpaused', { entityId, by: caller })
    return next
  }

  terminate(caller: Address, entityId: EntityId): EntityRecord {
    const row = this.entities.require(entityId)
    if (!sameAddress(caller, this.admin) && !sameAddress(caller, row.owner)) throw new AuthorizationError('AUTH_NOT_OWNER')
    const next = this.entities.setStatus(entityId, EntityStatus.TERMINATED)
    this.audit.emit('EntityTerminated', { entityId, by: caller })
    return next
  }

  // ---- roles ----

  /** Throws rather than returning a "none" role, so every caller of this gets a reasoned rejection. */
  resolveRole(entityId: EntityId, caller: Address): CallerRole {
    const row = this.entities.require(entityId)
    const now = this.clock.now()
    if (sameAddress(row.owner, caller)) {
      return row.templateId !== undefined ? CallerRole.OWNER_INSTANCE : CallerRole.OWNER_PLAIN
    }
    if (sameAddress(row.renter, caller)) {
      if (now <= row.leaseExpiry) return CallerRole.RENTER
      throw new LeaseExpiredError({ context: { expiry: row.leaseExpiry } })
    }
    if (sameAddress(row.operator, caller)) {
      if (now > row.leaseExpiry) throw new LeaseExpiredError({ context: { expiry: row.leaseExpiry } })
      if (now > row.operatorExpiry) throw new DelegationError('DELEGATION_EXPIRED', { context: { expiry: row.operatorExpiry } })
      return CallerRole.OPERATOR
    }
    throw new AuthorizationError('AUTH_NO_ROLE')
  }

  // ---- funds ----

  vaultOf(entityId: EntityId): Vault {
    const vault = this.vaults.get(entityKey(entityId))
    if (!vault) throw new EntityStateError('ENTITY_NOT_FOUND', { context: { entityId: entityId.toString() } })
    return vault
  }

  deposit(entityId: EntityId, amount: bigint): bigint {
    const row = this.entities.require(entityId)
    if (row.status === EntityStatus.TERMINATED) throw new EntityStateError('ENTITY_TERMINATED')
    const balance = this.vaultOf(entityId).deposit(this.address, amount)
    this.audit.emit('Deposited', { entityId, amount, balance })
    return balance
  }

  /** Funds only ever leave to the current owner, whoever asks. */
  async withdraw(caller: Address, entityId: EntityId, amount: bigint): Promise<WithdrawalReceipt> {
    return this.lock.run(entityKey(entityId), async () => {
      const row = this.requireOperable(entityId)
      const role = this.resolveRole(entityId, caller)
      if (role === CallerRole.OPERATOR) throw new AuthorizationError('AUTH_OPERATOR_WITHDRAW')
      const vault = this.vaultOf(entityId)
      await vault.withdraw(this.address, row.owner, amount)
      const receipt = { entityId, to: row.owner, amount, balance: vault.balanceOf() }
      this.audit.emit('Withdrawn', receipt)
      return receipt
    })
  }

  // ---- execution ----

  async execute(caller: Address, entityId: EntityId, input: unknown): Promise<ExecutionReceipt> {
    const corrId = `act_${ulid()}`
    let action: Action
    try {
      action = parseAction(input)
    } catch (e) {
      this.recordRejection(corrId, entityId, caller, undefined, e)
      throw e
    }
    return this.lock.run(entityKey(entityId), () => this.executeLocked(corrId, caller, entityId, action))
  }

  private async executeLocked(corrId: string, caller: Address, entityId: EntityId, action: Action): Promise<ExecutionReceipt> {
    const instructionId = instructionIdOf(action.payload)
    const role = this.authorize(corrId, caller, entityId, action)

    const event = { corrId, entityId, caller, role, destination: action.destination, instructionId }
    let returnData: string
    try {
      returnData = (await this.vaultOf(entityId).forward(this.address, action)).returnData
    } catch (e) {
      this.audit.emit('ActionExecuted', { ...event, success: false })
      logAction({ corr_id: corrId, entityId, caller, role, destination: action.destination, instructionId, success: false })
      countAction(role, 'failed')
      if (isRejection(e)) countRejection(e.code)
      throw e instanceof ReasonedRejection ? e : new ExecutionError('EXECUTION_FAILED', { message: String(e) })
    }

    const report = this.engine.commit(this.address, entityId, action)
    this.entities.touch(entityId, this.clock.now())
    this.audit.emit('ActionExecuted', { ...event, success: true })
    logAction({ corr_id: corrId, entityId, caller, role, destination: action.destination, instructionId, success: true })
    countAction(role, 'executed')
    return { corrId, entityId, role, instructionId, returnData, commitFailures: report.failures }
  }

  // ---- internals ----

  /** Status, role and policies; anything that fails here is recorded as a rejection. */
  private authorize(corrId: string, caller: Address, entityId: EntityId, action: Action): CallerRole {
    let role: CallerRole | undefined
    try {
      this.requireOperable(entityId)
      role = this.resolveRole(entityId, caller)
      if (role !== CallerRole.OWNER_PLAIN) {
        const decision = this.engine.validate(entityId, caller, action)
        if (!decision.allowed) throw new PolicyViolation(decision.reason ?? 'rejected', decision.policyType)
      }
      return role
    } catch (e) {
      this.recordRejection(corrId, entityId, caller, role, e)
      throw e
    }
  }

  private recordRejection(corrId: string, entityId: EntityId, caller: Address, role: CallerRole | undefined, e: unknown) {
    if (!isRejection(e)) return
    logRejection({
      corr_id: corrId,
      entityId,
      caller,
      code: e.code,
      category: e.reason.category,
      message: e.message,
      context: e.reason.context
    })
    countRejection(e.code)
    countAction(role ?? 'unknown', 'rejected')
    this.audit.emit('ActionRejected', { corrId, entityId, caller, code: e.code, message: e.message })
  }

  private openVault(row: EntityRecord) {
    this.vaults.set(entityKey(row.id), new Vault(row.id, row.vault, this.address, this.executor))
  }

  private requireOperable(entityId: EntityId): EntityRecord {
    const row = this.entities.require(entityId)
    if (row.status === EntityStatus.TERMINATED) throw new EntityStateError('ENTITY_TERMINATED')
    if (row.status === EntityStatus.PAUSED) throw new EntityStateError('ENTITY_PAUSED')
    return row
  }

  private assertAdmin(caller: Address) {
    if (!sameAddress(caller, this.admin)) throw new AuthorizationError('AUTH_NOT_ADMIN')
  }

  private assertOwnerOrMinter(row: EntityRecord, caller: Address) {
    if (!sameAddress(row.owner, caller) && !sameAddress(this.minter, caller)) throw new AuthorizationError('AUTH_NOT_OWNER')
  }

  private assertActiveRenter(row: EntityRecord, caller: Address) {
    if (sameAddress(this.entities.renterOf(row.id), caller)) return
    if (sameAddress(row.renter, caller)) throw new LeaseExpiredError({ context: { expiry: row.leaseExpiry } })
    throw new AuthorizationError('AUTH_NOT_RENTER')
  }

  private assertFutureLease(expiry: number) {
    if (!Number.isInteger(expiry) || expiry <= this.clock.now()) {
      throw new ReasonedRejection(reason('LEASE_INVALID_EXPIRY', { context: { expiry } }))
    }
  }

  /** now < expiry <= lease expiry */
  private assertDelegationWindow(row: EntityRecord, expiry: number) {
    if (expiry <= this.clock.now()) throw new DelegationError('DELEGATION_EXPIRED', { context: { expiry } })
    if (expiry > row.leaseExpiry) {
      throw new DelegationError('DELEGATION_EXCEEDS_LEASE', { context: { expiry, leaseExpiry: row.leaseExpiry } })
    }
  }
}
