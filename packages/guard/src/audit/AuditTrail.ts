/**
 * AuditTrail
 * Every state change and every executed or rejected action is emitted here, and mirrored to the logger.
 * Listeners are plain observers; the guard never reads anything back from them.
 * A listener that throws is logged and skipped: the action it observes has already happened.
 */

import { EventEmitter } from 'events'
import type { Address, EntityId } from '@leasehold/dto'
import { getLogger, logGuardEvent } from '../utils/logger'

export type GuardEventMap = {
  EntityMinted: { entityId: EntityId; owner: Address; vault: Address; templateId?: EntityId; paramsHash?: string }
  LeaseAssigned: { entityId: EntityId; renter: Address; expiry: number }
  OperatorSet: { entityId: EntityId; operator: Address; expiry: number; viaPermit: boolean }
  OperatorCleared: { entityId: EntityId; by: Address }
  OwnershipTransferred: { entityId: EntityId; from: Address; to: Address }
  InstanceBound: { instanceId: EntityId; templateId: EntityId; policies: string[] }
  ActionExecuted: {
    corrId: string
    entityId: EntityId
    caller: Address
    role: string
    destination: Address
    instructionId: string
    success: boolean
  }
  ActionRejected: { corrId: string; entityId: EntityId; caller: Address; code: string; message: string }
  PolicyCommitFailed: { entityId: EntityId; policyType: string; diagnostic: string }
  EntityPaused: { entityId: EntityId; by: Address }
  EntityUnpaused: { entityId: EntityId; by: Address }
  EntityTerminated: { entityId: EntityId; by: Address }
  Deposited: { entityId: EntityId; amount: bigint; balance: bigint }
  Withdrawn: { entityId: EntityId; to: Address; amount: bigint; balance: bigint }
}

export type GuardEventName = keyof GuardEventMap

export class AuditTrail {
  private emitter = new EventEmitter()

  on<K extends GuardEventName>(event: K, listener: (payload: GuardEventMap[K]) => void): () => void {
    const isolated = (payload: GuardEventMap[K]) => {
      try {
        listener(payload)
      } catch (e) {
        getLogger().error({ event: 'audit.listener_threw', auditEvent: event, err: e instanceof Error ? e.message : String(e) })
      }
    }
    this.emitter.on(event, isolated)
    return () => {
      this.emitter.off(event, isolated)
    }
  }

  emit<K extends GuardEventName>(event: K, payload: GuardEventMap[K]): void {
    logGuardEvent(event, payload)
    this.emitter.emit(event, payload)
  }
}
