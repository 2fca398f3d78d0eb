/**
 * SpendingLimitPolicy
 * Purpose: cap worst-case spend per call and per day, and cap approvals separately.
 * Ordering: blocked instruction kinds -> approval ceiling -> per-call cap -> daily cap.
 * Calldata the decoder does not recognise has no bounded spend and is blocked with the other kinds.
 * Template limits are the ceiling; an instance starts with a copy and may only tighten it.
 * Day buckets are UTC days (floor(now / 86400)); the counter resets when the bucket changes.
 */

import type { Address, EntityId, PolicyDecision } from '@leasehold/dto'
import { ConfigurationError } from '@leasehold/reasons'
import { assertNever, isUnlimitedAmount, spendAmount } from '../decoder/decodeAction'
import { KeyValueStore, Namespace, entityKey } from '../store/KeyValueStore'
import { Clock, systemClock } from '../utils/clock'
import { assertInstanceConfigurer, assertTemplateEditor } from './access'
import {
  ALLOW,
  NOT_CONFIGURED,
  PolicyCheckInput,
  PolicyCommitInput,
  PolicyHost,
  PolicyPlugin,
  UNRECOGNISED_INSTRUCTION,
  deny,
  isInert
} from './types'

export const SPENDING_LIMIT = 'spending_limit'

const DAY_SECONDS = 86_400

export type SpendingLimits = {
  maxPerTx: bigint
  maxPerDay: bigint
  maxApprove: bigint
}

type DayUsage = { day: number; spent: bigint }

function dayOf(ts: number): number {
  return Math.floor(ts / DAY_SECONDS)
}

function assertNonNegative(limits: SpendingLimits) {
  if (limits.maxPerTx < 0n || limits.maxPerDay < 0n || limits.maxApprove < 0n) {
    throw new ConfigurationError('CONFIG_CEILING_VIOLATION', { message: 'limits must be non-negative' })
  }
}

export class SpendingLimitPolicy implements PolicyPlugin {
  readonly policyType = SPENDING_LIMIT
  readonly renterConfigurable = true
  readonly capabilities = ['commit', 'instance-init'] as const

  private limits: Namespace<SpendingLimits>
  private usage: Namespace<DayUsage>

  constructor(store: KeyValueStore, private readonly host: PolicyHost, private readonly clock: Clock = systemClock) {
    this.limits = store.claim<SpendingLimits>(`${SPENDING_LIMIT}.limits`)
    this.usage = store.claim<DayUsage>(`${SPENDING_LIMIT}.usage`)
  }

  setTemplateLimits(caller: Address, templateId: EntityId, limits: SpendingLimits): void {
    assertTemplateEditor(this.host, templateId, caller)
    assertNonNegative(limits)
    this.limits.set(entityKey(templateId), { ...limits })
  }

  setInstanceLimits(caller: Address, instanceId: EntityId, limits: SpendingLimits): void {
    const templateId = assertInstanceConfigurer(this.host, instanceId, caller)
    assertNonNegative(limits)
    const ceiling = this.limits.get(entityKey(templateId))
    // no ceiling means the template never allowed spending; an instance cannot grant itself any
    if (!ceiling) {
      throw new ConfigurationError('CONFIG_CEILING_VIOLATION', {
        message: 'template sets no spending ceiling',
        context: { templateId: templateId.toString() }
      })
    }
    for (const field of ['maxPerTx', 'maxPerDay', 'maxApprove'] as const) {
      if (limits[field] > ceiling[field]) {
        throw new ConfigurationError('CONFIG_CEILING_VIOLATION', {
          context: { field, ceiling: ceiling[field].toString(), got: limits[field].toString() }
        })
      }
    }
    this.limits.set(entityKey(instanceId), { ...limits })
  }

  initInstance(instanceId: EntityId, templateId: EntityId): void {
    const ceiling = this.limits.get(entityKey(templateId))
    if (ceiling) this.limits.set(entityKey(instanceId), { ...ceiling })
  }

  getLimits(entityId: EntityId): SpendingLimits | undefined {
    const l = this.limits.get(entityKey(entityId))
    return l ? { ...l } : undefined
  }

  spentToday(entityId: EntityId): bigint {
    const u = this.usage.get(entityKey(entityId))
    if (!u || u.day !== dayOf(this.clock.now())) return 0n
    return u.spent
  }

  check(input: PolicyCheckInput): PolicyDecision {
    const cfg = this.limits.get(entityKey(input.entityId))
    if (!cfg) return isInert(input) ? ALLOW : deny(NOT_CONFIGURED)

    const { decoded } = input
    switch (decoded.kind) {
      case 'increase-allowance':
        // no ceiling of its own: repeated increases would walk past maxApprove
        return deny('increaseAllowance blocked')
      case 'permit':
        return deny('permit blocked')
      case 'unknown':
        return deny(UNRECOGNISED_INSTRUCTION)
      case 'approve':
        if (isUnlimitedAmount(decoded.amount)) return deny('unlimited approval blocked')
        if ((decoded.amount ?? 0n) > cfg.maxApprove) return deny('approve exceeds limit')
        break
      case 'decrease-allowance':
      case 'none':
      case 'swap-exact-in':
      case 'swap-exact-out':
      case 'transfer':
      case 'transfer-from':
      case 'wrap':
      case 'unwrap':
        break
      default:
        return assertNever(decoded.kind)
    }

    const spend = spendAmount(decoded, input.value)
    if (spend === 0n) return ALLOW
    if (spend > cfg.maxPerTx) return deny('exceeds per-call limit')
    if (this.spentToday(input.entityId) + spend > cfg.maxPerDay) return deny('daily limit reached')
    return ALLOW
  }

  commit(input: PolicyCommitInput): void {
    const spend = spendAmount(input.decoded, input.value)
    if (spend === 0n) return
    const key = entityKey(input.entityId)
    const day = dayOf(this.clock.now())
    const prev = this.usage.get(key)
    const spent = prev && prev.day === day ? prev.spent + spend : spend
    this.usage.set(key, { day, spent })
  }
}
