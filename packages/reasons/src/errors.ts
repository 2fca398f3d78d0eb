/**
 * ReasonedRejection and the guard error taxonomy.
 * Every synchronous rejection carries a registry ReasonDetail so callers can branch on `reason.code`.
 * Subclasses only narrow the category; they never add behaviour.
 */
import { ReasonCategory, ReasonCode, ReasonDetail } from '@leasehold/dto'
import { reason, ReasonOverrides } from './reason'

export class ReasonedRejection extends Error {
  public readonly reason: ReasonDetail
  public readonly terminalState = 'REJECTED' as const

  constructor(reason: ReasonDetail, human?: string) {
    super(human || reason.message)
    this.name = 'ReasonedRejection'
    this.reason = reason
  }

  get code(): ReasonCode {
    return this.reason.code
  }
}

/** Caller never had a role on the entity. */
export class AuthorizationError extends ReasonedRejection {
  constructor(code: ReasonCode = 'AUTH_NO_ROLE', overrides?: ReasonOverrides) {
    super(reason(code, overrides))
    this.name = 'AuthorizationError'
  }
}

/** Caller had renter access and lost it. */
export class LeaseExpiredError extends ReasonedRejection {
  constructor(overrides?: ReasonOverrides) {
    super(reason('LEASE_EXPIRED', overrides))
    this.name = 'LeaseExpiredError'
  }
}

/** The rejecting plugin's reason, surfaced verbatim as the message. */
export class PolicyViolation extends ReasonedRejection {
  public readonly policyType?: string

  constructor(policyReason: string, policyType?: string) {
    super(reason('POLICY_VIOLATION', {
      message: policyReason,
      context: policyType ? { policyType } : undefined,
    }))
    this.name = 'PolicyViolation'
    this.policyType = policyType
  }
}

export class EntityStateError extends ReasonedRejection {
  constructor(code: ReasonCode, overrides?: ReasonOverrides) {
    super(reason(code, overrides))
    this.name = 'EntityStateError'
  }
}

export class DelegationError extends ReasonedRejection {
  constructor(code: ReasonCode, overrides?: ReasonOverrides) {
    super(reason(code, overrides))
    this.name = 'DelegationError'
  }
}

export class ConfigurationError extends ReasonedRejection {
  constructor(code: ReasonCode, overrides?: ReasonOverrides) {
    super(reason(code, overrides))
    this.name = 'ConfigurationError'
  }
}

export class ExecutionError extends ReasonedRejection {
  constructor(code: ReasonCode = 'EXECUTION_FAILED', overrides?: ReasonOverrides) {
    super(reason(code, overrides))
    this.name = 'ExecutionError'
  }
}

export function isRejection(e: unknown): e is ReasonedRejection {
  return e instanceof ReasonedRejection
}

export function categoryOf(e: unknown): ReasonCategory {
  return isRejection(e) ? e.reason.category : ReasonCategory.INTERNAL
}
