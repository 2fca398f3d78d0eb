import { REASONS, ReasonCategory } from '@leasehold/dto'
import { codesIn, isReasonCode, reason } from '../src/reason'
import {
  ReasonedRejection,
  AuthorizationError,
  LeaseExpiredError,
  PolicyViolation,
  DelegationError,
  ConfigurationError,
  categoryOf,
} from '../src/errors'

describe('reasons factory', () => {
  test('factory-defaults: exact match for canonical codes', () => {
    const r = reason('AUTH_NO_ROLE')
    expect(r).toEqual(REASONS.AUTH_NO_ROLE)
  })

  test('override-context: merges new message and context', () => {
    const r = reason('CONFIG_CEILING_VIOLATION', { message: 'custom', context: { max: 1, got: 2 } })
    expect(r.message).toBe('custom')
    expect(r.context).toEqual({ max: 1, got: 2 })
    expect(r.category).toBe(ReasonCategory.CONFIGURATION)
  })

  test('every registry entry is keyed by its own code', () => {
    for (const [key, detail] of Object.entries(REASONS)) {
      expect(detail.code).toBe(key)
    }
  })

  test('empty overrides leave no context behind', () => {
    expect(reason('ENTITY_PAUSED', { context: {} })).not.toHaveProperty('context')
  })

  test('isReasonCode narrows registry codes only', () => {
    expect(isReasonCode('DELEGATION_REPLAYED')).toBe(true)
    expect(isReasonCode('NOT_A_CODE')).toBe(false)
    expect(isReasonCode('toString')).toBe(false)
  })

  test('codesIn lists a category in registry order', () => {
    expect(codesIn(ReasonCategory.LEASE)).toEqual(['LEASE_EXPIRED', 'LEASE_INVALID_EXPIRY'])
    expect(codesIn(ReasonCategory.VALIDATION)).toEqual(['VALIDATION_ACTION_SCHEMA'])
  })
})

describe('error taxonomy', () => {
  test('error-class-shape', () => {
    const err = new LeaseExpiredError({ context: { expiry: 10 } })
    expect(err).toBeInstanceOf(Error)
    expect(err).toBeInstanceOf(ReasonedRejection)
    expect(err.terminalState).toBe('REJECTED')
    expect(err.code).toBe('LEASE_EXPIRED')
    expect(err.name).toBe('LeaseExpiredError')
  })

  test('lease expiry and missing role are different codes', () => {
    expect(new LeaseExpiredError().code).not.toBe(new AuthorizationError().code)
    expect(new AuthorizationError().reason.category).toBe(ReasonCategory.AUTHORIZATION)
  })

  test('policy violation keeps the plugin reason verbatim', () => {
    const err = new PolicyViolation('exceeds per-call limit', 'spending_limit')
    expect(err.message).toBe('exceeds per-call limit')
    expect(err.reason.message).toBe('exceeds per-call limit')
    expect(err.reason.context).toEqual({ policyType: 'spending_limit' })
    expect(err.policyType).toBe('spending_limit')
  })

  test('delegation failures keep distinct codes', () => {
    const codes = [
      new DelegationError('DELEGATION_EXPIRED').code,
      new DelegationError('DELEGATION_REPLAYED').code,
      new DelegationError('DELEGATION_BAD_SIGNATURE').code,
      new DelegationError('DELEGATION_SUBMITTER_MISMATCH').code,
    ]
    expect(new Set(codes).size).toBe(4)
  })

  test('categoryOf falls back to INTERNAL for foreign errors', () => {
    expect(categoryOf(new ConfigurationError('CONFIG_DUPLICATE'))).toBe(ReasonCategory.CONFIGURATION)
    expect(categoryOf(new Error('boom'))).toBe(ReasonCategory.INTERNAL)
  })
})
