import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // AUTHORIZATION
  AUTH_NO_ROLE: { code: 'AUTH_NO_ROLE', category: ReasonCategory.AUTHORIZATION, message: 'Caller has no role on this entity' },
  AUTH_OPERATOR_WITHDRAW: { code: 'AUTH_OPERATOR_WITHDRAW', category: ReasonCategory.AUTHORIZATION, message: 'Operators cannot withdraw funds' },
  AUTH_NOT_ADMIN: { code: 'AUTH_NOT_ADMIN', category: ReasonCategory.AUTHORIZATION, message: 'Caller is not the admin' },
  AUTH_NOT_MINTER: { code: 'AUTH_NOT_MINTER', category: ReasonCategory.AUTHORIZATION, message: 'Caller is not the instance minter' },
  AUTH_NOT_OWNER: { code: 'AUTH_NOT_OWNER', category: ReasonCategory.AUTHORIZATION, message: 'Caller is not the entity owner' },
  AUTH_NOT_RENTER: { code: 'AUTH_NOT_RENTER', category: ReasonCategory.AUTHORIZATION, message: 'Caller is not the active renter' },
  AUTH_NOT_ROUTER: { code: 'AUTH_NOT_ROUTER', category: ReasonCategory.AUTHORIZATION, message: 'Only the access router may call this' },

  // LEASE
  LEASE_EXPIRED: { code: 'LEASE_EXPIRED', category: ReasonCategory.LEASE, message: 'Lease has expired' },
  LEASE_INVALID_EXPIRY: { code: 'LEASE_INVALID_EXPIRY', category: ReasonCategory.LEASE, message: 'Lease expiry is not valid' },

  // VALIDATION
  VALIDATION_ACTION_SCHEMA: { code: 'VALIDATION_ACTION_SCHEMA', category: ReasonCategory.VALIDATION, message: 'Action failed schema validation' },

  // POLICY
  POLICY_VIOLATION: { code: 'POLICY_VIOLATION', category: ReasonCategory.POLICY, message: 'Policy rejected the action' },

  // ENTITY STATE
  ENTITY_NOT_FOUND: { code: 'ENTITY_NOT_FOUND', category: ReasonCategory.ENTITY_STATE, message: 'Entity does not exist' },
  ENTITY_PAUSED: { code: 'ENTITY_PAUSED', category: ReasonCategory.ENTITY_STATE, message: 'Entity is paused' },
  ENTITY_TERMINATED: { code: 'ENTITY_TERMINATED', category: ReasonCategory.ENTITY_STATE, message: 'Entity is terminated' },
  ENTITY_BAD_TRANSITION: { code: 'ENTITY_BAD_TRANSITION', category: ReasonCategory.ENTITY_STATE, message: 'Status transition not allowed' },

  // DELEGATION
  DELEGATION_EXPIRED: { code: 'DELEGATION_EXPIRED', category: ReasonCategory.DELEGATION, message: 'Operator delegation has expired' },
  DELEGATION_EXCEEDS_LEASE: { code: 'DELEGATION_EXCEEDS_LEASE', category: ReasonCategory.DELEGATION, message: 'Operator expiry exceeds lease expiry' },
  DELEGATION_SIGNATURE_EXPIRED: { code: 'DELEGATION_SIGNATURE_EXPIRED', category: ReasonCategory.DELEGATION, message: 'Permit signature deadline has passed' },
  DELEGATION_REPLAYED: { code: 'DELEGATION_REPLAYED', category: ReasonCategory.DELEGATION, message: 'Permit nonce already used or out of order' },
  DELEGATION_BAD_SIGNATURE: { code: 'DELEGATION_BAD_SIGNATURE', category: ReasonCategory.DELEGATION, message: 'Permit signature does not match renter' },
  DELEGATION_SUBMITTER_MISMATCH: { code: 'DELEGATION_SUBMITTER_MISMATCH', category: ReasonCategory.DELEGATION, message: 'Permit must be submitted by its operator' },
  DELEGATION_RENTER_MISMATCH: { code: 'DELEGATION_RENTER_MISMATCH', category: ReasonCategory.DELEGATION, message: 'Permit renter is not the active renter' },

  // CONFIGURATION
  CONFIG_PLUGIN_NOT_APPROVED: { code: 'CONFIG_PLUGIN_NOT_APPROVED', category: ReasonCategory.CONFIGURATION, message: 'Policy plugin is not approved' },
  CONFIG_PLUGIN_CAPABILITY: { code: 'CONFIG_PLUGIN_CAPABILITY', category: ReasonCategory.CONFIGURATION, message: 'Policy plugin capabilities do not match its hooks' },
  CONFIG_DUPLICATE: { code: 'CONFIG_DUPLICATE', category: ReasonCategory.CONFIGURATION, message: 'Duplicate entry' },
  CONFIG_CAP_EXCEEDED: { code: 'CONFIG_CAP_EXCEEDED', category: ReasonCategory.CONFIGURATION, message: 'Policy list is full' },
  CONFIG_CEILING_VIOLATION: { code: 'CONFIG_CEILING_VIOLATION', category: ReasonCategory.CONFIGURATION, message: 'Value exceeds the template ceiling' },
  CONFIG_NOT_FOUND: { code: 'CONFIG_NOT_FOUND', category: ReasonCategory.CONFIGURATION, message: 'Entry not found' },
  CONFIG_NOT_RENTER_REMOVABLE: { code: 'CONFIG_NOT_RENTER_REMOVABLE', category: ReasonCategory.CONFIGURATION, message: 'Policy cannot be removed from an instance' },
  CONFIG_ALREADY_BOUND: { code: 'CONFIG_ALREADY_BOUND', category: ReasonCategory.CONFIGURATION, message: 'Instance is already bound' },
  CONFIG_NOT_BOUND: { code: 'CONFIG_NOT_BOUND', category: ReasonCategory.CONFIGURATION, message: 'Entity is not bound to a template' },
  CONFIG_TEMPLATE_INVALID: { code: 'CONFIG_TEMPLATE_INVALID', category: ReasonCategory.CONFIGURATION, message: 'Template is missing, unfrozen or empty' },
  CONFIG_TEMPLATE_FROZEN: { code: 'CONFIG_TEMPLATE_FROZEN', category: ReasonCategory.CONFIGURATION, message: 'Template is frozen' },
  CONFIG_NAMESPACE_TAKEN: { code: 'CONFIG_NAMESPACE_TAKEN', category: ReasonCategory.CONFIGURATION, message: 'Store namespace already claimed' },
  CONFIG_INVALID_ENV: { code: 'CONFIG_INVALID_ENV', category: ReasonCategory.CONFIGURATION, message: 'Environment configuration is invalid' },

  // EXECUTION
  EXECUTION_FAILED: { code: 'EXECUTION_FAILED', category: ReasonCategory.EXECUTION, message: 'Forwarded call failed' },
  EXECUTION_INSUFFICIENT_FUNDS: { code: 'EXECUTION_INSUFFICIENT_FUNDS', category: ReasonCategory.EXECUTION, message: 'Vault balance too low' },

  // INTERNAL
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, message: 'Internal error' },
}

export function getReason(code: ReasonCode): ReasonDetail {
  return REASONS[code]
}
