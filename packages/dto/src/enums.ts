export enum EntityStatus {
  ACTIVE = "ACTIVE",
  PAUSED = "PAUSED",
  TERMINATED = "TERMINATED",
}

export enum CallerRole {
  OWNER_PLAIN = "OWNER_PLAIN",
  OWNER_INSTANCE = "OWNER_INSTANCE",
  RENTER = "RENTER",
  OPERATOR = "OPERATOR",
}

export enum ReasonCategory {
  AUTHORIZATION = "AUTHORIZATION",
  LEASE = "LEASE",
  VALIDATION = "VALIDATION",
  POLICY = "POLICY",
  ENTITY_STATE = "ENTITY_STATE",
  DELEGATION = "DELEGATION",
  CONFIGURATION = "CONFIGURATION",
  EXECUTION = "EXECUTION",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "AUTH_NO_ROLE"
  | "AUTH_OPERATOR_WITHDRAW"
  | "AUTH_NOT_ADMIN"
  | "AUTH_NOT_MINTER"
  | "AUTH_NOT_OWNER"
  | "AUTH_NOT_RENTER"
  | "AUTH_NOT_ROUTER"
  | "LEASE_EXPIRED"
  | "LEASE_INVALID_EXPIRY"
  | "VALIDATION_ACTION_SCHEMA"
  | "POLICY_VIOLATION"
  | "ENTITY_NOT_FOUND"
  | "ENTITY_PAUSED"
  | "ENTITY_TERMINATED"
  | "ENTITY_BAD_TRANSITION"
  | "DELEGATION_EXPIRED"
  | "DELEGATION_EXCEEDS_LEASE"
  | "DELEGATION_SIGNATURE_EXPIRED"
  | "DELEGATION_REPLAYED"
  | "DELEGATION_BAD_SIGNATURE"
  | "DELEGATION_SUBMITTER_MISMATCH"
  | "DELEGATION_RENTER_MISMATCH"
  | "CONFIG_PLUGIN_NOT_APPROVED"
  | "CONFIG_PLUGIN_CAPABILITY"
  | "CONFIG_DUPLICATE"
  | "CONFIG_CAP_EXCEEDED"
  | "CONFIG_CEILING_VIOLATION"
  | "CONFIG_NOT_FOUND"
  | "CONFIG_NOT_RENTER_REMOVABLE"
  | "CONFIG_ALREADY_BOUND"
  | "CONFIG_NOT_BOUND"
  | "CONFIG_TEMPLATE_INVALID"
  | "CONFIG_TEMPLATE_FROZEN"
  | "CONFIG_NAMESPACE_TAKEN"
  | "CONFIG_INVALID_ENV"
  | "EXECUTION_FAILED"
  | "EXECUTION_INSUFFICIENT_FUNDS"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  message: string;
  context?: Record<string, string | number | boolean>;
}
