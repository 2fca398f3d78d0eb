/**
 * PolicyPlugin (public seam)
 * Purpose: one independently pluggable rule over a decoded action.
 * Contract: `check` is a pure read of the plugin's own namespace; `commit` is the only writer and runs
 * after the forwarded call succeeded. Optional hooks are declared up front in `capabilities`; the engine
 * refuses a plugin whose declarations and hooks disagree, and never probes for a hook at call time.
 * Fail-closed: a plugin with no configuration for an entity rejects anything but a zero-value empty call.
 */

import type { Address, EntityId, PolicyDecision } from '@leasehold/dto'
import type { DecodedAction } from '../decoder/decodeAction'

export type PolicyCapability = 'commit' | 'instance-init'

export interface PolicyCheckInput {
  entityId: EntityId
  caller: Address
  destination: Address
  instructionId: string
  payload: string
  value: bigint
  decoded: DecodedAction
  vault: Address
}

export type PolicyCommitInput = Omit<PolicyCheckInput, 'caller'>

export interface PolicyPlugin {
  readonly policyType: string
  readonly renterConfigurable: boolean
  readonly capabilities: readonly PolicyCapability[]
  check(input: PolicyCheckInput): PolicyDecision
  commit?(input: PolicyCommitInput): void
  initInstance?(instanceId: EntityId, templateId: EntityId): void
}

export interface CommittingPlugin extends PolicyPlugin {
  commit(input: PolicyCommitInput): void
}

export interface InitializingPlugin extends PolicyPlugin {
  initInstance(instanceId: EntityId, templateId: EntityId): void
}

export function declares(plugin: PolicyPlugin, capability: PolicyCapability): boolean {
  return plugin.capabilities.includes(capability)
}

export function canCommit(plugin: PolicyPlugin): plugin is CommittingPlugin {
  return declares(plugin, 'commit') && typeof plugin.commit === 'function'
}

export function canInitInstance(plugin: PolicyPlugin): plugin is InitializingPlugin {
  return declares(plugin, 'instance-init') && typeof plugin.initInstance === 'function'
}

/** Names of hooks whose presence disagrees with the declared capabilities; empty when consistent. */
export function capabilityMismatches(plugin: PolicyPlugin): string[] {
  const out: string[] = []
  if (declares(plugin, 'commit') !== (typeof plugin.commit === 'function')) out.push('commit')
  if (declares(plugin, 'instance-init') !== (typeof plugin.initInstance === 'function')) out.push('instance-init')
  return out
}

export const ALLOW: PolicyDecision = { allowed: true }

export function deny(reason: string): PolicyDecision {
  return { allowed: false, reason }
}

/** Zero-value call with nothing to inspect: the only thing an unconfigured plugin lets through. */
export function isInert(input: Pick<PolicyCheckInput, 'value' | 'decoded'>): boolean {
  return input.value === 0n && input.decoded.kind === 'none'
}

export const NOT_CONFIGURED = 'policy not configured'

export const UNRECOGNISED_INSTRUCTION = 'unrecognised instruction'

/**
 * What plugins may ask about entities. Implemented by the entity registry (ownership, leases)
 * and the policy engine (template bindings); plugins never see either directly.
 */
export interface PolicyHost {
  ownerOf(entityId: EntityId): Address | undefined
  renterOf(entityId: EntityId): Address | undefined
  templateOf(instanceId: EntityId): EntityId | undefined
  isTemplate(entityId: EntityId): boolean
  isTemplateFrozen(templateId: EntityId): boolean
}

/** Where template-level configuration for an entity lives: itself when it is a template, else its bound template. */
export function configSourceOf(host: PolicyHost, entityId: EntityId): EntityId | undefined {
  if (host.isTemplate(entityId)) return entityId
  return host.templateOf(entityId)
}
