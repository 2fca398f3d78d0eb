/**
 * PolicyEngine
 * Purpose: hold the approved plugin registry, template policy lists and instance bindings,
 * and run an entity's active policies over an action.
 *
 * Flow per action (driven by the router):
 *   validate  -> every active plugin's check, first rejection wins, no writes
 *   (vault forwards the call)
 *   commit    -> every active plugin's commit hook, router only; a throwing hook is logged and skipped
 *
 * Unbound plain entities have no active policies and are rejected outright.
 */

import type { Action, Address, EntityId, PolicyDecision } from '@leasehold/dto'
import { AuthorizationError, ConfigurationError, EntityStateError } from '@leasehold/reasons'
import { AuditTrail } from '../audit/AuditTrail'
import { decodeAction, instructionIdOf } from '../decoder/decodeAction'
import type { EntityDirectory } from '../entities/EntityRegistry'
import { PolicyHost, PolicyPlugin, canCommit, canInitInstance, capabilityMismatches } from '../plugins/types'
import { KeyValueStore, Namespace, entityKey } from '../store/KeyValueStore'
import { sameAddress } from '../utils/address'
import { getLogger, logCommitFailure } from '../utils/logger'
import { countCommitFailure } from '../utils/metrics'

export const NOT_BOUND = 'not bound'
export const POLICY_REVOKED = 'policy revoked'
export const CHECK_FAILED = 'policy check failed'

export const DEFAULT_MAX_POLICIES = 10

export type PolicyEngineOptions = {
  store: KeyValueStore
  entities: EntityDirectory
  admin: Address
  instanceMinter: Address
  router: Address
  maxPolicies?: number
  audit?: AuditTrail
}

export type CommitFailure = { policyType: string; diagnostic: string }

export type CommitReport = { committed: string[]; failures: CommitFailure[] }

type TemplateRecord = { policies: string[]; frozen: boolean }

type RegistryEntry = { plugin: PolicyPlugin; approved: boolean }

export class PolicyEngine implements PolicyHost {
  private readonly plugins: Map<string, RegistryEntry> = new Map()
  private readonly templates: Namespace<TemplateRecord>
  private readonly instances: Namespace<string[]>
  private readonly bindings: Namespace<EntityId>
  private readonly entities: EntityDirectory
  private readonly admin: Address
  private readonly instanceMinter: Address
  private readonly router: Address
  private readonly audit?: AuditTrail
  readonly maxPolicies: number

  constructor(opts: PolicyEngineOptions) {
    this.templates = opts.store.claim<TemplateRecord>('engine.templates')
    this.instances = opts.store.claim<string[]>('engine.instances')
    this.bindings = opts.store.claim<EntityId>('engine.bindings')
    this.entities = opts.entities
    this.admin = opts.admin
    this.instanceMinter = opts.instanceMinter
    this.router = opts.router
    this.audit = opts.audit
    this.maxPolicies = opts.maxPolicies ?? DEFAULT_MAX_POLICIES
  }

  // ---- plugin registry (admin) ----

  approvePlugin(caller: Address, plugin: PolicyPlugin): void {
    this.assertAdmin(caller)
    const mismatched = capabilityMismatches(plugin)
    if (mismatched.length) {
      throw new ConfigurationError('CONFIG_PLUGIN_CAPABILITY', {
        context: { policyType: plugin.policyType, hooks: mismatched.join(',') }
      })
    }
    const existing = this.plugins.get(plugin.policyType)
    if (existing?.approved) {
      throw new ConfigurationError('CONFIG_DUPLICATE', { context: { policyType: plugin.policyType } })
    }
    this.plugins.set(plugin.policyType, { plugin, approved: true })
  }

  /** Entities already carrying the type keep it in their list and fail closed until it is re-approved. */
  revokePlugin(caller: Address, policyType: string): void {
    this.assertAdmin(caller)
    const entry = this.plugins.get(policyType)
    if (!entry?.approved) throw new ConfigurationError('CONFIG_NOT_FOUND', { context: { policyType } })
    entry.approved = false
  }

  isApproved(policyType: string): boolean {
    return this.plugins.get(policyType)?.approved ?? false
  }

  approvedPlugins(): string[] {
    return [...this.plugins.entries()].filter(([, e]) => e.approved).map(([t]) => t)
  }

  // ---- templates (template owner) ----

  registerTemplate(caller: Address, entityId: EntityId): void {
    if (!this.entities.exists(entityId)) {
      throw new EntityStateError('ENTITY_NOT_FOUND', { context: { entityId: entityId.toString() } })
    }
    if (!sameAddress(this.entities.ownerOf(entityId), caller)) throw new AuthorizationError('AUTH_NOT_OWNER')
    if (this.entities.isInstance(entityId)) {
      throw new ConfigurationError('CONFIG_TEMPLATE_INVALID', { message: 'an instance cannot be a template' })
    }
    const key = entityKey(entityId)
    if (this.templates.has(key)) throw new ConfigurationError('CONFIG_DUPLICATE', { context: { templateId: key } })
    this.templates.set(key, { policies: [], frozen: false })
  }

  freezeTemplate(caller: Address, templateId: EntityId): void {
    const tpl = this.editableTemplate(caller, templateId)
    if (!tpl.policies.length) {
      throw new ConfigurationError('CONFIG_TEMPLATE_INVALID', { message: 'cannot freeze an empty template' })
    }
    this.templates.set(entityKey(templateId), { ...tpl, frozen: true })
  }

  addTemplatePolicy(caller: Address, templateId: EntityId, policyType: string): void {
    const tpl = this.editableTemplate(caller, templateId)
    this.assertAddable(tpl.policies, policyType)
    this.templates.set(entityKey(templateId), { ...tpl, policies: [...tpl.policies, policyType] })
  }

  removeTemplatePolicy(caller: Address, templateId: EntityId, policyType: string): void {
    const tpl = this.editableTemplate(caller, templateId)
    this.templates.set(entityKey(templateId), { ...tpl, policies: swapRemove(tpl.policies, policyType) })
  }

  templatePolicies(templateId: EntityId): string[] {
    return [...(this.templates.get(entityKey(templateId))?.policies ?? [])]
  }

  // ---- instances ----

  /**
   * Validates everything before writing anything: a failed bind leaves no binding,
   * no seeded list and no plugin state behind.
   */
  bindInstance(caller: Address, instanceId: EntityId, templateId: EntityId): void {
    if (!sameAddress(caller, this.instanceMinter)) throw new AuthorizationError('AUTH_NOT_MINTER')
    const key = entityKey(instanceId)
    if (this.bindings.has(key)) throw new ConfigurationError('CONFIG_ALREADY_BOUND', { context: { instanceId: key } })
    const tpl = this.templates.get(entityKey(templateId))
    if (!tpl || !tpl.frozen || !tpl.policies.length) {
      throw new ConfigurationError('CONFIG_TEMPLATE_INVALID', { context: { templateId: templateId.toString() } })
    }
    const plugins: PolicyPlugin[] = []
    for (const type of tpl.policies) {
      const entry = this.plugins.get(type)
      if (!entry?.approved) throw new ConfigurationError('CONFIG_PLUGIN_NOT_APPROVED', { context: { policyType: type } })
      plugins.push(entry.plugin)
    }

    for (const plugin of plugins) {
      if (canInitInstance(plugin)) plugin.initInstance(instanceId, templateId)
    }
    this.instances.set(key, [...tpl.policies])
    this.bindings.set(key, templateId)
    this.audit?.emit('InstanceBound', { instanceId, templateId, policies: [...tpl.policies] })
  }

  addInstancePolicy(caller: Address, instanceId: EntityId, policyType: string): void {
    const list = this.instanceListFor(caller, instanceId)
    this.assertAddable(list, policyType)
    this.instances.set(entityKey(instanceId), [...list, policyType])
  }

  removeInstancePolicy(caller: Address, instanceId: EntityId, policyType: string): void {
    const list = this.instanceListFor(caller, instanceId)
    const plugin = this.plugins.get(policyType)?.plugin
    if (plugin && !plugin.renterConfigurable) {
      throw new ConfigurationError('CONFIG_NOT_RENTER_REMOVABLE', { context: { policyType } })
    }
    this.instances.set(entityKey(instanceId), swapRemove(list, policyType))
  }

  // ---- PolicyHost ----

  ownerOf(entityId: EntityId): Address | undefined {
    return this.entities.ownerOf(entityId)
  }

  renterOf(entityId: EntityId): Address | undefined {
    return this.entities.renterOf(entityId)
  }

  templateOf(instanceId: EntityId): EntityId | undefined {
    return this.bindings.get(entityKey(instanceId))
  }

  isTemplate(entityId: EntityId): boolean {
    return this.templates.has(entityKey(entityId))
  }

  isTemplateFrozen(templateId: EntityId): boolean {
    return this.templates.get(entityKey(templateId))?.frozen ?? false
  }

  // ---- evaluation ----

  /** Instance list when non-empty, else its template's; a template runs its own; anything else has none. */
  activePolicies(entityId: EntityId): string[] {
    const key = entityKey(entityId)
    const templateId = this.bindings.get(key)
    if (templateId !== undefined) {
      const own = this.instances.get(key) ?? []
      return own.length ? [...own] : this.templatePolicies(templateId)
    }
    return this.templatePolicies(entityId)
  }

  validate(entityId: EntityId, caller: Address, action: Action): PolicyDecision {
    const active = this.activePolicies(entityId)
    const vault = this.entities.vaultOf(entityId)
    if (!active.length || vault === undefined) return { allowed: false, reason: NOT_BOUND }

    const decoded = decodeAction(action)
    const input = {
      entityId,
      caller,
      destination: action.destination,
      instructionId: instructionIdOf(action.payload),
      payload: action.payload,
      value: action.value,
      decoded,
      vault
    }
    for (const policyType of active) {
      const entry = this.plugins.get(policyType)
      if (!entry?.approved) return { allowed: false, reason: POLICY_REVOKED, policyType }
      let decision: PolicyDecision
      try {
        decision = entry.plugin.check(input)
      } catch (e) {
        getLogger().error({ event: 'policy.check_threw', policyType, entityId: entityId.toString(), err: String(e) })
        return { allowed: false, reason: CHECK_FAILED, policyType }
      }
      if (!decision.allowed) return { allowed: false, reason: decision.reason ?? 'rejected', policyType }
    }
    return { allowed: true }
  }

  /**
   * Runs after the vault call succeeded. The action already happened, so a throwing hook
   * cannot undo it: the failure is reported and the remaining hooks still run.
   */
  commit(caller: Address, entityId: EntityId, action: Action): CommitReport {
    if (!sameAddress(caller, this.router)) throw new AuthorizationError('AUTH_NOT_ROUTER')
    const vault = this.entities.vaultOf(entityId) ?? ''
    const input = {
      entityId,
      destination: action.destination,
      instructionId: instructionIdOf(action.payload),
      payload: action.payload,
      value: action.value,
      decoded: decodeAction(action),
      vault
    }
    const report: CommitReport = { committed: [], failures: [] }
    for (const policyType of this.activePolicies(entityId)) {
      const plugin = this.plugins.get(policyType)?.plugin
      if (!plugin || !canCommit(plugin)) continue
      try {
        plugin.commit(input)
        report.committed.push(policyType)
      } catch (e) {
        const diagnostic = e instanceof Error ? e.message : String(e)
        report.failures.push({ policyType, diagnostic })
        logCommitFailure({ entityId, policyType, diagnostic })
        countCommitFailure(policyType)
        this.audit?.emit('PolicyCommitFailed', { entityId, policyType, diagnostic })
      }
    }
    return report
  }

  // ---- internals ----

  private assertAdmin(caller: Address) {
    if (!sameAddress(caller, this.admin)) throw new AuthorizationError('AUTH_NOT_ADMIN')
  }

  private editableTemplate(caller: Address, templateId: EntityId): TemplateRecord {
    const tpl = this.templates.get(entityKey(templateId))
    if (!tpl) throw new ConfigurationError('CONFIG_TEMPLATE_INVALID', { context: { templateId: templateId.toString() } })
    if (!sameAddress(this.entities.ownerOf(templateId), caller)) throw new AuthorizationError('AUTH_NOT_OWNER')
    if (tpl.frozen) throw new ConfigurationError('CONFIG_TEMPLATE_FROZEN', { context: { templateId: templateId.toString() } })
    return tpl
  }

  private instanceListFor(caller: Address, instanceId: EntityId): string[] {
    const templateId = this.bindings.get(entityKey(instanceId))
    if (templateId === undefined) {
      throw new ConfigurationError('CONFIG_NOT_BOUND', { context: { instanceId: instanceId.toString() } })
    }
    if (!sameAddress(this.entities.ownerOf(instanceId), caller) && !sameAddress(this.entities.renterOf(instanceId), caller)) {
      throw new AuthorizationError('AUTH_NOT_RENTER')
    }
    return this.instances.get(entityKey(instanceId)) ?? []
  }

  private assertAddable(list: string[], policyType: string) {
    if (!this.isApproved(policyType)) throw new ConfigurationError('CONFIG_PLUGIN_NOT_APPROVED', { context: { policyType } })
    if (list.includes(policyType)) throw new ConfigurationError('CONFIG_DUPLICATE', { context: { policyType } })
    if (list.length >= this.maxPolicies) {
      throw new ConfigurationError('CONFIG_CAP_EXCEEDED', { context: { max: this.maxPolicies } })
    }
  }
}

/** Order is not preserved: the last entry takes the removed one's slot. */
function swapRemove(list: string[], policyType: string): string[] {
  const idx = list.indexOf(policyType)
  if (idx < 0) throw new ConfigurationError('CONFIG_NOT_FOUND', { context: { policyType } })
  const out = [...list]
  const last = out.length - 1
  out[idx] = out[last]
  out.pop()
  return out
}
