/**
 * CooldownPolicy
 * Purpose: minimum spacing between committed actions on one entity.
 * The first action after binding always passes; only a successful commit starts the clock.
 * Template value is the floor; instances may lengthen it, never shorten it.
 */

import type { Address, EntityId, PolicyDecision } from '@leasehold/dto'
import { ConfigurationError } from '@leasehold/reasons'
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
  deny,
  isInert
} from './types'

export const COOLDOWN = 'cooldown'

function assertSeconds(seconds: number) {
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new ConfigurationError('CONFIG_CEILING_VIOLATION', { message: 'cooldown must be a non-negative integer' })
  }
}

export class CooldownPolicy implements PolicyPlugin {
  readonly policyType = COOLDOWN
  readonly renterConfigurable = true
  readonly capabilities = ['commit', 'instance-init'] as const

  private seconds: Namespace<number>
  private lastCommit: Namespace<number>

  constructor(store: KeyValueStore, private readonly host: PolicyHost, private readonly clock: Clock = systemClock) {
    this.seconds = store.claim<number>(`${COOLDOWN}.seconds`)
    this.lastCommit = store.claim<number>(`${COOLDOWN}.last`)
  }

  setTemplateCooldown(caller: Address, templateId: EntityId, seconds: number): void {
    assertTemplateEditor(this.host, templateId, caller)
    assertSeconds(seconds)
    this.seconds.set(entityKey(templateId), seconds)
  }

  setInstanceCooldown(caller: Address, instanceId: EntityId, seconds: number): void {
    const templateId = assertInstanceConfigurer(this.host, instanceId, caller)
    assertSeconds(seconds)
    const floor = this.seconds.get(entityKey(templateId))
    if (floor === undefined) {
      throw new ConfigurationError('CONFIG_CEILING_VIOLATION', {
        message: 'template sets no cooldown floor',
        context: { templateId: templateId.toString() }
      })
    }
    if (seconds < floor) {
      throw new ConfigurationError('CONFIG_CEILING_VIOLATION', { context: { field: 'cooldownSeconds', floor, got: seconds } })
    }
    this.seconds.set(entityKey(instanceId), seconds)
  }

  initInstance(instanceId: EntityId, templateId: EntityId): void {
    const floor = this.seconds.get(entityKey(templateId))
    if (floor !== undefined) this.seconds.set(entityKey(instanceId), floor)
  }

  getCooldown(entityId: EntityId): number | undefined {
    return this.seconds.get(entityKey(entityId))
  }

  lastActionAt(entityId: EntityId): number | undefined {
    return this.lastCommit.get(entityKey(entityId))
  }

  check(input: PolicyCheckInput): PolicyDecision {
    const seconds = this.seconds.get(entityKey(input.entityId))
    if (seconds === undefined) return isInert(input) ? ALLOW : deny(NOT_CONFIGURED)
    const last = this.lastCommit.get(entityKey(input.entityId))
    if (last === undefined) return ALLOW
    if (this.clock.now() - last < seconds) return deny('cooldown active')
    return ALLOW
  }

  commit(input: PolicyCommitInput): void {
    this.lastCommit.set(entityKey(input.entityId), this.clock.now())
  }
}
