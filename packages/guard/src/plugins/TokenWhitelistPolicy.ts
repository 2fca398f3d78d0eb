/**
 * TokenWhitelistPolicy
 * Purpose: every token an action touches must be approved by the template owner.
 * Tokens come from the swap path, or from the call target for token-level instructions.
 * Membership lives on the template and is read through by its instances; owner-only.
 */

import type { Address, EntityId, PolicyDecision } from '@leasehold/dto'
import { assertNever } from '../decoder/decodeAction'
import { KeyValueStore, Namespace, entityKey } from '../store/KeyValueStore'
import { addrKey } from '../utils/address'
import { assertTemplateEditor } from './access'
import {
  ALLOW,
  NOT_CONFIGURED,
  PolicyCheckInput,
  PolicyHost,
  PolicyPlugin,
  configSourceOf,
  deny,
  isInert
} from './types'

export const TOKEN_WHITELIST = 'token_whitelist'

export class TokenWhitelistPolicy implements PolicyPlugin {
  readonly policyType = TOKEN_WHITELIST
  readonly renterConfigurable = false
  readonly capabilities = [] as const

  private tokens: Namespace<Set<string>>

  constructor(store: KeyValueStore, private readonly host: PolicyHost) {
    this.tokens = store.claim<Set<string>>(TOKEN_WHITELIST)
  }

  setToken(caller: Address, templateId: EntityId, token: Address, allowed: boolean): void {
    assertTemplateEditor(this.host, templateId, caller)
    const key = entityKey(templateId)
    const set = this.tokens.get(key) ?? new Set<string>()
    if (allowed) set.add(addrKey(token))
    else set.delete(addrKey(token))
    this.tokens.set(key, set)
  }

  check(input: PolicyCheckInput): PolicyDecision {
    const source = configSourceOf(this.host, input.entityId)
    const set = source === undefined ? undefined : this.tokens.get(entityKey(source))
    if (!set) return isInert(input) ? ALLOW : deny(NOT_CONFIGURED)

    const { decoded } = input
    switch (decoded.kind) {
      case 'none':
      case 'unknown':
        return ALLOW
      case 'swap-exact-in':
      case 'swap-exact-out':
      case 'approve':
      case 'increase-allowance':
      case 'decrease-allowance':
      case 'permit':
      case 'transfer':
      case 'transfer-from':
      case 'wrap':
      case 'unwrap':
        for (const token of decoded.tokens) {
          if (!set.has(addrKey(token))) return deny('token not whitelisted')
        }
        return ALLOW
      default:
        return assertNever(decoded.kind)
    }
  }
}
