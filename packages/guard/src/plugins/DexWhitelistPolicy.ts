/**
 * DexWhitelistPolicy
 * Purpose: every external protocol the vault calls, or grants an allowance to, must be approved.
 * Swaps and unrecognised calls are checked by destination; allowance instructions by spender.
 * An empty payload has no protocol behind it and may only target the vault itself.
 */

import type { Address, EntityId, PolicyDecision } from '@leasehold/dto'
import { assertNever } from '../decoder/decodeAction'
import { KeyValueStore, Namespace, entityKey } from '../store/KeyValueStore'
import { addrKey, sameAddress } from '../utils/address'
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

export const DEX_WHITELIST = 'dex_whitelist'

export class DexWhitelistPolicy implements PolicyPlugin {
  readonly policyType = DEX_WHITELIST
  readonly renterConfigurable = false
  readonly capabilities = [] as const

  private targets: Namespace<Set<string>>

  constructor(store: KeyValueStore, private readonly host: PolicyHost) {
    this.targets = store.claim<Set<string>>(DEX_WHITELIST)
  }

  setTarget(caller: Address, templateId: EntityId, target: Address, allowed: boolean): void {
    assertTemplateEditor(this.host, templateId, caller)
    const key = entityKey(templateId)
    const set = this.targets.get(key) ?? new Set<string>()
    if (allowed) set.add(addrKey(target))
    else set.delete(addrKey(target))
    this.targets.set(key, set)
  }

  check(input: PolicyCheckInput): PolicyDecision {
    const source = configSourceOf(this.host, input.entityId)
    const set = source === undefined ? undefined : this.targets.get(entityKey(source))
    if (!set) return isInert(input) ? ALLOW : deny(NOT_CONFIGURED)

    const { decoded } = input
    switch (decoded.kind) {
      case 'none':
        return sameAddress(input.destination, input.vault) ? ALLOW : deny('raw transfer must target vault')
      case 'swap-exact-in':
      case 'swap-exact-out':
      case 'unknown':
        return set.has(addrKey(input.destination)) ? ALLOW : deny('destination not whitelisted')
      case 'approve':
      case 'increase-allowance':
      case 'decrease-allowance':
      case 'permit':
        return decoded.spender && set.has(addrKey(decoded.spender)) ? ALLOW : deny('spender not whitelisted')
      case 'transfer':
      case 'transfer-from':
      case 'wrap':
      case 'unwrap':
        // the target is a token; token_whitelist owns that decision
        return ALLOW
      default:
        return assertNever(decoded.kind)
    }
  }
}
