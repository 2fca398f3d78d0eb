/**
 * ReceiverGuardPolicy
 * Purpose: proceeds never leave the vault. Swap and transfer recipients must be the vault,
 * and raw transfers must target it. A call it cannot decode has no recipient to check, so it is rejected.
 * Stateless and owner-only; it needs no configuration to be in force.
 */

import type { PolicyDecision } from '@leasehold/dto'
import { assertNever } from '../decoder/decodeAction'
import { sameAddress } from '../utils/address'
import { ALLOW, PolicyCheckInput, PolicyPlugin, UNRECOGNISED_INSTRUCTION, deny } from './types'

export const RECEIVER_GUARD = 'receiver_guard'

export class ReceiverGuardPolicy implements PolicyPlugin {
  readonly policyType = RECEIVER_GUARD
  readonly renterConfigurable = false
  readonly capabilities = [] as const

  check(input: PolicyCheckInput): PolicyDecision {
    const { decoded, vault } = input
    switch (decoded.kind) {
      case 'none':
        return sameAddress(input.destination, vault) ? ALLOW : deny('raw transfer must target vault')
      case 'swap-exact-in':
      case 'swap-exact-out':
        return sameAddress(decoded.recipient, vault) ? ALLOW : deny('swap recipient must be vault')
      case 'transfer':
      case 'transfer-from':
        return sameAddress(decoded.recipient, vault) ? ALLOW : deny('transfer recipient must be vault')
      case 'unknown':
        return deny(UNRECOGNISED_INSTRUCTION)
      case 'approve':
      case 'increase-allowance':
      case 'decrease-allowance':
      case 'permit':
      // wrapped native is minted back to the caller, which is the vault
      case 'wrap':
      case 'unwrap':
        return ALLOW
      default:
        return assertNever(decoded.kind)
    }
  }
}
