/* Parameter decoder: opaque action payload -> structured fields.

   Pure and total. Payloads shorter than a selector decode as `none` with an empty
   instruction id. Every kind below is handled by every plugin through an exhaustive
   switch, so adding a kind here is a compile error until each plugin decides on it. */

import { MaxUint256, Result, dataLength, dataSlice, isHexString } from 'ethers'
import type { Action, Address } from '@leasehold/dto'
import { instructionInterface } from './abi'

export type InstructionKind =
  | 'none'
  | 'swap-exact-in'
  | 'swap-exact-out'
  | 'approve'
  | 'increase-allowance'
  | 'decrease-allowance'
  | 'permit'
  | 'transfer'
  | 'transfer-from'
  | 'wrap'
  | 'unwrap'
  | 'unknown'

export interface DecodedAction {
  instructionId: string
  kind: InstructionKind
  method?: string
  // swap path, or [destination] when the call target is the token itself
  tokens: Address[]
  spender?: Address
  recipient?: Address
  amountIn?: bigint
  amountInMax?: bigint
  amountOut?: bigint
  amount?: bigint
  deadline?: bigint
  nativeIn: boolean
}

const SELECTOR_BYTES = 4

export function assertNever(x: never): never {
  throw new Error(`unhandled instruction kind: ${String(x)}`)
}

function asBigInt(v: unknown): bigint {
  if (typeof v !== 'bigint') throw new TypeError('expected uint')
  return v
}

function asAddress(v: unknown): Address {
  if (typeof v !== 'string') throw new TypeError('expected address')
  return v
}

function asAddressList(v: unknown): Address[] {
  if (!Array.isArray(v)) throw new TypeError('expected address[]')
  return v.map(asAddress)
}

function asTuple(v: unknown): Result {
  if (!(v instanceof Result)) throw new TypeError('expected tuple')
  return v
}

function base(instructionId: string, kind: InstructionKind, method?: string): DecodedAction {
  return { instructionId, kind, method, tokens: [], nativeIn: false }
}

export function instructionIdOf(payload: string): string {
  // whole bytes only: dataLength throws on an odd nibble count
  if (!isHexString(payload, true) || dataLength(payload) < SELECTOR_BYTES) return ''
  return dataSlice(payload, 0, SELECTOR_BYTES).toLowerCase()
}

export function decodeAction(action: Action): DecodedAction {
  const instructionId = instructionIdOf(action.payload)
  if (!instructionId) {
    // a payload that is not whole-byte hex cannot be inspected; only a genuinely short one is a plain transfer
    return base('', isHexString(action.payload, true) ? 'none' : 'unknown')
  }

  const fragment = instructionInterface.getFunction(instructionId)
  if (!fragment) return base(instructionId, 'unknown')

  let args: Result
  try {
    args = instructionInterface.decodeFunctionData(fragment, action.payload)
  } catch {
    return base(instructionId, 'unknown', fragment.name)
  }

  try {
    return decodeKnown(instructionId, fragment.name, args, action.destination)
  } catch {
    return base(instructionId, 'unknown', fragment.name)
  }
}

function decodeKnown(instructionId: string, method: string, args: Result, destination: Address): DecodedAction {
  switch (method) {
    case 'swapExactTokensForTokens':
    case 'swapExactTokensForETH':
    case 'swapExactTokensForTokensSupportingFeeOnTransferTokens':
    case 'swapExactTokensForETHSupportingFeeOnTransferTokens':
      return {
        ...base(instructionId, 'swap-exact-in', method),
        amountIn: asBigInt(args[0]),
        amountOut: asBigInt(args[1]),
        tokens: asAddressList(args[2]),
        recipient: asAddress(args[3]),
        deadline: asBigInt(args[4])
      }
    case 'swapExactETHForTokens':
    case 'swapExactETHForTokensSupportingFeeOnTransferTokens':
      return {
        ...base(instructionId, 'swap-exact-in', method),
        amountOut: asBigInt(args[0]),
        tokens: asAddressList(args[1]),
        recipient: asAddress(args[2]),
        deadline: asBigInt(args[3]),
        nativeIn: true
      }
    case 'swapTokensForExactTokens':
    case 'swapTokensForExactETH':
      return {
        ...base(instructionId, 'swap-exact-out', method),
        amountOut: asBigInt(args[0]),
        amountInMax: asBigInt(args[1]),
        tokens: asAddressList(args[2]),
        recipient: asAddress(args[3]),
        deadline: asBigInt(args[4])
      }
    case 'swapETHForExactTokens':
      return {
        ...base(instructionId, 'swap-exact-out', method),
        amountOut: asBigInt(args[0]),
        tokens: asAddressList(args[1]),
        recipient: asAddress(args[2]),
        deadline: asBigInt(args[3]),
        nativeIn: true
      }
    case 'exactInputSingle': {
      const p = asTuple(args[0])
      return {
        ...base(instructionId, 'swap-exact-in', method),
        tokens: [asAddress(p[0]), asAddress(p[1])],
        recipient: asAddress(p[3]),
        deadline: asBigInt(p[4]),
        amountIn: asBigInt(p[5]),
        amountOut: asBigInt(p[6])
      }
    }
    case 'exactOutputSingle': {
      const p = asTuple(args[0])
      return {
        ...base(instructionId, 'swap-exact-out', method),
        tokens: [asAddress(p[0]), asAddress(p[1])],
        recipient: asAddress(p[3]),
        deadline: asBigInt(p[4]),
        amountOut: asBigInt(p[5]),
        amountInMax: asBigInt(p[6])
      }
    }
    case 'approve':
      return { ...base(instructionId, 'approve', method), tokens: [destination], spender: asAddress(args[0]), amount: asBigInt(args[1]) }
    case 'increaseAllowance':
      return { ...base(instructionId, 'increase-allowance', method), tokens: [destination], spender: asAddress(args[0]), amount: asBigInt(args[1]) }
    case 'decreaseAllowance':
      return { ...base(instructionId, 'decrease-allowance', method), tokens: [destination], spender: asAddress(args[0]), amount: asBigInt(args[1]) }
    case 'permit':
      return {
        ...base(instructionId, 'permit', method),
        tokens: [destination],
        spender: asAddress(args[1]),
        amount: asBigInt(args[2]),
        deadline: asBigInt(args[3])
      }
    case 'transfer':
      return { ...base(instructionId, 'transfer', method), tokens: [destination], recipient: asAddress(args[0]), amount: asBigInt(args[1]) }
    case 'transferFrom':
      return { ...base(instructionId, 'transfer-from', method), tokens: [destination], recipient: asAddress(args[1]), amount: asBigInt(args[2]) }
    case 'deposit':
      return { ...base(instructionId, 'wrap', method), tokens: [destination] }
    case 'withdraw':
      return { ...base(instructionId, 'unwrap', method), tokens: [destination], amount: asBigInt(args[0]) }
    default:
      return base(instructionId, 'unknown', method)
  }
}

/**
 * Worst-case value leaving the vault for this action.
 * Exact-output swaps count the maximum input, never the nominal output.
 */
export function spendAmount(d: DecodedAction, value: bigint): bigint {
  switch (d.kind) {
    case 'none':
    case 'wrap':
    case 'unknown':
      return value
    case 'swap-exact-in':
      return d.nativeIn ? value : (d.amountIn ?? 0n) + value
    case 'swap-exact-out':
      return d.nativeIn ? value : (d.amountInMax ?? 0n) + value
    case 'transfer':
    case 'transfer-from':
      return (d.amount ?? 0n) + value
    case 'approve':
    case 'increase-allowance':
    case 'decrease-allowance':
    case 'permit':
    case 'unwrap':
      return value
    default:
      return assertNever(d.kind)
  }
}

export function isUnlimitedAmount(amount: bigint | undefined): boolean {
  return amount === MaxUint256
}

export function isSwap(d: DecodedAction): boolean {
  return d.kind === 'swap-exact-in' || d.kind === 'swap-exact-out'
}
