/**
 * Vault
 * - One per entity, at an address derived from the router and the entity id
 * - Holds the entity's balance and forwards calls; only the router may drive it
 * - Balance moves only after the forwarded call reports success
 */

import { getCreate2Address, keccak256, toBeHex, toUtf8Bytes, zeroPadValue } from 'ethers'
import type { Action, Address, EntityId } from '@leasehold/dto'
import { AuthorizationError, ExecutionError } from '@leasehold/reasons'
import { sameAddress } from '../utils/address'
import { CallExecutor, CallResult } from './CallExecutor'

export const VAULT_INIT_CODE_HASH = keccak256(toUtf8Bytes('LeaseholdVault'))

export function deriveVaultAddress(router: Address, entityId: EntityId): Address {
  return getCreate2Address(router, zeroPadValue(toBeHex(entityId), 32), VAULT_INIT_CODE_HASH)
}

export class Vault {
  private balance = 0n

  constructor(
    public readonly entityId: EntityId,
    public readonly address: Address,
    private readonly router: Address,
    private readonly executor: CallExecutor
  ) {}

  balanceOf(): bigint {
    return this.balance
  }

  deposit(caller: Address, amount: bigint): bigint {
    this.assertRouter(caller)
    if (amount <= 0n) throw new ExecutionError('EXECUTION_FAILED', { message: 'deposit must be positive' })
    this.balance += amount
    return this.balance
  }

  async forward(caller: Address, action: Action): Promise<CallResult> {
    this.assertRouter(caller)
    if (sameAddress(action.destination, this.address)) {
      // value to self changes nothing; calldata to self could reach vault internals
      if (action.payload === '0x') return { success: true, returnData: '0x' }
      throw new ExecutionError('EXECUTION_FAILED', { message: 'vault cannot call itself with calldata' })
    }
    return this.send(action.destination, action.value, action.payload)
  }

  async withdraw(caller: Address, to: Address, amount: bigint): Promise<CallResult> {
    this.assertRouter(caller)
    if (amount <= 0n) throw new ExecutionError('EXECUTION_FAILED', { message: 'withdrawal must be positive' })
    return this.send(to, amount, '0x')
  }

  private async send(to: Address, value: bigint, data: string): Promise<CallResult> {
    if (value > this.balance) {
      throw new ExecutionError('EXECUTION_INSUFFICIENT_FUNDS', {
        context: { balance: this.balance.toString(), requested: value.toString() }
      })
    }
    let result: CallResult
    try {
      result = await this.executor.call({ from: this.address, to, value, data })
    } catch (e) {
      throw new ExecutionError('EXECUTION_FAILED', { message: e instanceof Error ? e.message : String(e) })
    }
    if (!result.success) {
      throw new ExecutionError('EXECUTION_FAILED', {
        message: result.error ?? 'forwarded call reverted',
        context: { returnData: result.returnData }
      })
    }
    this.balance -= value
    return result
  }

  private assertRouter(caller: Address) {
    if (!sameAddress(caller, this.router)) throw new AuthorizationError('AUTH_NOT_ROUTER')
  }
}
