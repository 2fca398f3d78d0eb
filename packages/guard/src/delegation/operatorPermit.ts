/**
 * Operator permits: EIP-712 typed data a renter signs off-line so an operator can install itself.
 * The domain binds the router address and chain id; the nonce is per entity and moves on every
 * successful permit and every ownership transfer.
 */

import { Signer, TypedDataDomain, TypedDataEncoder, TypedDataField, verifyTypedData } from 'ethers'
import type { Address, OperatorPermit } from '@leasehold/dto'

export type PermitDomainConfig = {
  name: string
  version: string
  chainId: number
  verifyingContract: Address
}

export const OPERATOR_PERMIT_TYPES: Record<string, TypedDataField[]> = {
  OperatorPermit: [
    { name: 'entityId', type: 'uint256' },
    { name: 'renter', type: 'address' },
    { name: 'operator', type: 'address' },
    { name: 'expiry', type: 'uint64' },
    { name: 'nonce', type: 'uint256' },
    { name: 'deadline', type: 'uint64' }
  ]
}

export function permitDomain(cfg: PermitDomainConfig): TypedDataDomain {
  return {
    name: cfg.name,
    version: cfg.version,
    chainId: cfg.chainId,
    verifyingContract: cfg.verifyingContract
  }
}

function permitMessage(p: OperatorPermit): Record<string, unknown> {
  return {
    entityId: p.entityId,
    renter: p.renter,
    operator: p.operator,
    expiry: p.expiry,
    nonce: p.nonce,
    deadline: p.deadline
  }
}

export function hashPermit(domain: PermitDomainConfig, permit: OperatorPermit): string {
  return TypedDataEncoder.hash(permitDomain(domain), OPERATOR_PERMIT_TYPES, permitMessage(permit))
}

export async function signPermit(signer: Signer, domain: PermitDomainConfig, permit: OperatorPermit): Promise<string> {
  return signer.signTypedData(permitDomain(domain), OPERATOR_PERMIT_TYPES, permitMessage(permit))
}

/** Signer of `signature` over `permit`, or undefined when the signature does not parse. */
export function recoverPermitSigner(
  domain: PermitDomainConfig,
  permit: OperatorPermit,
  signature: string
): Address | undefined {
  try {
    return verifyTypedData(permitDomain(domain), OPERATOR_PERMIT_TYPES, permitMessage(permit), signature)
  } catch (e) {
    if (e instanceof Error) return undefined
    throw e
  }
}
