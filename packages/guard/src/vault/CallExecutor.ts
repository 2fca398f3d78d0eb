import type { Address } from '@leasehold/dto'

export type CallRequest = {
  from: Address
  to: Address
  value: bigint
  data: string
}

export type CallResult = {
  success: boolean
  returnData: string
  error?: string
}

/**
 * The outside world a vault talks to. A chain-backed executor signs and sends;
 * tests plug in a recording stand-in.
 */
export interface CallExecutor {
  call(req: CallRequest): Promise<CallResult>
}
