/* Shape check for an action before it reaches any policy: a real address, a non-negative
   value and even-length 0x calldata. Anything else is rejected with VALIDATION_ACTION_SCHEMA. */

import { isAddress, isHexString } from 'ethers'
import { z } from 'zod'
import type { Action } from '@leasehold/dto'
import { ReasonedRejection, reason } from '@leasehold/reasons'

export const ActionSchema = z.object({
  destination: z.string().refine((v) => isAddress(v), { message: 'destination must be a 20-byte address' }),
  value: z.bigint().nonnegative(),
  payload: z.string().refine((v) => isHexString(v, true), { message: 'payload must be 0x-prefixed bytes' })
})

export function validateAction(input: unknown): { valid: true; value: Action } | { valid: false; error: string } {
  const res = ActionSchema.safeParse(input)
  if (!res.success) return { valid: false, error: res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') }
  return { valid: true, value: res.data }
}

export function parseAction(input: unknown): Action {
  const res = validateAction(input)
  if (!res.valid) throw new ReasonedRejection(reason('VALIDATION_ACTION_SCHEMA', { message: res.error }))
  return res.value
}
