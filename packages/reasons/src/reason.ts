import { REASONS, ReasonCategory, ReasonCode, ReasonDetail } from '@leasehold/dto'

export type ReasonOverrides = Partial<Pick<ReasonDetail, 'message' | 'context'>>

/**
 * Builds the detail for `code` from the registry in @leasehold/dto.
 * `message` replaces the registry text; `context` is merged over any base context
 * and dropped entirely when it ends up empty.
 */
export function reason(code: ReasonCode, overrides?: ReasonOverrides): ReasonDetail {
  const base = REASONS[code]
  const context = { ...base.context, ...overrides?.context }
  const detail: ReasonDetail = { code, category: base.category, message: overrides?.message ?? base.message }
  if (Object.keys(context).length > 0) detail.context = context
  return detail
}

export function isReasonCode(value: string): value is ReasonCode {
  return Object.prototype.hasOwnProperty.call(REASONS, value)
}

export function codesIn(category: ReasonCategory): ReasonCode[] {
  return Object.values(REASONS)
    .filter((d) => d.category === category)
    .map((d) => d.code)
}
