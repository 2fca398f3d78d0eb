import pino from 'pino'

type ActionPayload = {
  corr_id: string
  entityId: bigint
  caller: string
  role?: string
  destination: string
  instructionId: string
  success: boolean
  ts?: string
}

type RejectionPayload = {
  corr_id: string
  entityId: bigint
  caller: string
  code: string
  category: string
  message: string
  context?: Record<string, string | number | boolean>
}

type CommitFailurePayload = {
  entityId: bigint
  policyType: string
  diagnostic: string
}

// create default logger; tests can replace via setLogger
let logger: pino.BaseLogger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.BaseLogger) {
  logger = l
}

export function getLogger(): pino.BaseLogger {
  return logger
}

export function logAction(payload: ActionPayload): void {
  logger.info({
    event: 'guard.action',
    corr_id: payload.corr_id,
    entityId: payload.entityId.toString(),
    caller: payload.caller,
    role: payload.role,
    destination: payload.destination,
    instructionId: payload.instructionId,
    success: payload.success,
    ts: payload.ts ?? new Date().toISOString()
  })
}

export function logRejection(payload: RejectionPayload): void {
  logger.warn({
    event: 'guard.rejected',
    corr_id: payload.corr_id,
    entityId: payload.entityId.toString(),
    caller: payload.caller,
    code: payload.code,
    category: payload.category,
    message: payload.message,
    context: payload.context
  })
}

export function logCommitFailure(payload: CommitFailurePayload): void {
  logger.warn({
    event: 'policy.commit_failed',
    entityId: payload.entityId.toString(),
    policyType: payload.policyType,
    diagnostic: payload.diagnostic
  })
}

// bigint fields are stringified; pino's JSON serializer cannot take them
export function logGuardEvent(name: string, fields: object): void {
  const out: Record<string, unknown> = { event: name }
  for (const [k, v] of Object.entries(fields)) out[k] = typeof v === 'bigint' ? v.toString() : v
  logger.info(out)
}

export default logger
