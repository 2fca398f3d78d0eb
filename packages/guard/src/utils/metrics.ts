import { Registry, Counter } from 'prom-client'

let registry: Registry
let actionCounter: Counter<string>
let rejectionCounter: Counter<string>
let commitFailureCounter: Counter<string>

// a registry handed back in (tests restore the previous one) already holds the counters
function counter(name: string, help: string, labelNames: string[]): Counter<string> {
  const existing = registry.getSingleMetric(name)
  if (existing instanceof Counter) return existing
  return new Counter({ name, help, labelNames, registers: [registry] })
}

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  actionCounter = counter(
    'guard_actions_total',
    'Actions submitted to the access router by caller role and outcome',
    ['role', 'outcome']
  )
  rejectionCounter = counter('guard_rejections_total', 'Rejected actions by reason code', ['code'])
  commitFailureCounter = counter(
    'guard_commit_failures_total',
    'Policy commit hooks that threw after a successful action',
    ['policy_type']
  )
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function getRegistry(): Registry {
  return registry
}

export function countAction(role: string, outcome: 'executed' | 'rejected' | 'failed') {
  actionCounter.labels({ role, outcome }).inc()
}

export function countRejection(code: string) {
  rejectionCounter.labels({ code }).inc()
}

export function countCommitFailure(policyType: string) {
  commitFailureCounter.labels({ policy_type: policyType }).inc()
}
