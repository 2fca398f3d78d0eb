import type { PolicyDecision } from '@leasehold/dto'
import { ALLOW, PolicyPlugin } from '../../src/plugins/types'
import {
  ADMIN,
  ALL_POLICIES,
  DEX,
  MINTER,
  OWNER,
  RENTER,
  ROUTER,
  STRANGER,
  TOKEN_A,
  buildTemplate,
  fullTemplate,
  leasedInstance,
  setupGuard,
  swapExactIn,
  valueTo
} from '../helpers/fixtures'
import { codeOf } from '../helpers/rejections'

function stubPlugin(policyType: string, extra: Partial<PolicyPlugin> = {}): PolicyPlugin {
  return {
    policyType,
    renterConfigurable: true,
    capabilities: [],
    check: (): PolicyDecision => ALLOW,
    ...extra
  }
}

describe('PolicyEngine: plugin registry', () => {
  test('only the admin approves or revokes', () => {
    const { guard } = setupGuard()
    expect(codeOf(() => guard.engine.approvePlugin(STRANGER, stubPlugin('stub')))).toBe('AUTH_NOT_ADMIN')
    expect(codeOf(() => guard.engine.revokePlugin(STRANGER, 'cooldown'))).toBe('AUTH_NOT_ADMIN')
  })

  test('stock plugins are approved at assembly', () => {
    const { guard } = setupGuard()
    expect(guard.engine.approvedPlugins().sort()).toEqual([...ALL_POLICIES].sort())
  })

  test('a second plugin under an approved type is refused', () => {
    const { guard } = setupGuard()
    expect(codeOf(() => guard.engine.approvePlugin(ADMIN, stubPlugin('spending_limit')))).toBe('CONFIG_DUPLICATE')
  })

  test('declared capabilities must match the hooks present', () => {
    const { guard } = setupGuard()
    const declaresOnly = stubPlugin('declares_only', { capabilities: ['commit'] })
    const hookOnly = stubPlugin('hook_only', { commit: () => undefined })
    expect(codeOf(() => guard.engine.approvePlugin(ADMIN, declaresOnly))).toBe('CONFIG_PLUGIN_CAPABILITY')
    expect(codeOf(() => guard.engine.approvePlugin(ADMIN, hookOnly))).toBe('CONFIG_PLUGIN_CAPABILITY')
    expect(guard.engine.isApproved('declares_only')).toBe(false)
  })

  test('revoking an unknown type fails', () => {
    const { guard } = setupGuard()
    expect(codeOf(() => guard.engine.revokePlugin(ADMIN, 'nope'))).toBe('CONFIG_NOT_FOUND')
  })

  test('a revoked plugin in an active set fails closed', () => {
    const { guard, clock } = setupGuard()
    const tpl = buildTemplate(guard, { policies: ['receiver_guard', 'cooldown'], cooldown: 10 })
    const inst = leasedInstance(guard, clock, tpl)
    const vault = guard.router.vaultOf(inst).address
    guard.engine.revokePlugin(ADMIN, 'cooldown')
    expect(guard.engine.validate(inst, RENTER.address, valueTo(vault, 0n))).toEqual({
      allowed: false,
      reason: 'policy revoked',
      policyType: 'cooldown'
    })
  })
})

describe('PolicyEngine: templates', () => {
  test('registration rules', () => {
    const { guard, clock } = setupGuard()
    const plain = guard.router.mint(ADMIN, OWNER)
    expect(codeOf(() => guard.engine.registerTemplate(STRANGER, plain.id))).toBe('AUTH_NOT_OWNER')
    expect(codeOf(() => guard.engine.registerTemplate(OWNER, 999n))).toBe('ENTITY_NOT_FOUND')
    guard.engine.registerTemplate(OWNER, plain.id)
    expect(guard.engine.isTemplate(plain.id)).toBe(true)
    expect(codeOf(() => guard.engine.registerTemplate(OWNER, plain.id))).toBe('CONFIG_DUPLICATE')

    const tpl = fullTemplate(guard)
    const inst = leasedInstance(guard, clock, tpl)
    expect(codeOf(() => guard.engine.registerTemplate(RENTER.address, inst))).toBe('CONFIG_TEMPLATE_INVALID')
  })

  test('editing rules and freezing', () => {
    const { guard } = setupGuard()
    const tpl = buildTemplate(guard, { policies: [], freeze: false })
    expect(codeOf(() => guard.engine.freezeTemplate(OWNER, tpl))).toBe('CONFIG_TEMPLATE_INVALID')
    expect(codeOf(() => guard.engine.addTemplatePolicy(OWNER, tpl, 'nope'))).toBe('CONFIG_PLUGIN_NOT_APPROVED')
    expect(codeOf(() => guard.engine.addTemplatePolicy(STRANGER, tpl, 'cooldown'))).toBe('AUTH_NOT_OWNER')

    guard.engine.addTemplatePolicy(OWNER, tpl, 'cooldown')
    expect(codeOf(() => guard.engine.addTemplatePolicy(OWNER, tpl, 'cooldown'))).toBe('CONFIG_DUPLICATE')
    guard.engine.freezeTemplate(OWNER, tpl)
    expect(guard.engine.isTemplateFrozen(tpl)).toBe(true)
    expect(codeOf(() => guard.engine.addTemplatePolicy(OWNER, tpl, 'receiver_guard'))).toBe('CONFIG_TEMPLATE_FROZEN')
    expect(codeOf(() => guard.engine.removeTemplatePolicy(OWNER, tpl, 'cooldown'))).toBe('CONFIG_TEMPLATE_FROZEN')
    expect(codeOf(() => guard.engine.freezeTemplate(OWNER, tpl))).toBe('CONFIG_TEMPLATE_FROZEN')
  })

  test('policy cap comes from configuration', () => {
    const { guard } = setupGuard({ maxPolicies: 2 })
    const tpl = buildTemplate(guard, { policies: ['cooldown', 'receiver_guard'], freeze: false })
    expect(codeOf(() => guard.engine.addTemplatePolicy(OWNER, tpl, 'spending_limit'))).toBe('CONFIG_CAP_EXCEEDED')
  })

  test('removal moves the last entry into the freed slot', () => {
    const { guard } = setupGuard()
    const tpl = buildTemplate(guard, {
      policies: ['token_whitelist', 'dex_whitelist', 'receiver_guard', 'spending_limit'],
      freeze: false
    })
    guard.engine.removeTemplatePolicy(OWNER, tpl, 'dex_whitelist')
    expect(guard.engine.templatePolicies(tpl)).toEqual(['token_whitelist', 'spending_limit', 'receiver_guard'])
    expect(codeOf(() => guard.engine.removeTemplatePolicy(OWNER, tpl, 'dex_whitelist'))).toBe('CONFIG_NOT_FOUND')
  })
})

describe('PolicyEngine: binding', () => {
  test('only the instance minter binds', () => {
    const { guard } = setupGuard()
    const tpl = fullTemplate(guard)
    const plain = guard.router.mint(ADMIN, OWNER)
    expect(codeOf(() => guard.engine.bindInstance(STRANGER, plain.id, tpl))).toBe('AUTH_NOT_MINTER')
  })

  test('an instance binds exactly once', () => {
    const { guard, clock } = setupGuard()
    const tpl = fullTemplate(guard)
    const inst = leasedInstance(guard, clock, tpl)
    expect(guard.engine.templateOf(inst)).toBe(tpl)
    expect(codeOf(() => guard.engine.bindInstance(MINTER, inst, tpl))).toBe('CONFIG_ALREADY_BOUND')
  })

  test('an unfrozen template cannot be bound and nothing is left behind', () => {
    const { guard, clock } = setupGuard()
    const tpl = buildTemplate(guard, { policies: ['cooldown'], cooldown: 5, freeze: false })
    const before = guard.entities.count()
    expect(codeOf(() => leasedInstance(guard, clock, tpl))).toBe('CONFIG_TEMPLATE_INVALID')
    expect(guard.entities.count()).toBe(before)
    // the id is reused by the next successful mint
    expect(guard.router.mint(ADMIN, OWNER).id).toBe(BigInt(before + 1))
  })

  test('a template carrying a revoked plugin cannot be bound', () => {
    const { guard, clock } = setupGuard()
    const tpl = buildTemplate(guard, { policies: ['receiver_guard', 'cooldown'], cooldown: 5 })
    guard.engine.revokePlugin(ADMIN, 'cooldown')
    expect(codeOf(() => leasedInstance(guard, clock, tpl))).toBe('CONFIG_PLUGIN_NOT_APPROVED')
  })

  test('instance list is seeded from the template and editable by the renter', () => {
    const { guard, clock } = setupGuard()
    const tpl = buildTemplate(guard, { policies: ['token_whitelist', 'receiver_guard'], tokens: [TOKEN_A] })
    const inst = leasedInstance(guard, clock, tpl)
    expect(guard.engine.activePolicies(inst)).toEqual(['token_whitelist', 'receiver_guard'])

    guard.engine.addInstancePolicy(RENTER.address, inst, 'cooldown')
    expect(guard.engine.activePolicies(inst)).toEqual(['token_whitelist', 'receiver_guard', 'cooldown'])
    expect(guard.engine.templatePolicies(tpl)).toEqual(['token_whitelist', 'receiver_guard'])

    expect(codeOf(() => guard.engine.removeInstancePolicy(RENTER.address, inst, 'token_whitelist'))).toBe(
      'CONFIG_NOT_RENTER_REMOVABLE'
    )
    expect(codeOf(() => guard.engine.addInstancePolicy(STRANGER, inst, 'spending_limit'))).toBe('AUTH_NOT_RENTER')
    guard.engine.removeInstancePolicy(RENTER.address, inst, 'cooldown')
    expect(guard.engine.activePolicies(inst)).toEqual(['token_whitelist', 'receiver_guard'])
  })

  test('instance-level edits need a binding', () => {
    const { guard } = setupGuard()
    const plain = guard.router.mint(ADMIN, OWNER)
    expect(codeOf(() => guard.engine.addInstancePolicy(OWNER, plain.id, 'cooldown'))).toBe('CONFIG_NOT_BOUND')
  })
})

describe('PolicyEngine: evaluation', () => {
  test('an entity with no policies is never allowed', () => {
    const { guard } = setupGuard()
    const plain = guard.router.mint(ADMIN, OWNER)
    expect(guard.engine.activePolicies(plain.id)).toEqual([])
    expect(guard.engine.validate(plain.id, OWNER, valueTo(OWNER, 0n))).toEqual({ allowed: false, reason: 'not bound' })
  })

  test('first rejection wins and names its policy', () => {
    const { guard, clock } = setupGuard()
    const inst = leasedInstance(guard, clock, fullTemplate(guard))
    const vault = guard.router.vaultOf(inst).address
    expect(guard.engine.validate(inst, RENTER.address, swapExactIn(500n, STRANGER))).toEqual({
      allowed: false,
      reason: 'swap recipient must be vault',
      policyType: 'receiver_guard'
    })
    expect(guard.engine.validate(inst, RENTER.address, swapExactIn(500n, vault))).toEqual({
      allowed: false,
      reason: 'exceeds per-call limit',
      policyType: 'spending_limit'
    })
  })

  test('validate is idempotent and writes nothing', () => {
    const { guard, clock } = setupGuard()
    const inst = leasedInstance(guard, clock, fullTemplate(guard))
    const vault = guard.router.vaultOf(inst).address
    const action = swapExactIn(50n, vault)
    const first = guard.engine.validate(inst, RENTER.address, action)
    const second = guard.engine.validate(inst, RENTER.address, action)
    expect(first).toEqual({ allowed: true })
    expect(second).toEqual(first)
    expect(guard.plugins.spendingLimit.spentToday(inst)).toBe(0n)
    expect(guard.plugins.cooldown.lastActionAt(inst)).toBeUndefined()
  })

  test('a payload of odd-length hex is rejected by policy, not by the decoder', () => {
    const { guard, clock } = setupGuard()
    const inst = leasedInstance(guard, clock, fullTemplate(guard))
    expect(guard.engine.validate(inst, RENTER.address, { destination: DEX, value: 0n, payload: '0x123' })).toEqual({
      allowed: false,
      reason: 'unrecognised instruction',
      policyType: 'receiver_guard'
    })
  })

  test('a throwing check is a rejection', () => {
    const { guard, clock } = setupGuard()
    guard.engine.approvePlugin(
      ADMIN,
      stubPlugin('faulty', {
        check: () => {
          throw new Error('bad state')
        }
      })
    )
    const tpl = buildTemplate(guard, { policies: ['faulty'] })
    const inst = leasedInstance(guard, clock, tpl)
    expect(guard.engine.validate(inst, RENTER.address, valueTo(DEX, 0n))).toEqual({
      allowed: false,
      reason: 'policy check failed',
      policyType: 'faulty'
    })
  })

  test('commit is reserved to the router', () => {
    const { guard, clock } = setupGuard()
    const inst = leasedInstance(guard, clock, fullTemplate(guard))
    expect(codeOf(() => guard.engine.commit(RENTER.address, inst, valueTo(DEX, 0n)))).toBe('AUTH_NOT_ROUTER')
    expect(guard.engine.commit(ROUTER, inst, valueTo(DEX, 0n)).failures).toEqual([])
  })

  test('a failing commit hook does not stop the others', () => {
    const { guard, clock } = setupGuard()
    guard.engine.approvePlugin(
      ADMIN,
      stubPlugin('exploding', {
        capabilities: ['commit'],
        commit: () => {
          throw new Error('boom')
        }
      })
    )
    const tpl = buildTemplate(guard, {
      policies: ['exploding', 'spending_limit'],
      limits: { maxPerTx: 100n, maxPerDay: 1_000n, maxApprove: 0n }
    })
    const inst = leasedInstance(guard, clock, tpl)
    const vault = guard.router.vaultOf(inst).address
    const failed: string[] = []
    guard.audit.on('PolicyCommitFailed', (e) => failed.push(`${e.policyType}:${e.diagnostic}`))

    const report = guard.engine.commit(ROUTER, inst, swapExactIn(40n, vault))
    expect(report.failures).toEqual([{ policyType: 'exploding', diagnostic: 'boom' }])
    expect(report.committed).toEqual(['spending_limit'])
    expect(guard.plugins.spendingLimit.spentToday(inst)).toBe(40n)
    expect(failed).toEqual(['exploding:boom'])
  })
})
