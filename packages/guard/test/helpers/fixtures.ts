import { Interface, Wallet, solidityPacked } from 'ethers'
import type { Action, EntityId } from '@leasehold/dto'
import { instructionInterface } from '../../src/decoder/abi'
import { createGuard, Guard } from '../../src'
import type { GuardConfig } from '../../src/config'
import type { SpendingLimits } from '../../src/plugins/SpendingLimitPolicy'
import { ManualClock } from './ManualClock'
import { RecordingExecutor } from './RecordingExecutor'

export const ADMIN = '0x' + 'aa'.repeat(20)
export const MINTER = '0x' + 'bb'.repeat(20)
export const OWNER = '0x' + 'cc'.repeat(20)
export const OPERATOR = '0x' + 'dd'.repeat(20)
export const STRANGER = '0x' + 'ee'.repeat(20)
export const NEW_OWNER = '0x' + 'ff'.repeat(20)

export const DEX = '0x' + '11'.repeat(20)
export const TOKEN_A = '0x' + '22'.repeat(20)
export const TOKEN_B = '0x' + '33'.repeat(20)
export const WETH = '0x' + '44'.repeat(20)
export const OUTSIDER = '0x' + '55'.repeat(20)

export const ROUTER = '0x' + '99'.repeat(20)

// placeholder keys, test use only
export const RENTER = new Wallet('0x' + '01'.repeat(32))
export const OTHER_RENTER = new Wallet('0x' + '02'.repeat(32))

export const DAY = 86_400
export const HOUR = 3_600

export function testConfig(overrides: Partial<GuardConfig> = {}): GuardConfig {
  return {
    nodeEnv: 'test',
    logLevel: 'silent',
    chainId: 31337,
    domainName: 'Leasehold',
    domainVersion: '1',
    maxPolicies: 10,
    routerAddress: ROUTER,
    ...overrides
  }
}

export function setupGuard(config: Partial<GuardConfig> = {}) {
  const clock = new ManualClock()
  const executor = new RecordingExecutor()
  const guard = createGuard({ admin: ADMIN, minter: MINTER, executor, clock, config: testConfig(config) })
  return { guard, clock, executor }
}

export type TemplateSetup = {
  policies: string[]
  tokens?: string[]
  targets?: string[]
  limits?: SpendingLimits
  cooldown?: number
  freeze?: boolean
}

/** Mints a template entity for OWNER, configures the given plugins and (by default) freezes it. */
export function buildTemplate(guard: Guard, setup: TemplateSetup): EntityId {
  const { router, engine, plugins } = guard
  const tpl = router.mint(ADMIN, OWNER)
  engine.registerTemplate(OWNER, tpl.id)
  for (const p of setup.policies) engine.addTemplatePolicy(OWNER, tpl.id, p)
  for (const t of setup.tokens ?? []) plugins.tokenWhitelist.setToken(OWNER, tpl.id, t, true)
  for (const t of setup.targets ?? []) plugins.dexWhitelist.setTarget(OWNER, tpl.id, t, true)
  if (setup.limits) plugins.spendingLimit.setTemplateLimits(OWNER, tpl.id, setup.limits)
  if (setup.cooldown !== undefined) plugins.cooldown.setTemplateCooldown(OWNER, tpl.id, setup.cooldown)
  if (setup.freeze ?? true) engine.freezeTemplate(OWNER, tpl.id)
  return tpl.id
}

export const ALL_POLICIES = ['token_whitelist', 'dex_whitelist', 'receiver_guard', 'spending_limit', 'cooldown']

export function fullTemplate(guard: Guard): EntityId {
  return buildTemplate(guard, {
    policies: ALL_POLICIES,
    tokens: [TOKEN_A, TOKEN_B, WETH],
    targets: [DEX],
    limits: { maxPerTx: 100n, maxPerDay: 250n, maxApprove: 500n },
    cooldown: 60
  })
}

/** Instance leased (and owned) by RENTER for `days`, funded with `funds`. */
export function leasedInstance(guard: Guard, clock: ManualClock, templateId: EntityId, days = 30, funds = 1_000n): EntityId {
  const row = guard.router.mintInstance(MINTER, templateId, RENTER.address, clock.now() + days * DAY, { label: 'test' })
  if (funds > 0n) guard.router.deposit(row.id, funds)
  return row.id
}

export function encode(method: string, args: unknown[]): string {
  return instructionInterface.encodeFunctionData(method, args)
}

export function swapExactIn(amountIn: bigint, recipient: string, path: string[] = [TOKEN_A, TOKEN_B]): Action {
  return {
    destination: DEX,
    value: 0n,
    payload: encode('swapExactTokensForTokens', [amountIn, 0n, path, recipient, 2_000_000_000n])
  }
}

export function approve(token: string, spender: string, amount: bigint): Action {
  return { destination: token, value: 0n, payload: encode('approve', [spender, amount]) }
}

export function transfer(token: string, to: string, amount: bigint): Action {
  return { destination: token, value: 0n, payload: encode('transfer', [to, amount]) }
}

export function valueTo(destination: string, value: bigint): Action {
  return { destination, value, payload: '0x' }
}

export function decreaseAllowance(token: string, spender: string, amount: bigint): Action {
  return { destination: token, value: 0n, payload: encode('decreaseAllowance', [spender, amount]) }
}

// multi-hop router entry point the decoder has no fragment for
const multiHop = new Interface([
  'function exactInput((bytes path, address recipient, uint256 deadline, uint256 amountIn, uint256 amountOutMinimum) params) payable'
])

export function exactInputMultiHop(amountIn: bigint, recipient: string): Action {
  const path = solidityPacked(['address', 'uint24', 'address'], [TOKEN_A, 3000, TOKEN_B])
  return {
    destination: DEX,
    value: 0n,
    payload: multiHop.encodeFunctionData('exactInput', [[path, recipient, 2_000_000_000n, amountIn, 0n]])
  }
}
