import type { Address } from '@leasehold/dto'
import { AuditTrail } from './audit/AuditTrail'
import { GuardConfig, loadConfig } from './config'
import { PolicyEngine } from './engine/PolicyEngine'
import { EntityRegistry } from './entities/EntityRegistry'
import { CooldownPolicy } from './plugins/CooldownPolicy'
import { DexWhitelistPolicy } from './plugins/DexWhitelistPolicy'
import { ReceiverGuardPolicy } from './plugins/ReceiverGuardPolicy'
import { SpendingLimitPolicy } from './plugins/SpendingLimitPolicy'
import { TokenWhitelistPolicy } from './plugins/TokenWhitelistPolicy'
import { AccessRouter } from './router/AccessRouter'
import { InMemoryKeyValueStore, KeyValueStore } from './store/KeyValueStore'
import { Clock, systemClock } from './utils/clock'
import { CallExecutor } from './vault/CallExecutor'
import { deriveVaultAddress } from './vault/Vault'

export * from './audit/AuditTrail'
export * from './config'
export * from './decoder/decodeAction'
export * from './delegation/operatorPermit'
export * from './engine/PolicyEngine'
export * from './entities/EntityRegistry'
export * from './entities/statusMachine'
export * from './plugins'
export * from './router/AccessRouter'
export * from './router/actionSchema'
export * from './store/KeyValueStore'
export * from './utils/address'
export * from './utils/canonical'
export * from './utils/clock'
export * from './vault/CallExecutor'
export * from './vault/Vault'

export type GuardOptions = {
  admin: Address
  minter: Address
  executor: CallExecutor
  config?: GuardConfig
  clock?: Clock
  store?: KeyValueStore
  audit?: AuditTrail
}

export type GuardPlugins = {
  tokenWhitelist: TokenWhitelistPolicy
  dexWhitelist: DexWhitelistPolicy
  receiverGuard: ReceiverGuardPolicy
  spendingLimit: SpendingLimitPolicy
  cooldown: CooldownPolicy
}

export type Guard = {
  config: GuardConfig
  store: KeyValueStore
  audit: AuditTrail
  entities: EntityRegistry
  engine: PolicyEngine
  plugins: GuardPlugins
  router: AccessRouter
}

/** Wires the store, registry, engine, the five stock plugins (approved by `admin`) and the router. */
export function createGuard(opts: GuardOptions): Guard {
  const config = opts.config ?? loadConfig()
  const clock = opts.clock ?? systemClock
  const store = opts.store ?? new InMemoryKeyValueStore()
  const audit = opts.audit ?? new AuditTrail()
  const routerAddress = config.routerAddress

  const entities = new EntityRegistry(store, (id) => deriveVaultAddress(routerAddress, id), clock)
  const engine = new PolicyEngine({
    store,
    entities,
    admin: opts.admin,
    instanceMinter: opts.minter,
    router: routerAddress,
    maxPolicies: config.maxPolicies,
    audit
  })

  const plugins: GuardPlugins = {
    tokenWhitelist: new TokenWhitelistPolicy(store, engine),
    dexWhitelist: new DexWhitelistPolicy(store, engine),
    receiverGuard: new ReceiverGuardPolicy(),
    spendingLimit: new SpendingLimitPolicy(store, engine, clock),
    cooldown: new CooldownPolicy(store, engine, clock)
  }
  for (const plugin of Object.values(plugins)) engine.approvePlugin(opts.admin, plugin)

  const router = new AccessRouter({
    address: routerAddress,
    admin: opts.admin,
    minter: opts.minter,
    entities,
    engine,
    executor: opts.executor,
    domain: { name: config.domainName, version: config.domainVersion, chainId: config.chainId },
    clock,
    audit
  })

  return { config, store, audit, entities, engine, plugins, router }
}
