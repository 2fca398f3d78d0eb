export * from './types'
export * from './access'
export * from './TokenWhitelistPolicy'
export * from './DexWhitelistPolicy'
export * from './SpendingLimitPolicy'
export * from './CooldownPolicy'
export * from './ReceiverGuardPolicy'
