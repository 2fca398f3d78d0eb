import { ADMIN, OUTSIDER, OWNER, ROUTER, STRANGER, setupGuard } from '../helpers/fixtures'
import { RecordingExecutor } from '../helpers/RecordingExecutor'
import { Vault, deriveVaultAddress } from '../../src/vault/Vault'
import { codeOf, codeOfAsync } from '../helpers/rejections'

describe('Vault', () => {
  function fundedVault() {
    const executor = new RecordingExecutor()
    const vault = new Vault(1n, deriveVaultAddress(ROUTER, 1n), ROUTER, executor)
    vault.deposit(ROUTER, 100n)
    return { executor, vault }
  }

  test('addresses are deterministic per router and id', () => {
    expect(deriveVaultAddress(ROUTER, 1n)).toBe(deriveVaultAddress(ROUTER, 1n))
    expect(deriveVaultAddress(ROUTER, 1n)).not.toBe(deriveVaultAddress(ROUTER, 2n))
    expect(deriveVaultAddress(ROUTER, 1n)).not.toBe(deriveVaultAddress(OUTSIDER, 1n))
  })

  test('minted entities get their derived vault', () => {
    const { guard } = setupGuard()
    const row = guard.router.mint(ADMIN, OWNER)
    expect(row.vault).toBe(deriveVaultAddress(ROUTER, row.id))
    expect(guard.router.vaultOf(row.id).address).toBe(row.vault)
  })

  test('only the router drives it', async () => {
    const { vault } = fundedVault()
    expect(codeOf(() => vault.deposit(STRANGER, 1n))).toBe('AUTH_NOT_ROUTER')
    expect(await codeOfAsync(vault.forward(STRANGER, { destination: OUTSIDER, value: 1n, payload: '0x' }))).toBe('AUTH_NOT_ROUTER')
    expect(await codeOfAsync(vault.withdraw(STRANGER, OWNER, 1n))).toBe('AUTH_NOT_ROUTER')
  })

  test('deposits must be positive', () => {
    const { vault } = fundedVault()
    expect(codeOf(() => vault.deposit(ROUTER, 0n))).toBe('EXECUTION_FAILED')
  })

  test('value-only call to itself is a no-op', async () => {
    const { vault, executor } = fundedVault()
    const res = await vault.forward(ROUTER, { destination: vault.address, value: 50n, payload: '0x' })
    expect(res).toEqual({ success: true, returnData: '0x' })
    expect(executor.calls).toHaveLength(0)
    expect(vault.balanceOf()).toBe(100n)
  })

  test('calldata to itself is refused', async () => {
    const { vault } = fundedVault()
    expect(await codeOfAsync(vault.forward(ROUTER, { destination: vault.address, value: 0n, payload: '0xdeadbeef' }))).toBe(
      'EXECUTION_FAILED'
    )
  })

  test('an executor that throws becomes an execution failure', async () => {
    const { vault, executor } = fundedVault()
    executor.throwNext = new Error('rpc unavailable')
    await expect(vault.forward(ROUTER, { destination: OUTSIDER, value: 10n, payload: '0x' })).rejects.toThrow('rpc unavailable')
    expect(vault.balanceOf()).toBe(100n)
  })

  test('successful call debits the balance', async () => {
    const { vault, executor } = fundedVault()
    executor.returnData = '0x01'
    const res = await vault.forward(ROUTER, { destination: OUTSIDER, value: 10n, payload: '0x' })
    expect(res.returnData).toBe('0x01')
    expect(vault.balanceOf()).toBe(90n)
  })
})
