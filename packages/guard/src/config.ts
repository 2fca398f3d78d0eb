// src/config.ts

/**
 * Centralized configuration: environment variables parsed once through a zod schema.
 * Values come from process.env, with .env.guard (package root, then cwd) filling anything unset.
 */

import dotenv from 'dotenv'
import fs from 'fs'
import path from 'path'
import { isAddress } from 'ethers'
import { z } from 'zod'
import { ConfigurationError } from '@leasehold/reasons'

// Resolve package root for both ts-node (src) and built (dist/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const packageRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..')

const candidateEnvPaths = [
  path.join(packageRoot, '.env.guard'),
  path.join(process.cwd(), '.env.guard')
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

export const DEFAULT_ROUTER_ADDRESS = '0x000000000000000000000000000000000000a11c'

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  GUARD_CHAIN_ID: z.coerce.number().int().positive().default(31337),
  GUARD_DOMAIN_NAME: z.string().min(1).default('Leasehold'),
  GUARD_DOMAIN_VERSION: z.string().min(1).default('1'),
  GUARD_MAX_POLICIES: z.coerce.number().int().min(1).max(64).default(10),
  GUARD_ROUTER_ADDRESS: z
    .string()
    .refine((v) => isAddress(v), { message: 'must be a 20-byte hex address' })
    .default(DEFAULT_ROUTER_ADDRESS)
})

export type GuardConfig = {
  nodeEnv: string
  logLevel: string
  chainId: number
  domainName: string
  domainVersion: string
  maxPolicies: number
  routerAddress: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GuardConfig {
  const res = EnvSchema.safeParse(env)
  if (!res.success) {
    const fields = res.error.issues.map((i) => i.path.join('.')).join(',')
    throw new ConfigurationError('CONFIG_INVALID_ENV', {
      message: `invalid environment: ${res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      context: { fields }
    })
  }
  const e = res.data
  return {
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    chainId: e.GUARD_CHAIN_ID,
    domainName: e.GUARD_DOMAIN_NAME,
    domainVersion: e.GUARD_DOMAIN_VERSION,
    maxPolicies: e.GUARD_MAX_POLICIES,
    routerAddress: e.GUARD_ROUTER_ADDRESS
  }
}
