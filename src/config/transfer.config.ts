import type { AppEnv } from './env.js'
import type { PlanTier } from '../common/interfaces/transfer.interface.js'

const MIB = 1024 * 1024
const DAY_MS = 24 * 60 * 60 * 1000

export type PlanLimits = Readonly<Record<PlanTier, number>>

/**
 * Policy values the lifecycle manager is constructed with.
 * Built once at startup and frozen; nothing reads these from the environment later.
 */
export interface TransferConfig {
  readonly planLimits: PlanLimits
  readonly defaultPlan: PlanTier
  readonly retentionMs: number
  readonly downloadBaseUrl: string
  readonly basePath: string
}

export function createTransferConfig(env: AppEnv): TransferConfig {
  const planLimits: PlanLimits = Object.freeze({
    free: env.PLAN_LIMIT_FREE_MB * MIB,
    standard: env.PLAN_LIMIT_STANDARD_MB * MIB,
    premium: env.PLAN_LIMIT_PREMIUM_MB * MIB,
  })

  const config: TransferConfig = {
    planLimits,
    defaultPlan: 'free',
    retentionMs: env.RETENTION_DAYS * DAY_MS,
    downloadBaseUrl: env.DOWNLOAD_BASE_URL,
    basePath: env.BASE_PATH,
  }
  return Object.freeze(config)
}
