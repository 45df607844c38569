import type { PlanLimits } from '../config/transfer.config.js'
import { isPlanTier, type PlanTier } from '../common/interfaces/transfer.interface.js'
import { InvalidPlanError, QuotaExceededError } from '../common/errors/transfer.errors.js'

/**
 * Maps a plan tier and an aggregate byte count to accept or reject.
 * Pure: it is consulted before any blob or metadata write.
 */
export class QuotaPolicy {
  constructor(private readonly limits: PlanLimits) {}

  public limitFor(planTier: PlanTier): number {
    return this.limits[planTier]
  }

  public admit(planTier: string, totalBytes: number): boolean {
    if (!isPlanTier(planTier)) return false
    if (!Number.isFinite(totalBytes) || totalBytes < 0) return false
    return totalBytes <= this.limits[planTier]
  }

  public assertAdmitted(planTier: string, totalBytes: number): PlanTier {
    if (!isPlanTier(planTier)) {
      throw new InvalidPlanError(planTier)
    }
    if (!this.admit(planTier, totalBytes)) {
      throw new QuotaExceededError(planTier, totalBytes, this.limits[planTier])
    }
    return planTier
  }
}
