import type { QuotaLimitKind } from '../../lib/errors.js';

export interface QuotaLimits {
  /** Tokens over the trailing window, shared by every module. Null is unlimited. */
  tokenBudget: number | null;
  /** Units for one module. Null is unlimited. */
  unitCap: number | null;
  unitWindowDays: number | null;
}

export interface QuotaUsage {
  tokensInWindow: number;
  unitsUsed: number;
}

export interface QuotaRequest {
  projectedTokens: number;
  projectedUnits: number;
}

export type QuotaDecision =
  | { admitted: true }
  | { admitted: false; limitKind: QuotaLimitKind; reason: string };

/**
 * Admission rule: the token budget is checked first, then the module's unit cap.
 * A request is rejected when usage plus the projection would pass the limit.
 */
export function evaluateQuota(limits: QuotaLimits, usage: QuotaUsage, request: QuotaRequest): QuotaDecision {
  if (limits.tokenBudget !== null && usage.tokensInWindow + request.projectedTokens > limits.tokenBudget) {
    return {
      admitted: false,
      limitKind: 'tokens',
      reason: `Weekly token budget exceeded: ${usage.tokensInWindow} used, ${request.projectedTokens} projected, budget ${limits.tokenBudget}`,
    };
  }

  if (limits.unitCap !== null && usage.unitsUsed + request.projectedUnits > limits.unitCap) {
    const scope = limits.unitWindowDays ? `in the last ${limits.unitWindowDays} days` : 'in total';
    return {
      admitted: false,
      limitKind: 'units',
      reason: `Usage limit for this tool reached: ${usage.unitsUsed} used ${scope}, ${request.projectedUnits} requested, limit ${limits.unitCap}`,
    };
  }

  return { admitted: true };
}
