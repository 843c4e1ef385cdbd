import { describe, expect, it } from 'vitest';
import { evaluateQuota, type QuotaLimits } from './evaluate.js';

const limits = (overrides: Partial<QuotaLimits> = {}): QuotaLimits => ({
  tokenBudget: 1000,
  unitCap: null,
  unitWindowDays: null,
  ...overrides,
});

describe('evaluateQuota', () => {
  it('rejects a projection that would pass the token budget', () => {
    const decision = evaluateQuota(limits(), { tokensInWindow: 950, unitsUsed: 0 }, { projectedTokens: 100, projectedUnits: 1 });

    expect(decision).toEqual({
      admitted: false,
      limitKind: 'tokens',
      reason: 'Weekly token budget exceeded: 950 used, 100 projected, budget 1000',
    });
  });

  it('admits a projection that lands exactly on the budget', () => {
    const decision = evaluateQuota(limits(), { tokensInWindow: 900, unitsUsed: 0 }, { projectedTokens: 100, projectedUnits: 1 });
    expect(decision).toEqual({ admitted: true });
  });

  it('never admits a user already over budget', () => {
    for (const used of [1001, 1500, 10_000]) {
      for (const projected of [0, 1, 500]) {
        const decision = evaluateQuota(limits(), { tokensInWindow: used, unitsUsed: 0 }, { projectedTokens: projected, projectedUnits: 0 });
        expect(decision.admitted).toBe(false);
      }
    }
  });

  it('checks the module unit cap after the token budget', () => {
    const decision = evaluateQuota(
      limits({ unitCap: 10, unitWindowDays: 30 }),
      { tokensInWindow: 0, unitsUsed: 9 },
      { projectedTokens: 10, projectedUnits: 2 },
    );

    expect(decision).toEqual({
      admitted: false,
      limitKind: 'units',
      reason: 'Usage limit for this tool reached: 9 used in the last 30 days, 2 requested, limit 10',
    });
  });

  it('treats null limits as unlimited', () => {
    const decision = evaluateQuota(
      limits({ tokenBudget: null }),
      { tokensInWindow: 5_000_000, unitsUsed: 5_000 },
      { projectedTokens: 1_000_000, projectedUnits: 100 },
    );
    expect(decision).toEqual({ admitted: true });
  });
});
