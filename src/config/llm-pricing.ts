export interface ModelPricing {
  inputPerMTok: number;
  outputPerMTok: number;
}

/** USD per million tokens, used to price usage events. */
export const LLM_PRICING: Record<string, ModelPricing> = {
  'claude-3-5-haiku-20241022': { inputPerMTok: 0.80, outputPerMTok: 4.00 },
  'claude-haiku-4-5-20251001': { inputPerMTok: 1.00, outputPerMTok: 5.00 },
  'claude-sonnet-4-20250514': { inputPerMTok: 3.00, outputPerMTok: 15.00 },
  'claude-opus-4-20250514': { inputPerMTok: 15.00, outputPerMTok: 75.00 },
};

// Unknown models are priced as the default model.
const FALLBACK_MODEL = 'claude-sonnet-4-20250514';

export interface UsageCost {
  inputCostUsd: number;
  outputCostUsd: number;
  totalCostUsd: number;
}

export function priceFor(model: string): ModelPricing {
  return LLM_PRICING[model] ?? LLM_PRICING[FALLBACK_MODEL];
}

export function calculateCost(model: string, inputTokens: number, outputTokens: number): UsageCost {
  const pricing = priceFor(model);
  const inputCostUsd = (inputTokens / 1_000_000) * pricing.inputPerMTok;
  const outputCostUsd = (outputTokens / 1_000_000) * pricing.outputPerMTok;
  return { inputCostUsd, outputCostUsd, totalCostUsd: inputCostUsd + outputCostUsd };
}
