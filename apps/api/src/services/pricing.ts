import type { RateTable } from "../config";

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

/**
 * Estimated USD cost of a call. Dated model ids returned by the API
 * (`gpt-4o-2024-08-06`) are priced by their longest matching table key;
 * unknown models cost nothing.
 */
export function estimateCost(rates: RateTable, model: string, usage: TokenUsage): number {
  const key = Object.keys(rates)
    .filter((name) => model === name || model.startsWith(`${name}-`))
    .sort((a, b) => b.length - a.length)[0];
  if (!key) return 0;

  const rate = rates[key];
  const cost =
    (usage.promptTokens / 1000) * rate.inputPer1K +
    (usage.completionTokens / 1000) * rate.outputPer1K;
  return Math.round(cost * 1e6) / 1e6;
}

export function isPriced(rates: RateTable, model: string): boolean {
  return Object.keys(rates).some((name) => model === name || model.startsWith(`${name}-`));
}
