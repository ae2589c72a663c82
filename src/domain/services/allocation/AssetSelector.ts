import { allocationError } from './ErrorMetric';

/**
 * One greedy increment: spend `amount` (the asset's current price) on the
 * asset at `assetIndex`
 */
export interface AssetSelection {
  assetIndex: number;
  amount: number;
}

/**
 * Pick the asset whose one-unit purchase moves the portfolio closest to the
 * ideal allocation.
 *
 * Every asset priced within `budget` is tried: its equity grows by its price,
 * the vector is normalized by the new total, and the result is scored against
 * `idealFractions`. The smallest error wins; ties keep the lowest index.
 *
 * @param equities Current equity per asset
 * @param prices Current unit price per asset (same indexing)
 * @param idealFractions Target fraction per asset (same indexing)
 * @param budget Funds still available for this increment
 * @returns The selection, or undefined when nothing is affordable or no
 *   candidate can be scored
 */
export function selectAssetToFund(
  equities: readonly number[],
  prices: readonly number[],
  idealFractions: readonly number[],
  budget: number,
): AssetSelection | undefined {
  const totalEquity = equities.reduce((sum, equity) => sum + equity, 0);

  let best: AssetSelection | undefined;
  let bestError = Infinity;

  prices.forEach((price, candidateIndex) => {
    if (!isAffordable(price, budget)) {
      return;
    }

    const newTotal = totalEquity + price;
    const candidateFractions = equities.map((equity, i) =>
      (i === candidateIndex ? equity + price : equity) / newTotal,
    );

    const error = allocationError(candidateFractions, idealFractions);
    if (error !== undefined && error < bestError) {
      bestError = error;
      best = { assetIndex: candidateIndex, amount: price };
    }
  });

  return best;
}

/**
 * Non-positive prices never qualify, so every increment spends money
 */
export function isAffordable(price: number, budget: number): boolean {
  return price > 0 && price <= budget;
}
