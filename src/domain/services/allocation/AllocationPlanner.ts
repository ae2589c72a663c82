import { Injectable } from '@nestjs/common';
import { AssetSelection, isAffordable, selectAssetToFund } from './AssetSelector';

/**
 * Ordered purchases plus the equities they would produce
 */
export interface PurchasePlan {
  purchases: AssetSelection[];
  equities: number[];
}

interface PlanningState {
  readonly purchases: readonly AssetSelection[];
  readonly equities: readonly number[];
  readonly remainingBudget: number;
}

/**
 * AllocationPlanner - Turns one funding pool into a list of purchases
 *
 * Repeatedly asks the asset selector for the next increment and books it,
 * until no asset is affordable or no candidate qualifies. Each increment
 * spends a positive price, so the loop runs at most
 * ceil(totalBudget / min(prices)) times.
 */
@Injectable()
export class AllocationPlanner {
  plan(
    initialEquities: readonly number[],
    prices: readonly number[],
    idealFractions: readonly number[],
    totalBudget: number,
  ): PurchasePlan {
    let state: PlanningState = {
      purchases: [],
      equities: [...initialEquities],
      remainingBudget: totalBudget,
    };

    for (;;) {
      const budget = state.remainingBudget;
      if (!prices.some((price) => isAffordable(price, budget))) {
        break;
      }

      const selection = selectAssetToFund(state.equities, prices, idealFractions, budget);
      if (!selection) {
        break;
      }

      state = {
        purchases: [...state.purchases, selection],
        equities: state.equities.map((equity, i) =>
          i === selection.assetIndex ? equity + selection.amount : equity,
        ),
        remainingBudget: budget - selection.amount,
      };
    }

    return {
      purchases: [...state.purchases],
      equities: [...state.equities],
    };
  }

  /**
   * Total dollars spent by a plan
   */
  static totalAmount(plan: PurchasePlan): number {
    return plan.purchases.reduce((sum, purchase) => sum + purchase.amount, 0);
  }
}
