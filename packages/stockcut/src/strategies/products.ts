import type { Observation, ProductDemand, Size } from "../types";
import { stockSize, usedArea } from "../geometry";

export function area([w, h]: Size): number {
  return w * h;
}

/** Products with remaining quantity. */
export function eligibleProducts(observation: Observation): ProductDemand[] {
  return observation.products.filter((p) => p.quantity > 0);
}

/**
 * Largest-area product with remaining quantity; the first one wins ties.
 */
export function largestProduct(observation: Observation): ProductDemand | null {
  let largest: ProductDemand | null = null;
  let largestArea = 0;
  for (const product of eligibleProducts(observation)) {
    const a = area(product.size);
    if (a > largestArea) {
      largestArea = a;
      largest = product;
    }
  }
  return largest;
}

/**
 * Stock to steer the learned policy towards.
 *
 * Partially filled stocks under 80% utilization come first, preferring the
 * less utilized ones; otherwise the first untouched stock. null when every
 * stock is full or over the threshold.
 */
export function findBestFittingStock(observation: Observation): number | null {
  let bestIdx: number | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;
  let firstEmpty: number | null = null;

  for (const [idx, grid] of observation.stocks.entries()) {
    const { width, height } = stockSize(grid);
    const total = width * height;
    const used = usedArea(grid);

    if (used === 0) {
      if (firstEmpty === null) firstEmpty = idx;
      continue;
    }

    const utilization = used / total;
    if (utilization >= 0.8) continue;

    const score = 100 + (0.8 - utilization) * 50;
    if (score > bestScore) {
      bestScore = score;
      bestIdx = idx;
    }
  }

  return bestIdx ?? firstEmpty;
}
