/**
 * In-process cutting-stock environment
 *
 * Owns stock grids and product demand, applies placements and reports the
 * next observation. Used by the examples and the end-to-end tests.
 */

import {
  EMPTY,
  canPlace,
  filledRatio,
  totalDemand,
  type Observation,
  type Placement,
  type ProductDemand,
  type Size,
  type StepInfo,
} from "../../src";

export interface EnvironmentConfig {
  /** Stock sheet sizes, [width, height]. */
  stocks: Size[];
  products: ProductDemand[];
}

export interface StepResult {
  observation: Observation;
  info: StepInfo;
  done: boolean;
  /** False when the placement was null or could not be applied. */
  applied: boolean;
}

export class CuttingStockEnvironment {
  private stocks: number[][][] = [];
  private products: ProductDemand[] = [];

  constructor(private config: EnvironmentConfig) {
    this.reset();
  }

  reset(): { observation: Observation; info: StepInfo } {
    this.stocks = this.config.stocks.map(([w, h]) =>
      Array.from({ length: h }, () => new Array<number>(w).fill(EMPTY))
    );
    this.products = this.config.products.map((p) => ({ size: [...p.size], quantity: p.quantity }));
    return { observation: this.observe(), info: this.info() };
  }

  /**
   * Apply `placement` and decrement the matching product. The episode ends
   * when demand is met or no placement was made.
   */
  step(placement: Placement | null): StepResult {
    const applied = placement !== null && this.apply(placement);
    const observation = this.observe();
    const done = !applied || totalDemand(observation) === 0;
    return { observation, info: this.info(), done, applied };
  }

  private apply({ stockIdx, size, position }: Placement): boolean {
    const grid = this.stocks[stockIdx];
    if (!grid || !canPlace(grid, position, size)) return false;

    const [w, h] = size;
    const productIdx = this.products.findIndex(
      (p) =>
        p.quantity > 0 &&
        ((p.size[0] === w && p.size[1] === h) || (p.size[0] === h && p.size[1] === w))
    );
    const product = this.products[productIdx];
    if (!product) return false;

    const [x, y] = position;
    for (let cy = y; cy < y + h; cy++) {
      const row = grid[cy];
      if (!row) continue;
      for (let cx = x; cx < x + w; cx++) row[cx] = productIdx;
    }
    product.quantity--;
    return true;
  }

  private observe(): Observation {
    return {
      stocks: this.stocks.map((grid) => grid.map((row) => [...row])),
      products: this.products.map((p) => ({ size: [...p.size], quantity: p.quantity })),
    };
  }

  private info(): StepInfo {
    return { filledRatio: filledRatio(this.stocks) };
  }
}
