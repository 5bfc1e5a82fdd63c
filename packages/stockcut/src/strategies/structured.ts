/**
 * Structured placement: deterministic corner/edge-first packing of the
 * largest remaining product, used while the policy is still exploring.
 */

import type { Grid, Observation, Placement, Position, Size } from "../types";
import { canPlace, isEmptyStock, stockSize } from "../geometry";
import { largestProduct } from "./products";

/** Corners in fixed order: top-left, top-right, bottom-left, bottom-right. */
export function cornerPositions(grid: Grid, [w, h]: Size): Position[] {
  const { width, height } = stockSize(grid);
  return [
    [0, 0],
    [width - w, 0],
    [0, height - h],
    [width - w, height - h],
  ];
}

/** Edge-aligned positions: top, left, bottom, right edge in that order. */
export function edgePositions(grid: Grid, [w, h]: Size): Position[] {
  const { width, height } = stockSize(grid);
  const positions: Position[] = [];
  for (let x = 0; x <= width - w; x++) positions.push([x, 0]);
  for (let y = 0; y <= height - h; y++) positions.push([0, y]);
  for (let x = 0; x <= width - w; x++) positions.push([x, height - h]);
  for (let y = 0; y <= height - h; y++) positions.push([width - w, y]);
  return positions;
}

/**
 * Place the largest remaining product (declared orientation) in the first
 * stock that admits it: corners first on an untouched stock, then the edge
 * scan. null when no stock admits an edge or corner placement.
 */
export function structuredPlacement(observation: Observation): Placement | null {
  const product = largestProduct(observation);
  if (!product) return null;

  const size: Size = [product.size[0], product.size[1]];

  for (const [stockIdx, grid] of observation.stocks.entries()) {
    const candidates = isEmptyStock(grid)
      ? [...cornerPositions(grid, size), ...edgePositions(grid, size)]
      : edgePositions(grid, size);

    const position = candidates.find((p) => canPlace(grid, p, size));
    if (position) {
      return { stockIdx, size, position };
    }
  }

  return null;
}
