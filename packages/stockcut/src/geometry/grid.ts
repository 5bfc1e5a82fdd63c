/**
 * Occupancy grid primitives.
 *
 * Grids are indexed `grid[y][x]`; width is the row length, height the row
 * count. Nothing here mutates its input.
 */

import { EMPTY, type Grid, type Observation, type Position, type Size } from "../types";

export interface StockSize {
  width: number;
  height: number;
}

export function stockSize(grid: Grid): StockSize {
  return { width: grid[0]?.length ?? 0, height: grid.length };
}

export function inBounds(grid: Grid, x: number, y: number): boolean {
  const { width, height } = stockSize(grid);
  return x >= 0 && y >= 0 && x < width && y < height;
}

/** True for an in-bounds empty cell. */
export function isEmptyCell(grid: Grid, x: number, y: number): boolean {
  return grid[y]?.[x] === EMPTY;
}

/** True for an in-bounds cell holding an occupant. */
export function isOccupied(grid: Grid, x: number, y: number): boolean {
  const value = grid[y]?.[x];
  return value !== undefined && value !== EMPTY;
}

/** Number of occupied cells. */
export function usedArea(grid: Grid): number {
  let used = 0;
  for (const row of grid) {
    for (const cell of row) {
      if (cell !== EMPTY) used++;
    }
  }
  return used;
}

export function isEmptyStock(grid: Grid): boolean {
  return usedArea(grid) === 0;
}

/** Occupied fraction of a single stock. */
export function stockUtilization(grid: Grid): number {
  const { width, height } = stockSize(grid);
  const area = width * height;
  return area === 0 ? 0 : usedArea(grid) / area;
}

/**
 * Filled ratio over the stocks that hold any material.
 * Untouched stocks are excluded from both numerator and denominator;
 * 0 when nothing has been placed yet.
 */
export function filledRatio(stocks: readonly Grid[]): number {
  let used = 0;
  let total = 0;
  for (const grid of stocks) {
    const cells = usedArea(grid);
    if (cells === 0) continue;
    const { width, height } = stockSize(grid);
    used += cells;
    total += width * height;
  }
  return total > 0 ? used / total : 0;
}

/** Stocks holding any material. */
export function usedStockCount(stocks: readonly Grid[]): number {
  return stocks.filter((grid) => !isEmptyStock(grid)).length;
}

/**
 * A rectangle can be placed when it lies within the stock and every
 * covered cell is empty.
 */
export function canPlace(grid: Grid, [x, y]: Position, [w, h]: Size): boolean {
  const { width, height } = stockSize(grid);
  if (w <= 0 || h <= 0 || x < 0 || y < 0) return false;
  if (x + w > width || y + h > height) return false;

  for (let cy = y; cy < y + h; cy++) {
    for (let cx = x; cx < x + w; cx++) {
      if (!isEmptyCell(grid, cx, cy)) return false;
    }
  }
  return true;
}

/** True when (x, y) falls inside the footprint. */
export function inFootprint([x, y]: Position, [w, h]: Size, cx: number, cy: number): boolean {
  return cx >= x && cx < x + w && cy >= y && cy < y + h;
}

/**
 * Copy of a grid with the footprint cleared. Used to recover the grid as it
 * was before an already applied placement.
 */
export function withoutFootprint(grid: Grid, position: Position, size: Size): number[][] {
  return grid.map((row, cy) =>
    row.map((cell, cx) => (inFootprint(position, size, cx, cy) ? EMPTY : cell))
  );
}

export function totalDemand(observation: Observation): number {
  return observation.products.reduce((s, p) => s + Math.max(0, p.quantity), 0);
}

/** Original orientation first; the rotated one only when it differs. */
export function orientations([w, h]: Size): Size[] {
  return w === h ? [[w, h]] : [[w, h], [h, w]];
}
