/**
 * Local structure around a candidate rectangle: its 1-cell halo, distance to
 * existing material and the empty regions it touches.
 */

import type { Grid, Position, Size } from "../types";
import { inBounds, isEmptyCell, isOccupied, stockSize } from "./grid";

const ORTHOGONAL_WEIGHT = 2.0;
const DIAGONAL_WEIGHT = 0.25;

/**
 * Visit every in-bounds cell of the 1-cell halo around a footprint.
 * `diagonal` is true for the four corner cells of the halo.
 */
function forEachHaloCell(
  grid: Grid,
  [x, y]: Position,
  [w, h]: Size,
  visit: (cx: number, cy: number, diagonal: boolean) => void
): void {
  for (let dy = -1; dy <= h; dy++) {
    for (let dx = -1; dx <= w; dx++) {
      const insideX = dx >= 0 && dx < w;
      const insideY = dy >= 0 && dy < h;
      if (insideX && insideY) continue;

      const cx = x + dx;
      const cy = y + dy;
      if (!inBounds(grid, cx, cy)) continue;

      visit(cx, cy, !insideX && !insideY);
    }
  }
}

/**
 * Weighted count of occupied halo cells: cells sharing an edge with the
 * footprint weigh 2.0, diagonal corners 0.25.
 */
export function adjacentWeight(grid: Grid, position: Position, size: Size): number {
  let weight = 0;
  forEachHaloCell(grid, position, size, (cx, cy, diagonal) => {
    if (isOccupied(grid, cx, cy)) {
      weight += diagonal ? DIAGONAL_WEIGHT : ORTHOGONAL_WEIGHT;
    }
  });
  return weight;
}

/** Empty cells in the 1-cell halo. */
export function emptyNeighborCount(grid: Grid, position: Position, size: Size): number {
  let count = 0;
  forEachHaloCell(grid, position, size, (cx, cy) => {
    if (isEmptyCell(grid, cx, cy)) count++;
  });
  return count;
}

/**
 * Manhattan distance from `position` to the nearest occupied cell,
 * 0 for a stock without material.
 */
export function distanceToNearestFilled(grid: Grid, [x, y]: Position): number {
  let best = Number.POSITIVE_INFINITY;
  grid.forEach((row, cy) => {
    row.forEach((_, cx) => {
      if (isOccupied(grid, cx, cy)) {
        best = Math.min(best, Math.abs(cx - x) + Math.abs(cy - y));
      }
    });
  });
  return isFinite(best) ? best : 0;
}

/**
 * Size of the 4-connected empty region containing `start`.
 * 0 when `start` is occupied or out of bounds.
 */
export function connectedEmptyAreaSize(grid: Grid, [startX, startY]: Position): number {
  if (!isEmptyCell(grid, startX, startY)) return 0;

  const { width } = stockSize(grid);
  const visited = new Set<number>();
  const stack: Position[] = [[startX, startY]];
  let area = 0;

  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const [x, y] = next;
    const key = y * width + x;
    if (visited.has(key)) continue;

    visited.add(key);
    area++;

    for (const [nx, ny] of [
      [x - 1, y],
      [x + 1, y],
      [x, y - 1],
      [x, y + 1],
    ] as const) {
      if (isEmptyCell(grid, nx, ny) && !visited.has(ny * width + nx)) {
        stack.push([nx, ny]);
      }
    }
  }

  return area;
}

/** Empty cells in the footprint's columns above its top edge. */
export function gapsAbove(grid: Grid, [x, y]: Position, width: number): number {
  let gaps = 0;
  for (let cx = x; cx < x + width; cx++) {
    for (let cy = 0; cy < y; cy++) {
      if (isEmptyCell(grid, cx, cy)) gaps++;
    }
  }
  return gaps;
}
