/**
 * Placement-quality heuristics.
 *
 * Two scorers sit on top of the neighborhood helpers:
 * - patternScore: ranks the candidates a decoded action hint admits
 * - placementScore: the greedy fallback's priority score
 *
 * Both are pure; they read the grid as it is before the placement.
 */

import type { Grid, Position, Size } from "../types";
import { inBounds, inFootprint, isEmptyCell, isOccupied, stockSize, stockUtilization } from "./grid";
import {
  adjacentWeight,
  connectedEmptyAreaSize,
  distanceToNearestFilled,
  gapsAbove,
} from "./neighborhood";

/** Pieces below this many cells use the small-piece regime. */
export const SMALL_PIECE_AREA = 20;

/** Empty regions below this size are considered unusable leftovers. */
export const SMALL_GAP_AREA = 4;

const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [0, -1],
  [1, 0],
  [-1, 0],
];

/**
 * Probe the four axis directions at a distance equal to the piece's own
 * extent; a direction counts when the whole opposing edge is occupied.
 * Perfect when at least two directions count or the alignment quality
 * reaches 1.5.
 */
export function isPerfectFit(grid: Grid, [x, y]: Position, [w, h]: Size): boolean {
  let perfectFits = 0;
  let alignmentQuality = 0;

  for (const [dx, dy] of DIRECTIONS) {
    const checkX = x + dx * w;
    const checkY = y + dy * h;
    if (!inBounds(grid, checkX, checkY)) continue;

    if (dx !== 0) {
      let aligned = 0;
      for (let cy = y; cy < y + h; cy++) {
        if (isOccupied(grid, checkX, cy)) aligned++;
      }
      if (aligned === h) {
        perfectFits++;
        alignmentQuality += aligned / h;
      }
    } else {
      let aligned = 0;
      for (let cx = x; cx < x + w; cx++) {
        if (isOccupied(grid, cx, checkY)) aligned++;
      }
      if (aligned === w) {
        perfectFits++;
        alignmentQuality += aligned / w;
      }
    }
  }

  return perfectFits >= 2 || alignmentQuality >= 1.5;
}

/**
 * Directions (probed one piece-extent away) whose empty region is smaller
 * than the piece itself.
 */
export function isolationRisk(grid: Grid, [x, y]: Position, [w, h]: Size): number {
  let risk = 0;
  for (const [dx, dy] of DIRECTIONS) {
    const area = connectedEmptyAreaSize(grid, [x + dx * w, y + dy * h]);
    if (area > 0 && area < w * h) risk++;
  }
  return risk;
}

/**
 * Empty cells within a 2-cell halo around the footprint whose connected
 * region is smaller than SMALL_GAP_AREA.
 */
export function smallGapCount(grid: Grid, position: Position, size: Size): number {
  const [x, y] = position;
  const [w, h] = size;
  const padding = 2;
  let count = 0;

  for (let cy = y - padding; cy < y + h + padding; cy++) {
    for (let cx = x - padding; cx < x + w + padding; cx++) {
      if (inFootprint(position, size, cx, cy)) continue;
      if (!isEmptyCell(grid, cx, cy)) continue;
      const gap = connectedEmptyAreaSize(grid, [cx, cy]);
      if (gap > 0 && gap < SMALL_GAP_AREA) count++;
    }
  }

  return count;
}

/**
 * Distinct small occupants within a 3-cell radius of the footprint.
 * An occupant is small when it covers fewer than SMALL_PIECE_AREA cells of
 * the window.
 */
export function countNearbySmallPieces(grid: Grid, [x, y]: Position, [w, h]: Size): number {
  const { width, height } = stockSize(grid);
  const padding = 3;
  const x0 = Math.max(0, x - padding);
  const x1 = Math.min(width, x + w + padding);
  const y0 = Math.max(0, y - padding);
  const y1 = Math.min(height, y + h + padding);

  const cellsById = new Map<number, number>();
  for (let cy = y0; cy < y1; cy++) {
    for (let cx = x0; cx < x1; cx++) {
      const id = grid[cy]?.[cx];
      if (id === undefined || !isOccupied(grid, cx, cy)) continue;
      cellsById.set(id, (cellsById.get(id) ?? 0) + 1);
    }
  }

  let small = 0;
  for (const cells of cellsById.values()) {
    if (cells < SMALL_PIECE_AREA) small++;
  }
  return small;
}

/**
 * Composite pattern score used to rank the candidates of a decoded action.
 *
 * Small pieces favour the top-left corner and edges, clustering with other
 * small pieces, and staying close to existing material. Large pieces favour
 * edge alignment on either side, corners and already utilized stocks.
 */
export function patternScore(grid: Grid, position: Position, size: Size): number {
  const { width, height } = stockSize(grid);
  const [x, y] = position;
  const [w, h] = size;
  let score = 0;

  if (w * h < SMALL_PIECE_AREA) {
    if (x === 0 && y === 0) {
      score += 3.0;
    } else if (x === 0 || y === 0) {
      score += 2.0;
    }
    score += countNearbySmallPieces(grid, position, size) * 1.5;
    score -= distanceToNearestFilled(grid, position) * 0.5;
    return score;
  }

  const alignedX = x === 0 || x + w === width;
  const alignedY = y === 0 || y + h === height;
  if (alignedX) score += 2.0;
  if (alignedY) score += 2.0;
  if (alignedX && alignedY) score += 3.0;
  score += stockUtilization(grid) * 2.0;

  return score;
}

/**
 * Greedy priority score for a candidate rectangle.
 *
 * A stock that already holds material starts at 50 and earns adjacency,
 * perfect-fit and (below 60% utilization) center-seeking bonuses. An empty
 * stock only earns small corner/edge bonuses. Gaps above the piece, isolated
 * regions and small leftover gaps are penalized either way.
 */
export function placementScore(grid: Grid, position: Position, size: Size): number {
  const { width, height } = stockSize(grid);
  const [x, y] = position;
  const [w, h] = size;
  const utilization = stockUtilization(grid);
  let score = 0;

  const alignedX = x === 0 || x + w === width;
  const alignedY = y === 0 || y + h === height;

  if (utilization > 0) {
    score += 50;

    const adjacency = adjacentWeight(grid, position, size);
    if (adjacency >= 2) {
      score += 60 * Math.pow(2.0, adjacency - 1);
    } else {
      score += 30 * adjacency;
    }
    if (adjacency >= 3) score += 100;

    if (isPerfectFit(grid, position, size)) score += 50;

    if (utilization < 0.6) {
      const centerX = Math.floor(width / 2);
      const centerY = Math.floor(height / 2);
      const distToCenter = Math.abs(x + w / 2 - centerX) + Math.abs(y + h / 2 - centerY);
      score += Math.max(0, 25 - distToCenter);
    }
  } else if (utilization < 0.3) {
    if (alignedX && alignedY) {
      score += 10;
    } else if (alignedX || alignedY) {
      score += 5;
    }
  }

  score -= gapsAbove(grid, position, w) * 15;
  score -= isolationRisk(grid, position, size) * 20;
  score -= smallGapCount(grid, position, size) * 25;

  return score;
}

/**
 * Weighted mix of the piece's share of the stock and the right/bottom
 * remainder rectangles left beside it.
 */
export function spaceUtilization(grid: Grid, [x, y]: Position, [w, h]: Size): number {
  const { width, height } = stockSize(grid);
  const stockArea = width * height;
  if (stockArea === 0) return 0;

  let remaining = 0;
  if (x + w < width) remaining += (width - (x + w)) * height;
  if (y + h < height) remaining += w * (height - (y + h));

  return ((w * h) / stockArea) * 3.0 + (remaining / stockArea) * 2.0;
}

/**
 * Edge-aligned placement that leaves at least 30% of the stock and room for
 * a piece of the same short side.
 */
export function isGoodPattern(grid: Grid, [x, y]: Position, [w, h]: Size): boolean {
  const { width, height } = stockSize(grid);
  const edgeAligned = x === 0 || x + w === width || y === 0 || y + h === height;
  const remainingRatio = 1 - (w * h) / (width * height);
  const hasUsableSpace = remainingRatio >= 0.3 && Math.min(width, height) >= Math.min(w, h);
  return edgeAligned && hasUsableSpace;
}
