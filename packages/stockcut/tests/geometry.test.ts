import { expect, test } from "vitest";
import {
  adjacentWeight,
  canPlace,
  connectedEmptyAreaSize,
  distanceToNearestFilled,
  emptyNeighborCount,
  filledRatio,
  gapsAbove,
  orientations,
  stockSize,
  usedStockCount,
  withoutFootprint,
} from "../src";
import { emptyGrid, fillRect, gridFromRows } from "./fixtures";

const grid = gridFromRows([
  ".....",
  "..0..",
  ".....",
  ".....",
]);

test("Grid: stock size is width by row length, height by row count", () => {
  expect(stockSize(grid)).toEqual({ width: 5, height: 4 });
});

test("Grid: canPlace requires bounds and empty cells", () => {
  expect(canPlace(grid, [0, 0], [2, 2])).toBe(true);
  expect(canPlace(grid, [3, 2], [2, 2])).toBe(true);
  expect(canPlace(grid, [1, 0], [2, 2])).toBe(false);
  expect(canPlace(grid, [4, 0], [2, 1])).toBe(false);
  expect(canPlace(grid, [0, 3], [1, 2])).toBe(false);
  expect(canPlace(grid, [-1, 0], [1, 1])).toBe(false);
});

test("Neighborhood: edge neighbors weigh 2, diagonal corners 0.25", () => {
  expect(adjacentWeight(grid, [0, 1], [2, 1])).toBe(2);
  expect(adjacentWeight(grid, [3, 2], [1, 1])).toBe(0.25);
  expect(adjacentWeight(grid, [0, 3], [1, 1])).toBe(0);
});

test("Neighborhood: empty neighbors only count in-bounds halo cells", () => {
  expect(emptyNeighborCount(grid, [0, 0], [1, 1])).toBe(3);
  expect(emptyNeighborCount(grid, [1, 0], [1, 1])).toBe(4);
});

test("Neighborhood: distance to nearest filled cell is Manhattan, 0 on an empty stock", () => {
  expect(distanceToNearestFilled(grid, [0, 0])).toBe(3);
  expect(distanceToNearestFilled(grid, [4, 3])).toBe(4);
  expect(distanceToNearestFilled(emptyGrid(3, 3), [2, 2])).toBe(0);
});

test("Neighborhood: flood fill measures the 4-connected empty region", () => {
  expect(connectedEmptyAreaSize(grid, [0, 0])).toBe(19);
  expect(connectedEmptyAreaSize(grid, [2, 1])).toBe(0);
  expect(connectedEmptyAreaSize(grid, [9, 9])).toBe(0);

  const split = gridFromRows([".0..", "0..."]);
  expect(connectedEmptyAreaSize(split, [0, 0])).toBe(1);
  expect(connectedEmptyAreaSize(split, [3, 1])).toBe(5);
});

test("Neighborhood: gaps above counts empty cells over the footprint columns", () => {
  expect(gapsAbove(grid, [2, 3], 1)).toBe(2);
  expect(gapsAbove(grid, [1, 2], 2)).toBe(3);
  expect(gapsAbove(grid, [0, 0], 5)).toBe(0);
});

test("Grid: corrected filled ratio ignores untouched stocks", () => {
  const used = fillRect(emptyGrid(10, 10), [0, 0], [10, 6]);
  const untouched = emptyGrid(10, 10);

  expect(filledRatio([used, untouched])).toBe(0.6);
  expect(filledRatio([untouched])).toBe(0);
  expect(usedStockCount([used, untouched])).toBe(1);
});

test("Grid: corrected filled ratio weights stocks by area", () => {
  const untouched = emptyGrid(10, 10);
  const half = fillRect(emptyGrid(10, 10), [0, 0], [10, 5]);
  const full = fillRect(emptyGrid(5, 5), [0, 0], [5, 5]);

  // (50 + 25) / (100 + 25)
  expect(filledRatio([untouched, half, full])).toBe(0.6);
  expect(usedStockCount([untouched, half, full])).toBe(2);
});

test("Grid: withoutFootprint clears only the footprint", () => {
  const placed = fillRect(emptyGrid(3, 2), [1, 0], [2, 1], 7);
  expect(withoutFootprint(placed, [1, 0], [1, 1])).toEqual([
    [-1, -1, 7],
    [-1, -1, -1],
  ]);
  expect(placed[0]).toEqual([-1, 7, 7]);
});

test("Grid: squares have a single orientation", () => {
  expect(orientations([2, 3])).toEqual([
    [2, 3],
    [3, 2],
  ]);
  expect(orientations([2, 2])).toEqual([[2, 2]]);
});
