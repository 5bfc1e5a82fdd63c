import { expect, test } from "vitest";
import {
  countNearbySmallPieces,
  isGoodPattern,
  isPerfectFit,
  isolationRisk,
  patternScore,
  placementScore,
  smallGapCount,
  spaceUtilization,
} from "../src";
import { emptyGrid, gridFromRows } from "./fixtures";

test("Pattern: perfect fit needs two fully occupied opposing edges", () => {
  const oneSide = gridFromRows(["00..", "00..", "...."]);
  const twoSides = gridFromRows(["00..", "00..", "1111"]);

  expect(isPerfectFit(oneSide, [2, 0], [2, 2])).toBe(false);
  expect(isPerfectFit(twoSides, [2, 0], [2, 2])).toBe(true);
});

test("Pattern: isolation risk counts directions whose region is smaller than the piece", () => {
  const grid = gridFromRows(["0.0..."]);
  expect(isolationRisk(grid, [3, 0], [2, 1])).toBe(1);
  expect(isolationRisk(emptyGrid(10, 10), [0, 0], [2, 2])).toBe(0);
});

test("Pattern: small gaps are counted per cell around the footprint", () => {
  const grid = gridFromRows(["0.0..."]);
  expect(smallGapCount(grid, [3, 0], [2, 1])).toBe(2);
  expect(smallGapCount(emptyGrid(10, 10), [4, 4], [2, 2])).toBe(0);
});

test("Pattern: nearby small pieces are distinct occupants", () => {
  const grid = gridFromRows(["0..", "...", "..1"]);
  expect(countNearbySmallPieces(grid, [1, 1], [1, 1])).toBe(2);
});

test("Pattern: small pieces prefer the corner and nearby material", () => {
  const grid = gridFromRows(["...", ".0.", "..."]);
  // corner 3 + one small neighbor 1.5 − distance 2 × 0.5
  expect(patternScore(grid, [0, 0], [1, 1])).toBe(3.5);
  expect(patternScore(grid, [2, 0], [1, 1])).toBe(2 + 1.5 - 1);
});

test("Pattern: large pieces prefer aligned edges and corners", () => {
  const grid = emptyGrid(10, 10);
  expect(patternScore(grid, [0, 0], [5, 4])).toBe(7);
  expect(patternScore(grid, [5, 6], [5, 4])).toBe(7);
  expect(patternScore(grid, [2, 0], [5, 4])).toBe(2);
  expect(patternScore(grid, [2, 3], [5, 4])).toBe(0);
});

test("Placement score: empty stock rewards corners, then edges", () => {
  const grid = emptyGrid(10, 10);
  expect(placementScore(grid, [0, 0], [2, 2])).toBe(10);
  expect(placementScore(grid, [3, 0], [2, 2])).toBe(5);
  // six empty cells above the piece
  expect(placementScore(grid, [3, 3], [2, 2])).toBe(-90);
});

test("Placement score: adjacency dominates on a stock with material", () => {
  const grid = gridFromRows([
    "00........",
    "00........",
    "..........",
    "..........",
  ]);
  const beside = placementScore(grid, [2, 0], [2, 2]);
  const apart = placementScore(grid, [8, 0], [2, 2]);
  expect(beside).toBeGreaterThan(apart);
});

test("Pattern: space utilization and good pattern on an empty stock", () => {
  const grid = emptyGrid(10, 10);
  expect(spaceUtilization(grid, [0, 0], [4, 4])).toBeCloseTo(2.16, 10);
  expect(isGoodPattern(grid, [0, 0], [4, 4])).toBe(true);
  expect(isGoodPattern(grid, [3, 3], [4, 4])).toBe(false);
  expect(isGoodPattern(grid, [0, 0], [9, 9])).toBe(false);
});
