import { EMPTY, silentLogger, type PolicyConfig } from "../src";

/** Grid from rows of "." (empty) and digits (occupant id). */
export function gridFromRows(rows: string[]): number[][] {
  return rows.map((row) => [...row].map((c) => (c === "." ? EMPTY : Number(c))));
}

export function emptyGrid(width: number, height: number): number[][] {
  return Array.from({ length: height }, () => new Array<number>(width).fill(EMPTY));
}

/** Copy of `grid` with a rectangle set to `id`. */
export function fillRect(
  grid: number[][],
  [x, y]: [number, number],
  [w, h]: [number, number],
  id: number = 0
): number[][] {
  return grid.map((row, cy) =>
    row.map((cell, cx) => (cx >= x && cx < x + w && cy >= y && cy < y + h ? id : cell))
  );
}

/** Tiny networks and a silent logger so policy tests stay fast. */
export function testPolicyConfig(overrides?: PolicyConfig): PolicyConfig {
  return {
    ...overrides,
    actionSpace: { maxStocks: 2, ...overrides?.actionSpace },
    network: {
      actorHiddenSizes: [8],
      criticHiddenSizes: [8],
      criticDropout: 0,
      ...overrides?.network,
    },
    logger: overrides?.logger ?? silentLogger,
  };
}
