/**
 * Vector utilities.
 * All operations are pure functions on number arrays.
 */

import type { Vec } from "./types";

export function zeros(n: number): Vec {
  return new Array<number>(n).fill(0);
}

export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

/** Sum of array elements */
export function sum(xs: readonly number[]): number {
  return xs.reduce((a, b) => a + b, 0);
}

/** Arithmetic mean; 0 for an empty array */
export function mean(xs: readonly number[]): number {
  return xs.length === 0 ? 0 : sum(xs) / xs.length;
}

/**
 * Sample standard deviation (n − 1 denominator).
 * Returns 0 when fewer than two values are given.
 */
export function sampleStd(xs: readonly number[]): number {
  if (xs.length < 2) return 0;
  const m = mean(xs);
  const ss = xs.reduce((s, x) => s + (x - m) * (x - m), 0);
  return Math.sqrt(ss / (xs.length - 1));
}

/**
 * Shift to zero mean and scale to unit sample variance.
 * `epsilon` guards the denominator for constant inputs.
 */
export function standardize(xs: readonly number[], epsilon: number = 1e-8): Vec {
  const m = mean(xs);
  const s = sampleStd(xs);
  return xs.map((x) => (x - m) / (s + epsilon));
}

/** Log-sum-exp for numerical stability */
export function logSumExp(xs: readonly number[]): number {
  if (xs.length === 0) return Number.NEGATIVE_INFINITY;
  const m = Math.max(...xs);
  if (!isFinite(m)) return m;
  let s = 0;
  for (const x of xs) s += Math.exp(x - m);
  return m + Math.log(s || 1e-12);
}

/** Log-softmax normalization */
export function logSoftmax(xs: readonly number[]): Vec {
  const lse = logSumExp(xs);
  return xs.map((x) => x - lse);
}

/** Index of the largest element; -1 for an empty array */
export function argmax(xs: readonly number[]): number {
  let best = -1;
  let bestValue = Number.NEGATIVE_INFINITY;
  xs.forEach((x, i) => {
    if (x > bestValue) {
      bestValue = x;
      best = i;
    }
  });
  return best;
}
