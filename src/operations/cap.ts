/**
 * Site cap: keep a uniform random subset of columns in original order
 */

import { ValidationError } from "../errors";
import type { RecodedMatrix } from "../types";
import { selectColumns } from "../types";
import { RandomSampler, type RandomSource } from "./core/sampling";
import type { CapResult } from "./types";

/**
 * Reduce the matrix to at most `maxSites` columns
 *
 * When the cap is smaller than the column count, `maxSites` distinct columns
 * are drawn uniformly without replacement and put back in ascending order.
 * Otherwise the matrix is returned unchanged and flagged so the caller can
 * warn.
 *
 * @throws {ValidationError} When `maxSites` is not a positive integer
 *
 * @example
 * ```typescript
 * const { matrix, overCap } = capSites(filtered, 1000, createSeededRandom(1));
 * ```
 */
export function capSites(
  matrix: RecodedMatrix,
  maxSites: number | undefined,
  random: RandomSource = Math.random
): CapResult {
  if (maxSites === undefined) {
    return { matrix, overCap: 0, capApplied: false, capExceedsAvailable: false };
  }
  if (!Number.isInteger(maxSites) || maxSites <= 0) {
    throw new ValidationError(`Maximum number of sites must be a positive integer, got ${maxSites}`);
  }
  if (maxSites >= matrix.length) {
    return { matrix, overCap: 0, capApplied: false, capExceedsAvailable: true };
  }

  const positions = Array.from({ length: matrix.length }, (_, position) => position);
  const selected = new RandomSampler<number>(maxSites, random).sample(positions).sort((a, b) => a - b);

  return {
    matrix: selectColumns(matrix, selected),
    overCap: matrix.length - selected.length,
    capApplied: true,
    capExceedsAvailable: false,
  };
}
