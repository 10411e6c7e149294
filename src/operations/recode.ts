/**
 * SiteRecoder - turn alignment columns into SNAPP's ternary code
 *
 * Walks the alignment one column at a time. Every column is either copied
 * into the output (binary input), recoded to `0`/`1`/`2`/`-` (biallelic
 * nucleotide sites), or counted under one exclusion category and dropped.
 */

import { RecodingError } from "../errors";
import type { Alignment, ExclusionCategory, RecodedMatrix, SiteFormat } from "../types";
import { createTally, matrixFromColumns } from "../types";
import {
  type Base,
  expandSymbol,
  GAP,
  isAmbiguityCode,
  isMissing,
  isTernarySymbol,
  substitutionClass,
} from "./core/alphabet";
import type { RandomSource } from "./core/sampling";
import type { AlleleBalance, RecodeOptions, RecodeResult, SiteMode } from "./types";

/** Expected share of `0` among homozygous calls in binary input */
export const BALANCE_GOAL = 0.5;
/** Allowed distance from {@link BALANCE_GOAL} before warning */
export const BALANCE_TOLERANCE = 0.01;

/**
 * Count `0` and `2` calls across a matrix and test their balance
 */
export function alleleBalance(matrix: RecodedMatrix): AlleleBalance {
  let zeros = 0;
  let twos = 0;
  for (const row of matrix.rows) {
    for (const symbol of row) {
      if (symbol === "0") zeros++;
      else if (symbol === "2") twos++;
    }
  }

  const total = zeros + twos;
  const proportion = total === 0 ? Number.NaN : zeros / total;
  const deviates = total > 0 && Math.abs(proportion - BALANCE_GOAL) > BALANCE_TOLERANCE;
  return { zeros, twos, proportion, deviates };
}

/**
 * Recoder for one alignment
 *
 * @example
 * ```typescript
 * const recoder = new SiteRecoder({ mode: "transversions", random: () => 0 });
 * const { matrix, tally } = recoder.recode(alignment, "nucleotide");
 * ```
 */
export class SiteRecoder {
  private readonly mode: SiteMode;
  private readonly random: RandomSource;

  constructor(options: RecodeOptions = {}) {
    this.mode = options.mode ?? "all";
    this.random = options.random ?? Math.random;
  }

  /**
   * Recode every column of the alignment
   *
   * @throws {RecodingError} On a symbol outside the alignment's alphabet
   */
  recode(alignment: Alignment, format: SiteFormat): RecodeResult {
    const buffers: string[][] = alignment.samples.map(() => []);
    const tally: Record<ExclusionCategory, number> = { ...createTally() };
    const sequences = alignment.samples.map((sample) => sample.sequence);

    for (let position = 0; position < alignment.length; position++) {
      const column = sequences.map((sequence) => sequence.charAt(position));
      const outcome =
        format === "binary" ? this.recodeBinaryColumn(column) : this.recodeNucleotideColumn(column, position);

      if (typeof outcome === "string") {
        tally[outcome]++;
      } else {
        outcome.forEach((symbol, index) => buffers[index]?.push(symbol));
      }
    }

    const matrix = matrixFromColumns(
      alignment.samples.map((sample) => sample.id),
      buffers
    );
    return {
      matrix,
      tally,
      ...(format === "binary" ? { balance: alleleBalance(matrix) } : {}),
    };
  }

  /**
   * Binary columns with two or three distinct states pass through unchanged
   */
  private recodeBinaryColumn(column: readonly string[]): readonly string[] | ExclusionCategory {
    const states = new Set(column.filter(isTernarySymbol));
    if (states.size === 0) return "missing";
    if (states.size === 1) return "monomorphic";
    return column;
  }

  private recodeNucleotideColumn(
    column: readonly string[],
    position: number
  ): readonly string[] | ExclusionCategory {
    const bases = new Set<Base>();
    for (const symbol of column) {
      const expanded = expandSymbol(symbol);
      if (expanded === undefined) {
        throw new RecodingError(`Found unexpected base ${symbol}`, position + 1);
      }
      for (const base of expanded) bases.add(base);
    }

    switch (bases.size) {
      case 0:
        return "missing";
      case 1:
        return "monomorphic";
      case 3:
        return "triAllelic";
      case 4:
        return "tetraAllelic";
      case 2:
        return this.recodeBiallelicColumn(column, [...bases].sort(), position);
      default:
        throw new RecodingError(`Found unexpected number of alleles (${bases.size})`, position + 1);
    }
  }

  private recodeBiallelicColumn(
    column: readonly string[],
    pair: readonly Base[],
    position: number
  ): readonly string[] | ExclusionCategory {
    const [first, second] = pair;
    if (first === undefined || second === undefined) {
      throw new RecodingError("Expected two distinct bases", position + 1);
    }

    const substitution = substitutionClass(first, second);
    if (substitution === undefined) {
      throw new RecodingError(`Unexpected combination of bases ${first} and ${second}`, position + 1);
    }
    if (this.mode === "transversions" && substitution === "transition") return "excludedTransition";
    if (this.mode === "transitions" && substitution === "transversion") return "excludedTransversion";

    // Which base is "0" carries no meaning, so it is drawn per site
    const [zero, two]: readonly [Base, Base] = this.random() < 0.5 ? [first, second] : [second, first];

    return column.map((symbol) => {
      if (symbol === zero) return "0";
      if (symbol === two) return "2";
      if (isMissing(symbol)) return GAP;
      if (isAmbiguityCode(symbol)) return "1";
      throw new RecodingError(`Found unexpected base ${symbol}`, position + 1);
    });
  }
}

/**
 * Recode an alignment with a one-off {@link SiteRecoder}
 */
export function recodeSites(
  alignment: Alignment,
  format: SiteFormat,
  options: RecodeOptions = {}
): RecodeResult {
  return new SiteRecoder(options).recode(alignment, format);
}
