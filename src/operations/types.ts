/**
 * Shared option types for the conversion stages
 */

import type { ExclusionTally, RecodedMatrix, SiteFormat } from "../types";
import type { RandomSource } from "./core/sampling";

/**
 * Which substitution classes to keep at biallelic nucleotide sites
 */
export type SiteMode = "all" | "transversions" | "transitions";

/**
 * Options for recoding sites
 */
export interface RecodeOptions {
  /** Substitution classes to keep (default "all") */
  mode?: SiteMode;

  /** Source for the per-site 0/2 polarity (default Math.random) */
  random?: RandomSource;
}

/**
 * Proportion of `0` among all `0` and `2` calls in a binary matrix
 */
export interface AlleleBalance {
  readonly zeros: number;
  readonly twos: number;
  /** zeros / (zeros + twos); NaN when both are zero */
  readonly proportion: number;
  /** Proportion is further than the tolerance from one half */
  readonly deviates: boolean;
}

/**
 * Output of the site recoder
 */
export interface RecodeResult {
  readonly matrix: RecodedMatrix;
  readonly tally: ExclusionTally;
  /** Only computed for binary input */
  readonly balance?: AlleleBalance;
}

/**
 * Output of the site cap
 */
export interface CapResult {
  readonly matrix: RecodedMatrix;
  /** Columns removed by the cap */
  readonly overCap: number;
  /** Cap was smaller than the surviving column count */
  readonly capApplied: boolean;
  /** Cap was set but not smaller than the surviving column count */
  readonly capExceedsAvailable: boolean;
}

/**
 * Everything the diagnostics need to report on a run
 */
export interface DiagnosticsInput {
  readonly tally: ExclusionTally;
  readonly halfCalledSites: number;
  readonly balance?: AlleleBalance;
  readonly mode: SiteMode;
  readonly maxSites?: number;
  readonly cap: Pick<CapResult, "overCap" | "capApplied" | "capExceedsAvailable">;
  readonly retainedSites: number;
}

/**
 * Human-readable report of a run
 */
export interface Diagnostics {
  /** One entry per warning, possibly spanning several lines */
  readonly warnings: readonly string[];
  readonly info: string;
}

/**
 * Options for a complete conversion, as given by the CLI
 */
export interface ConversionOptions {
  /** PHYLIP input path (exclusive with vcf) */
  phylip?: string;
  /** VCF input path (exclusive with phylip) */
  vcf?: string;
  /** Species/specimen table path (default "example.spc.txt") */
  table?: string;
  /** Keep at most this many sites */
  maxSites?: number;
  /** Keep transversion sites only */
  transversions?: boolean;
  /** Keep transition sites only */
  transitions?: boolean;
  /** Output NEXUS path (default "snapp.nex") */
  output?: string;
  /** Write the provenance comment (default true) */
  annotate?: boolean;
  /** Seed for reproducible polarity and site sampling */
  seed?: number;
}

/**
 * Result of a conversion
 */
export interface ConversionResult {
  readonly format: SiteFormat;
  readonly matrix: RecodedMatrix;
  /** Exclusions from every stage */
  readonly tally: ExclusionTally;
  readonly halfCalledSites: number;
  readonly balance?: AlleleBalance;
  /** Alignment columns before any filtering */
  readonly inputColumns: number;
  readonly diagnostics: Diagnostics;
}
