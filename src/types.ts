/**
 * Core type definitions for SNP matrix conversion
 *
 * Inputs are normalized into an {@link Alignment}: one symbol string per
 * specimen, all of equal length. Each pipeline stage reads an alignment or a
 * {@link RecodedMatrix} and returns a new value plus the counts of what it
 * excluded; nothing is shared between stages except what they return.
 */

import { type } from "arktype";

// =============================================================================
// SAMPLES AND ALIGNMENTS
// =============================================================================

/**
 * One specimen and its symbols, one per site
 */
export interface Sample {
  /** Specimen identifier as written in the input */
  readonly id: string;
  /** Upper-cased symbols, one per alignment column */
  readonly sequence: string;
  /** Line the specimen was read from (PHYLIP only) */
  readonly lineNumber?: number;
}

/**
 * Alphabet of an alignment
 */
export type SiteFormat = "binary" | "nucleotide";

/**
 * Input file formats
 */
export type InputFormat = "phylip" | "vcf";

/**
 * Normalized input: equal-length symbol strings for every specimen
 */
export interface Alignment {
  readonly source: InputFormat;
  readonly samples: readonly Sample[];
  /** Number of columns (sites) */
  readonly length: number;
  /** Known alphabet; set for VCF input, left for the classifier otherwise */
  readonly format?: SiteFormat;
  /** Records excluded while normalizing (VCF indels and multi-allelic records) */
  readonly tally: ExclusionTally;
  /** VCF records with at least one half-called genotype */
  readonly halfCalledSites: number;
}

// =============================================================================
// EXCLUSION ACCOUNTING
// =============================================================================

/**
 * Reasons a site is excluded from the output
 */
export type ExclusionCategory =
  | "missing"
  | "monomorphic"
  | "triAllelic"
  | "tetraAllelic"
  | "indel"
  | "excludedTransition"
  | "excludedTransversion"
  | "speciesIncomplete"
  | "overCap";

export const EXCLUSION_CATEGORIES: readonly ExclusionCategory[] = [
  "missing",
  "monomorphic",
  "triAllelic",
  "tetraAllelic",
  "indel",
  "excludedTransition",
  "excludedTransversion",
  "speciesIncomplete",
  "overCap",
];

/**
 * Count of excluded sites per category
 */
export type ExclusionTally = Readonly<Record<ExclusionCategory, number>>;

/**
 * Empty tally, optionally seeded with some counts
 */
export function createTally(counts: Partial<Record<ExclusionCategory, number>> = {}): ExclusionTally {
  return {
    missing: 0,
    monomorphic: 0,
    triAllelic: 0,
    tetraAllelic: 0,
    indel: 0,
    excludedTransition: 0,
    excludedTransversion: 0,
    speciesIncomplete: 0,
    overCap: 0,
    ...counts,
  };
}

/**
 * Sum tallies category by category
 */
export function mergeTallies(...tallies: readonly ExclusionTally[]): ExclusionTally {
  const merged: Record<ExclusionCategory, number> = { ...createTally() };
  for (const tally of tallies) {
    for (const category of EXCLUSION_CATEGORIES) {
      merged[category] += tally[category];
    }
  }
  return merged;
}

/**
 * Total number of excluded sites in a tally
 */
export function totalExcluded(tally: ExclusionTally): number {
  return EXCLUSION_CATEGORIES.reduce((sum, category) => sum + tally[category], 0);
}

// =============================================================================
// RECODED MATRIX
// =============================================================================

/**
 * Ternary matrix: one row of `0`, `1`, `2` or gap per specimen
 *
 * Rows keep the specimen order of the input and always share one length.
 */
export interface RecodedMatrix {
  readonly specimenIds: readonly string[];
  readonly rows: readonly string[];
  /** Number of columns */
  readonly length: number;
}

/**
 * Build a matrix from per-specimen column buffers
 */
export function matrixFromColumns(
  specimenIds: readonly string[],
  buffers: readonly (readonly string[])[]
): RecodedMatrix {
  const rows = buffers.map((buffer) => buffer.join(""));
  return { specimenIds, rows, length: buffers[0]?.length ?? 0 };
}

/**
 * Symbols of every specimen at one column
 */
export function columnAt(matrix: RecodedMatrix, position: number): string[] {
  return matrix.rows.map((row) => row.charAt(position));
}

/**
 * Keep only the given columns, in the order given
 */
export function selectColumns(matrix: RecodedMatrix, positions: readonly number[]): RecodedMatrix {
  const rows = matrix.rows.map((row) => positions.map((position) => row.charAt(position)).join(""));
  return { specimenIds: matrix.specimenIds, rows, length: positions.length };
}

// =============================================================================
// SPECIES MAPPING
// =============================================================================

/**
 * One row of the species table
 */
export interface SpeciesEntry {
  readonly species: string;
  readonly specimen: string;
}

// =============================================================================
// PARSER OPTIONS
// =============================================================================

/**
 * Options shared by all input parsers
 */
export interface ParserOptions {
  /** Skip schema validation of parsed records */
  skipValidation?: boolean;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

/**
 * Identifier of a specimen or species: one whitespace-free token
 */
export const IdentifierSchema = type(/^\S+$/);

/**
 * Sample with a non-empty identifier
 */
export const SampleSchema = type({
  id: IdentifierSchema,
  sequence: "string",
  "lineNumber?": "number.integer > 0",
});

/**
 * Species table row
 */
export const SpeciesEntrySchema = type({
  species: IdentifierSchema,
  specimen: IdentifierSchema,
});
