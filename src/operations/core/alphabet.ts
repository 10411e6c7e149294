/**
 * Symbol alphabets and lookup tables for SNP recoding
 *
 * Sites are read as one symbol per specimen. Symbols come from one of two
 * alphabets: nucleotides (four bases plus the six two-base IUPAC codes) or the
 * SNAPP ternary code. Both share the same missing-data markers.
 *
 * @module alphabet
 *
 * @example
 * ```typescript
 * expandSymbol("R");              // ["A", "G"]
 * genotypeSymbol("G", "A");       // "R"
 * substitutionClass("C", "T");    // "transition"
 * ```
 */

// =============================================================================
// CHARACTER-LEVEL ALPHABET DEFINITIONS
// =============================================================================

/**
 * Unambiguous nucleotide bases
 */
export type Base = "A" | "C" | "G" | "T";

/**
 * Two-base IUPAC ambiguity codes (heterozygous calls)
 */
export type AmbiguityCode = "R" | "Y" | "S" | "W" | "K" | "M";

/**
 * Markers for a missing call
 */
export type MissingSymbol = "-" | "?" | "N";

/**
 * SNAPP ternary alphabet
 */
export type TernarySymbol = "0" | "1" | "2";

/**
 * Either homozygous state or the heterozygous code
 */
export type NucleotideSymbol = Base | AmbiguityCode;

/**
 * Two bases in alphabetical order, e.g. "AG"
 */
export type BasePairKey = `${Base}${Base}`;

export type SubstitutionClass = "transition" | "transversion";

/** Gap marker written for missing calls in recoded output */
export const GAP = "-";

export const BASES: readonly Base[] = ["A", "C", "G", "T"];

export const MISSING_SYMBOLS: readonly MissingSymbol[] = ["-", "?", "N"];

export const TERNARY_SYMBOLS: readonly TernarySymbol[] = ["0", "1", "2"];

// =============================================================================
// LOOKUP TABLES
// =============================================================================

/**
 * Ambiguity code → its unordered base pair
 */
export const AMBIGUITY_PAIRS: Readonly<Record<AmbiguityCode, readonly [Base, Base]>> = {
  R: ["A", "G"],
  Y: ["C", "T"],
  S: ["C", "G"],
  W: ["A", "T"],
  K: ["G", "T"],
  M: ["A", "C"],
};

/**
 * Sorted base pair → genotype symbol (homozygous pairs give the plain base)
 */
export const PAIR_SYMBOLS: Readonly<Record<string, NucleotideSymbol>> = {
  AA: "A",
  AC: "M",
  AG: "R",
  AT: "W",
  CC: "C",
  CG: "S",
  CT: "Y",
  GG: "G",
  GT: "K",
  TT: "T",
};

/**
 * Sorted distinct base pair → substitution class
 *
 * Purine↔purine (A/G) and pyrimidine↔pyrimidine (C/T) are transitions.
 */
export const SUBSTITUTION_CLASSES: Readonly<Record<string, SubstitutionClass>> = {
  AC: "transversion",
  AG: "transition",
  AT: "transversion",
  CG: "transversion",
  CT: "transition",
  GT: "transversion",
};

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isBase(symbol: string): symbol is Base {
  return symbol === "A" || symbol === "C" || symbol === "G" || symbol === "T";
}

export function isAmbiguityCode(symbol: string): symbol is AmbiguityCode {
  return Object.hasOwn(AMBIGUITY_PAIRS, symbol);
}

export function isNucleotideSymbol(symbol: string): symbol is NucleotideSymbol {
  return isBase(symbol) || isAmbiguityCode(symbol);
}

export function isMissing(symbol: string): symbol is MissingSymbol {
  return symbol === "-" || symbol === "?" || symbol === "N";
}

export function isTernarySymbol(symbol: string): symbol is TernarySymbol {
  return symbol === "0" || symbol === "1" || symbol === "2";
}

// =============================================================================
// TABLE ACCESSORS
// =============================================================================

/**
 * Order-independent key for two bases
 */
export function pairKey(first: Base, second: Base): BasePairKey {
  return first <= second ? `${first}${second}` : `${second}${first}`;
}

/**
 * Bases carried by one symbol
 *
 * A plain base counts twice (homozygous), an ambiguity code contributes its
 * pair and a missing marker contributes nothing.
 *
 * @returns the bases, or `undefined` when the symbol is not a nucleotide or missing marker
 */
export function expandSymbol(symbol: string): readonly Base[] | undefined {
  if (isBase(symbol)) {
    return [symbol, symbol];
  }
  if (isAmbiguityCode(symbol)) {
    return AMBIGUITY_PAIRS[symbol];
  }
  if (isMissing(symbol)) {
    return [];
  }
  return undefined;
}

/**
 * Genotype symbol for an unordered pair of resolved alleles
 *
 * @returns the plain base or ambiguity code, or `undefined` for a pair with no code
 */
export function genotypeSymbol(first: string, second: string): NucleotideSymbol | undefined {
  const key = first <= second ? `${first}${second}` : `${second}${first}`;
  return PAIR_SYMBOLS[key];
}

/**
 * Transition/transversion status of two distinct bases
 */
export function substitutionClass(first: Base, second: Base): SubstitutionClass | undefined {
  return SUBSTITUTION_CLASSES[pairKey(first, second)];
}
