/**
 * snapp-matrix - SNP matrices for SNAPP
 *
 * Converts a PHYLIP alignment or VCF genotype table plus a species table into
 * a ternary NEXUS matrix, excluding sites SNAPP cannot use and reporting why.
 */

// Compression infrastructure
export {
  CompressionDetector,
  type CompressionFormat,
  CompressionService,
  type CompressionServiceShape,
} from "./compression";
// Error types
export {
  AlphabetError,
  ConfigurationError,
  ERROR_SUGGESTIONS,
  FileError,
  GenotypeCombinationError,
  getErrorSuggestion,
  ParseError,
  PhylipParseError,
  RecodingError,
  SequenceLengthError,
  SnappMatrixError,
  SpeciesTableError,
  SpecimenMismatchError,
  ValidationError,
  VcfParseError,
} from "./errors";
// Input and output formats
export { AbstractParser } from "./formats/abstract-parser";
export { buildAlignment, specimenIds } from "./formats/alignment";
export { alignmentParser, type InputSource, normalizeInput, normalizeText } from "./formats/input";
export { type MatrixProvenance, NexusWriter, type NexusWriterOptions, rowLabel } from "./formats/nexus";
export { PhylipParser, type PhylipParserOptions } from "./formats/phylip";
export {
  assertSameSpecimens,
  isHeaderRow,
  SpeciesMapping,
  SpeciesTableParser,
} from "./formats/species-table";
export {
  type AlleleClass,
  classifyAlleles,
  type GenotypeCall,
  parseGenotype,
  VcfParser,
  type VcfParserOptions,
} from "./formats/vcf";
// File I/O
export { exists, readToString } from "./io/file-reader";
export { writeString } from "./io/file-writer";
// Conversion stages
export { capSites } from "./operations/cap";
export { classifyAlignment } from "./operations/classify";
export {
  type AmbiguityCode,
  type Base,
  expandSymbol,
  GAP,
  genotypeSymbol,
  isAmbiguityCode,
  isMissing,
  isNucleotideSymbol,
  isTernarySymbol,
  type SubstitutionClass,
  substitutionClass,
} from "./operations/core/alphabet";
export {
  createRandomSources,
  createSeededRandom,
  RandomSampler,
  type RandomSource,
  type RandomSources,
} from "./operations/core/sampling";
export { buildDiagnostics } from "./operations/diagnostics";
export {
  type ConversionSettings,
  convertAlignment,
  DEFAULT_OUTPUT,
  DEFAULT_TABLE,
  type ResolvedOptions,
  resolveOptions,
  runConversion,
} from "./operations/pipeline";
export { alleleBalance, BALANCE_GOAL, BALANCE_TOLERANCE, recodeSites, SiteRecoder } from "./operations/recode";
export { filterSpeciesCompleteness, type SpeciesFilterResult } from "./operations/species-filter";
export type {
  AlleleBalance,
  CapResult,
  ConversionOptions,
  ConversionResult,
  Diagnostics,
  DiagnosticsInput,
  RecodeOptions,
  RecodeResult,
  SiteMode,
} from "./operations/types";
// Core types
export {
  type Alignment,
  columnAt,
  createTally,
  EXCLUSION_CATEGORIES,
  type ExclusionCategory,
  type ExclusionTally,
  type InputFormat,
  matrixFromColumns,
  mergeTallies,
  type ParserOptions,
  type RecodedMatrix,
  type Sample,
  type SiteFormat,
  type SpeciesEntry,
  selectColumns,
  totalExcluded,
} from "./types";
