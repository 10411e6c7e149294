/**
 * Conversion pipeline
 *
 * Runs the stages strictly forward:
 *
 * ```
 * normalize → classify → recode → species filter → cap → diagnostics → NEXUS
 * ```
 *
 * Each stage returns its own counts; the pipeline merges them into one tally.
 */

import { type } from "arktype";
import { ConfigurationError } from "../errors";
import { specimenIds } from "../formats/alignment";
import { type InputSource, normalizeInput } from "../formats/input";
import { NexusWriter } from "../formats/nexus";
import { assertSameSpecimens, type SpeciesMapping, SpeciesTableParser } from "../formats/species-table";
import type { Alignment, ParserOptions } from "../types";
import { createTally, mergeTallies } from "../types";
import { capSites } from "./cap";
import { classifyAlignment } from "./classify";
import { createRandomSources, type RandomSources } from "./core/sampling";
import { buildDiagnostics } from "./diagnostics";
import { recodeSites } from "./recode";
import { filterSpeciesCompleteness } from "./species-filter";
import type { ConversionOptions, ConversionResult, SiteMode } from "./types";

export const DEFAULT_TABLE = "example.spc.txt";
export const DEFAULT_OUTPUT = "snapp.nex";

/**
 * ArkType schema for ConversionOptions validation
 */
const ConversionOptionsSchema = type({
  "phylip?": "string > 0",
  "vcf?": "string > 0",
  "table?": "string > 0",
  "maxSites?": "number.integer > 0",
  "transversions?": "boolean",
  "transitions?": "boolean",
  "output?": "string > 0",
  "annotate?": "boolean",
  "seed?": "number.integer",
}).narrow((options, ctx) => {
  const hasPhylip = options.phylip !== undefined;
  const hasVcf = options.vcf !== undefined;

  if (!hasPhylip && !hasVcf) {
    return ctx.reject({
      expected: "an input file in either phylip or vcf format",
      actual: "neither",
      path: ["phylip"],
    });
  }
  if (hasPhylip && hasVcf) {
    return ctx.reject({
      expected: "only one of phylip and vcf",
      actual: "both",
      path: ["vcf"],
    });
  }
  if (options.transversions === true && options.transitions === true) {
    return ctx.reject({
      expected: "only one of transversions and transitions",
      actual: "both",
      path: ["transitions"],
    });
  }

  return true;
});

/**
 * Validated options with defaults applied
 */
export interface ResolvedOptions {
  readonly input: InputSource;
  readonly table: string;
  readonly output: string;
  readonly mode: SiteMode;
  readonly maxSites?: number;
  readonly annotate: boolean;
  readonly seed?: number;
}

/**
 * Validate conversion options and apply defaults
 *
 * @throws {ConfigurationError} On missing or conflicting options
 */
export function resolveOptions(options: ConversionOptions): ResolvedOptions {
  const validationResult = ConversionOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ConfigurationError(`Invalid conversion options: ${validationResult.summary}`);
  }

  const input: InputSource =
    validationResult.phylip !== undefined
      ? { format: "phylip", path: validationResult.phylip }
      : { format: "vcf", path: validationResult.vcf ?? "" };

  const mode: SiteMode = validationResult.transversions
    ? "transversions"
    : validationResult.transitions
      ? "transitions"
      : "all";

  return {
    input,
    table: validationResult.table ?? DEFAULT_TABLE,
    output: validationResult.output ?? DEFAULT_OUTPUT,
    mode,
    annotate: validationResult.annotate ?? true,
    ...(validationResult.maxSites !== undefined ? { maxSites: validationResult.maxSites } : {}),
    ...(validationResult.seed !== undefined ? { seed: validationResult.seed } : {}),
  };
}

/**
 * Settings for the in-memory conversion
 */
export interface ConversionSettings {
  mode?: SiteMode;
  maxSites?: number;
  random?: RandomSources;
}

/**
 * Convert a normalized alignment into a SNAPP matrix
 *
 * Synchronous and free of I/O; the only randomness comes from `settings.random`.
 *
 * @throws {SpecimenMismatchError} When table and alignment specimens differ
 * @throws {AlphabetError} When the alignment alphabet is not recognized
 * @throws {RecodingError} On an unexpected symbol while recoding
 *
 * @example
 * ```typescript
 * const result = convertAlignment(alignment, mapping, { mode: "all", random: createRandomSources(42) });
 * console.log(result.diagnostics.info);
 * ```
 */
export function convertAlignment(
  alignment: Alignment,
  mapping: SpeciesMapping,
  settings: ConversionSettings = {}
): ConversionResult {
  const mode = settings.mode ?? "all";
  const random = settings.random ?? createRandomSources();

  assertSameSpecimens(mapping, specimenIds(alignment));

  const format = classifyAlignment(alignment);
  const recoded = recodeSites(alignment, format, { mode, random: random.polarity });
  const filtered = filterSpeciesCompleteness(recoded.matrix, mapping);
  const capped = capSites(filtered.matrix, settings.maxSites, random.cap);

  const tally = mergeTallies(
    alignment.tally,
    recoded.tally,
    createTally({ speciesIncomplete: filtered.speciesIncomplete, overCap: capped.overCap })
  );

  const diagnostics = buildDiagnostics({
    tally,
    halfCalledSites: alignment.halfCalledSites,
    mode,
    cap: capped,
    retainedSites: capped.matrix.length,
    ...(recoded.balance !== undefined ? { balance: recoded.balance } : {}),
    ...(settings.maxSites !== undefined ? { maxSites: settings.maxSites } : {}),
  });

  return {
    format,
    matrix: capped.matrix,
    tally,
    halfCalledSites: alignment.halfCalledSites,
    inputColumns: alignment.length,
    diagnostics,
    ...(recoded.balance !== undefined ? { balance: recoded.balance } : {}),
  };
}

/**
 * Read the inputs, convert them and write the NEXUS file
 *
 * @throws {ConfigurationError} On invalid options
 * @throws {FileError} When an input cannot be read or the output cannot be written
 */
export async function runConversion(
  options: ConversionOptions,
  parserOptions: ParserOptions = {}
): Promise<ConversionResult & { readonly options: ResolvedOptions }> {
  const resolved = resolveOptions(options);

  const alignment = await normalizeInput(resolved.input, parserOptions);
  const mapping = await new SpeciesTableParser(parserOptions).parseFile(resolved.table);

  const result = convertAlignment(alignment, mapping, {
    mode: resolved.mode,
    random: createRandomSources(resolved.seed),
    ...(resolved.maxSites !== undefined ? { maxSites: resolved.maxSites } : {}),
  });

  await new NexusWriter({ annotate: resolved.annotate }).writeFile(resolved.output, result.matrix, mapping, {
    sourcePath: resolved.input.path,
    format: result.format,
  });

  return { ...result, options: resolved };
}
