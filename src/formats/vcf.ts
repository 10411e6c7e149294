/**
 * VCF genotype parser
 *
 * Extracts biallelic SNPs from the minimal VCF subset SNP callers write:
 * `##` meta lines, one `#CHROM` header naming specimens from column 10, and
 * one record per variant with a `GT` subfield in each genotype column.
 *
 * Each biallelic record becomes one alignment column: a diploid genotype is
 * turned into a plain base (homozygous) or a two-base IUPAC code
 * (heterozygous). Indels and multi-allelic records are counted and skipped.
 */

import { GenotypeCombinationError, VcfParseError } from "../errors";
import { genotypeSymbol } from "../operations/core/alphabet";
import { createTally } from "../types";
import type { Alignment, ParserOptions, Sample } from "../types";
import { AbstractParser, splitLines, tokenize } from "./abstract-parser";
import { buildAlignment } from "./alignment";

/**
 * VCF-specific parser options
 */
export interface VcfParserOptions extends ParserOptions {}

/**
 * How a record's REF and ALT alleles are treated
 */
export type AlleleClass = "biallelic" | "indel" | "triAllelic" | "tetraAllelic";

/** Columns before the first genotype: CHROM POS ID REF ALT QUAL FILTER INFO FORMAT */
const FIXED_COLUMNS = 9;
const REF_COLUMN = 3;
const ALT_COLUMN = 4;
const FORMAT_COLUMN = 8;

/** Symbol written for a missing or half-missing genotype */
const MISSING_GENOTYPE = "N";

/**
 * Classify a record by its REF and ALT fields
 *
 * @returns the class, or `undefined` for an allele count with no class
 */
export function classifyAlleles(ref: string, alt: string): AlleleClass | undefined {
  if (ref.length === 1 && alt.length === 1) {
    return "biallelic";
  }
  if (ref.length > 1 && !ref.includes(",")) {
    return "indel";
  }
  if (alt.length > 1 && !alt.includes(",")) {
    return "indel";
  }

  const alleleCount = countOf(ref, ",") + countOf(alt, ",") + 2;
  if (alleleCount === 3) return "triAllelic";
  if (alleleCount === 4) return "tetraAllelic";
  return undefined;
}

function countOf(text: string, character: string): number {
  return text.split(character).length - 1;
}

/**
 * Parsed call of one specimen at one record
 */
export interface GenotypeCall {
  /** Plain base, IUPAC code or the missing marker */
  readonly symbol: string;
  /** Exactly one of the two alleles was missing */
  readonly halfCalled: boolean;
}

/**
 * Turn one `GT` value into a genotype symbol
 *
 * @param gt - Genotype such as `0/1`, `1|1` or `./.`
 * @throws {VcfParseError} On an unknown separator or allele index
 * @throws {GenotypeCombinationError} When the resolved alleles have no code
 */
export function parseGenotype(gt: string, ref: string, alt: string, lineNumber?: number): GenotypeCall {
  let separator: string;
  if (gt.includes("/")) {
    separator = "/";
  } else if (gt.includes("|")) {
    separator = "|";
  } else {
    throw new VcfParseError(
      "Expected alleles to be separated by '/' or '|' but did not find such separators",
      lineNumber,
      gt
    );
  }

  const [first = "", second = ""] = gt.split(separator);
  const firstBase = resolveAllele(first, ref, alt);
  const secondBase = resolveAllele(second, ref, alt);
  if (firstBase === undefined || secondBase === undefined) {
    throw new VcfParseError(
      `Expected genotypes to be bi-allelic and contain only 0s and/or 1s or missing data marked with '.', but found ${first} and ${second}`,
      lineNumber,
      gt
    );
  }

  if (firstBase === null || secondBase === null) {
    return { symbol: MISSING_GENOTYPE, halfCalled: firstBase !== secondBase };
  }

  const symbol = genotypeSymbol(firstBase, secondBase);
  if (symbol === undefined) {
    throw new GenotypeCombinationError(firstBase, secondBase, lineNumber);
  }
  return { symbol, halfCalled: false };
}

/**
 * Allele index to base: `null` for missing, `undefined` for an invalid index
 */
function resolveAllele(index: string, ref: string, alt: string): string | null | undefined {
  switch (index) {
    case "0":
      return ref;
    case "1":
      return alt;
    case ".":
      return null;
    default:
      return undefined;
  }
}

/**
 * Parser for VCF genotype tables
 *
 * @example
 * ```typescript
 * const alignment = new VcfParser().parseString(vcfText);
 * alignment.tally.indel;        // records skipped as indels
 * alignment.halfCalledSites;    // records with a half-missing genotype
 * ```
 */
export class VcfParser extends AbstractParser<Alignment, VcfParserOptions> {
  constructor(options: VcfParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "VCF";
  }

  /**
   * Parse a VCF file's contents into a nucleotide alignment
   *
   * @throws {VcfParseError} On a missing header, missing `GT`, malformed genotype or allele fields
   */
  parseString(data: string): Alignment {
    const lines = splitLines(data);
    let specimens: string[] | undefined;
    let buffers: string[][] = [];
    const excluded = { indel: 0, triAllelic: 0, tetraAllelic: 0 };
    let halfCalledSites = 0;

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index] ?? "";
      const lineNumber = index + 1;
      if (line.trim() === "" || line.startsWith("##")) continue;

      if (specimens === undefined) {
        if (!line.startsWith("#")) {
          throw new VcfParseError(
            "Expected a vcf header line beginning with '#CHROM' but could not find it",
            lineNumber
          );
        }
        specimens = tokenize(line).slice(FIXED_COLUMNS);
        buffers = specimens.map(() => []);
        continue;
      }

      if (line.startsWith("#")) {
        this.warn("Ignoring additional header line", lineNumber);
        continue;
      }

      const record = tokenize(line);
      if (record.length !== FIXED_COLUMNS + specimens.length) {
        throw new VcfParseError(
          `Expected ${FIXED_COLUMNS + specimens.length} columns but found ${record.length}`,
          lineNumber
        );
      }

      const ref = (record[REF_COLUMN] ?? "").toUpperCase();
      const alt = (record[ALT_COLUMN] ?? "").toUpperCase();
      const alleleClass = classifyAlleles(ref, alt);

      switch (alleleClass) {
        case "biallelic": {
          const calls = this.parseGenotypes(record, ref, alt, lineNumber);
          calls.forEach((call, specimen) => buffers[specimen]?.push(call.symbol));
          if (calls.some((call) => call.halfCalled)) {
            halfCalledSites++;
          }
          break;
        }
        case "indel":
        case "triAllelic":
        case "tetraAllelic":
          excluded[alleleClass]++;
          break;
        case undefined:
          throw new VcfParseError(
            `Unexpected combination of REF and ALT alleles (REF: ${ref}; ALT: ${alt})`,
            lineNumber
          );
      }
    }

    if (specimens === undefined) {
      throw new VcfParseError("Expected a vcf header line beginning with '#CHROM' but could not find it");
    }
    if (specimens.length === 0) {
      throw new VcfParseError("The vcf header line names no specimens");
    }

    const samples: Sample[] = specimens.map((id, specimen) => ({
      id,
      sequence: (buffers[specimen] ?? []).join(""),
    }));

    return buildAlignment("vcf", samples, {
      format: "nucleotide",
      tally: createTally(excluded),
      halfCalledSites,
    });
  }

  /**
   * Genotype calls of every specimen in one biallelic record
   */
  private parseGenotypes(
    record: readonly string[],
    ref: string,
    alt: string,
    lineNumber: number
  ): GenotypeCall[] {
    const format = record[FORMAT_COLUMN] ?? "";
    const gtIndex = format.split(":").indexOf("GT");
    if (gtIndex === -1) {
      throw new VcfParseError("Expected 'GT' in FORMAT field but could not find it", lineNumber, format);
    }

    return record.slice(FIXED_COLUMNS).map((field) => {
      const gt = field.split(":")[gtIndex];
      if (gt === undefined) {
        throw new VcfParseError("Genotype field has no GT value", lineNumber, field);
      }
      return parseGenotype(gt, ref, alt, lineNumber);
    });
  }
}
