/**
 * PHYLIP alignment parser
 *
 * Reads the sequential, single-line-per-specimen layout SNP pipelines emit:
 *
 * ```
 * 3 8
 * spec_a  ACGTRACG
 * spec_b  ACGTAACG
 * spec_c  AYGTGACN
 * ```
 *
 * The first line is the `ntax nchar` count line and is not needed to parse
 * the rest; a count that disagrees with the data is reported as a warning.
 */

import { type } from "arktype";
import { PhylipParseError, ValidationError } from "../errors";
import type { Alignment, ParserOptions, Sample } from "../types";
import { SampleSchema } from "../types";
import { AbstractParser, splitLines, tokenize } from "./abstract-parser";
import { buildAlignment } from "./alignment";

/**
 * PHYLIP-specific parser options
 */
export interface PhylipParserOptions extends ParserOptions {}

/**
 * Parser for PHYLIP SNP alignments
 *
 * @example
 * ```typescript
 * const alignment = new PhylipParser().parseString("2 3\nsp1 ACG\nsp2 ACT\n");
 * alignment.samples.map((s) => s.id); // ["sp1", "sp2"]
 * ```
 */
export class PhylipParser extends AbstractParser<Alignment, PhylipParserOptions> {
  constructor(options: PhylipParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "PHYLIP";
  }

  /**
   * Parse a PHYLIP file's contents
   *
   * @throws {PhylipParseError} When a data line has no sequence or no data lines exist
   * @throws {SequenceLengthError} When sequences differ in length
   */
  parseString(data: string): Alignment {
    const lines = splitLines(data);
    const samples: Sample[] = [];

    for (let index = 1; index < lines.length; index++) {
      const lineNumber = index + 1;
      const tokens = tokenize(lines[index] ?? "");
      if (tokens.length === 0) continue;

      samples.push(this.parseDataLine(tokens, lineNumber));
    }

    if (samples.length === 0) {
      throw new PhylipParseError("No sequences found after the header line");
    }

    const alignment = buildAlignment("phylip", samples);
    this.checkHeader(tokenize(lines[0] ?? ""), alignment);
    return alignment;
  }

  private parseDataLine(tokens: readonly string[], lineNumber: number): Sample {
    const [id, sequence] = tokens;
    if (id === undefined || sequence === undefined) {
      throw new PhylipParseError(
        "Expected a specimen id followed by a sequence",
        lineNumber,
        tokens.join(" ")
      );
    }
    if (tokens.length > 2) {
      this.warn(`Ignoring ${tokens.length - 2} extra field(s) after the sequence of ${id}`, lineNumber);
    }

    const sample: Sample = { id, sequence: sequence.toUpperCase(), lineNumber };
    if (!this.options.skipValidation) {
      const validation = SampleSchema(sample);
      if (validation instanceof type.errors) {
        throw new ValidationError(`Invalid PHYLIP record: ${validation.summary}`, lineNumber);
      }
    }
    return sample;
  }

  /**
   * Compare an `ntax nchar` header with the parsed data
   */
  private checkHeader(header: readonly string[], alignment: Alignment): void {
    const [taxa, characters] = header.map(Number);
    if (header.length !== 2 || taxa === undefined || characters === undefined) return;
    if (!Number.isInteger(taxa) || !Number.isInteger(characters)) return;

    if (taxa !== alignment.samples.length || characters !== alignment.length) {
      this.warn(
        `Header declares ${taxa} specimens and ${characters} sites, found ${alignment.samples.length} and ${alignment.length}`,
        1
      );
    }
  }
}
