/**
 * Input dispatch: PHYLIP and VCF both normalize to an {@link Alignment}
 */

import type { Alignment, InputFormat, ParserOptions } from "../types";
import type { AbstractParser } from "./abstract-parser";
import { PhylipParser } from "./phylip";
import { VcfParser } from "./vcf";

/**
 * An input file in one of the supported formats
 */
export type InputSource =
  | { readonly format: "phylip"; readonly path: string }
  | { readonly format: "vcf"; readonly path: string };

/**
 * Parser producing an alignment for the given input format
 */
export function alignmentParser(
  format: InputFormat,
  options: ParserOptions = {}
): AbstractParser<Alignment> {
  switch (format) {
    case "phylip":
      return new PhylipParser(options);
    case "vcf":
      return new VcfParser(options);
  }
}

/**
 * Read an input file into an alignment
 */
export async function normalizeInput(
  source: InputSource,
  options: ParserOptions = {}
): Promise<Alignment> {
  return alignmentParser(source.format, options).parseFile(source.path);
}

/**
 * Normalize already-loaded input text
 */
export function normalizeText(
  format: InputFormat,
  text: string,
  options: ParserOptions = {}
): Alignment {
  return alignmentParser(format, options).parseString(text);
}
