/**
 * Alignment alphabet classification
 */

import { AlphabetError } from "../errors";
import type { Alignment, SiteFormat } from "../types";
import { isMissing, isNucleotideSymbol, isTernarySymbol } from "./core/alphabet";

/**
 * Decide whether an alignment is already binary-coded or holds nucleotides
 *
 * Missing markers are ignored. The binary test comes first, so an alignment
 * with nothing but missing data is binary. A known format (VCF input) is
 * returned without scanning.
 *
 * @throws {AlphabetError} When the symbols fit neither alphabet
 *
 * @example
 * ```typescript
 * classifyAlignment(new PhylipParser().parseString("2 2\na 02\nb 1-\n")); // "binary"
 * ```
 */
export function classifyAlignment(alignment: Alignment): SiteFormat {
  if (alignment.format !== undefined) {
    return alignment.format;
  }

  const symbols = new Set<string>();
  for (const sample of alignment.samples) {
    for (const symbol of sample.sequence) {
      if (!isMissing(symbol)) {
        symbols.add(symbol);
      }
    }
  }

  const present = [...symbols];
  if (present.every(isTernarySymbol)) {
    return "binary";
  }
  if (present.every(isNucleotideSymbol)) {
    return "nucleotide";
  }

  const unexpected = present.filter((symbol) => !isTernarySymbol(symbol) && !isNucleotideSymbol(symbol));
  throw new AlphabetError(unexpected.length > 0 ? unexpected : present);
}
