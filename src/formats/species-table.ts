/**
 * Species/specimen table parser
 *
 * Two whitespace-separated columns per line, species first:
 *
 * ```
 * species   specimen
 * sp_north  ind_01
 * sp_north  ind_02
 * sp_south  ind_03
 * ```
 *
 * The header row is optional.
 */

import { type } from "arktype";
import { SpecimenMismatchError, SpeciesTableError } from "../errors";
import type { ParserOptions, SpeciesEntry } from "../types";
import { SpeciesEntrySchema } from "../types";
import { AbstractParser, splitLines, tokenize } from "./abstract-parser";

const HEADER_SPECIMEN_LABELS = new Set(["specimen", "specimens", "sample", "samples"]);

/**
 * Mapping from specimens to the species they belong to
 */
export class SpeciesMapping {
  private readonly speciesBySpecimen = new Map<string, string>();
  private readonly specimensBySpecies = new Map<string, string[]>();

  constructor(readonly entries: readonly SpeciesEntry[]) {
    for (const { species, specimen } of entries) {
      this.speciesBySpecimen.set(specimen, species);
      const members = this.specimensBySpecies.get(species);
      if (members === undefined) {
        this.specimensBySpecies.set(species, [specimen]);
      } else {
        members.push(specimen);
      }
    }
  }

  /**
   * Species of a specimen, if the table lists it
   */
  speciesOf(specimen: string): string | undefined {
    return this.speciesBySpecimen.get(specimen);
  }

  /**
   * Distinct species in first-seen order
   */
  species(): string[] {
    return [...this.specimensBySpecies.keys()];
  }

  /**
   * Specimens listed for a species, in table order
   */
  specimensOf(species: string): readonly string[] {
    return this.specimensBySpecies.get(species) ?? [];
  }

  /**
   * Specimen identifiers in table order (duplicates kept)
   */
  specimens(): string[] {
    return this.entries.map((entry) => entry.specimen);
  }
}

/**
 * Whether the first two tokens of a line form the optional header row
 */
export function isHeaderRow(tokens: readonly string[]): boolean {
  const [first, second] = tokens;
  if (first === undefined || second === undefined) return false;
  return first.toLowerCase() === "species" && HEADER_SPECIMEN_LABELS.has(second.toLowerCase());
}

/**
 * Require the table and the sequence input to name the same specimens
 *
 * Compared as multisets: order is irrelevant, multiplicity is not.
 *
 * @throws {SpecimenMismatchError} Listing the identifiers found on one side only
 */
export function assertSameSpecimens(mapping: SpeciesMapping, inputSpecimens: readonly string[]): void {
  const remaining = new Map<string, number>();
  for (const specimen of mapping.specimens()) {
    remaining.set(specimen, (remaining.get(specimen) ?? 0) + 1);
  }

  const onlyInInput: string[] = [];
  for (const specimen of inputSpecimens) {
    const count = remaining.get(specimen) ?? 0;
    if (count === 0) {
      onlyInInput.push(specimen);
    } else {
      remaining.set(specimen, count - 1);
    }
  }

  const onlyInTable = [...remaining].flatMap(([specimen, count]) =>
    Array.from({ length: count }, () => specimen)
  );

  if (onlyInTable.length > 0 || onlyInInput.length > 0) {
    throw new SpecimenMismatchError(onlyInTable, onlyInInput);
  }
}

/**
 * Parser for species tables
 *
 * @example
 * ```typescript
 * const mapping = new SpeciesTableParser().parseString("species specimen\nsp1 a\nsp1 b\n");
 * mapping.specimensOf("sp1"); // ["a", "b"]
 * ```
 */
export class SpeciesTableParser extends AbstractParser<SpeciesMapping> {
  constructor(options: ParserOptions = {}) {
    super(options);
  }

  protected getFormatName(): string {
    return "Species table";
  }

  /**
   * @throws {SpeciesTableError} When a line has fewer than two fields
   */
  parseString(data: string): SpeciesMapping {
    const entries: SpeciesEntry[] = [];
    const seen = new Set<string>();

    splitLines(data).forEach((line, index) => {
      const lineNumber = index + 1;
      const tokens = tokenize(line);
      if (tokens.length === 0 || isHeaderRow(tokens)) return;

      const [species, specimen] = tokens;
      if (species === undefined || specimen === undefined) {
        throw new SpeciesTableError("Expected a species id followed by a specimen id", lineNumber, line.trim());
      }

      const entry: SpeciesEntry = { species, specimen };
      if (!this.options.skipValidation) {
        const validation = SpeciesEntrySchema(entry);
        if (validation instanceof type.errors) {
          throw new SpeciesTableError(`Invalid species table row: ${validation.summary}`, lineNumber);
        }
      }

      if (seen.has(specimen)) {
        this.warn(`Specimen ${specimen} is listed more than once`, lineNumber);
      }
      seen.add(specimen);
      entries.push(entry);
    });

    return new SpeciesMapping(entries);
  }
}
