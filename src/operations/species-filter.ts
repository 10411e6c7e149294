/**
 * Species-completeness filter
 *
 * SNAPP cannot use a site at which some species has no call at all. Such
 * columns are removed for every specimen.
 */

import type { SpeciesMapping } from "../formats/species-table";
import type { RecodedMatrix } from "../types";
import { columnAt, selectColumns } from "../types";
import { isTernarySymbol } from "./core/alphabet";

export interface SpeciesFilterResult {
  readonly matrix: RecodedMatrix;
  /** Columns dropped because a species had only missing data */
  readonly speciesIncomplete: number;
}

/**
 * Drop every column where at least one species has no informative call
 *
 * A call is informative when it is `0`, `1` or `2`. The gap, `?` and `N`
 * are all missing, so a binary column whose only values for some species
 * are `?` or `N` is dropped, not just one where that species has only gaps.
 * A species with no specimen in the matrix never has a call, so it drops
 * every column.
 *
 * @example
 * ```typescript
 * const { matrix, speciesIncomplete } = filterSpeciesCompleteness(recoded, mapping);
 * ```
 */
export function filterSpeciesCompleteness(
  matrix: RecodedMatrix,
  mapping: SpeciesMapping
): SpeciesFilterResult {
  const rowsBySpecies = mapping.species().map((species) => {
    const members = new Set(mapping.specimensOf(species));
    return matrix.specimenIds.flatMap((specimen, row) => (members.has(specimen) ? [row] : []));
  });

  const kept: number[] = [];
  for (let position = 0; position < matrix.length; position++) {
    const column = columnAt(matrix, position);
    const complete = rowsBySpecies.every((rows) =>
      rows.some((row) => isTernarySymbol(column[row] ?? ""))
    );
    if (complete) {
      kept.push(position);
    }
  }

  return {
    matrix: selectColumns(matrix, kept),
    speciesIncomplete: matrix.length - kept.length,
  };
}
