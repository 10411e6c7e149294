/**
 * Tests for the species-completeness filter
 */

import * as fc from "fast-check";
import { describe, expect, test } from "vitest";
import { SpeciesMapping } from "../../src/formats/species-table";
import { filterSpeciesCompleteness } from "../../src/operations/species-filter";
import type { RecodedMatrix } from "../../src/types";

const mapping = new SpeciesMapping([
  { species: "s1", specimen: "a" },
  { species: "s1", specimen: "b" },
  { species: "s2", specimen: "c" },
]);

describe("filterSpeciesCompleteness", () => {
  test("drops columns where a species has only missing data", () => {
    const matrix: RecodedMatrix = { specimenIds: ["a", "b", "c"], rows: ["0-2-", "-?1-", "2201"], length: 4 };

    const result = filterSpeciesCompleteness(matrix, mapping);

    expect(result.matrix.rows).toEqual(["02", "-1", "20"]);
    expect(result.matrix.length).toBe(2);
    expect(result.speciesIncomplete).toBe(2);
  });

  test("treats ? and N from binary input as missing", () => {
    const matrix: RecodedMatrix = { specimenIds: ["a", "b", "c"], rows: ["02", "20", "?N"], length: 2 };

    const result = filterSpeciesCompleteness(matrix, mapping);

    expect(result.matrix.length).toBe(0);
    expect(result.speciesIncomplete).toBe(2);
  });

  test("one informative specimen per species is enough", () => {
    const matrix: RecodedMatrix = { specimenIds: ["a", "b", "c"], rows: ["-", "1", "0"], length: 1 };
    expect(filterSpeciesCompleteness(matrix, mapping).speciesIncomplete).toBe(0);
  });

  test("a species without specimens in the matrix drops every column", () => {
    const withExtraSpecies = new SpeciesMapping([...mapping.entries, { species: "s3", specimen: "d" }]);
    const matrix: RecodedMatrix = { specimenIds: ["a", "b", "c"], rows: ["01", "21", "00"], length: 2 };

    const result = filterSpeciesCompleteness(matrix, withExtraSpecies);

    expect(result.matrix.length).toBe(0);
    expect(result.speciesIncomplete).toBe(2);
  });

  test("keeps row order and specimen ids", () => {
    const matrix: RecodedMatrix = { specimenIds: ["c", "a", "b"], rows: ["0", "1", "-"], length: 1 };
    const result = filterSpeciesCompleteness(matrix, mapping);

    expect(result.matrix.specimenIds).toEqual(["c", "a", "b"]);
    expect(result.matrix.rows).toEqual(["0", "1", "-"]);
  });

  test("is idempotent", () => {
    const row = fc.stringOf(fc.constantFrom("0", "1", "2", "-"), { minLength: 8, maxLength: 8 });

    fc.assert(
      fc.property(fc.tuple(row, row, row), (rows) => {
        const matrix: RecodedMatrix = { specimenIds: ["a", "b", "c"], rows, length: 8 };
        const once = filterSpeciesCompleteness(matrix, mapping);
        const twice = filterSpeciesCompleteness(once.matrix, mapping);

        expect(twice.matrix).toEqual(once.matrix);
        expect(twice.speciesIncomplete).toBe(0);
        expect(once.matrix.length + once.speciesIncomplete).toBe(8);
      })
    );
  });
});
