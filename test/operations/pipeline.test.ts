/**
 * Tests for the conversion pipeline
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as fc from "fast-check";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ConfigurationError, FileError, SpecimenMismatchError } from "../../src/errors";
import { PhylipParser } from "../../src/formats/phylip";
import { SpeciesMapping, SpeciesTableParser } from "../../src/formats/species-table";
import { createRandomSources } from "../../src/operations/core/sampling";
import {
  convertAlignment,
  DEFAULT_OUTPUT,
  DEFAULT_TABLE,
  resolveOptions,
  runConversion,
} from "../../src/operations/pipeline";
import { totalExcluded } from "../../src/types";

const TABLE = "species specimen\ns1 a\ns1 b\ns2 c\n";
const mapping = new SpeciesTableParser().parseString(TABLE);

function phylip(text: string) {
  return new PhylipParser({ onWarning: () => {} }).parseString(text);
}

describe("resolveOptions", () => {
  test("requires an input file", () => {
    expect(() => resolveOptions({})).toThrow(ConfigurationError);
    expect(() => resolveOptions({})).toThrow(/^Invalid conversion options: /);
  });

  test("rejects both input formats", () => {
    expect(() => resolveOptions({ phylip: "in.phy", vcf: "in.vcf" })).toThrow(ConfigurationError);
  });

  test("rejects both substitution filters", () => {
    expect(() => resolveOptions({ phylip: "in.phy", transversions: true, transitions: true })).toThrow(
      ConfigurationError
    );
  });

  test("rejects a cap that is not a positive integer", () => {
    expect(() => resolveOptions({ phylip: "in.phy", maxSites: 0 })).toThrow(ConfigurationError);
    expect(() => resolveOptions({ phylip: "in.phy", maxSites: 2.5 })).toThrow(ConfigurationError);
    expect(() => resolveOptions({ phylip: "in.phy", maxSites: Number.NaN })).toThrow(ConfigurationError);
  });

  test("applies defaults", () => {
    expect(resolveOptions({ vcf: "calls.vcf" })).toEqual({
      input: { format: "vcf", path: "calls.vcf" },
      table: DEFAULT_TABLE,
      output: DEFAULT_OUTPUT,
      mode: "all",
      annotate: true,
    });
  });

  test("keeps given values", () => {
    expect(
      resolveOptions({
        phylip: "in.phy",
        table: "sp.txt",
        output: "out.nex",
        transitions: true,
        maxSites: 100,
        annotate: false,
        seed: 5,
      })
    ).toEqual({
      input: { format: "phylip", path: "in.phy" },
      table: "sp.txt",
      output: "out.nex",
      mode: "transitions",
      maxSites: 100,
      annotate: false,
      seed: 5,
    });
  });

  test("transversions flag selects transversion mode", () => {
    expect(resolveOptions({ phylip: "in.phy", transversions: true }).mode).toBe("transversions");
  });
});

describe("convertAlignment", () => {
  test("monomorphic and tri-allelic sites leave an empty matrix", () => {
    const result = convertAlignment(phylip("3 4\na ACGT\nb ACGA\nc ACGC\n"), mapping, {
      random: createRandomSources(1),
    });

    expect(result.format).toBe("nucleotide");
    expect(result.matrix.length).toBe(0);
    expect(result.tally.monomorphic).toBe(3);
    expect(result.tally.triAllelic).toBe(1);
    expect(result.inputColumns).toBe(4);
    expect(result.diagnostics.info).toBe("INFO: Retained 0 bi-allelic sites.");
  });

  test("drops sites where a species has no call", () => {
    const result = convertAlignment(phylip("3 4\na AGAN\nb GGCN\nc N?AA\n"), mapping, {
      random: createRandomSources(1),
    });

    expect(result.tally.monomorphic).toBe(2);
    expect(result.tally.speciesIncomplete).toBe(1);
    expect(result.matrix.length).toBe(1);

    const [a, b, c] = result.matrix.rows;
    expect(a).toBe(c);
    expect([a, b].sort()).toEqual(["0", "2"]);
    expect(result.diagnostics.warnings).toEqual([
      "WARNING: Excluded 1 site with only missing data in one or more species.",
      "WARNING: Excluded 2 monomorphic sites.",
    ]);
  });

  test("binary columns where a species has only ? are dropped", () => {
    const result = convertAlignment(phylip("3 2\na 02\nb 20\nc ??\n"), mapping, {
      random: createRandomSources(1),
    });

    expect(result.format).toBe("binary");
    expect(result.tally.speciesIncomplete).toBe(2);
    expect(result.matrix.length).toBe(0);
  });

  test("binary input passes through and is capped", () => {
    const result = convertAlignment(phylip("3 6\na 012012\nb 120120\nc 201201\n"), mapping, {
      maxSites: 2,
      random: createRandomSources(9),
    });

    expect(result.format).toBe("binary");
    expect(result.matrix.length).toBe(2);
    expect(result.tally.overCap).toBe(4);
    expect(result.balance).toEqual({ zeros: 6, twos: 6, proportion: 0.5, deviates: false });
    expect(result.diagnostics.info).toBe(
      "INFO: Removed 4 bi-allelic sites due to specified maximum number of 2 sites."
    );
  });

  test("same seed gives the same matrix", () => {
    const alignment = phylip("3 5\na ACAGT\nb CAGAT\nc AAGGC\n");
    const first = convertAlignment(alignment, mapping, { maxSites: 2, random: createRandomSources(42) });
    const second = convertAlignment(alignment, mapping, { maxSites: 2, random: createRandomSources(42) });

    expect(first.matrix).toEqual(second.matrix);
  });

  test("specimens must match the table", () => {
    const partial = new SpeciesMapping([
      { species: "s1", specimen: "a" },
      { species: "s1", specimen: "b" },
    ]);
    expect(() => convertAlignment(phylip("3 2\na AG\nb GA\nc AA\n"), partial)).toThrow(SpecimenMismatchError);
  });

  test("every input column is retained or counted once", () => {
    const symbol = fc.constantFrom("A", "C", "G", "T", "R", "Y", "K", "M", "S", "W", "N", "-", "?");
    const row = fc.stringOf(symbol, { minLength: 10, maxLength: 10 });

    fc.assert(
      fc.property(
        fc.tuple(row, row, row),
        fc.constantFrom("all" as const, "transversions" as const, "transitions" as const),
        fc.option(fc.integer({ min: 1, max: 12 }), { nil: undefined }),
        fc.integer(),
        ([a, b, c], mode, maxSites, seed) => {
          const alignment = phylip(`3 10\na ${a}\nb ${b}\nc ${c}\n`);
          const result = convertAlignment(alignment, mapping, {
            mode,
            random: createRandomSources(seed),
            ...(maxSites !== undefined ? { maxSites } : {}),
          });

          expect(totalExcluded(result.tally) + result.matrix.length).toBe(result.inputColumns);
          expect(result.matrix.rows.every((output) => /^[012\-?N]*$/.test(output))).toBe(true);
        }
      )
    );
  });
});

describe("runConversion", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "snapp-matrix-run-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("converts a PHYLIP file and writes NEXUS", async () => {
    const input = join(dir, "in.phy");
    const table = join(dir, "species.txt");
    const output = join(dir, "out.nex");
    writeFileSync(input, "3 4\na AGAN\nb GGCN\nc N?AA\n");
    writeFileSync(table, TABLE);

    const result = await runConversion({ phylip: input, table, output, seed: 3 }, { onWarning: () => {} });

    expect(result.options.output).toBe(output);
    expect(result.matrix.length).toBe(1);

    const lines = readFileSync(output, "utf8").split("\n");
    expect(lines.slice(0, 6)).toEqual([
      "#NEXUS",
      "",
      "",
      `[The SNP data matrix, converted to binary format from file ${input}.]`,
      "",
      "Begin data;",
    ]);
    expect(lines[6]).toBe("\tDimensions ntax=3 nchar=1;");
    expect(lines[9]?.startsWith("a_s1\t")).toBe(true);
    expect(lines[10]?.startsWith("b_s1\t")).toBe(true);
    expect(lines[11]?.startsWith("c_s2\t")).toBe(true);
    expect(lines.slice(12)).toEqual(["\t;", "End;", ""]);
  });

  test("converts a VCF file without annotation", async () => {
    const input = join(dir, "calls.vcf");
    const table = join(dir, "species.txt");
    const output = join(dir, "out.nex");
    const header = ["#CHROM", "POS", "ID", "REF", "ALT", "QUAL", "FILTER", "INFO", "FORMAT", "a", "b", "c"];
    const records = [
      ["chr1", "1", ".", "A", "C", ".", ".", ".", "GT", "0/0", "0/1", "1/1"],
      ["chr1", "2", ".", "G", "T", ".", ".", ".", "GT", "0/0", "0/0", "./0"],
      ["chr1", "3", ".", "GA", "G", ".", ".", ".", "GT", "0/0", "0/0", "0/0"],
    ];
    writeFileSync(input, `${[header, ...records].map((fields) => fields.join("\t")).join("\n")}\n`);
    writeFileSync(table, TABLE);

    const result = await runConversion({ vcf: input, table, output, annotate: false, seed: 3 });

    expect(result.format).toBe("nucleotide");
    expect(result.matrix.length).toBe(1);
    expect(result.matrix.rows[1]).toBe("1");
    expect(result.tally.indel).toBe(1);
    expect(result.tally.monomorphic).toBe(1);
    expect(result.diagnostics.warnings).toEqual([
      "WARNING: Found 1 site with genotypes that were half missing. These genotypes were ignored.",
      "WARNING: Excluded 1 monomorphic site.",
      "WARNING: Excluded 1 indel site.",
    ]);
    expect(readFileSync(output, "utf8").split("\n").slice(0, 3)).toEqual(["#NEXUS", "", "Begin data;"]);
  });

  test("missing table file is a FileError", async () => {
    const input = join(dir, "in.phy");
    writeFileSync(input, "1 2\na 01\n");

    await expect(
      runConversion({ phylip: input, table: join(dir, "missing.txt"), output: join(dir, "out.nex") })
    ).rejects.toBeInstanceOf(FileError);
  });
});
