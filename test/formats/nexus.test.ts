/**
 * Tests for NEXUS output
 */

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { NexusWriter, rowLabel } from "../../src/formats/nexus";
import { SpeciesMapping } from "../../src/formats/species-table";
import type { RecodedMatrix } from "../../src/types";

const mapping = new SpeciesMapping([
  { species: "sp_north", specimen: "ind_01" },
  { species: "sp_south", specimen: "ind_03" },
]);

const matrix: RecodedMatrix = {
  specimenIds: ["ind_01", "ind_03"],
  rows: ["0121", "2-10"],
  length: 4,
};

const BODY = [
  "Begin data;",
  "\tDimensions ntax=2 nchar=4;",
  "\tFormat datatype=integerdata symbols='012' gap=-;",
  "\tMatrix",
  "ind_01_sp_north\t0121",
  "ind_03_sp_south\t2-10",
  "\t;",
  "End;",
];

describe("rowLabel", () => {
  test("joins specimen and species with an underscore", () => {
    expect(rowLabel("ind_03", mapping)).toBe("ind_03_sp_south");
  });

  test("throws for an unmapped specimen", () => {
    expect(() => rowLabel("ind_99", mapping)).toThrow(ValidationError);
  });
});

describe("NexusWriter", () => {
  test("annotates binary input as taken from the source", () => {
    const text = new NexusWriter().format(matrix, mapping, { sourcePath: "in.phy", format: "binary" });

    expect(text).toBe(
      `${["#NEXUS", "", "", "[The SNP data matrix, taken from file in.phy.]", "", ...BODY].join("\n")}\n`
    );
  });

  test("annotates nucleotide input as converted", () => {
    const text = new NexusWriter().format(matrix, mapping, { sourcePath: "calls.vcf", format: "nucleotide" });

    expect(text.split("\n")[3]).toBe("[The SNP data matrix, converted to binary format from file calls.vcf.]");
  });

  test("omits the comment when annotation is off", () => {
    const text = new NexusWriter({ annotate: false }).format(matrix, mapping, {
      sourcePath: "in.phy",
      format: "binary",
    });

    expect(text).toBe(`${["#NEXUS", "", ...BODY].join("\n")}\n`);
  });

  test("uses the configured line ending", () => {
    const text = new NexusWriter({ annotate: false, lineEnding: "\r\n" }).format(matrix, mapping, {
      sourcePath: "in.phy",
      format: "binary",
    });

    expect(text.startsWith("#NEXUS\r\n\r\nBegin data;\r\n")).toBe(true);
    expect(text.endsWith("End;\r\n")).toBe(true);
  });

  test("writes an empty matrix with nchar=0", () => {
    const empty: RecodedMatrix = { specimenIds: ["ind_01", "ind_03"], rows: ["", ""], length: 0 };
    const lines = new NexusWriter({ annotate: false })
      .format(empty, mapping, { sourcePath: "in.phy", format: "binary" })
      .split("\n");

    expect(lines[3]).toBe("\tDimensions ntax=2 nchar=0;");
    expect(lines[6]).toBe("ind_01_sp_north\t");
  });

  test("writeFile writes the formatted matrix", async () => {
    const dir = mkdtempSync(join(tmpdir(), "snapp-matrix-nexus-"));
    try {
      const path = join(dir, "snapp.nex");
      const writer = new NexusWriter();
      const provenance = { sourcePath: "in.phy", format: "binary" } as const;

      await writer.writeFile(path, matrix, mapping, provenance);

      expect(readFileSync(path, "utf8")).toBe(writer.format(matrix, mapping, provenance));
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
