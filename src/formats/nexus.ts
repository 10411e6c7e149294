/**
 * NEXUS writer for SNAPP input matrices
 *
 * Output layout:
 *
 * ```
 * #NEXUS
 *
 * Begin data;
 * 	Dimensions ntax=3 nchar=4;
 * 	Format datatype=integerdata symbols='012' gap=-;
 * 	Matrix
 * ind_01_sp_north	0121
 * ...
 * 	;
 * End;
 * ```
 */

import { ValidationError } from "../errors";
import { writeString } from "../io/file-writer";
import type { RecodedMatrix, SiteFormat } from "../types";
import type { SpeciesMapping } from "./species-table";

/**
 * Where the matrix came from, for the provenance comment
 */
export interface MatrixProvenance {
  /** Input file the matrix was built from */
  readonly sourcePath: string;
  /** Alphabet of the input */
  readonly format: SiteFormat;
}

export interface NexusWriterOptions {
  /** Write the bracketed provenance comment (default true) */
  annotate?: boolean;
  lineEnding?: string;
}

/**
 * Row label: specimen id and its species joined by an underscore
 *
 * @throws {ValidationError} When the specimen is not in the mapping
 */
export function rowLabel(specimen: string, mapping: SpeciesMapping): string {
  const species = mapping.speciesOf(specimen);
  if (species === undefined) {
    throw new ValidationError(`Specimen ${specimen} has no species in the species table`);
  }
  return `${specimen}_${species}`;
}

export class NexusWriter {
  private readonly annotate: boolean;
  private readonly lineEnding: string;

  constructor(options: NexusWriterOptions = {}) {
    this.annotate = options.annotate ?? true;
    this.lineEnding = options.lineEnding ?? "\n";
  }

  /**
   * Render the matrix as a NEXUS data block
   */
  format(matrix: RecodedMatrix, mapping: SpeciesMapping, provenance: MatrixProvenance): string {
    const lines: string[] = ["#NEXUS", ""];

    if (this.annotate) {
      const action =
        provenance.format === "binary" ? "taken from" : "converted to binary format from";
      lines.push("", `[The SNP data matrix, ${action} file ${provenance.sourcePath}.]`, "");
    }

    lines.push(
      "Begin data;",
      `\tDimensions ntax=${matrix.specimenIds.length} nchar=${matrix.length};`,
      "\tFormat datatype=integerdata symbols='012' gap=-;",
      "\tMatrix"
    );

    matrix.specimenIds.forEach((specimen, index) => {
      lines.push(`${rowLabel(specimen, mapping)}\t${matrix.rows[index] ?? ""}`);
    });

    lines.push("\t;", "End;");
    return lines.join(this.lineEnding) + this.lineEnding;
  }

  /**
   * Render and write the matrix to a file
   */
  async writeFile(
    path: string,
    matrix: RecodedMatrix,
    mapping: SpeciesMapping,
    provenance: MatrixProvenance
  ): Promise<void> {
    await writeString(path, this.format(matrix, mapping, provenance));
  }
}
