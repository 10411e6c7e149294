/**
 * Command-line entry point
 *
 * ```
 * tsx src/cli.ts -p example.phy -t example.spc.txt -x snapp.nex
 * ```
 */

import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { ConfigurationError, getErrorSuggestion, SnappMatrixError } from "./errors";
import { DEFAULT_OUTPUT, DEFAULT_TABLE, runConversion } from "./operations/pipeline";
import type { ConversionOptions } from "./operations/types";

export const HELP_TEXT = `Usage: snapp-matrix [OPTIONS]

Example:
snapp-matrix -p example.phy -t ${DEFAULT_TABLE} -x ${DEFAULT_OUTPUT}

Options:
  -p, --phylip FILENAME     File with SNP data in phylip format (default: none).
  -v, --vcf FILENAME        File with SNP data in vcf format (default: none).
  -t, --table FILENAME      File with table linking species and specimens (default: ${DEFAULT_TABLE}).
  -m, --max-snps NUMBER     Maximum number of SNPs to be used (default: no maximum).
  -r, --transversions       Use transversions only (default: false).
  -i, --transitions         Use transitions only (default: false).
  -x, --nex FILENAME        Output file in NEX format (default: ${DEFAULT_OUTPUT}).
  -n, --no-annotation       Do not write the provenance comment (default: false).
  -s, --seed NUMBER         Seed for reproducible output (default: random).
  -h, --help                Print this help text.
`;

/**
 * Raw option values from node:util parseArgs
 */
function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        phylip: { type: "string", short: "p" },
        vcf: { type: "string", short: "v" },
        table: { type: "string", short: "t" },
        "max-snps": { type: "string", short: "m" },
        transversions: { type: "boolean", short: "r" },
        transitions: { type: "boolean", short: "i" },
        nex: { type: "string", short: "x" },
        "no-annotation": { type: "boolean", short: "n" },
        seed: { type: "string", short: "s" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse command-line arguments into conversion options
 *
 * @returns the options, or `"help"` when help was requested or no arguments were given
 * @throws {ConfigurationError} On unknown options or missing option values
 */
export function parseCliArgs(argv: readonly string[]): ConversionOptions | "help" {
  if (argv.length === 0) {
    return "help";
  }

  const values = readArgs(argv);

  if (values.help === true) {
    return "help";
  }

  const options: ConversionOptions = {};
  if (values.phylip !== undefined) options.phylip = values.phylip;
  if (values.vcf !== undefined) options.vcf = values.vcf;
  if (values.table !== undefined) options.table = values.table;
  if (values["max-snps"] !== undefined) options.maxSites = Number(values["max-snps"]);
  if (values.transversions === true) options.transversions = true;
  if (values.transitions === true) options.transitions = true;
  if (values.nex !== undefined) options.output = values.nex;
  if (values["no-annotation"] === true) options.annotate = false;
  if (values.seed !== undefined) options.seed = Number(values.seed);
  return options;
}

/**
 * Run the converter and return the process exit status
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options === "help") {
      console.log(HELP_TEXT);
      return 0;
    }

    const result = await runConversion(options);

    if (result.diagnostics.warnings.length > 0) {
      console.log(`${result.diagnostics.warnings.join("\n")}\n`);
    }
    console.log(`${result.diagnostics.info}\n`);
    console.log(`Wrote SNAPP input in NEX format to file ${result.options.output}.\n`);
    return 0;
  } catch (error) {
    if (error instanceof SnappMatrixError) {
      console.error(`ERROR: ${error.toString()}`);
      const suggestion = getErrorSuggestion(error);
      if (suggestion !== undefined) {
        console.error(`Suggestion: ${suggestion}`);
      }
      return 1;
    }
    throw error;
  }
}

const invokedPath = process.argv[1];
if (invokedPath !== undefined && import.meta.url === pathToFileURL(invokedPath).href) {
  main().then(
    (status) => {
      process.exitCode = status;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
