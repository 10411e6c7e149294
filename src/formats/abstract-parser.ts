/**
 * Abstract base parser for the text inputs of a conversion
 *
 * PHYLIP, VCF and species-table parsers all read a whole text into one value.
 * The base class merges options, provides the warning hook and implements
 * file parsing on top of each format's `parseString`.
 */

import { readToString } from "../io/file-reader";
import type { ParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The value this parser produces (Alignment, SpeciesMapping)
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: Required<ParserOptions> & TOptions;

  constructor(options: TOptions) {
    const baseDefaults: Required<ParserOptions> = {
      skipValidation: false,
      onWarning: (warning: string, lineNumber?: number): void => {
        const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
        console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
  }

  /**
   * Format-specific default options
   */
  protected getDefaultOptions(): Partial<TOptions> {
    return {};
  }

  /**
   * Parse a complete input text
   * @param data - Raw file contents
   */
  abstract parseString(data: string): T;

  /**
   * Read and parse a file (gzip-compressed files are decompressed)
   * @param filePath - Path to the input file
   */
  async parseFile(filePath: string): Promise<T> {
    const data = await readToString(filePath);
    return this.parseString(data);
  }

  /**
   * Format name for error messages and warnings
   */
  protected abstract getFormatName(): string;

  /**
   * Report a non-fatal problem through the configured handler
   */
  protected warn(warning: string, lineNumber?: number): void {
    this.options.onWarning(warning, lineNumber);
  }
}

/**
 * Split text into lines, accepting both LF and CRLF endings
 */
export function splitLines(data: string): string[] {
  return data.split(/\r?\n/);
}

/**
 * Whitespace-separated tokens of one line
 */
export function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter((token) => token.length > 0);
}
