/**
 * Error handling for SNP matrix conversion
 *
 * Every failure in a conversion run is fatal. Errors carry a stable code,
 * the input line where the problem was found (when there is one) and a short
 * context string so the CLI can print a single useful message.
 */

/**
 * Base error class for all conversion errors
 */
export class SnappMatrixError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SnappMatrixError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Missing or conflicting run options
 */
export class ConfigurationError extends SnappMatrixError {
  constructor(message: string, context?: string) {
    super(message, "CONFIGURATION_ERROR", undefined, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Validation errors for malformed or invalid data
 */
export class ValidationError extends SnappMatrixError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends SnappMatrixError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * PHYLIP-specific parsing errors
 */
export class PhylipParseError extends ParseError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "PHYLIP", lineNumber, context);
    this.name = "PhylipParseError";
  }
}

/**
 * VCF-specific parsing errors with the offending field
 */
export class VcfParseError extends ParseError {
  constructor(
    message: string,
    lineNumber?: number,
    public readonly field?: string
  ) {
    super(message, "VCF", lineNumber, field !== undefined ? `field "${field}"` : undefined);
    this.name = "VcfParseError";
  }
}

/**
 * Species/specimen table parsing errors
 */
export class SpeciesTableError extends ParseError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "SPECIES_TABLE", lineNumber, context);
    this.name = "SpeciesTableError";
  }
}

/**
 * Thrown when normalized sequences do not all share one length
 */
export class SequenceLengthError extends ValidationError {
  constructor(
    public readonly specimenId: string,
    public readonly expectedLength: number,
    public readonly actualLength: number
  ) {
    super(
      "Sequences have different lengths",
      undefined,
      `specimen ${specimenId}: expected ${expectedLength}, found ${actualLength}`
    );
    this.name = "SequenceLengthError";
  }
}

/**
 * Thrown when the alignment alphabet is neither binary nor nucleotide
 */
export class AlphabetError extends ValidationError {
  constructor(public readonly unexpectedSymbols: readonly string[]) {
    super(
      "Sequence format could not be recognized as either 'nucleotide' or 'binary'",
      undefined,
      `unexpected symbols: ${unexpectedSymbols.join(", ")}`
    );
    this.name = "AlphabetError";
  }
}

/**
 * Species table and sequence input name different specimens
 */
export class SpecimenMismatchError extends SnappMatrixError {
  constructor(
    public readonly onlyInTable: readonly string[],
    public readonly onlyInInput: readonly string[]
  ) {
    super(
      "The specimens listed in the species table and those included in the input file are not identical",
      "SPECIMEN_MISMATCH"
    );
    this.name = "SpecimenMismatchError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.onlyInTable.length > 0) {
      msg += `\nOnly in table: ${this.onlyInTable.join(", ")}`;
    }
    if (this.onlyInInput.length > 0) {
      msg += `\nOnly in input: ${this.onlyInInput.join(", ")}`;
    }
    return msg;
  }
}

/**
 * A pair of alleles that has no single-letter code
 */
export class GenotypeCombinationError extends VcfParseError {
  constructor(
    public readonly first: string,
    public readonly second: string,
    lineNumber?: number
  ) {
    super(`Unexpected genotype: ${first} and ${second}`, lineNumber);
    this.name = "GenotypeCombinationError";
  }
}

/**
 * Unexpected symbol met while recoding a site
 */
export class RecodingError extends SnappMatrixError {
  constructor(
    message: string,
    public readonly position: number,
    context?: string
  ) {
    super(`${message} at position ${position}`, "RECODING_ERROR", undefined, context);
    this.name = "RecodingError";
  }
}

/**
 * File I/O errors with the failing operation
 */
export class FileError extends SnappMatrixError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "decompress",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `Path: ${filePath}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("incorrect header check") || msg.includes("unexpected end")) {
      return "File appears to be truncated or not actually gzip compressed";
    }

    return undefined;
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  CONFIGURATION: "Pass exactly one of --phylip or --vcf, and at most one of --transversions or --transitions",
  ALPHABET: "Use A, C, G, T, the two-base IUPAC codes R, Y, S, W, K, M, or 0/1/2, with -, ? or N for missing data",
  SEQUENCE_LENGTH: "Every specimen must have the same number of sites",
  VCF_GENOTYPE: "Genotypes must be diploid calls such as 0/1 or 0|1 with alleles 0, 1 or '.'",
  SPECIMEN_MISMATCH: "Make sure every specimen in the input appears exactly once in the species table",
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: SnappMatrixError): string | undefined {
  if (error instanceof ConfigurationError) {
    return ERROR_SUGGESTIONS.CONFIGURATION;
  }
  if (error instanceof AlphabetError || error instanceof RecodingError) {
    return ERROR_SUGGESTIONS.ALPHABET;
  }
  if (error instanceof SequenceLengthError) {
    return ERROR_SUGGESTIONS.SEQUENCE_LENGTH;
  }
  if (error instanceof SpecimenMismatchError) {
    return ERROR_SUGGESTIONS.SPECIMEN_MISMATCH;
  }
  if (error instanceof VcfParseError && error.message.toLowerCase().includes("genotype")) {
    return ERROR_SUGGESTIONS.VCF_GENOTYPE;
  }
  if (error instanceof FileError) {
    return undefined;
  }

  return ERROR_SUGGESTIONS.MALFORMED_LINE;
}
