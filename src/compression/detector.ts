/**
 * Compression format detection for input files
 *
 * VCF files are routinely distributed gzip-compressed (`.vcf.gz`), so the
 * reader checks both the file extension and the gzip magic bytes.
 */

/**
 * Compression formats the reader understands
 */
export type CompressionFormat = "gzip" | "none";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip", ".bgz"] as const;

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("calls.vcf.gz"); // "gzip"
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])); // "gzip"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   */
  static fromExtension(filePath: string): CompressionFormat {
    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format from the first bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    return bytes.length >= 2 &&
      bytes[0] === GZIP_MAGIC_FIRST_BYTE &&
      bytes[1] === GZIP_MAGIC_SECOND_BYTE
      ? "gzip"
      : "none";
  }

  /**
   * Magic bytes win over the extension; an unmarked `.gz` file is still tried as gzip
   */
  static detect(filePath: string, bytes: Uint8Array): CompressionFormat {
    const fromBytes = CompressionDetector.fromMagicBytes(bytes);
    return fromBytes !== "none" ? fromBytes : CompressionDetector.fromExtension(filePath);
  }
}
