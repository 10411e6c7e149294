/**
 * Compression support for input files
 */

export { CompressionDetector, type CompressionFormat } from "./detector";
export { CompressionService, type CompressionServiceShape } from "./service";
