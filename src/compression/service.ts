/**
 * Decompression service for Effect-based dependency injection
 *
 * The file reader declares a dependency on {@link CompressionService} and is
 * run with {@link CompressionService.Live}; tests can provide another layer.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const svc = yield* CompressionService;
 *   return yield* svc.decompress(bytes, "gzip", "calls.vcf.gz");
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 */

import { gunzipSync } from "node:zlib";
import { Context, Effect, Layer } from "effect";
import { FileError } from "../errors";
import type { CompressionFormat } from "./detector";

/**
 * Shape of the compression service
 */
export interface CompressionServiceShape {
  /**
   * Decompress file contents
   *
   * @param data - Raw file bytes
   * @param format - Compression format of the bytes
   * @param filePath - Source path, for error reporting
   */
  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat,
    filePath: string
  ) => Effect.Effect<Uint8Array, FileError>;
}

export class CompressionService extends Context.Tag("@snapp-matrix/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip decompression through node:zlib
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(CompressionService, {
    decompress: (data, format, filePath) => {
      if (format === "none") {
        return Effect.succeed(data);
      }
      return Effect.try({
        try: () => new Uint8Array(gunzipSync(data)),
        catch: (error) => FileError.fromSystemError("decompress", filePath, error),
      });
    },
  });
}
