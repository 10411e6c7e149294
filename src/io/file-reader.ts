/**
 * File reading utilities built on Effect Platform
 *
 * All Effect plumbing stays inside this module; callers get Promise-based
 * functions that reject with {@link FileError}.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Layer } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { FileError } from "../errors";
import { getPlatform, runEffect } from "./runtime";

const FilePathSchema = type("string > 0");

/**
 * Check that a path exists and is a regular file
 *
 * @example
 * ```typescript
 * if (!(await exists("species.txt"))) {
 *   console.error("species table not found");
 * }
 * ```
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));

  return runEffect(program.pipe(Effect.provide(getPlatform())));
}

/**
 * Read an entire file as UTF-8 text, decompressing gzip input
 *
 * @param path - File to read
 * @throws {FileError} When the file cannot be read or decompressed
 */
export async function readToString(path: string): Promise<string> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const compression = yield* CompressionService;

    const raw = yield* fs
      .readFile(validatedPath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", validatedPath, error)));

    const format = CompressionDetector.detect(validatedPath, raw);
    const bytes = yield* compression.decompress(raw, format, validatedPath);
    return new TextDecoder("utf-8").decode(bytes);
  });

  return runEffect(
    program.pipe(Effect.provide(Layer.merge(getPlatform(), CompressionService.Live)))
  );
}

/**
 * Validate file path using ArkType
 */
function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
