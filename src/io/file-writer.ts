/**
 * File writing operations using Effect Platform
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { getPlatform, runEffect } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * The parent directory must already exist.
 *
 * @param path - File path to write to
 * @param content - String content to write
 * @throws {FileError} When the directory is missing or the write fails
 *
 * @example
 * ```typescript
 * await writeString("snapp.nex", nexus);
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  if (path.length === 0) {
    throw new FileError("Output path must not be empty", path, "write");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const directory = pathService.dirname(pathService.resolve(path));
    const directoryExists = yield* fs.exists(directory);
    if (!directoryExists) {
      return yield* Effect.fail(
        new FileError(`Output directory does not exist: ${directory}`, path, "write")
      );
    }

    yield* fs.writeFileString(path, content);
  }).pipe(
    Effect.mapError((error) =>
      error instanceof FileError ? error : FileError.fromSystemError("write", path, error)
    )
  );

  await runEffect(program.pipe(Effect.provide(getPlatform())));
}
