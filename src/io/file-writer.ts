/**
 * File writing for BED and annotation outputs
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError, ValidationError } from "../errors";
import { runFileProgram } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails
 *
 * @example
 * ```typescript
 * await writeString("union.bed", "chr1\t100\t260\n");
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  if (path.trim() === "") {
    throw new ValidationError("File path must not be empty");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, content);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));

  await runFileProgram(program);
}

export const FileWriter = {
  writeString,
} as const;
