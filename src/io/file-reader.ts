/**
 * File reading for BED and GTF inputs
 *
 * Programs run over the Effect platform `FileSystem` so every failure
 * surfaces as a `FileError` carrying the operation and path.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { FileError, ValidationError } from "../errors";
import { runFileProgram } from "./runtime";

/**
 * Reject empty paths before touching the file system
 */
function validatePath(path: string): string {
  if (path.trim() === "") {
    throw new ValidationError("File path must not be empty");
  }
  return path;
}

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If the path exists but cannot be inspected
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

  return runFileProgram(program);
}

/**
 * Read a whole text file
 *
 * @throws {FileError} If the file cannot be read
 */
export async function readToString(path: string): Promise<string> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("read", validatedPath, error)));

  return runFileProgram(program);
}

/**
 * Line stream over a file; `\n` and `\r\n` endings are stripped
 */
async function createLineStream(validatedPath: string) {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const lines = fs.stream(validatedPath).pipe(
      Stream.decodeText(),
      Stream.splitLines,
      Stream.mapError((error) => FileError.fromSystemError("read", validatedPath, error))
    );
    return Stream.toReadableStream(lines);
  });

  return runFileProgram(program);
}

/**
 * Stream a text file line by line
 *
 * @throws {FileError} If the file cannot be opened or reading fails midway
 *
 * @example
 * ```typescript
 * for await (const line of readLines("peaks.bed")) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLines(path: string): AsyncIterable<string> {
  const validatedPath = validatePath(path);
  const reader = (await createLineStream(validatedPath)).getReader();
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } catch (error) {
    finished = true;
    throw error instanceof FileError ? error : FileError.fromSystemError("read", validatedPath, error);
  } finally {
    if (!finished) {
      await reader.cancel();
    }
  }
}

export const FileReader = {
  exists,
  readToString,
  readLines,
} as const;
