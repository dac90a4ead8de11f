import { readFile, stat } from "node:fs/promises";
import { err, ok, type Result } from "./result";

/** Largest program file accepted: 1 GiB. */
export const MAX_PROGRAM_BYTES = 1024 * 1024 * 1024;

export type ProgramSpec =
  | { kind: "literal"; text: string }
  | { kind: "file"; path: string; maxBytes?: number };

export type LoadedProgram = {
  /** File path, or `<eval>` for literal programs. */
  name: string;
  bytes: Uint8Array;
};

export enum SourceErrorCode {
  FILE_NOT_FOUND = "FILE_NOT_FOUND",
  FILE_TOO_LARGE = "FILE_TOO_LARGE",
  FILE_UNREADABLE = "FILE_UNREADABLE",
}

export class SourceError extends Error {
  constructor(
    readonly code: SourceErrorCode,
    readonly path: string,
    message: string
  ) {
    super(message);
    this.name = "SourceError";
  }
}

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

function toSourceError(path: string, e: unknown): SourceError {
  if (errnoCode(e) === "ENOENT") {
    return new SourceError(
      SourceErrorCode.FILE_NOT_FOUND,
      path,
      `file not found: ${path}`
    );
  }
  const reason = e instanceof Error ? e.message : String(e);
  return new SourceError(
    SourceErrorCode.FILE_UNREADABLE,
    path,
    `cannot read ${path}: ${reason}`
  );
}

export async function loadProgram(
  source: ProgramSpec
): Promise<Result<LoadedProgram, SourceError>> {
  if (source.kind === "literal") {
    return ok({ name: "<eval>", bytes: Buffer.from(source.text, "utf8") });
  }

  const { path } = source;
  const maxBytes = source.maxBytes ?? MAX_PROGRAM_BYTES;
  try {
    const info = await stat(path);
    if (info.size > maxBytes) {
      return err(
        new SourceError(
          SourceErrorCode.FILE_TOO_LARGE,
          path,
          `file too large: ${path} (${info.size} bytes, limit ${maxBytes})`
        )
      );
    }
    const bytes = await readFile(path);
    return ok({ name: path, bytes });
  } catch (e) {
    return err(toSourceError(path, e));
  }
}
