/*
 *   Copyright (c) 2025 Alexander Neitzel

 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.

 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU General Public License for more details.

 *   You should have received a copy of the GNU General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

export type ErrorKind =
  | "MalformedInput"
  | "EmptyCorpus"
  | "TruncatedStream"
  | "UnknownCode"
  | "CorruptStream"
  | "InvalidDictionary"
  | "UsageError";

/**
 * Base class of every error raised by astpack.
 * `kind` is stable and used by the CLI to report failures.
 */
export abstract class AstpackError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The AST (or dump) violates the node schema. */
export class MalformedInput extends AstpackError {
  readonly kind = "MalformedInput";
}

/** A dictionary was requested from zero trees. */
export class EmptyCorpus extends AstpackError {
  readonly kind = "EmptyCorpus";

  constructor() {
    super("Cannot build a dictionary from an empty corpus");
  }
}

/** The byte stream ended in the middle of a token. */
export class TruncatedStream extends AstpackError {
  readonly kind = "TruncatedStream";

  /** `needed` is unknown when the stream ends inside compressed data. */
  constructor(readonly offset: number, readonly needed?: number) {
    super(
      needed === undefined
        ? `Unexpected end of stream at byte ${offset}`
        : `Unexpected end of stream at byte ${offset} (needed ${needed} more byte${
            needed === 1 ? "" : "s"
          })`
    );
  }
}

/**
 * A reference token points past the end of the dictionary.
 * A blob decoded with the wrong dictionary usually fails this way.
 */
export class UnknownCode extends AstpackError {
  readonly kind = "UnknownCode";

  constructor(readonly code: number, readonly dictionarySize: number) {
    super(
      `Dictionary code ${code} is out of range (dictionary has ${dictionarySize} entries)`
    );
  }
}

/** The stream is complete but not a valid blob. */
export class CorruptStream extends AstpackError {
  readonly kind = "CorruptStream";
}

/** The dictionary file cannot be loaded. */
export class InvalidDictionary extends AstpackError {
  readonly kind = "InvalidDictionary";
}

export class UsageError extends AstpackError {
  readonly kind = "UsageError";
}

export function isAstpackError(error: unknown): error is AstpackError {
  return error instanceof AstpackError;
}
