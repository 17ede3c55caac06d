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

import { describeShapeError } from "../ast/schema";
import { InvalidDictionary } from "../errors";
import {
  entrySignature,
  parsePayloadKey,
  type DictionaryEntry,
  type PatternTuple,
} from "./patterns";

/**
 * An immutable table of patterns. Codes are dense, assigned by position,
 * and every pattern signature maps to exactly one code.
 *
 * The same dictionary must be given to the encoder and the decoder of a
 * blob; the blob cannot be read without it.
 */
export class Dictionary {
  private readonly codes = new Map<string, number>();
  private readonly entryList: readonly DictionaryEntry[];

  /**
   * @param maxDepth Height of the largest subtree pattern the encoder
   * should look up.
   */
  constructor(entries: readonly DictionaryEntry[], readonly maxDepth: number) {
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new InvalidDictionary(`Invalid maximum pattern depth ${maxDepth}`);
    }
    entries.forEach((entry, code) => {
      checkEntry(entry, code);
      const signature = entrySignature(entry);
      if (this.codes.has(signature)) {
        throw new InvalidDictionary(`Entry ${code} duplicates entry ${this.codes.get(signature)}`);
      }
      this.codes.set(signature, code);
    });
    this.entryList = Object.freeze([...entries]);
  }

  get size(): number {
    return this.entryList.length;
  }

  get entries(): readonly DictionaryEntry[] {
    return this.entryList;
  }

  /** The code of a pattern signature, if the dictionary has it. */
  lookup(signature: string): number | undefined {
    return this.codes.get(signature);
  }

  entry(code: number): DictionaryEntry | undefined {
    return Number.isInteger(code) ? this.entryList[code] : undefined;
  }
}

function checkEntry(entry: DictionaryEntry, code: number): void {
  if (entry.type === "head") {
    if (!Number.isInteger(entry.arity) || entry.arity < 0) {
      throw new InvalidDictionary(`Entry ${code} has invalid arity ${entry.arity}`);
    }
    const problem = describeShapeError(entry.kind, entry.payload, entry.arity);
    if (problem) {
      throw new InvalidDictionary(`Entry ${code} is not a valid node: ${problem}`);
    }
    return;
  }
  checkPattern(entry.pattern, code);
}

function checkPattern([kind, key, children]: PatternTuple, code: number): void {
  const parsed = parsePayloadKey(key);
  if (!parsed) {
    throw new InvalidDictionary(`Entry ${code} has an invalid payload "${key}"`);
  }
  const problem = describeShapeError(kind, parsed.payload, children.length);
  if (problem) {
    throw new InvalidDictionary(`Entry ${code} is not a valid subtree: ${problem}`);
  }
  for (const child of children) checkPattern(child, code);
}
