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

import reservedWords from "./reserved-words.json";

const RESERVED_WORDS: ReadonlySet<string> = new Set(reservedWords);

const NAME_CHARS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

/**
 * Canonical short name for the `index`-th name: a, b, …, Z, aa, ab, …
 * Reserved words get a leading underscore.
 */
export function generateShortName(index: number): string {
  let name = "";
  do {
    name = NAME_CHARS[index % NAME_CHARS.length] + name;
    index = Math.floor(index / NAME_CHARS.length) - 1;
  } while (index >= 0);

  if (RESERVED_WORDS.has(name)) {
    name = "_" + name;
  }

  return name;
}

/**
 * Yields canonical names in order, skipping every name in `taken`.
 */
export function* canonicalNames(taken: ReadonlySet<string>): Generator<string> {
  for (let index = 0; ; index++) {
    const name = generateShortName(index);
    if (!taken.has(name)) yield name;
  }
}
