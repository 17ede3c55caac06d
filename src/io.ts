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

import { readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import path from "path";

export function readInput(filename: string): Buffer {
  return readFileSync(filename);
}

export function readTextInput(filename: string): string {
  return readFileSync(filename, "utf8");
}

/**
 * Writes `data` to a temporary file next to `filename` and renames it into
 * place, so a failed write never leaves a partial output behind.
 */
export function writeOutputAtomic(filename: string, data: string | Uint8Array): void {
  const temporary = path.join(
    path.dirname(filename),
    `.${path.basename(filename)}.${process.pid}.tmp`
  );
  try {
    writeFileSync(temporary, data);
    renameSync(temporary, filename);
  } catch (error) {
    rmSync(temporary, { force: true });
    throw error;
  }
}
