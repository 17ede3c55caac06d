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

import * as babelParser from "@babel/parser";
import generate from "@babel/generator";
import * as t from "@babel/types";
import { MalformedInput } from "../errors";
import type { AstTree } from "../ast/tree";
import { errorMessage } from "./json";
import { lowerProgram } from "./lower";
import { raiseProgram } from "./raise";

/** Parses a JavaScript script into a raw (unoptimized) tree. */
export function parseJavaScript(code: string): AstTree {
  let program: t.Program;
  try {
    program = babelParser.parse(code, { sourceType: "script" }).program;
  } catch (error) {
    throw new MalformedInput(`Cannot parse JavaScript: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return lowerProgram(program);
}

export function printJavaScript(tree: AstTree): string {
  const program = raiseProgram(tree);
  if (!t.isProgram(program)) {
    throw new MalformedInput("Root node is not a Program");
  }
  return generate(program).code;
}
