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

import { z } from "zod";
import { MalformedInput } from "../errors";
import type { AstTree } from "../ast/tree";
import { errorMessage, isRecord } from "./json";
import { lowerProgram } from "./lower";
import { raiseProgram } from "./raise";

export const DUMP_FORMAT = "astpack-ast";
export const DUMP_VERSION = 1;

const DumpEnvelope = z.object({
  format: z.literal(DUMP_FORMAT),
  version: z.literal(DUMP_VERSION),
  program: z.record(z.unknown()),
});

/**
 * Reads an AST dump. Accepts the versioned envelope written by
 * {@link serializeDump}, or a bare Babel `File` / `Program` node.
 */
export function parseDump(text: string): AstTree {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new MalformedInput(`AST dump is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return lowerProgram(unwrapDump(data));
}

function unwrapDump(data: unknown): unknown {
  if (!isRecord(data)) {
    throw new MalformedInput("AST dump must be a JSON object");
  }
  if ("format" in data) {
    const envelope = DumpEnvelope.safeParse(data);
    if (!envelope.success) {
      throw new MalformedInput(
        `Unsupported AST dump header: ${envelope.error.issues
          .map((issue) => `${issue.path.join(".") || "dump"}: ${issue.message}`)
          .join("; ")}`
      );
    }
    return envelope.data.program;
  }
  if (data.type === "File") {
    return data.program;
  }
  return data;
}

export function serializeDump(tree: AstTree): string {
  const dump = {
    format: DUMP_FORMAT,
    version: DUMP_VERSION,
    program: raiseProgram(tree),
  };
  return JSON.stringify(dump, null, 2) + "\n";
}
