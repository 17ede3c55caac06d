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

import type { AstpackConfig } from "./config";
import { decode } from "./codec/decoder";
import { encode } from "./codec/encoder";
import { buildDictionary } from "./dictionary/builder";
import { loadDictionary, serializeDictionary } from "./dictionary/file";
import { parseDump, serializeDump } from "./dump/file";
import { parseJavaScript, printJavaScript } from "./dump/javascript";
import { readInput, readTextInput, writeOutputAtomic } from "./io";
import type { Logger } from "./logger";
import { optimize } from "./optimizer";

export interface CommandContext {
  config: AstpackConfig;
  logger: Logger;
}

export interface Command {
  name: string;
  /** Operand synopsis shown in usage messages. */
  usage: string;
  description: string;
  minArgs: number;
  maxArgs: number;
  run(args: string[], context: CommandContext): void;
}

export const COMMANDS: readonly Command[] = [
  {
    name: "make-dict",
    usage: "<input-ast-dump>... <output-dict>",
    description: "Build a dictionary from one or more AST dumps",
    minArgs: 2,
    maxArgs: Infinity,
    run(args, { config, logger }) {
      const inputs = args.slice(0, -1);
      const output = args[args.length - 1];
      const corpus = inputs.map((input) => {
        logger.info(`Reading ${input}`);
        return optimize(parseDump(readTextInput(input)), { logger });
      });
      const dictionary = buildDictionary(corpus, config.dictionary, logger);
      writeOutputAtomic(output, serializeDictionary(dictionary));
      logger.info(`Wrote ${dictionary.size} entries to ${output}`);
    },
  },
  {
    name: "optimize-ast",
    usage: "<input-ast-dump> <output-ast-dump>",
    description: "Canonicalize an AST dump for compression",
    minArgs: 2,
    maxArgs: 2,
    run([input, output], { logger }) {
      const tree = optimize(parseDump(readTextInput(input)), { logger });
      writeOutputAtomic(output, serializeDump(tree));
    },
  },
  {
    name: "encode-ast",
    usage: "<dict> <input-optimized-dump> <output-bin>",
    description: "Encode an optimized AST dump with a dictionary",
    minArgs: 3,
    maxArgs: 3,
    run([dict, input, output], { logger }) {
      const dictionary = loadDictionary(readInput(dict));
      const tree = parseDump(readTextInput(input));
      writeOutputAtomic(output, encode(dictionary, tree, logger));
    },
  },
  {
    name: "decode-ast",
    usage: "<dict> <input-bin> <output-dump>",
    description: "Decode a binary AST with the dictionary it was encoded with",
    minArgs: 3,
    maxArgs: 3,
    run([dict, input, output], { logger }) {
      const dictionary = loadDictionary(readInput(dict));
      const tree = decode(dictionary, readInput(input), logger);
      writeOutputAtomic(output, serializeDump(tree));
    },
  },
  {
    name: "parse-js",
    usage: "<input.js> <output-ast-dump>",
    description: "Parse a JavaScript script into a raw AST dump",
    minArgs: 2,
    maxArgs: 2,
    run([input, output]) {
      writeOutputAtomic(output, serializeDump(parseJavaScript(readTextInput(input))));
    },
  },
  {
    name: "print-ast",
    usage: "<input-ast-dump> <output.js>",
    description: "Generate JavaScript source from an AST dump",
    minArgs: 2,
    maxArgs: 2,
    run([input, output]) {
      const code = printJavaScript(parseDump(readTextInput(input)));
      writeOutputAtomic(output, code + "\n");
    },
  },
];

export function findCommand(name: string): Command | undefined {
  return COMMANDS.find((command) => command.name === name);
}
