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

/**
 * astpack CLI
 *
 * Usage:
 *   astpack make-dict sample.dump my.dict
 *   astpack optimize-ast input.dump optimized.dump
 *   astpack encode-ast my.dict optimized.dump program.bin
 *   astpack decode-ast my.dict program.bin decoded.dump
 */

import { COMMANDS, findCommand } from "./commands";
import { loadConfig } from "./config";
import { errorMessage } from "./dump/json";
import { UsageError, isAstpackError } from "./errors";
import { createLogger } from "./logger";
import { VERSION } from "./version";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function printHelp(): void {
  const width = Math.max(...COMMANDS.map((command) => command.name.length));
  const commands = COMMANDS.map(
    (command) => `  ${command.name.padEnd(width)}  ${command.description}`
  ).join("\n");
  const usages = COMMANDS.map(
    (command) => `  astpack ${command.name} ${command.usage}`
  ).join("\n");

  console.log(`
astpack v${VERSION} - Dictionary-based binary AST codec

Usage:
  astpack <command> [arguments]

Commands:
${commands}

Arguments:
${usages}

Options:
  --version, -v     Show version number
  --help, -h        Show this help message

Environment Variables:
  ASTPACK_LOG_LEVEL            silent, error, warn, info or debug (default: info)
  ASTPACK_DICT_MAX_ENTRIES     Maximum dictionary entries (default: 4096)
  ASTPACK_DICT_MAX_DEPTH       Height of the largest subtree pattern (default: 3)
  ASTPACK_DICT_MIN_FREQUENCY   Minimum pattern frequency (default: 1)
`);
}

interface ParsedArgs {
  version: boolean;
  help: boolean;
  unknownOptions: string[];
  positionals: string[];
}

function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    version: false,
    help: false,
    unknownOptions: [],
    positionals: [],
  };

  for (const arg of args) {
    if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      result.unknownOptions.push(arg);
    } else {
      result.positionals.push(arg);
    }
  }

  return result;
}

/**
 * Runs one CLI invocation and returns its exit code: 0 on success, 1 when
 * the command fails, 2 on a usage error.
 */
export function runCli(
  argv: string[],
  env: Record<string, string | undefined> = process.env
): number {
  const args = parseArgs(argv);

  if (args.version) {
    console.log(VERSION);
    return EXIT_SUCCESS;
  }

  if (args.help) {
    printHelp();
    return EXIT_SUCCESS;
  }

  const [name, ...operands] = args.positionals;
  let logger = createLogger();

  try {
    const config = loadConfig(env);
    logger = createLogger(config.logLevel);

    if (args.unknownOptions.length > 0) {
      throw new UsageError(`Unknown option ${args.unknownOptions[0]}`);
    }
    if (name === undefined) {
      throw new UsageError("No command given; run astpack --help for usage");
    }
    const command = findCommand(name);
    if (!command) {
      throw new UsageError(`Unknown command "${name}"; run astpack --help for usage`);
    }
    logger = logger.child(command.name);
    if (operands.length < command.minArgs || operands.length > command.maxArgs) {
      throw new UsageError(`Usage: astpack ${command.name} ${command.usage}`);
    }

    command.run(operands, { config, logger });
    return EXIT_SUCCESS;
  } catch (error) {
    if (isAstpackError(error)) {
      logger.error(`${error.kind}: ${error.message}`);
      return error.kind === "UsageError" ? EXIT_USAGE : EXIT_FAILURE;
    }
    logger.error(`Unexpected error: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }
}
