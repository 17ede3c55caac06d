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

export { AstTree, validateTree } from "./ast/tree";
export type { AstNode, NodeId } from "./ast/tree";
export {
  NODE_KINDS,
  STRUCTURAL_KINDS,
  describeShapeError,
  fieldsOf,
  isStructuralKind,
  kindFromTag,
  kindTag,
  leafSpec,
} from "./ast/schema";
export type { LeafSpec, Payload, PayloadType, StructuralKind } from "./ast/schema";
export { canonicalNames, generateShortName } from "./ast/names";

export { optimize, TRANSFORMERS } from "./optimizer";
export type { OptimizeOptions } from "./optimizer";
export type { NodeTransformer, Phase, TransformContext } from "./transformers/transformers";

export { buildDictionary } from "./dictionary/builder";
export { Dictionary } from "./dictionary/dictionary";
export { loadDictionary, serializeDictionary } from "./dictionary/file";
export type { DictionaryEntry, PatternTuple } from "./dictionary/patterns";

export { encode } from "./codec/encoder";
export { decode } from "./codec/decoder";
export {
  DICTIONARY_MAGIC_HEADER,
  FORMAT_VERSION,
  MAGIC_HEADER,
  MAX_NESTING_DEPTH,
} from "./codec/format";

export { DUMP_FORMAT, DUMP_VERSION, parseDump, serializeDump } from "./dump/file";
export { parseJavaScript, printJavaScript } from "./dump/javascript";

export {
  AstpackError,
  CorruptStream,
  EmptyCorpus,
  InvalidDictionary,
  MalformedInput,
  TruncatedStream,
  UnknownCode,
  UsageError,
  isAstpackError,
} from "./errors";
export type { ErrorKind } from "./errors";

export { DEFAULT_DICTIONARY_OPTIONS, loadConfig } from "./config";
export type { AstpackConfig, DictionaryOptions } from "./config";
export { createLogger, LOG_LEVELS, silentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export { runCli } from "./cli";
export { VERSION } from "./version";
