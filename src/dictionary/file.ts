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

import { decode as msgpackDecode, encode as msgpackEncode } from "@msgpack/msgpack";
import { brotliCompressSync, brotliDecompressSync } from "zlib";
import { z } from "zod";
import { DICTIONARY_MAGIC_HEADER, FORMAT_VERSION } from "../codec/format";
import { InvalidDictionary } from "../errors";
import { errorMessage } from "../dump/json";
import { Dictionary } from "./dictionary";
import {
  parsePayloadKey,
  payloadKey,
  type DictionaryEntry,
  type PatternTuple,
} from "./patterns";

const PatternSchema: z.ZodType<PatternTuple> = z.lazy(() =>
  z.tuple([z.string(), z.string(), z.array(PatternSchema)])
);

const EntrySchema = z.union([
  z.tuple([z.literal("T"), PatternSchema]),
  z.tuple([z.literal("H"), z.string(), z.string(), z.number().int().nonnegative()]),
]);

const DictionaryDocument = z.tuple([
  z.number().int().positive(),
  z.array(EntrySchema),
]);

type EntryTuple = z.infer<typeof EntrySchema>;

/**
 * Serializes a dictionary: magic header, format version, then a
 * Brotli-compressed MessagePack document `[maxDepth, entries]`.
 */
export function serializeDictionary(dictionary: Dictionary): Buffer {
  const entries = dictionary.entries.map(
    (entry): EntryTuple =>
      entry.type === "tree"
        ? ["T", entry.pattern]
        : ["H", entry.kind, payloadKey(entry.payload), entry.arity]
  );
  const encoded = msgpackEncode([dictionary.maxDepth, entries]);
  const compressed = brotliCompressSync(encoded);
  return Buffer.concat([DICTIONARY_MAGIC_HEADER, FORMAT_VERSION, compressed]);
}

export function loadDictionary(buffer: Uint8Array): Dictionary {
  const header = DICTIONARY_MAGIC_HEADER.length;
  if (
    buffer.length < header + FORMAT_VERSION.length ||
    !DICTIONARY_MAGIC_HEADER.equals(buffer.subarray(0, header))
  ) {
    throw new InvalidDictionary("Invalid dictionary file: bad magic number");
  }
  const version = buffer[header];
  if (version !== FORMAT_VERSION[0]) {
    throw new InvalidDictionary(
      `Unsupported dictionary version: ${version} | Current version: ${FORMAT_VERSION[0]}`
    );
  }

  let document: unknown;
  try {
    document = msgpackDecode(
      brotliDecompressSync(buffer.subarray(header + FORMAT_VERSION.length))
    );
  } catch (error) {
    throw new InvalidDictionary(
      `Cannot decompress dictionary: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const parsed = DictionaryDocument.safeParse(document);
  if (!parsed.success) {
    throw new InvalidDictionary(
      `Invalid dictionary content: ${parsed.error.issues[0]?.message ?? "unknown issue"}`
    );
  }
  const [maxDepth, tuples] = parsed.data;
  return new Dictionary(tuples.map(toEntry), maxDepth);
}

function toEntry(tuple: EntryTuple, code: number): DictionaryEntry {
  if (tuple[0] === "T") {
    return { type: "tree", pattern: tuple[1] };
  }
  const [, kind, key, arity] = tuple;
  const parsed = parsePayloadKey(key);
  if (!parsed) {
    throw new InvalidDictionary(`Entry ${code} has an invalid payload "${key}"`);
  }
  return parsed.payload === undefined
    ? { type: "head", kind, arity }
    : { type: "head", kind, payload: parsed.payload, arity };
}
