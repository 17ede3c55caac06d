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

import { brotliDecompressSync } from "zlib";
import {
  describeShapeError,
  fieldsOf,
  kindFromTag,
  leafSpec,
  isStructuralKind,
  type Payload,
} from "../ast/schema";
import { AstTree, type NodeId } from "../ast/tree";
import type { Dictionary } from "../dictionary/dictionary";
import { parsePayloadKey, type PatternTuple } from "../dictionary/patterns";
import { errorMessage } from "../dump/json";
import { CorruptStream, TruncatedStream, UnknownCode } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { ByteReader } from "./bytes";
import {
  FORMAT_VERSION,
  HEADER_LENGTH,
  MAGIC_HEADER,
  MAX_NESTING_DEPTH,
  PAYLOAD_FALSE,
  PAYLOAD_NONE,
  PAYLOAD_NUMBER,
  PAYLOAD_STRING,
  PAYLOAD_TRUE,
  PAYLOAD_UTF16,
  TAG_LITERAL,
  TAG_REFERENCE,
} from "./format";

/**
 * Decodes a blob written by `encode` with the same dictionary.
 *
 * @throws TruncatedStream when the blob ends inside its header or its
 * compressed token stream
 * @throws UnknownCode when a reference is outside the dictionary
 * @throws CorruptStream for anything else that is not a valid blob
 */
export function decode(
  dictionary: Dictionary,
  blob: Uint8Array,
  logger: Logger = silentLogger
): AstTree {
  const buffer = Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength);
  checkHeader(buffer);

  const input = new ByteReader(decompress(buffer));
  const tree = new AstTree();

  const decodeNode = (depth: number): NodeId => {
    if (depth > MAX_NESTING_DEPTH) {
      throw new CorruptStream(`Tree is nested deeper than ${MAX_NESTING_DEPTH} levels`);
    }
    const tag = input.readByte();
    if (tag === TAG_REFERENCE) {
      return decodeReference(input.readVarint(), depth);
    }
    if (tag !== TAG_LITERAL) {
      throw new CorruptStream(`Unknown token tag ${tag} at byte ${input.offset - 1}`);
    }

    const kindTag = input.readVarint();
    const kind = kindFromTag(kindTag);
    if (kind === undefined) {
      throw new CorruptStream(`Unknown kind tag ${kindTag} at byte ${input.offset}`);
    }
    const payload = readPayload(input);
    const arity = kind === "List" ? input.readVarint() : literalArity(kind);
    const problem = describeShapeError(kind, payload, arity);
    if (problem) {
      throw new CorruptStream(`Invalid ${kind} token at byte ${input.offset}: ${problem}`);
    }
    return withChildren(kind, payload, arity, depth);
  };

  const decodeReference = (code: number, depth: number): NodeId => {
    const entry = dictionary.entry(code);
    if (entry === undefined) {
      throw new UnknownCode(code, dictionary.size);
    }
    if (entry.type === "tree") {
      return materialize(entry.pattern);
    }
    return withChildren(entry.kind, entry.payload, entry.arity, depth);
  };

  const withChildren = (
    kind: string,
    payload: Payload | undefined,
    arity: number,
    depth: number
  ): NodeId => {
    const children: NodeId[] = [];
    for (let i = 0; i < arity; i++) children.push(decodeNode(depth + 1));
    return tree.add(kind, payload, children);
  };

  const materialize = ([kind, key, children]: PatternTuple): NodeId => {
    // Entries were validated when the dictionary was built or loaded.
    const payload = parsePayloadKey(key)?.payload;
    return tree.add(kind, payload, children.map(materialize));
  };

  try {
    tree.root = decodeNode(1);
  } catch (error) {
    // The compressed stream was complete, so a short token stream is corrupt
    if (error instanceof TruncatedStream) {
      throw new CorruptStream(`Token stream ends inside a token at byte ${error.offset}`, {
        cause: error,
      });
    }
    throw error;
  }
  if (input.remaining > 0) {
    throw new CorruptStream(
      `${input.remaining} trailing byte${input.remaining === 1 ? "" : "s"} after the tree`
    );
  }
  if (tree.kind(tree.root) !== "Program") {
    throw new CorruptStream(`Decoded root is a ${tree.kind(tree.root)}, not a Program`);
  }

  logger
    .child("decoder")
    .info(`Decoded ${tree.size} nodes from ${buffer.length} bytes (${input.offset} uncompressed)`);
  return tree.compact();
}

function checkHeader(buffer: Buffer): void {
  const magicLength = Math.min(buffer.length, MAGIC_HEADER.length);
  if (!buffer.subarray(0, magicLength).equals(MAGIC_HEADER.subarray(0, magicLength))) {
    throw new CorruptStream("Invalid blob: bad magic number");
  }
  // A blob cut short inside its header is truncated, not corrupt
  if (buffer.length < HEADER_LENGTH) {
    throw new TruncatedStream(buffer.length, HEADER_LENGTH - buffer.length);
  }
  const version = buffer[MAGIC_HEADER.length];
  if (version !== FORMAT_VERSION[0]) {
    throw new CorruptStream(
      `Unsupported version: ${version} | Current version: ${FORMAT_VERSION[0]}`
    );
  }
}

function decompress(buffer: Buffer): Buffer {
  if (buffer.length === HEADER_LENGTH) {
    throw new TruncatedStream(buffer.length);
  }
  try {
    return brotliDecompressSync(buffer.subarray(HEADER_LENGTH));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "Z_BUF_ERROR") {
      throw new TruncatedStream(buffer.length);
    }
    throw new CorruptStream(`Cannot decompress token stream: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/** Child count of a literal token whose kind has a fixed arity. */
function literalArity(kind: string): number {
  if (isStructuralKind(kind) || leafSpec(kind)) return 0;
  return fieldsOf(kind)?.length ?? 0;
}

function readPayload(input: ByteReader): Payload | undefined {
  const marker = input.readByte();
  switch (marker) {
    case PAYLOAD_NONE:
      return undefined;
    case PAYLOAD_FALSE:
      return false;
    case PAYLOAD_TRUE:
      return true;
    case PAYLOAD_NUMBER:
      return input.readFloat64();
    case PAYLOAD_STRING:
      return input.readBytes(input.readVarint()).toString("utf8");
    case PAYLOAD_UTF16: {
      const units = input.readBytes(input.readVarint() * 2);
      let text = "";
      for (let i = 0; i < units.length; i += 2) {
        text += String.fromCharCode(units[i] | (units[i + 1] << 8));
      }
      return text;
    }
    default:
      throw new CorruptStream(`Unknown payload marker ${marker} at byte ${input.offset - 1}`);
  }
}
