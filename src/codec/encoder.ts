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

import { brotliCompressSync } from "zlib";
import { kindTag, type Payload } from "../ast/schema";
import { validateTree, type AstTree, type NodeId } from "../ast/tree";
import type { Dictionary } from "../dictionary/dictionary";
import {
  headSignatureOf,
  patternOf,
  subtreeHeights,
  treeSignature,
} from "../dictionary/patterns";
import { MalformedInput } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { ByteWriter } from "./bytes";
import {
  FORMAT_VERSION,
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

interface EncodeStats {
  nodes: number;
  treeReferences: number;
  headReferences: number;
  literals: number;
}

/**
 * Encodes an optimized tree against `dictionary`.
 *
 * Nodes are written in pre-order. A node whose whole subtree is a dictionary
 * pattern becomes one reference token; otherwise its head is written as a
 * reference or as a literal token, followed by its children. The token
 * stream is Brotli-compressed behind the header.
 *
 * @throws MalformedInput when the tree is invalid or nested deeper than
 * {@link MAX_NESTING_DEPTH} tokens
 */
export function encode(
  dictionary: Dictionary,
  tree: AstTree,
  logger: Logger = silentLogger
): Buffer {
  validateTree(tree);
  const out = new ByteWriter();

  const heights = subtreeHeights(tree);
  const stats: EncodeStats = {
    nodes: heights.size,
    treeReferences: 0,
    headReferences: 0,
    literals: 0,
  };

  const encodeNode = (id: NodeId, depth: number): void => {
    if (depth > MAX_NESTING_DEPTH) {
      throw new MalformedInput(`Tree is nested deeper than ${MAX_NESTING_DEPTH} levels`);
    }
    if ((heights.get(id) ?? Infinity) <= dictionary.maxDepth) {
      const code = dictionary.lookup(treeSignature(patternOf(tree, id)));
      if (code !== undefined) {
        out.writeByte(TAG_REFERENCE);
        out.writeVarint(code);
        stats.treeReferences++;
        return;
      }
    }

    const node = tree.node(id);
    const code = dictionary.lookup(headSignatureOf(node));
    if (code !== undefined) {
      out.writeByte(TAG_REFERENCE);
      out.writeVarint(code);
      stats.headReferences++;
    } else {
      const tag = kindTag(node.kind);
      if (tag === undefined) {
        // validateTree has already rejected unknown kinds
        throw new Error(`No kind tag for ${node.kind}`);
      }
      out.writeByte(TAG_LITERAL);
      out.writeVarint(tag);
      writePayload(out, node.payload);
      if (node.kind === "List") {
        out.writeVarint(node.children.length);
      }
      stats.literals++;
    }
    for (const child of node.children) encodeNode(child, depth + 1);
  };

  encodeNode(tree.root, 1);
  const tokens = out.toBuffer();
  const blob = Buffer.concat([MAGIC_HEADER, FORMAT_VERSION, brotliCompressSync(tokens)]);
  logger
    .child("encoder")
    .info(
      `Encoded ${stats.nodes} nodes into ${blob.length} bytes, ${tokens.length} before compression (${stats.treeReferences} subtree references, ${stats.headReferences} node references, ${stats.literals} literals)`
    );
  return blob;
}

function writePayload(out: ByteWriter, payload: Payload | undefined): void {
  switch (typeof payload) {
    case "undefined":
      out.writeByte(PAYLOAD_NONE);
      return;
    case "boolean":
      out.writeByte(payload ? PAYLOAD_TRUE : PAYLOAD_FALSE);
      return;
    case "number":
      out.writeByte(PAYLOAD_NUMBER);
      out.writeFloat64(payload);
      return;
    default: {
      const bytes = Buffer.from(payload, "utf8");
      if (bytes.toString("utf8") === payload) {
        out.writeByte(PAYLOAD_STRING);
        out.writeVarint(bytes.length);
        out.writeBytes(bytes);
        return;
      }
      out.writeByte(PAYLOAD_UTF16);
      out.writeVarint(payload.length);
      for (let i = 0; i < payload.length; i++) {
        const unit = payload.charCodeAt(i);
        out.writeByte(unit & 0xff);
        out.writeByte(unit >>> 8);
      }
    }
  }
}
