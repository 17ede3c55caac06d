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

import type { Payload } from "../ast/schema";
import type { AstNode, AstTree, NodeId } from "../ast/tree";

/**
 * A complete subtree stored in a dictionary: kind, payload and children,
 * as nested tuples. The payload is a {@link payloadKey}.
 */
export type PatternTuple = [kind: string, payload: string, children: PatternTuple[]];

export type DictionaryEntry =
  /** A whole subtree; a reference replaces the node and its descendants. */
  | { type: "tree"; pattern: PatternTuple }
  /** A single node; a reference is followed by `arity` child nodes. */
  | { type: "head"; kind: string; payload?: Payload; arity: number };

/**
 * Lossless, type-tagged string form of a payload. The empty string stands
 * for "no payload".
 */
export function payloadKey(payload: Payload | undefined): string {
  switch (typeof payload) {
    case "undefined":
      return "";
    case "string":
      return "s" + payload;
    case "number":
      // String(-0) is "0"; keep the sign
      return "n" + (Object.is(payload, -0) ? "-0" : String(payload));
    default:
      return payload ? "b1" : "b0";
  }
}

/** Inverse of {@link payloadKey}; undefined input means the key is invalid. */
export function parsePayloadKey(
  key: string
): { payload: Payload | undefined } | undefined {
  if (key === "") return { payload: undefined };
  const body = key.slice(1);
  switch (key[0]) {
    case "s":
      return { payload: body };
    case "n": {
      const value = Number(body);
      // Number("") is 0 and Number("0x1") is 1; only accept canonical text
      return payloadKey(value) === key ? { payload: value } : undefined;
    }
    case "b":
      if (body === "1") return { payload: true };
      if (body === "0") return { payload: false };
      return undefined;
    default:
      return undefined;
  }
}

export function headSignature(
  kind: string,
  payload: Payload | undefined,
  arity: number
): string {
  return JSON.stringify(["H", kind, payloadKey(payload), arity]);
}

export function headSignatureOf(node: AstNode): string {
  return headSignature(node.kind, node.payload, node.children.length);
}

export function treeSignature(pattern: PatternTuple): string {
  return JSON.stringify(["T", pattern]);
}

export function entrySignature(entry: DictionaryEntry): string {
  return entry.type === "tree"
    ? treeSignature(entry.pattern)
    : headSignature(entry.kind, entry.payload, entry.arity);
}

export function patternOf(tree: AstTree, id: NodeId): PatternTuple {
  const { kind, payload, children } = tree.node(id);
  return [kind, payloadKey(payload), children.map((child) => patternOf(tree, child))];
}

/**
 * Height of every reachable node's subtree, indexed by node id. A leaf has
 * height 1.
 */
export function subtreeHeights(tree: AstTree): Map<NodeId, number> {
  const heights = new Map<NodeId, number>();
  const order = tree.preorder();
  for (let i = order.length - 1; i >= 0; i--) {
    const id = order[i];
    let height = 1;
    for (const child of tree.children(id)) {
      height = Math.max(height, (heights.get(child) ?? 0) + 1);
    }
    heights.set(id, height);
  }
  return heights;
}
