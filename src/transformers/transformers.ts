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

import { fieldIndex } from "../ast/schema";
import type { AstTree, NodeId } from "../ast/tree";
import type { Logger } from "../logger";

export type Phase = "main" | "post";

export interface TransformContext {
  /**
   * The tree being optimized. Transformers may add nodes and rewrite
   * payloads or child lists in place.
   */
  tree: AstTree;
  /**
   * The current phase of the optimizer
   */
  phase: Phase;
  logger: Logger;
}

export interface NodeTransformer {
  key: string;
  displayName: string;

  // Optional: Limits the node kinds this transformer applies to
  kinds?: string[];

  // Optional: Which phases this transformer runs in (default: all)
  phases?: Phase[];

  // Required: Checks if this transformer should run on a given node
  test: (id: NodeId, context: TransformContext) => boolean;

  // Required: Returns the replacement node, or `id` itself when the node
  // was kept (possibly rewritten in place)
  transform: (id: NodeId, context: TransformContext) => NodeId;
}

export type Constant = string | number | boolean;

export const LITERAL_KINDS: ReadonlySet<string> = new Set([
  "StringLiteral",
  "NumericLiteral",
  "BooleanLiteral",
]);

/** Child of `id` holding the schema field `name`. */
export function field(tree: AstTree, id: NodeId, name: string): NodeId {
  return tree.child(id, fieldIndex(tree.kind(id), name));
}

/** Payload of the `Attr` child holding field `name`, if any. */
export function attr(
  tree: AstTree,
  id: NodeId,
  name: string
): string | number | boolean | undefined {
  const child = field(tree, id, name);
  return tree.kind(child) === "Attr" ? tree.payload(child) : undefined;
}

/**
 * Compile-time value of a literal, or of a negated numeric literal.
 * Returns undefined for anything else.
 */
export function constantValue(tree: AstTree, id: NodeId): Constant | undefined {
  const kind = tree.kind(id);
  if (LITERAL_KINDS.has(kind)) {
    return tree.payload(id);
  }
  if (kind === "UnaryExpression" && attr(tree, id, "operator") === "-") {
    const argument = field(tree, id, "argument");
    const value = tree.payload(argument);
    if (tree.kind(argument) === "NumericLiteral" && typeof value === "number") {
      return -value;
    }
  }
  return undefined;
}

/** Non-finite numbers and -0 cannot be written as literals. */
export function hasLiteralForm(value: Constant): boolean {
  return typeof value !== "number" || (Number.isFinite(value) && !Object.is(value, -0));
}

/**
 * Builds the literal for a folded value. Negative numbers become a unary
 * minus applied to a numeric literal, as a parser would produce them.
 */
export function makeConstant(
  tree: AstTree,
  value: Constant
): NodeId | undefined {
  if (typeof value === "string") return tree.add("StringLiteral", value);
  if (typeof value === "boolean") return tree.add("BooleanLiteral", value);
  if (!hasLiteralForm(value)) return undefined;
  if (value < 0) {
    return tree.add("UnaryExpression", undefined, [
      tree.add("Attr", "-"),
      tree.add("NumericLiteral", -value),
      tree.add("Attr", true),
    ]);
  }
  return tree.add("NumericLiteral", value);
}
