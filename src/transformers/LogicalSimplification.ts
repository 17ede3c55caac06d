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

import type { AstTree, NodeId } from "../ast/tree";
import { attr, constantValue, field, type NodeTransformer } from "./transformers";

export const LogicalSimplificationTransformer: NodeTransformer = {
  key: "logical-simplification",
  displayName: "Simplify Boolean Expressions",
  kinds: ["UnaryExpression", "LogicalExpression"],
  phases: ["main"],

  test(id, { tree }) {
    return simplify(tree, id, false) !== undefined;
  },

  transform(id, { tree }) {
    return simplify(tree, id, true) ?? id;
  },
};

/**
 * Returns the simplified node for `id`, or undefined when no rule applies.
 * With `build` unset nothing is added to the tree and any defined result
 * only signals that a rule applies.
 */
function simplify(tree: AstTree, id: NodeId, build: boolean): NodeId | undefined {
  const operator = attr(tree, id, "operator");

  // Simplify: !true → false, !0 → true, !"" → true
  if (tree.kind(id) === "UnaryExpression") {
    if (operator !== "!") return undefined;
    const value = constantValue(tree, field(tree, id, "argument"));
    if (value === undefined) return undefined;
    return build ? tree.add("BooleanLiteral", !value) : id;
  }

  const left = field(tree, id, "left");
  const value = constantValue(tree, left);
  if (value === undefined) return undefined;
  const right = field(tree, id, "right");

  switch (operator) {
    // Simplify: true && x → x, false && x → false
    case "&&":
      return value ? right : left;
    // Simplify: true || x → true, false || x → x
    case "||":
      return value ? left : right;
    // Literals are never nullish: "a" ?? x → "a"
    case "??":
      return left;
    default:
      return undefined;
  }
}
