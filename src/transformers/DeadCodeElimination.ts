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

const FUNCTION_BOUNDARIES: ReadonlySet<string> = new Set([
  "FunctionExpression",
  "ArrowFunctionExpression",
  "ClassMethod",
  "ClassPrivateMethod",
  "ObjectMethod",
]);

export const DeadCodeEliminationTransformer: NodeTransformer = {
  key: "dead-code-elimination",
  displayName: "Dead Code Elimination",
  kinds: ["IfStatement", "ConditionalExpression"],
  phases: ["main"],

  test(id, { tree }) {
    const test = constantValue(tree, field(tree, id, "test"));
    if (test === undefined) return false;
    const dropped = field(tree, id, test ? "alternate" : "consequent");
    // Hoisted declarations in the dropped branch are still visible.
    return tree.kind(id) !== "IfStatement" || !declaresHoisted(tree, dropped);
  },

  transform(id, { tree }) {
    const test = constantValue(tree, field(tree, id, "test"));
    const kept = field(tree, id, test ? "consequent" : "alternate");
    if (tree.kind(kept) === "None") {
      // If no alternate, the statement becomes empty
      return tree.add("EmptyStatement");
    }
    return kept;
  },
};

function declaresHoisted(tree: AstTree, id: NodeId): boolean {
  const kind = tree.kind(id);
  if (kind === "FunctionDeclaration") return true;
  if (kind === "VariableDeclaration" && attr(tree, id, "kind") === "var") {
    return true;
  }
  if (FUNCTION_BOUNDARIES.has(kind)) return false;
  return tree.children(id).some((child) => declaresHoisted(tree, child));
}
