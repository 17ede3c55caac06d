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
import {
  type Constant,
  type NodeTransformer,
  attr,
  constantValue,
  field,
  hasLiteralForm,
  makeConstant,
} from "./transformers";

export const ConstantFoldingTransformer: NodeTransformer = {
  key: "constant-folding",
  displayName:
    "Constant Folding (Compile-time Evaluation of Binary Expressions)",
  kinds: ["BinaryExpression"],
  phases: ["main"],

  test(id, { tree }) {
    const folded = foldBinaryExpression(tree, id);
    return folded !== undefined && hasLiteralForm(folded);
  },

  transform(id, { tree }) {
    const folded = foldBinaryExpression(tree, id);
    return folded === undefined ? id : makeConstant(tree, folded) ?? id;
  },
};

function foldBinaryExpression(tree: AstTree, id: NodeId): Constant | undefined {
  const operator = attr(tree, id, "operator");
  const left = constantValue(tree, field(tree, id, "left"));
  const right = constantValue(tree, field(tree, id, "right"));
  if (typeof operator !== "string" || left === undefined || right === undefined) {
    return undefined;
  }
  return evaluateBinaryExpression(operator, left, right);
}

// Helper: Evaluate known binary operations with JavaScript's coercions
function evaluateBinaryExpression(
  op: string,
  left: Constant,
  right: Constant
): Constant | undefined {
  if (typeof left === "string" && typeof right === "string") {
    switch (op) {
      case "<":
        return left < right;
      case "<=":
        return left <= right;
      case ">":
        return left > right;
      case ">=":
        return left >= right;
    }
  }

  const l = Number(left);
  const r = Number(right);
  switch (op) {
    case "+":
      return typeof left === "string" || typeof right === "string"
        ? String(left) + String(right)
        : l + r;
    case "-":
      return l - r;
    case "*":
      return l * r;
    case "/":
      return l / r;
    case "%":
      return l % r;
    case "**":
      return l ** r;
    case "&":
      return l & r;
    case "|":
      return l | r;
    case "^":
      return l ^ r;
    case "<<":
      return l << r;
    case ">>":
      return l >> r;
    case ">>>":
      return l >>> r;
    case "===":
      return left === right;
    case "!==":
      return left !== right;
    case "==":
      return typeof left === typeof right ? left === right : l === r;
    case "!=":
      return typeof left === typeof right ? left !== right : l !== r;
    case "<":
      return l < r;
    case "<=":
      return l <= r;
    case ">":
      return l > r;
    case ">=":
      return l >= r;
    default:
      return undefined;
  }
}
