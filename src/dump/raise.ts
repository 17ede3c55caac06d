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

import { MalformedInput } from "../errors";
import { describeShapeError, fieldsOf, leafSpec } from "../ast/schema";
import { validateTree, type AstTree, type NodeId } from "../ast/tree";
import type { JsonObject, JsonValue } from "./json";

/**
 * Converts an arena tree back into a Babel-shaped `Program` node. Fields are
 * emitted in schema order, so equal trees produce identical JSON.
 */
export function raiseProgram(tree: AstTree): JsonObject {
  validateTree(tree);
  return raiseNode(tree, tree.root);
}

function raiseValue(tree: AstTree, id: NodeId): JsonValue {
  const { kind, payload, children } = tree.node(id);
  switch (kind) {
    case "None":
      return null;
    case "Attr":
      if (payload === undefined) {
        throw new MalformedInput(`Attr node ${id} has no payload`);
      }
      return payload;
    case "List":
      return children.map((child) => raiseValue(tree, child));
    default:
      return raiseNode(tree, id);
  }
}

function raiseNode(tree: AstTree, id: NodeId): JsonObject {
  const { kind, payload, children } = tree.node(id);
  const problem = describeShapeError(kind, payload, children.length);
  if (problem) {
    throw new MalformedInput(`Invalid ${kind} node: ${problem}`);
  }

  const leaf = leafSpec(kind);
  if (leaf) {
    return { type: kind, [leaf.field]: payload ?? null };
  }

  const values = children.map((child) => raiseValue(tree, child));

  if (kind === "TemplateElement") {
    const [raw, cooked, tail] = values;
    if (typeof raw !== "string" || (cooked !== null && typeof cooked !== "string")) {
      throw new MalformedInput(`TemplateElement node ${id} has invalid text`);
    }
    return { type: kind, value: { raw, cooked }, tail };
  }

  const node: JsonObject = { type: kind };
  (fieldsOf(kind) ?? []).forEach((field, i) => {
    node[field] = values[i];
  });
  return node;
}
