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
import {
  fieldsOf,
  leafSpec,
  type Payload,
  type PayloadType,
} from "../ast/schema";
import { AstTree, validateTree, type NodeId } from "../ast/tree";
import { isRecord } from "./json";

/**
 * Converts a Babel-shaped `Program` node (parsed JSON or a live Babel AST)
 * into an arena tree. Fields outside the node schema, such as locations and
 * `extra`, are dropped.
 */
export function lowerProgram(program: unknown): AstTree {
  const tree = new AstTree();
  tree.root = lowerValue(tree, program, "program");
  validateTree(tree);
  return tree;
}

function isPayloadOf(value: unknown, type: PayloadType): value is Payload {
  return typeof value === type;
}

function lowerValue(tree: AstTree, value: unknown, path: string): NodeId {
  if (value === null || value === undefined) {
    return tree.add("None");
  }
  if (Array.isArray(value)) {
    const items = value.map((item, i) => lowerValue(tree, item, `${path}[${i}]`));
    return tree.add("List", undefined, items);
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return tree.add("Attr", value);
  }
  if (isRecord(value) && typeof value.type === "string") {
    return lowerNode(tree, value.type, value, path);
  }
  throw new MalformedInput(`Unsupported value at ${path}`);
}

function lowerNode(
  tree: AstTree,
  type: string,
  node: Record<string, unknown>,
  path: string
): NodeId {
  const leaf = leafSpec(type);
  if (leaf) {
    const value = node[leaf.field];
    if (!isPayloadOf(value, leaf.type)) {
      throw new MalformedInput(
        `${path}: ${type}.${leaf.field} must be a ${leaf.type}`
      );
    }
    return tree.add(type, value);
  }

  if (type === "TemplateElement") {
    return lowerTemplateElement(tree, node, path);
  }

  const fields = fieldsOf(type);
  if (!fields) {
    throw new MalformedInput(`Unsupported node type "${type}" at ${path}`);
  }
  const children = fields.map((field) =>
    lowerValue(tree, node[field], `${path}.${field}`)
  );
  return tree.add(type, undefined, children);
}

// TemplateElement keeps its text in a `{ raw, cooked }` object; both halves
// become fields of their own.
function lowerTemplateElement(
  tree: AstTree,
  node: Record<string, unknown>,
  path: string
): NodeId {
  const value = node.value;
  if (!isRecord(value) || typeof value.raw !== "string") {
    throw new MalformedInput(`${path}: TemplateElement.value.raw must be a string`);
  }
  const cooked = value.cooked;
  if (cooked !== null && cooked !== undefined && typeof cooked !== "string") {
    throw new MalformedInput(
      `${path}: TemplateElement.value.cooked must be a string or null`
    );
  }
  return tree.add("TemplateElement", undefined, [
    tree.add("Attr", value.raw),
    typeof cooked === "string" ? tree.add("Attr", cooked) : tree.add("None"),
    lowerValue(tree, node.tail, `${path}.tail`),
  ]);
}
