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

import { describe, expect, it } from "vitest";
import {
  NODE_KINDS,
  describeShapeError,
  kindFromTag,
  kindTag,
} from "../src/ast/schema";
import { AstTree, validateTree } from "../src/ast/tree";
import { lowerProgram } from "../src/dump/lower";
import { MalformedInput } from "../src/errors";

function emptyProgram(tree: AstTree): number {
  const body = tree.add("List");
  const directives = tree.add("List");
  const sourceType = tree.add("Attr", "script");
  return tree.add("Program", undefined, [body, directives, sourceType]);
}

function expressionProgram(expression: unknown) {
  return lowerProgram({
    type: "Program",
    body: [{ type: "ExpressionStatement", expression }],
    directives: [],
    sourceType: "script",
  });
}

describe("schema", () => {
  it("numbers structural kinds first", () => {
    expect(kindTag("List")).toBe(0);
    expect(kindTag("None")).toBe(1);
    expect(kindTag("Attr")).toBe(2);
    expect(kindFromTag(0)).toBe("List");
    expect(kindFromTag(NODE_KINDS.length)).toBeUndefined();
    expect(kindTag("ImportDeclaration")).toBeUndefined();
  });

  it("describes shape violations", () => {
    expect(describeShapeError("Identifier", "x", 0)).toBeUndefined();
    expect(describeShapeError("Identifier", 1, 0)).toBe(
      "Identifier requires a string payload"
    );
    expect(describeShapeError("Attr", undefined, 0)).toBe(
      "Attr nodes require a payload"
    );
    expect(describeShapeError("ReturnStatement", undefined, 2)).toBe(
      "ReturnStatement requires 1 children, found 2"
    );
    expect(describeShapeError("Widget", undefined, 0)).toBe(
      'unknown node kind "Widget"'
    );
  });
});

describe("AstTree", () => {
  it("compacts reachable nodes in pre-order", () => {
    const tree = new AstTree();
    tree.add("Identifier", "unused");
    tree.root = emptyProgram(tree);

    const compacted = tree.compact();
    expect(tree.size).toBe(5);
    expect(compacted.size).toBe(4);
    expect(compacted.root).toBe(0);
    expect(compacted.kind(0)).toBe("Program");
    expect(compacted.children(0)).toEqual([1, 2, 3]);
    expect(compacted.payload(3)).toBe("script");
    expect(compacted.equals(tree)).toBe(true);
  });

  it("rejects a node with two parents", () => {
    const tree = new AstTree();
    const list = tree.add("List");
    const sourceType = tree.add("Attr", "script");
    tree.root = tree.add("Program", undefined, [list, list, sourceType]);

    expect(() => validateTree(tree)).toThrow(MalformedInput);
    expect(() => tree.compact()).toThrow(MalformedInput);
  });

  it("requires a Program root", () => {
    const tree = new AstTree();
    tree.root = tree.add("Identifier", "x");
    expect(() => validateTree(tree)).toThrow(
      "Root node must be a Program, found Identifier"
    );
  });

  it("rejects nodes with the wrong number of children", () => {
    const tree = new AstTree();
    tree.root = tree.add("Program", undefined, [tree.add("List")]);
    expect(() => validateTree(tree)).toThrow(MalformedInput);
  });

  it("compares payloads with Object.is", () => {
    const zero = expressionProgram({ type: "NumericLiteral", value: 0 });
    const negativeZero = expressionProgram({ type: "NumericLiteral", value: -0 });
    const notANumber = expressionProgram({ type: "NumericLiteral", value: NaN });

    expect(zero.equals(negativeZero)).toBe(false);
    expect(notANumber.equals(notANumber.clone())).toBe(true);
  });

  it("refuses to address missing nodes", () => {
    const tree = new AstTree();
    expect(() => tree.node(0)).toThrow("Node 0 does not exist");
    expect(() => tree.root).toThrow("Tree has no root");
    expect(() => {
      tree.root = 3;
    }).toThrow("Node 3 does not exist");
  });
});
