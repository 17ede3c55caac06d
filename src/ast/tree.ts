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
import { describeShapeError, type Payload } from "./schema";

/** Index of a node inside its {@link AstTree}. */
export type NodeId = number;

export interface AstNode {
  kind: string;
  payload?: Payload;
  children: NodeId[];
}

/**
 * An AST stored as an arena: nodes live in one array and refer to their
 * children by index. Each node has exactly one parent, except the root.
 *
 * Rewrites may leave unreachable nodes behind; {@link AstTree.compact}
 * drops them and renumbers the rest in pre-order.
 */
export class AstTree {
  private readonly nodes: AstNode[] = [];
  private rootId: NodeId = -1;

  get size(): number {
    return this.nodes.length;
  }

  get root(): NodeId {
    if (this.rootId === -1) {
      throw new Error("Tree has no root");
    }
    return this.rootId;
  }

  set root(id: NodeId) {
    this.node(id);
    this.rootId = id;
  }

  add(kind: string, payload?: Payload, children: NodeId[] = []): NodeId {
    for (const child of children) this.node(child);
    const node: AstNode = { kind, children: [...children] };
    if (payload !== undefined) node.payload = payload;
    this.nodes.push(node);
    return this.nodes.length - 1;
  }

  node(id: NodeId): AstNode {
    const node = this.nodes[id];
    if (!Number.isInteger(id) || node === undefined) {
      throw new Error(`Node ${id} does not exist`);
    }
    return node;
  }

  kind(id: NodeId): string {
    return this.node(id).kind;
  }

  payload(id: NodeId): Payload | undefined {
    return this.node(id).payload;
  }

  children(id: NodeId): readonly NodeId[] {
    return this.node(id).children;
  }

  child(id: NodeId, index: number): NodeId {
    const child = this.node(id).children[index];
    if (child === undefined) {
      throw new Error(`Node ${id} has no child at ${index}`);
    }
    return child;
  }

  setChildren(id: NodeId, children: NodeId[]): void {
    for (const child of children) this.node(child);
    this.node(id).children = [...children];
  }

  setPayload(id: NodeId, payload: Payload): void {
    this.node(id).payload = payload;
  }

  /** Node ids reachable from the root, parents before children. */
  preorder(): NodeId[] {
    const order: NodeId[] = [];
    const stack: NodeId[] = [this.root];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      order.push(id);
      const { children } = this.node(id);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
    return order;
  }

  /**
   * Copies the reachable part of the tree into a new arena numbered in
   * pre-order. Fails when a node is reachable twice.
   */
  compact(): AstTree {
    const out = new AstTree();
    const seen = new Set<NodeId>();
    const copy = (id: NodeId): NodeId => {
      if (seen.has(id)) {
        throw new MalformedInput(`Node ${id} has more than one parent`);
      }
      seen.add(id);
      const node = this.node(id);
      const target = out.add(node.kind, node.payload);
      out.setChildren(target, node.children.map(copy));
      return target;
    };
    out.root = copy(this.root);
    return out;
  }

  clone(): AstTree {
    return this.compact();
  }

  /** Structural equality: kinds, payloads and child order. */
  equals(other: AstTree): boolean {
    const same = (a: NodeId, b: NodeId): boolean => {
      const left = this.node(a);
      const right = other.node(b);
      return (
        left.kind === right.kind &&
        Object.is(left.payload, right.payload) &&
        left.children.length === right.children.length &&
        left.children.every((child, i) => same(child, right.children[i]))
      );
    };
    return same(this.root, other.root);
  }
}

/**
 * Checks every reachable node against the schema and the tree invariant.
 * Throws {@link MalformedInput} on the first violation.
 */
export function validateTree(tree: AstTree): void {
  const seen = new Set<NodeId>();
  const stack: NodeId[] = [tree.root];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    if (seen.has(id)) {
      throw new MalformedInput(`Node ${id} has more than one parent`);
    }
    seen.add(id);
    const { kind, payload, children } = tree.node(id);
    const problem = describeShapeError(kind, payload, children.length);
    if (problem) {
      throw new MalformedInput(`Invalid ${kind} node: ${problem}`);
    }
    stack.push(...children);
  }
  if (tree.kind(tree.root) !== "Program") {
    throw new MalformedInput(
      `Root node must be a Program, found ${tree.kind(tree.root)}`
    );
  }
}
