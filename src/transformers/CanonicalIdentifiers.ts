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

import { canonicalNames } from "../ast/names";
import type { AstTree, NodeId } from "../ast/tree";
import { attr, field, type NodeTransformer } from "./transformers";

const FUNCTION_KINDS: ReadonlySet<string> = new Set([
  "FunctionDeclaration",
  "FunctionExpression",
  "ArrowFunctionExpression",
  "ClassMethod",
  "ClassPrivateMethod",
  "ObjectMethod",
]);

/** Nodes that open a lexical scope for `let`, `const` and `class`. */
const BLOCK_SCOPE_KINDS: ReadonlySet<string> = new Set([
  "BlockStatement",
  "ForStatement",
  "ForInStatement",
  "ForOfStatement",
  "CatchClause",
  "StaticBlock",
  "ClassExpression",
]);

/**
 * Renames local bindings to canonical short names, in order of first
 * occurrence. A name keeps its spelling when any of its occurrences does not
 * resolve to a function or block binding: script globals, builtins and other
 * free names.
 *
 * Renaming is program-wide: all occurrences of a local name get the same
 * canonical name.
 */
export const CanonicalIdentifiersTransformer: NodeTransformer = {
  key: "canonical-identifiers",
  displayName: "Canonical Identifier Names",
  kinds: ["Program"],
  phases: ["post"],

  test: () => true,

  transform(id, { tree, logger }) {
    const references = collectReferences(tree, id, collectScopes(tree, id));

    const local = new Set<string>();
    const taken = new Set<string>();
    for (const reference of references) {
      (reference.local ? local : taken).add(reference.name);
    }

    const renames = new Map<string, string>();
    const names = canonicalNames(taken);
    for (const { name } of references) {
      if (!local.has(name) || taken.has(name) || renames.has(name)) continue;
      const next = names.next();
      if (next.done) break;
      renames.set(name, next.value);
    }

    for (const { id: identifier, name } of references) {
      const renamed = renames.get(name);
      if (renamed !== undefined) tree.setPayload(identifier, renamed);
    }

    logger.debug(`Renamed ${renames.size} local names, kept ${taken.size} global names`);
    return id;
  },
};

/**
 * Names bound directly in each function and block scope, keyed by the node
 * that opens the scope. Script-level bindings are not recorded.
 *
 * `var` binds in the nearest function; `let`, `const`, classes and function
 * declarations bind in the nearest block. Binding a function declaration in
 * its block means a use outside the block never counts as local.
 */
function collectScopes(tree: AstTree, root: NodeId): Map<NodeId, Set<string>> {
  const scopes = new Map<NodeId, Set<string>>();

  const bind = (pattern: NodeId, scope: Set<string>) =>
    walkPattern(tree, pattern, (name) => scope.add(name));

  const open = (id: NodeId): Set<string> => {
    const scope = new Set<string>();
    scopes.set(id, scope);
    return scope;
  };

  const visit = (id: NodeId, functionScope: Set<string>, blockScope: Set<string>): void => {
    const kind = tree.kind(id);
    if (kind === "SwitchStatement") {
      // The cases share one scope; the discriminant is outside it
      visit(field(tree, id, "discriminant"), functionScope, blockScope);
      const cases = field(tree, id, "cases");
      const caseScope = open(cases);
      for (const child of tree.children(cases)) visit(child, functionScope, caseScope);
      return;
    }
    switch (kind) {
      case "VariableDeclaration": {
        const target = attr(tree, id, "kind") === "var" ? functionScope : blockScope;
        for (const declarator of tree.children(field(tree, id, "declarations"))) {
          bind(field(tree, declarator, "id"), target);
        }
        break;
      }
      case "FunctionDeclaration":
      case "ClassDeclaration":
        bind(field(tree, id, "id"), blockScope);
        break;
    }

    let innerFunction = functionScope;
    let innerBlock = blockScope;
    if (FUNCTION_KINDS.has(kind)) {
      innerFunction = innerBlock = open(id);
      bind(field(tree, id, "params"), innerFunction);
      if (kind === "FunctionExpression") bind(field(tree, id, "id"), innerFunction);
    } else if (BLOCK_SCOPE_KINDS.has(kind)) {
      innerBlock = open(id);
      if (kind === "CatchClause") bind(field(tree, id, "param"), innerBlock);
      if (kind === "ClassExpression") bind(field(tree, id, "id"), innerBlock);
      // `var` inside a static block stays in the block
      if (kind === "StaticBlock") innerFunction = innerBlock;
    }
    for (const child of tree.children(id)) visit(child, innerFunction, innerBlock);
  };

  const globals = new Set<string>();
  visit(root, globals, globals);
  return scopes;
}

function walkPattern(tree: AstTree, id: NodeId, add: (name: string) => void): void {
  switch (tree.kind(id)) {
    case "Identifier": {
      const name = tree.payload(id);
      if (typeof name === "string") add(name);
      break;
    }
    case "ObjectProperty":
      walkPattern(tree, field(tree, id, "value"), add);
      break;
    case "ObjectPattern":
      walkPattern(tree, field(tree, id, "properties"), add);
      break;
    case "ArrayPattern":
      walkPattern(tree, field(tree, id, "elements"), add);
      break;
    case "AssignmentPattern":
      walkPattern(tree, field(tree, id, "left"), add);
      break;
    case "RestElement":
      walkPattern(tree, field(tree, id, "argument"), add);
      break;
    case "List":
      for (const child of tree.children(id)) walkPattern(tree, child, add);
      break;
  }
}

interface Reference {
  id: NodeId;
  name: string;
  /** Resolves to a binding of an enclosing function or block. */
  local: boolean;
}

/**
 * Identifiers in binding or reference position, in pre-order. Property
 * names, method keys, labels and meta properties are skipped.
 */
function collectReferences(
  tree: AstTree,
  root: NodeId,
  scopes: ReadonlyMap<NodeId, ReadonlySet<string>>
): Reference[] {
  const references: Reference[] = [];
  const visit = (id: NodeId, chain: readonly ReadonlySet<string>[]): void => {
    if (tree.kind(id) === "Identifier") {
      const name = tree.payload(id);
      if (typeof name === "string") {
        references.push({ id, name, local: chain.some((scope) => scope.has(name)) });
      }
      return;
    }
    const scope = scopes.get(id);
    const inner = scope ? [...chain, scope] : chain;
    // A function declaration's name is bound outside the function
    const outerName =
      tree.kind(id) === "FunctionDeclaration" ? field(tree, id, "id") : undefined;
    tree.children(id).forEach((child, index) => {
      if (isNameSlot(tree, id, index)) return;
      visit(child, child === outerName ? chain : inner);
    });
  };
  visit(root, []);
  return references;
}

function isNameSlot(tree: AstTree, parent: NodeId, index: number): boolean {
  switch (tree.kind(parent)) {
    case "MemberExpression":
    case "OptionalMemberExpression":
      return (
        tree.child(parent, index) === field(tree, parent, "property") &&
        attr(tree, parent, "computed") !== true
      );
    case "ObjectProperty":
    case "ObjectMethod":
    case "ClassMethod":
    case "ClassProperty":
      return (
        tree.child(parent, index) === field(tree, parent, "key") &&
        attr(tree, parent, "computed") !== true
      );
    case "PrivateName":
    case "MetaProperty":
    case "LabeledStatement":
    case "BreakStatement":
    case "ContinueStatement":
      return tree.kind(tree.child(parent, index)) === "Identifier";
    default:
      return false;
  }
}
