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

import { validateTree, type AstTree, type NodeId } from "./ast/tree";
import { silentLogger, type Logger } from "./logger";
import { CanonicalIdentifiersTransformer } from "./transformers/CanonicalIdentifiers";
import { ConstantFoldingTransformer } from "./transformers/ConstantFolding";
import { DeadCodeEliminationTransformer } from "./transformers/DeadCodeElimination";
import { LogicalSimplificationTransformer } from "./transformers/LogicalSimplification";
import type {
  NodeTransformer,
  Phase,
  TransformContext,
} from "./transformers/transformers";

export const TRANSFORMERS: readonly NodeTransformer[] = [
  ConstantFoldingTransformer,
  LogicalSimplificationTransformer,
  DeadCodeEliminationTransformer,
  CanonicalIdentifiersTransformer,
];

const PHASES: Phase[] = ["main", "post"];

export interface OptimizeOptions {
  logger?: Logger;
  transformers?: readonly NodeTransformer[];
}

/**
 * Canonicalizes a tree for compression. The input is left untouched.
 *
 * Each phase rewrites the tree bottom-up: a node is visited after its
 * children, and transformers are re-applied to a replacement until none
 * matches, so one pass reaches a fixpoint and `optimize` is idempotent.
 */
export function optimize(input: AstTree, options: OptimizeOptions = {}): AstTree {
  validateTree(input);
  const tree = input.clone();
  const logger = (options.logger ?? silentLogger).child("optimizer");
  const transformers = options.transformers ?? TRANSFORMERS;
  let applied = 0;

  for (const phase of PHASES) {
    const context: TransformContext = { tree, phase, logger };
    const active = transformers.filter((transformer) =>
      transformer.phases ? transformer.phases.includes(phase) : true
    );

    const apply = (id: NodeId): NodeId => {
      let current = id;
      let changed = true;
      while (changed) {
        changed = false;
        for (const transformer of active) {
          const kind = tree.kind(current);
          const matchesKind =
            !transformer.kinds || transformer.kinds.includes(kind);
          if (!matchesKind || !transformer.test(current, context)) continue;

          logger.debug(
            `[${phase.toUpperCase()}] Applying transformer "${
              transformer.displayName
            }" (${transformer.key}) to node ${current} (Kind: ${kind})`
          );
          applied++;
          const result = transformer.transform(current, context);
          if (result !== current) {
            current = result;
            changed = true;
            break;
          }
        }
      }
      return current;
    };

    const rewrite = (id: NodeId): NodeId => {
      tree.setChildren(id, tree.children(id).map(rewrite));
      return apply(id);
    };

    tree.root = rewrite(tree.root);
  }

  const result = tree.compact();
  validateTree(result);
  logger.info(
    `Applied ${applied} rewrites; ${input.size} nodes in, ${result.size} out`
  );
  return result;
}
