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

import { validateTree, type AstTree } from "../ast/tree";
import { DEFAULT_DICTIONARY_OPTIONS, type DictionaryOptions } from "../config";
import { EmptyCorpus } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { Dictionary } from "./dictionary";
import {
  headSignatureOf,
  patternOf,
  subtreeHeights,
  treeSignature,
  type DictionaryEntry,
} from "./patterns";

interface Candidate {
  entry: DictionaryEntry;
  count: number;
}

/**
 * Builds a dictionary from a corpus of optimized trees.
 *
 * Candidates are the complete subtrees of height at most `maxDepth`, and the
 * head (kind, payload, child count) of every inner node. They are ranked by
 * how often they occur across the corpus; ties keep first-seen order, so
 * the result only depends on the corpus and the options.
 */
export function buildDictionary(
  corpus: readonly AstTree[],
  options: Partial<DictionaryOptions> = {},
  logger: Logger = silentLogger
): Dictionary {
  if (corpus.length === 0) {
    throw new EmptyCorpus();
  }
  const { maxEntries, maxDepth, minFrequency } = {
    ...DEFAULT_DICTIONARY_OPTIONS,
    ...options,
  };
  const log = logger.child("dictionary");

  // Map iteration follows insertion order, i.e. first-seen order.
  const candidates = new Map<string, Candidate>();
  const count = (signature: string, entry: () => DictionaryEntry) => {
    const candidate = candidates.get(signature);
    if (candidate) {
      candidate.count++;
    } else {
      candidates.set(signature, { entry: entry(), count: 1 });
    }
  };

  for (const tree of corpus) {
    validateTree(tree);
    const heights = subtreeHeights(tree);
    for (const id of tree.preorder()) {
      const node = tree.node(id);
      if ((heights.get(id) ?? Infinity) <= maxDepth) {
        const pattern = patternOf(tree, id);
        count(treeSignature(pattern), () => ({ type: "tree", pattern }));
      }
      if (node.children.length > 0) {
        count(headSignatureOf(node), () => ({
          type: "head",
          kind: node.kind,
          ...(node.payload === undefined ? {} : { payload: node.payload }),
          arity: node.children.length,
        }));
      }
    }
  }

  // Array.prototype.sort is stable, so equal counts stay in first-seen order.
  const selected = [...candidates.values()]
    .filter((candidate) => candidate.count >= minFrequency)
    .sort((a, b) => b.count - a.count)
    .slice(0, maxEntries)
    .map((candidate) => candidate.entry);

  log.info(
    `Selected ${selected.length} of ${candidates.size} patterns from ${corpus.length} tree${
      corpus.length === 1 ? "" : "s"
    }`
  );
  return new Dictionary(selected, maxDepth);
}
