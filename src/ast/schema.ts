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

import { z } from "zod";
import schemaData from "./schema.json";

/**
 * Literal value carried by a node: an identifier name, a literal's value or
 * a primitive field such as an operator.
 */
export type Payload = string | number | boolean;

export type PayloadType = "string" | "number" | "boolean";

export interface LeafSpec {
  /** Name of the Babel field holding the payload. */
  field: string;
  type: PayloadType;
}

const SchemaFile = z.object({
  leaves: z.record(
    z.object({
      field: z.string(),
      type: z.enum(["string", "number", "boolean"]),
    })
  ),
  nodes: z.record(z.array(z.string())),
});

const schema = SchemaFile.parse(schemaData);

/**
 * Kinds that model the JSON structure around Babel nodes:
 * `List` is an array field, `None` an absent field and `Attr` a primitive one.
 */
export const STRUCTURAL_KINDS = ["List", "None", "Attr"] as const;

export type StructuralKind = (typeof STRUCTURAL_KINDS)[number];

const LEAVES = new Map<string, LeafSpec>(Object.entries(schema.leaves));
const FIELDS = new Map<string, readonly string[]>(Object.entries(schema.nodes));

/**
 * Every node kind, in tag order. The position of a kind in this list is its
 * kind tag on the wire, so entries are only ever appended.
 */
export const NODE_KINDS: readonly string[] = [
  ...STRUCTURAL_KINDS,
  ...LEAVES.keys(),
  ...FIELDS.keys(),
];

const KIND_TAGS = new Map(NODE_KINDS.map((kind, tag) => [kind, tag]));

export function kindTag(kind: string): number | undefined {
  return KIND_TAGS.get(kind);
}

export function kindFromTag(tag: number): string | undefined {
  return tag < NODE_KINDS.length ? NODE_KINDS[tag] : undefined;
}

export function isStructuralKind(kind: string): kind is StructuralKind {
  return kind === "List" || kind === "None" || kind === "Attr";
}

export function leafSpec(kind: string): LeafSpec | undefined {
  return LEAVES.get(kind);
}

/** Ordered Babel fields of a non-leaf node kind. */
export function fieldsOf(kind: string): readonly string[] | undefined {
  return FIELDS.get(kind);
}

export function fieldIndex(kind: string, field: string): number {
  const index = FIELDS.get(kind)?.indexOf(field) ?? -1;
  if (index === -1) {
    throw new Error(`Node kind "${kind}" has no field "${field}"`);
  }
  return index;
}

export function payloadTypeOf(payload: Payload): PayloadType {
  switch (typeof payload) {
    case "string":
      return "string";
    case "number":
      return "number";
    default:
      return "boolean";
  }
}

/**
 * Checks a node's kind, payload and child count against the schema.
 * Returns a description of the violation, or undefined for a valid shape.
 */
export function describeShapeError(
  kind: string,
  payload: Payload | undefined,
  childCount: number
): string | undefined {
  if (kind === "List") {
    return payload === undefined ? undefined : "List nodes carry no payload";
  }
  if (kind === "None") {
    if (payload !== undefined) return "None nodes carry no payload";
    return childCount === 0 ? undefined : "None nodes have no children";
  }
  if (kind === "Attr") {
    if (payload === undefined) return "Attr nodes require a payload";
    return childCount === 0 ? undefined : "Attr nodes have no children";
  }

  const leaf = LEAVES.get(kind);
  if (leaf) {
    if (payload === undefined || payloadTypeOf(payload) !== leaf.type) {
      return `${kind} requires a ${leaf.type} payload`;
    }
    return childCount === 0 ? undefined : `${kind} has no children`;
  }

  const fields = FIELDS.get(kind);
  if (!fields) return `unknown node kind "${kind}"`;
  if (payload !== undefined) return `${kind} carries no payload`;
  if (childCount !== fields.length) {
    return `${kind} requires ${fields.length} children, found ${childCount}`;
  }
  return undefined;
}
