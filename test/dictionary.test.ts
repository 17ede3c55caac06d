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

import { encode as msgpackEncode } from "@msgpack/msgpack";
import { brotliCompressSync } from "zlib";
import { describe, expect, it } from "vitest";
import { DICTIONARY_MAGIC_HEADER, FORMAT_VERSION } from "../src/codec/format";
import { buildDictionary } from "../src/dictionary/builder";
import { Dictionary } from "../src/dictionary/dictionary";
import { loadDictionary, serializeDictionary } from "../src/dictionary/file";
import { parsePayloadKey, payloadKey } from "../src/dictionary/patterns";
import { parseJavaScript } from "../src/dump/javascript";
import { EmptyCorpus, InvalidDictionary } from "../src/errors";

function dictionaryFile(document: unknown): Buffer {
  return Buffer.concat([
    DICTIONARY_MAGIC_HEADER,
    FORMAT_VERSION,
    brotliCompressSync(msgpackEncode(document)),
  ]);
}

describe("payload keys", () => {
  it("tag each payload type", () => {
    expect(payloadKey(undefined)).toBe("");
    expect(payloadKey("x")).toBe("sx");
    expect(payloadKey(1.5)).toBe("n1.5");
    expect(payloadKey(-0)).toBe("n-0");
    expect(payloadKey(true)).toBe("b1");
  });

  it("parse back only canonical keys", () => {
    expect(parsePayloadKey("n-0")).toEqual({ payload: -0 });
    expect(parsePayloadKey("nNaN")).toEqual({ payload: NaN });
    expect(parsePayloadKey("s")).toEqual({ payload: "" });
    expect(parsePayloadKey("n0x1")).toBeUndefined();
    expect(parsePayloadKey("n")).toBeUndefined();
    expect(parsePayloadKey("b2")).toBeUndefined();
    expect(parsePayloadKey("q")).toBeUndefined();
  });
});

describe("buildDictionary", () => {
  it("rejects an empty corpus", () => {
    expect(() => buildDictionary([])).toThrow(EmptyCorpus);
  });

  it("lists candidates in first-seen order when counts tie", () => {
    const dictionary = buildDictionary([parseJavaScript("x;")]);
    const statement = ["ExpressionStatement", "", [["Identifier", "sx", []]]];

    expect(dictionary.maxDepth).toBe(3);
    expect(dictionary.entries).toEqual([
      { type: "head", kind: "Program", arity: 3 },
      { type: "tree", pattern: ["List", "", [statement]] },
      { type: "head", kind: "List", arity: 1 },
      { type: "tree", pattern: statement },
      { type: "head", kind: "ExpressionStatement", arity: 1 },
      { type: "tree", pattern: ["Identifier", "sx", []] },
      { type: "tree", pattern: ["List", "", []] },
      { type: "tree", pattern: ["Attr", "sscript", []] },
    ]);
  });

  it("ranks frequent patterns first", () => {
    const corpus = [parseJavaScript("x; x;")];
    const statement = ["ExpressionStatement", "", [["Identifier", "sx", []]]];

    expect(buildDictionary(corpus).entries.slice(0, 3)).toEqual([
      { type: "tree", pattern: statement },
      { type: "head", kind: "ExpressionStatement", arity: 1 },
      { type: "tree", pattern: ["Identifier", "sx", []] },
    ]);
    expect(buildDictionary(corpus, { minFrequency: 2 }).size).toBe(3);
    expect(buildDictionary(corpus, { maxEntries: 2 }).size).toBe(2);
  });

  it("is deterministic", () => {
    const corpus = () => [
      parseJavaScript("function f(a) {\n  return a * 2;\n}"),
      parseJavaScript("let total = f(1) + f(2);"),
    ];
    expect(serializeDictionary(buildDictionary(corpus()))).toEqual(
      serializeDictionary(buildDictionary(corpus()))
    );
  });

  it("limits subtree patterns to the maximum depth", () => {
    const dictionary = buildDictionary([parseJavaScript("x;")], { maxDepth: 1 });
    expect(dictionary.entries.filter((entry) => entry.type === "tree")).toEqual([
      { type: "tree", pattern: ["Identifier", "sx", []] },
      { type: "tree", pattern: ["List", "", []] },
      { type: "tree", pattern: ["Attr", "sscript", []] },
    ]);
  });
});

describe("Dictionary", () => {
  it("assigns codes by position", () => {
    const dictionary = new Dictionary(
      [
        { type: "head", kind: "List", arity: 2 },
        { type: "tree", pattern: ["NumericLiteral", "n-0", []] },
      ],
      2
    );
    expect(dictionary.lookup('["H","List","",2]')).toBe(0);
    expect(dictionary.lookup('["T",["NumericLiteral","n-0",[]]]')).toBe(1);
    expect(dictionary.entry(2)).toBeUndefined();
  });

  it("rejects duplicate and malformed entries", () => {
    expect(
      () =>
        new Dictionary(
          [
            { type: "head", kind: "List", arity: 1 },
            { type: "head", kind: "List", arity: 1 },
          ],
          3
        )
    ).toThrow("Entry 1 duplicates entry 0");
    expect(
      () => new Dictionary([{ type: "head", kind: "Identifier", arity: 0 }], 3)
    ).toThrow(InvalidDictionary);
    expect(() => new Dictionary([], 0)).toThrow(InvalidDictionary);
  });
});

describe("dictionary files", () => {
  it("load what they save", () => {
    const dictionary = new Dictionary(
      [
        { type: "tree", pattern: ["NumericLiteral", "n-0", []] },
        { type: "head", kind: "Attr", payload: "const", arity: 0 },
        { type: "head", kind: "List", arity: 2 },
      ],
      2
    );
    const loaded = loadDictionary(serializeDictionary(dictionary));

    expect(loaded.maxDepth).toBe(2);
    expect(loaded.entries).toEqual(dictionary.entries);
  });

  it("start with the dictionary magic header", () => {
    const file = serializeDictionary(new Dictionary([], 3));
    expect([...file.subarray(0, 5)]).toEqual([0xa5, 0x7b, 0x1c, 0x0d, 0x01]);
  });

  it("reject files that are not dictionaries", () => {
    expect(() => loadDictionary(Buffer.from([0, 1, 2, 3, 4]))).toThrow(
      "Invalid dictionary file: bad magic number"
    );
    expect(() => loadDictionary(DICTIONARY_MAGIC_HEADER)).toThrow(InvalidDictionary);

    const newer = serializeDictionary(new Dictionary([], 3));
    newer[4] = 2;
    expect(() => loadDictionary(newer)).toThrow(
      "Unsupported dictionary version: 2 | Current version: 1"
    );
  });

  it("reject invalid content", () => {
    expect(() => loadDictionary(dictionaryFile({ hello: 1 }))).toThrow(InvalidDictionary);
    expect(() =>
      loadDictionary(dictionaryFile([3, [["T", ["NumericLiteral", "nabc", []]]]]))
    ).toThrow(InvalidDictionary);
    expect(() =>
      loadDictionary(
        dictionaryFile([
          3,
          [
            ["H", "List", "", 1],
            ["H", "List", "", 1],
          ],
        ])
      )
    ).toThrow("Entry 1 duplicates entry 0");
  });
});
