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

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "../src/cli";
import { VERSION } from "../src/version";

const ENV = { ASTPACK_LOG_LEVEL: "silent" };

const SOURCE = [
  "function area(width, height) {",
  "  const scale = 2 * 5;",
  "  return width * height * scale;",
  "}",
  "console.log(area(3, 4));",
  "",
].join("\n");

describe("astpack CLI", () => {
  let dir: string;
  const file = (name: string) => path.join(dir, name);
  const run = (...args: string[]) => runCli(args, ENV);

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "astpack-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("round-trips a script through every command", () => {
    writeFileSync(file("input.js"), SOURCE);

    expect(run("parse-js", file("input.js"), file("raw.json"))).toBe(0);
    expect(run("optimize-ast", file("raw.json"), file("optimized.json"))).toBe(0);
    expect(run("make-dict", file("raw.json"), file("sample.dict"))).toBe(0);
    expect(run("encode-ast", file("sample.dict"), file("optimized.json"), file("program.bin"))).toBe(0);
    expect(run("decode-ast", file("sample.dict"), file("program.bin"), file("decoded.json"))).toBe(0);
    expect(run("print-ast", file("decoded.json"), file("output.js"))).toBe(0);

    expect(readFileSync(file("decoded.json"), "utf8")).toBe(
      readFileSync(file("optimized.json"), "utf8")
    );
    expect(readFileSync(file("output.js"), "utf8")).toBe(
      [
        "function area(a, b) {",
        "  const c = 10;",
        "  return a * b * c;",
        "}",
        "console.log(area(3, 4));",
        "",
      ].join("\n")
    );
  });

  it("optimizes idempotently", () => {
    writeFileSync(file("input.js"), SOURCE);
    run("parse-js", file("input.js"), file("raw.json"));
    run("optimize-ast", file("raw.json"), file("once.json"));
    run("optimize-ast", file("once.json"), file("twice.json"));

    expect(readFileSync(file("twice.json"), "utf8")).toBe(
      readFileSync(file("once.json"), "utf8")
    );
  });

  it("builds the same dictionary from the same corpus", () => {
    writeFileSync(file("input.js"), SOURCE);
    run("parse-js", file("input.js"), file("raw.json"));
    run("make-dict", file("raw.json"), file("raw.json"), file("first.dict"));
    run("make-dict", file("raw.json"), file("raw.json"), file("second.dict"));

    expect(readFileSync(file("first.dict"))).toEqual(readFileSync(file("second.dict")));
  });

  it("fails without writing output", () => {
    writeFileSync(file("input.js"), SOURCE);
    run("parse-js", file("input.js"), file("raw.json"));
    run("make-dict", file("raw.json"), file("sample.dict"));
    run("encode-ast", file("sample.dict"), file("raw.json"), file("program.bin"));

    const blob = readFileSync(file("program.bin"));
    writeFileSync(file("short.bin"), blob.subarray(0, blob.length - 1));

    expect(run("decode-ast", file("sample.dict"), file("short.bin"), file("out.json"))).toBe(1);
    expect(run("encode-ast", file("missing.dict"), file("raw.json"), file("out.bin"))).toBe(1);
    expect(run("encode-ast", file("raw.json"), file("raw.json"), file("out.bin"))).toBe(1);
    expect(existsSync(file("out.json"))).toBe(false);
    expect(existsSync(file("out.bin"))).toBe(false);
  });

  it("reports usage errors", () => {
    // Configuration errors are logged before the log level is known
    vi.spyOn(console, "error").mockImplementation(() => {});
    expect(run()).toBe(2);
    expect(run("compress", "a", "b")).toBe(2);
    expect(run("make-dict", file("only-one"))).toBe(2);
    expect(run("decode-ast", "a", "b")).toBe(2);
    expect(run("optimize-ast", "--fast", "a", "b")).toBe(2);
    expect(runCli(["optimize-ast", "a", "b"], { ...ENV, ASTPACK_DICT_MAX_DEPTH: "0" })).toBe(2);
  });

  it("prints its version and help", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    expect(run("--version")).toBe(0);
    expect(log).toHaveBeenCalledWith(VERSION);

    expect(run("--help")).toBe(0);
    expect(log).toHaveBeenLastCalledWith(
      expect.stringContaining("  astpack encode-ast <dict> <input-optimized-dump> <output-bin>")
    );
  });
});
