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

import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config";
import { UsageError } from "../src/errors";
import { createLogger } from "../src/logger";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "info",
      dictionary: { maxEntries: 4096, maxDepth: 3, minFrequency: 1 },
    });
  });

  it("reads the environment", () => {
    const config = loadConfig({
      ASTPACK_LOG_LEVEL: "debug",
      ASTPACK_DICT_MAX_ENTRIES: "10",
      ASTPACK_DICT_MAX_DEPTH: "",
      HOME: "/home/test",
    });
    expect(config.logLevel).toBe("debug");
    expect(config.dictionary).toEqual({ maxEntries: 10, maxDepth: 3, minFrequency: 1 });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ ASTPACK_DICT_MAX_DEPTH: "0" })).toThrow(UsageError);
    expect(() => loadConfig({ ASTPACK_DICT_MAX_ENTRIES: "many" })).toThrow(UsageError);
    expect(() => loadConfig({ ASTPACK_LOG_LEVEL: "loud" })).toThrow(UsageError);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with its scopes", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("error").child("codec").error("boom");
    expect(error).toHaveBeenCalledWith("[astpack][codec] boom");
  });

  it("drops messages below its level", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger("warn");
    logger.info("progress");
    logger.warn("careful");
    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[astpack] careful");
  });
});
