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

/**
 * Configuration Module
 *
 * Resolves settings from environment variables. Library calls take their
 * options explicitly; only the CLI reads the environment.
 */

import { z } from "zod";
import { UsageError } from "./errors";
import { LOG_LEVELS, type LogLevel } from "./logger";

export const DEFAULT_DICTIONARY_OPTIONS = {
  maxEntries: 4096,
  maxDepth: 3,
  minFrequency: 1,
} as const;

export interface DictionaryOptions {
  /** Upper bound on the number of dictionary entries. */
  maxEntries: number;
  /** Height of the largest subtree stored as a single pattern. */
  maxDepth: number;
  /** Patterns seen fewer times than this are never selected. */
  minFrequency: number;
}

export interface AstpackConfig {
  logLevel: LogLevel;
  dictionary: DictionaryOptions;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  ASTPACK_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  ASTPACK_DICT_MAX_ENTRIES: positiveInt(DEFAULT_DICTIONARY_OPTIONS.maxEntries),
  ASTPACK_DICT_MAX_DEPTH: positiveInt(DEFAULT_DICTIONARY_OPTIONS.maxDepth),
  ASTPACK_DICT_MIN_FREQUENCY: positiveInt(
    DEFAULT_DICTIONARY_OPTIONS.minFrequency
  ),
});

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AstpackConfig {
  // Empty variables count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new UsageError(`Invalid configuration: ${issues}`);
  }

  return {
    logLevel: parsed.data.ASTPACK_LOG_LEVEL,
    dictionary: {
      maxEntries: parsed.data.ASTPACK_DICT_MAX_ENTRIES,
      maxDepth: parsed.data.ASTPACK_DICT_MAX_DEPTH,
      minFrequency: parsed.data.ASTPACK_DICT_MIN_FREQUENCY,
    },
  };
}
