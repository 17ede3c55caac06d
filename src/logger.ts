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

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  /**
   * Returns a logger that appends `scope` to this logger's prefix,
   * e.g. `[astpack][optimizer]`.
   */
  child(scope: string): Logger;
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function createLogger(
  level: LogLevel = "info",
  scopes: string[] = ["astpack"]
): Logger {
  const prefix = scopes.map((scope) => `[${scope}]`).join("");
  const enabled = (wanted: LogLevel) => rank(level) >= rank(wanted);

  return {
    level,
    error(message) {
      if (enabled("error")) console.error(`${prefix} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`);
    },
    info(message) {
      // Progress goes to stderr; stdout is reserved for command output.
      if (enabled("info")) console.error(`${prefix} ${message}`);
    },
    debug(message) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`);
    },
    child(scope) {
      return createLogger(level, [...scopes, scope]);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
