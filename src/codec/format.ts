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
 * Magic header of an encoded AST blob.
 */
export const MAGIC_HEADER = Buffer.from([0xa5, 0x7b, 0x1c, 0x01]);
/**
 * Magic header of a dictionary file.
 */
export const DICTIONARY_MAGIC_HEADER = Buffer.from([0xa5, 0x7b, 0x1c, 0x0d]);
export const FORMAT_VERSION = Buffer.from([0x01]);

export const HEADER_LENGTH = MAGIC_HEADER.length + FORMAT_VERSION.length;

/**
 * Deepest token nesting a blob may have. The root token is at depth 1.
 */
export const MAX_NESTING_DEPTH = 2048;

/** Token tags. */
export const TAG_LITERAL = 0x00;
export const TAG_REFERENCE = 0x01;

/** Payload markers of a literal token. */
export const PAYLOAD_NONE = 0x00;
/** Varint byte length, then UTF-8 bytes. */
export const PAYLOAD_STRING = 0x01;
/** IEEE-754 double, little-endian. */
export const PAYLOAD_NUMBER = 0x02;
export const PAYLOAD_FALSE = 0x03;
export const PAYLOAD_TRUE = 0x04;
/**
 * Varint count, then little-endian UTF-16 code units. Used for strings with
 * unpaired surrogates, which UTF-8 cannot carry.
 */
export const PAYLOAD_UTF16 = 0x05;
