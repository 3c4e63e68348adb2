// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal shared utilities for the OFX module.
 *
 * @module
 */

import type { OfxPosition } from "./types.js";

/** Whitespace as in the C locale: space, \t, \n, \v, \f and \r. */
export function isWhitespace(code: number): boolean {
  return code === 0x20 || (code >= 0x09 && code <= 0x0d);
}

/**
 * Returns the first index at or after `pos` that is not whitespace.
 *
 * @param text The text to scan.
 * @param pos Where to start.
 * @returns The index of the first non-whitespace character, or `text.length`.
 */
export function skipWhitespace(text: string, pos: number): number {
  const len = text.length;
  while (pos < len && isWhitespace(text.charCodeAt(pos))) pos++;
  return pos;
}

/** Removes trailing whitespace (C locale). */
export function trimEndWhitespace(text: string): string {
  let end = text.length;
  while (end > 0 && isWhitespace(text.charCodeAt(end - 1))) end--;
  return end === text.length ? text : text.slice(0, end);
}

/**
 * The JSON member key for a tag: its name lower-cased.
 *
 * @example Usage
 * ```ts
 * import { memberKey } from "./_common.js";
 *
 * memberKey("STMTTRN"); // "stmttrn"
 * ```
 */
export function memberKey(tag: string): string {
  return tag.toLowerCase();
}

/**
 * Compute line and column from an offset on demand.
 * Only called when an error occurs.
 *
 * @param input The whole input.
 * @param offset The offset to locate.
 * @param trackPosition If false, line and column are reported as 0.
 */
export function computePosition(
  input: string,
  offset: number,
  trackPosition = true,
): OfxPosition {
  if (!trackPosition) {
    return { line: 0, column: 0, offset };
  }
  let line = 1;
  let lastNlPos = -1;
  let searchStart = 0;
  while (true) {
    const nlPos = input.indexOf("\n", searchStart);
    if (nlPos === -1 || nlPos >= offset) break;
    line++;
    lastNlPos = nlPos;
    searchStart = nlPos + 1;
  }
  return { line, column: offset - lastNlPos, offset };
}
