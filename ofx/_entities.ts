// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal module for entity decoding.
 *
 * OFX 1.x is SGML: only the five predefined XML entities are recognized, and
 * an `&` that does not start one of them is ordinary text.
 *
 * @module
 */

/**
 * The five predefined entities.
 * Using const assertion for precise typing.
 */
const NAMED_ENTITIES = {
  lt: "<",
  gt: ">",
  amp: "&",
  apos: "'",
  quot: '"',
} as const;

type EntityName = keyof typeof NAMED_ENTITIES;

/** The `;` must appear within this many characters after the `&`. */
const MAX_REFERENCE_SPAN = 5;

function isEntityName(name: string): name is EntityName {
  return Object.hasOwn(NAMED_ENTITIES, name);
}

/**
 * Decodes the predefined entities `&quot; &amp; &apos; &lt; &gt;` in a string.
 *
 * Unknown, numeric or unterminated references are copied through unchanged.
 * Decoding is a single pass, so `&amp;lt;` yields `&lt;`.
 *
 * @example Usage
 * ```ts
 * import { decodeEntities } from "./_entities.js";
 *
 * decodeEntities("AT&amp;T"); // "AT&T"
 * decodeEntities("AT&T");     // "AT&T"
 * decodeEntities("&#65;");    // "&#65;"
 * ```
 *
 * @param text The text containing entities to decode.
 * @returns The text with entities decoded.
 */
export function decodeEntities(text: string): string {
  // Fast path: no ampersand means no entities to decode
  let amp = text.indexOf("&");
  if (amp === -1) return text;

  let result = "";
  let copied = 0;
  while (amp !== -1) {
    const limit = Math.min(amp + 1 + MAX_REFERENCE_SPAN, text.length);
    const semi = text.indexOf(";", amp + 1);
    if (semi !== -1 && semi < limit && semi > amp + 1) {
      const name = text.slice(amp + 1, semi);
      if (isEntityName(name)) {
        result += text.slice(copied, amp) + NAMED_ENTITIES[name];
        copied = semi + 1;
        amp = text.indexOf("&", copied);
        continue;
      }
    }
    amp = text.indexOf("&", amp + 1);
  }
  return result + text.slice(copied);
}
