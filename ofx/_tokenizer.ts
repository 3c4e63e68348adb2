// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal tag-soup tokenizer.
 *
 * Scans SGML-style OFX markup into open and close events. Closing tags are
 * optional in the source, attribute values may be unquoted, and the text of a
 * leaf runs up to the next tag.
 *
 * @module
 */

import type { OfxElementEvent, TokenizeOptions } from "./types.js";
import { OfxSyntaxError } from "./types.js";
import { decodeEntities } from "./_entities.js";
import {
  computePosition,
  isWhitespace,
  skipWhitespace,
  trimEndWhitespace,
} from "./_common.js";

// Character codes for hot path optimization
const CC_LT = 60; // <
const CC_GT = 62; // >
const CC_SLASH = 47; // /
const CC_EQ = 61; // =
const CC_DQUOTE = 34; // "

/** Characters that end a tag or attribute name and an unquoted value. */
function isNameTerminator(code: number): boolean {
  return (
    isWhitespace(code) ||
    code === CC_LT ||
    code === CC_GT ||
    code === CC_SLASH ||
    code === CC_EQ ||
    code === CC_DQUOTE
  );
}

/**
 * Tokenizes OFX tag soup into element events.
 *
 * Each open event carries the tag's attributes and the text that follows it.
 * A self-closing tag yields an open event immediately followed by a close
 * event of the same name. A closing tag for `rootName` ends the scan.
 *
 * @example Usage
 * ```ts ignore
 * for (const event of tokenize("<OFX><CODE>0</OFX>", { rootName: "OFX" })) {
 *   console.log(event.type, event.name);
 * }
 * // open OFX
 * // open CODE
 * ```
 *
 * @param input The whole input.
 * @param options Where to start, and the root tag that ends the scan.
 * @throws {OfxSyntaxError} If a tag is malformed or the input ends inside one.
 */
export function* tokenize(
  input: string,
  options: TokenizeOptions,
): Generator<OfxElementEvent, void, undefined> {
  const { rootName } = options;
  const trackPosition = options.trackPosition ?? true;
  const len = input.length;
  let pos = options.start ?? 0;

  function error(message: string): never {
    throw new OfxSyntaxError(
      message,
      computePosition(input, Math.min(pos, len), trackPosition),
    );
  }

  function skip(): boolean {
    const start = pos;
    pos = skipWhitespace(input, pos);
    return pos > start;
  }

  function readName(): string {
    const start = pos;
    while (pos < len && !isNameTerminator(input.charCodeAt(pos))) pos++;
    return input.slice(start, pos);
  }

  function readQuotedValue(): string {
    const start = pos;
    const closeIdx = input.indexOf('"', start);
    if (closeIdx === -1) {
      pos = len;
      error("Unterminated attribute value");
    }
    if (closeIdx === start) error("Empty attribute value");
    pos = closeIdx + 1;
    return input.slice(start, closeIdx);
  }

  function readText(): string {
    skip();
    const start = pos;
    while (pos < len) {
      const code = input.charCodeAt(pos);
      if (code === CC_LT || code === CC_GT) {
        return trimEndWhitespace(input.slice(start, pos));
      }
      pos++;
    }
    return error("Unexpected end of input in element text");
  }

  function readAttributes(): Record<string, string> {
    const attributes: Record<string, string> = Object.create(null);
    while (pos < len) {
      const code = input.charCodeAt(pos);
      if (code === CC_GT || code === CC_SLASH) break;

      const attrName = readName();
      if (attrName === "") {
        error(
          `Unexpected character '${String.fromCharCode(code)}' in start tag`,
        );
      }
      skip();
      if (pos >= len) error("Unexpected end of input in start tag");

      let value = "";
      if (input.charCodeAt(pos) === CC_EQ) {
        pos++; // Skip '='
        skip();
        if (pos >= len) error("Unexpected end of input in start tag");
        if (input.charCodeAt(pos) === CC_DQUOTE) {
          pos++; // Skip opening quote
          value = readQuotedValue();
        } else {
          value = readName();
          if (value === "") error("Expected attribute value after '='");
        }
      }
      skip();

      if (!(attrName in attributes)) {
        attributes[attrName] = decodeEntities(value);
      }
    }
    return attributes;
  }

  while (pos < len) {
    skip();
    if (pos >= len) break;

    const tagStart = pos;
    if (input.charCodeAt(pos) !== CC_LT) error("Expected '<'");
    pos++; // Skip '<'
    skip();
    if (pos >= len) error("Unexpected end of input after '<'");

    // End tag: </name>
    if (input.charCodeAt(pos) === CC_SLASH) {
      pos++; // Skip '/'
      skip();
      const name = readName();
      if (name === "") error("Expected element name in end tag");
      skip();
      if (pos >= len || input.charCodeAt(pos) !== CC_GT) {
        error("Expected '>' in end tag");
      }
      pos++; // Skip '>'

      if (name === rootName) return;
      yield { type: "close", name, offset: tagStart };
      continue;
    }

    // Start tag: <name attributes...>text or <name attributes.../>
    const name = readName();
    if (name === "") {
      error(`Unexpected character '${input[pos]}' after '<'`);
    }

    const attributes: Record<string, string> = skip()
      ? readAttributes()
      : Object.create(null);
    if (pos >= len) error("Unexpected end of input in start tag");

    let selfClosing = false;
    if (input.charCodeAt(pos) === CC_SLASH) {
      selfClosing = true;
      pos++; // Skip '/'
    }
    skip();
    if (pos >= len || input.charCodeAt(pos) !== CC_GT) {
      error("Expected '>' to end start tag");
    }
    pos++; // Skip '>'

    const text = selfClosing ? "" : decodeEntities(readText());
    yield {
      type: "open",
      name,
      attributes,
      text,
      selfClosing,
      offset: tagStart,
    };
    if (selfClosing) {
      yield { type: "close", name, offset: tagStart };
    }
  }
}
