// Copyright 2018-2026 the Deno authors. MIT license.

import { expect, test } from "vitest";
import { tokenize } from "./_tokenizer.js";
import { type OfxElementEvent, OfxSyntaxError } from "./types.js";

/** Helper to collect the events of a document rooted at `<OFX>`. */
function collect(input: string, start?: number): OfxElementEvent[] {
  return Array.from(tokenize(input, { rootName: "OFX", start }));
}

/** Helper to capture the syntax error thrown while tokenizing. */
function syntaxError(input: string, trackPosition?: boolean): OfxSyntaxError {
  try {
    Array.from(tokenize(input, { rootName: "OFX", trackPosition }));
  } catch (error) {
    if (error instanceof OfxSyntaxError) return error;
    throw error;
  }
  throw new Error(`No syntax error for ${JSON.stringify(input)}`);
}

// =============================================================================
// Events
// =============================================================================

test("tokenize() yields open events carrying the following text", () => {
  expect(collect("<OFX><CODE>0</OFX>")).toEqual([
    {
      type: "open",
      name: "OFX",
      attributes: {},
      text: "",
      selfClosing: false,
      offset: 0,
    },
    {
      type: "open",
      name: "CODE",
      attributes: {},
      text: "0",
      selfClosing: false,
      offset: 5,
    },
  ]);
});

test("tokenize() yields close events", () => {
  expect(collect("<A>x</B>")).toEqual([
    {
      type: "open",
      name: "A",
      attributes: {},
      text: "x",
      selfClosing: false,
      offset: 0,
    },
    { type: "close", name: "B", offset: 4 },
  ]);
});

test("tokenize() trims text and decodes entities", () => {
  const [event] = collect("<MEMO>  Coffee &amp; donuts  \n<X/>");
  expect(event?.type === "open" && event.text).toBe("Coffee & donuts");
});

test("tokenize() keeps inner whitespace in text", () => {
  const [event] = collect("<NAME>Acme\tFund  A\r\n</OFX>");
  expect(event?.type === "open" && event.text).toBe("Acme\tFund  A");
});

test("tokenize() yields open and close for a self-closing tag", () => {
  expect(collect("<A/><B />")).toEqual([
    {
      type: "open",
      name: "A",
      attributes: {},
      text: "",
      selfClosing: true,
      offset: 0,
    },
    { type: "close", name: "A", offset: 0 },
    {
      type: "open",
      name: "B",
      attributes: {},
      text: "",
      selfClosing: true,
      offset: 4,
    },
    { type: "close", name: "B", offset: 4 },
  ]);
});

test("tokenize() allows whitespace inside tags", () => {
  const events = collect("< A >1< / A >");
  expect(events.map((event) => [event.type, event.name])).toEqual([
    ["open", "A"],
    ["close", "A"],
  ]);
});

test("tokenize() stops at the closing root tag", () => {
  const events = collect("<A>1</OFX><B>2");
  expect(events.map((event) => event.name)).toEqual(["A"]);
  expect(collect("<A>1</ OFX ><B>2").map((event) => event.name)).toEqual(["A"]);
});

test("tokenize() starts at the given offset", () => {
  const events = collect("<OFX><A>1</OFX>", 5);
  expect(events).toEqual([
    {
      type: "open",
      name: "A",
      attributes: {},
      text: "1",
      selfClosing: false,
      offset: 5,
    },
  ]);
});

test("tokenize() yields nothing for blank input", () => {
  expect(collect("")).toEqual([]);
  expect(collect(" \r\n\t")).toEqual([]);
});

// =============================================================================
// Attributes
// =============================================================================

test("tokenize() reads quoted, unquoted and bare attributes", () => {
  const [event] = collect(`<A id="1" name=foo flag>text</OFX>`);
  expect(event?.type === "open" && event.attributes).toEqual({
    id: "1",
    name: "foo",
    flag: "",
  });
  expect(event?.type === "open" && event.text).toBe("text");
});

test("tokenize() keeps the first of repeated attributes", () => {
  const [event] = collect(`<A x="1" x="2"/>`);
  expect(event?.type === "open" && event.attributes).toEqual({ x: "1" });
});

test("tokenize() decodes entities in attribute values", () => {
  const [event] = collect(`<A v="a&amp;b" w = "&lt;"/>`);
  expect(event?.type === "open" && event.attributes).toEqual({
    v: "a&b",
    w: "<",
  });
});

// =============================================================================
// Errors
// =============================================================================

test("tokenize() throws on input ending in a start tag", () => {
  const error = syntaxError("<A");
  expect(error.message).toBe(
    "Unexpected end of input in start tag at line 1, column 3",
  );
  expect(error.offset).toBe(2);
});

test("tokenize() throws on input ending in element text", () => {
  expect(syntaxError("<A>text").message).toBe(
    "Unexpected end of input in element text at line 1, column 8",
  );
});

test("tokenize() throws on input ending after '<'", () => {
  expect(syntaxError("<").message).toBe(
    "Unexpected end of input after '<' at line 1, column 2",
  );
});

test("tokenize() throws on a missing element name", () => {
  expect(syntaxError("<>").message).toBe(
    "Unexpected character '>' after '<' at line 1, column 2",
  );
  expect(syntaxError("</>").message).toBe(
    "Expected element name in end tag at line 1, column 3",
  );
});

test("tokenize() throws on an unterminated end tag", () => {
  expect(syntaxError("</A").message).toBe(
    "Expected '>' in end tag at line 1, column 4",
  );
});

test("tokenize() throws on a stray '>' in text", () => {
  expect(syntaxError("<A>a>b</OFX>").message).toBe(
    "Expected '<' at line 1, column 5",
  );
});

test("tokenize() throws on malformed attributes", () => {
  expect(syntaxError(`<A v="1>`).message).toBe(
    "Unterminated attribute value at line 1, column 9",
  );
  expect(syntaxError(`<A v="">x</OFX>`).message).toBe(
    "Empty attribute value at line 1, column 7",
  );
  expect(syntaxError("<A v=>x</OFX>").message).toBe(
    "Expected attribute value after '=' at line 1, column 6",
  );
  expect(syntaxError("<A =1>x</OFX>").message).toBe(
    "Unexpected character '=' in start tag at line 1, column 4",
  );
});

test("tokenize() reports line and column across lines", () => {
  const error = syntaxError("\n<A>1\n<B");
  expect(error).toBeInstanceOf(SyntaxError);
  expect(error.line).toBe(3);
  expect(error.column).toBe(3);
  expect(error.offset).toBe(8);
});

test("tokenize() reports only the offset without position tracking", () => {
  const error = syntaxError("\n<A>1\n<B", false);
  expect(error.message).toBe(
    "Unexpected end of input in start tag at line 0, column 0",
  );
  expect(error.offset).toBe(8);
});
