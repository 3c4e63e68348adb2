// Copyright 2018-2026 the Deno authors. MIT license.

import { readFileSync } from "node:fs";
import { pino } from "pino";
import { expect, test } from "vitest";
import { convert } from "./convert.js";
import { loadSchema, schemaNode } from "./schema.js";
import {
  OfxNotDocumentError,
  OfxSyntaxError,
  OfxUnbalancedStackError,
  OfxValueError,
} from "./types.js";

const STATEMENT = readFileSync(
  new URL("./testdata/statement.ofx", import.meta.url),
  "utf8",
);
const STATEMENT_JSON: unknown = JSON.parse(
  readFileSync(new URL("./testdata/statement.json", import.meta.url), "utf8"),
);

/** Helper to create a logger whose records are collected in `lines`. */
function captureLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino({ level: "info" }, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

// =============================================================================
// Documents
// =============================================================================

test("convert() converts an investment statement with the bundled schema", () => {
  const { logger } = captureLogger();
  expect(convert(STATEMENT, { logger })).toEqual(STATEMENT_JSON);
});

test("convert() produces identical output on repeated runs", () => {
  const { logger } = captureLogger();
  const first = JSON.stringify(convert(STATEMENT, { logger }));
  const second = JSON.stringify(convert(STATEMENT, { logger }));
  expect(second).toBe(first);
});

test("convert() ignores everything after the closing root tag", () => {
  const { logger } = captureLogger();
  const input = "<OFX><SIGNONMSGSRSV1></SIGNONMSGSRSV1></OFX><<not markup";
  expect(convert(input, { logger })).toEqual({ signonmsgsrsv1: {} });
});

test("convert() closes the root at the end of input", () => {
  const { logger } = captureLogger();
  const input = "<OFX>\n<SIGNONMSGSRSV1>\n</SIGNONMSGSRSV1>\n";
  expect(convert(input, { logger })).toEqual({ signonmsgsrsv1: {} });
});

test("convert() writes compact offsets on request", () => {
  const { logger } = captureLogger();
  const input = "<OFX><SIGNONMSGSRSV1><SONRS>" +
    "<DTSERVER>20210115120000[-5:EST]</SONRS></SIGNONMSGSRSV1></OFX>";
  expect(convert(input, { logger, compactOffset: true })).toEqual({
    signonmsgsrsv1: { sonrs: { dtserver: "2021-01-15T12:00:00-05" } },
  });
});

// =============================================================================
// Schemas
// =============================================================================

test("convert() accepts a bare root node", () => {
  const { logger } = captureLogger();
  const schema = schemaNode({ leaves: { CODE: "number" } });
  expect(convert("<OFX><CODE>1</OFX>", { schema, logger })).toEqual({
    code: 1,
  });
  expect(
    convert("<DOC><CODE>2</DOC>", { schema, rootTag: "DOC", logger }),
  ).toEqual({ code: 2 });
});

test("convert() uses the root tag of a loaded schema", () => {
  const { logger } = captureLogger();
  const schema = loadSchema({
    rootTag: "DOC",
    root: "main",
    nodes: { main: { serialize: "merged-object", leaves: { OK: "boolean" } } },
  });
  expect(convert("header\n<DOC><OK>Y</DOC>", { schema, logger })).toEqual({
    ok: true,
  });
});

// =============================================================================
// Errors
// =============================================================================

test("convert() rejects input without a root marker", () => {
  const { logger, lines } = captureLogger();
  expect(() => convert("OFXHEADER:100\n", { logger })).toThrow(
    new OfxNotDocumentError("<OFX>"),
  );
  expect(lines).toHaveLength(1);
  expect(lines[0]).toMatchObject({
    level: 50,
    msg: "Processing failed.",
    err: { message: "Not an OFX document: no <OFX> found" },
  });
});

test("convert() reports syntax errors with their position", () => {
  const { logger } = captureLogger();
  expect(() => convert("<OFX><A", { logger })).toThrow(
    new OfxSyntaxError("Unexpected end of input in start tag", {
      line: 1,
      column: 8,
      offset: 7,
    }),
  );
  expect(() => convert("<OFX><A", { logger, trackPosition: false })).toThrow(
    "Unexpected end of input in start tag at line 0, column 0",
  );
});

test("convert() rejects containers left open", () => {
  const { logger } = captureLogger();
  expect(() =>
    convert("<OFX><SIGNONMSGSRSV1><SONRS></OFX>", { logger })
  ).toThrow(
    new OfxUnbalancedStackError("Stack not empty", [
      "OFX",
      "SIGNONMSGSRSV1",
      "SONRS",
    ]),
  );
});

test("convert() rejects undecodable numbers", () => {
  const { logger } = captureLogger();
  const input = "<OFX><INVSTMTMSGSRSV1><INVSTMTTRNRS><INVSTMTRS><INVBAL>" +
    "<AVAILCASH>lots</INVBAL></INVSTMTRS></INVSTMTTRNRS></INVSTMTMSGSRSV1>";
  expect(() => convert(input, { logger })).toThrow(
    new OfxValueError("AVAILCASH", "lots", "number"),
  );
});

// =============================================================================
// Diagnostics
// =============================================================================

test("convert() logs unknown elements and success", () => {
  const { logger, lines } = captureLogger();
  const input =
    "<OFX><SIGNONMSGSRSV1><SONRS><FOO>bar</SONRS></SIGNONMSGSRSV1></OFX>";
  expect(convert(input, { logger })).toEqual({ signonmsgsrsv1: { sonrs: {} } });
  expect(lines).toHaveLength(2);
  expect(lines[0]).toMatchObject({
    level: 40,
    msg: "unhandled element",
    container: "SONRS",
    element: "FOO",
    text: "bar",
  });
  expect(lines[1]).toMatchObject({ level: 30, msg: "Processing succeeded." });
});

test("convert() logs nothing when quiet", () => {
  const { logger, lines } = captureLogger();
  const input =
    "<OFX><SIGNONMSGSRSV1><SONRS><FOO>bar</SONRS></SIGNONMSGSRSV1></OFX>";
  expect(convert(input, { logger, quiet: true })).toEqual({
    signonmsgsrsv1: { sonrs: {} },
  });
  expect(() => convert("no document", { logger, quiet: true })).toThrow(
    OfxNotDocumentError,
  );
  expect(lines).toEqual([]);
});
