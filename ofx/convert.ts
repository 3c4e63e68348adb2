// Copyright 2018-2026 the Deno authors. MIT license.

/**
 * Converts an OFX document into a JSON tree.
 *
 * @module
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  ConvertOptions,
  JsonObject,
  OfxSchema,
  OfxSchemaNode,
} from "./types.js";
import { OfxNotDocumentError } from "./types.js";
import { tokenize } from "./_tokenizer.js";
import { OfxDocumentBuilder } from "./_document_builder.js";
import { defaultSchema } from "./schema.js";

export type { ConvertOptions } from "./types.js";

let stderrLogger: Logger | undefined;

function defaultLogger(): Logger {
  stderrLogger ??= pino(
    { name: "ofx-to-json" },
    pino.destination({ dest: 2, sync: true }),
  );
  return stderrLogger;
}

function isSchema(schema: OfxSchema | OfxSchemaNode): schema is OfxSchema {
  return "root" in schema;
}

/**
 * Converts an OFX 1.x document into a JSON object.
 *
 * Everything before the first `<OFX>` (headers, blank lines) is skipped, and
 * everything after the matching `</OFX>` is ignored. Elements the schema does
 * not know are logged at `warn` and left out of the output.
 *
 * @example Usage
 * ```ts
 * import { convert } from "ofx-to-json";
 *
 * const ofx = `OFXHEADER:100
 *
 * <OFX>
 * <SIGNONMSGSRSV1><SONRS>
 * <STATUS><CODE>0<SEVERITY>INFO</STATUS>
 * <DTSERVER>20210115120000[-5:EST]
 * <LANGUAGE>ENG
 * </SONRS></SIGNONMSGSRSV1>
 * </OFX>`;
 *
 * convert(ofx, { quiet: true });
 * // {
 * //   signonmsgsrsv1: {
 * //     sonrs: {
 * //       status: { code: "0", severity: "INFO" },
 * //       dtserver: "2021-01-15T12:00:00-05:00",
 * //       language: "ENG",
 * //     },
 * //   },
 * // }
 * ```
 *
 * @param input The whole document.
 * @param options Schema, root tag, logging and output options.
 * @returns The JSON tree.
 * @throws {OfxNotDocumentError} If the input has no root marker.
 * @throws {OfxSyntaxError} If the markup is malformed.
 * @throws {OfxCloseMismatchError} If a closing tag matches nothing open.
 * @throws {OfxUnbalancedStackError} If containers are left open.
 * @throws {OfxValueError} If a number or boolean leaf does not decode.
 * @throws {OfxSchemaError} If the schema does not fit the document's shape.
 */
export function convert(input: string, options?: ConvertOptions): JsonObject {
  const base = options?.logger ?? defaultLogger();
  const logger = options?.quiet ? base.child({}, { level: "silent" }) : base;

  try {
    const schema = options?.schema ?? defaultSchema();
    const root = isSchema(schema) ? schema.root : schema;
    const rootTag = options?.rootTag ??
      (isSchema(schema) ? schema.rootTag : "OFX");

    const marker = `<${rootTag}>`;
    const markerIdx = input.indexOf(marker);
    if (markerIdx === -1) throw new OfxNotDocumentError(marker);

    const builder = new OfxDocumentBuilder(root, {
      rootName: rootTag,
      logger,
      compactOffset: options?.compactOffset ?? false,
    });
    const events = tokenize(input, {
      rootName: rootTag,
      start: markerIdx + marker.length,
      trackPosition: options?.trackPosition ?? true,
    });
    for (const event of events) {
      if (event.type === "open") builder.onOpenElement(event);
      else builder.onCloseElement(event);
    }
    const result = builder.finish();

    logger.info("Processing succeeded.");
    return result;
  } catch (err) {
    logger.error({ err }, "Processing failed.");
    throw err;
  }
}
