// Copyright 2018-2026 the Deno authors. MIT license.

/**
 * Converts OFX 1.x documents into JSON.
 *
 * OFX 1.x is SGML-derived tag soup: closing tags are optional, and the text of
 * a leaf element runs up to the next tag. A schema says which tags open
 * containers, which carry typed values, and how each container appears in the
 * output. The bundled schema covers signon responses, investment statements
 * and security lists.
 *
 * ```ts ignore
 * import { convert, loadSchema } from "ofx-to-json";
 *
 * // With the bundled schema
 * const statement = convert(ofxText);
 *
 * // With a custom schema
 * const schema = loadSchema(JSON.parse(schemaText));
 * const tree = convert(ofxText, { schema, quiet: true });
 * ```
 *
 * Unknown elements are reported through the logger and left out of the
 * output. Malformed markup, closing tags that match nothing and values that
 * do not decode are thrown as errors.
 *
 * @module
 */

export * from "./types.js";
export * from "./convert.js";
export * from "./schema.js";
export type { OfxDateTime } from "./_values.js";
export {
  encodeDateTime,
  formatDateTime,
  parseBoolean,
  parseDateTime,
  parseNumber,
} from "./_values.js";
export { decodeEntities } from "./_entities.js";
export { tokenize } from "./_tokenizer.js";
export { OfxDocumentBuilder } from "./_document_builder.js";
