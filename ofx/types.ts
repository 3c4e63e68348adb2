// Copyright 2018-2026 the Deno authors. MIT license.

import type { Logger } from "pino";

/**
 * Position information for error reporting.
 *
 * @example Usage
 * ```ts
 * import type { OfxPosition } from "ofx-to-json";
 *
 * const pos: OfxPosition = { line: 10, column: 5, offset: 150 };
 * ```
 */
export interface OfxPosition {
  /** Line number (1-indexed). */
  readonly line: number;
  /** Column number (1-indexed). */
  readonly column: number;
  /** Character offset in the input. */
  readonly offset: number;
}

/**
 * Error thrown when the tag soup itself cannot be tokenized: a missing name,
 * a missing `>`, an unterminated quoted attribute or input ending inside a tag.
 *
 * @example Usage
 * ```ts
 * import { OfxSyntaxError } from "ofx-to-json";
 *
 * const error = new OfxSyntaxError("Expected '>'", { line: 3, column: 7, offset: 40 });
 * error instanceof SyntaxError; // true
 * error.line; // 3
 * ```
 */
export class OfxSyntaxError extends SyntaxError {
  /** The line number where the error occurred (1-indexed). */
  readonly line: number;
  /** The column number where the error occurred (1-indexed). */
  readonly column: number;
  /** The character offset where the error occurred. */
  readonly offset: number;

  /**
   * Constructs a new OfxSyntaxError.
   *
   * @param message The error message describing what went wrong.
   * @param position The position in the input where the error occurred.
   */
  constructor(message: string, position: OfxPosition) {
    super(`${message} at line ${position.line}, column ${position.column}`);
    this.name = "OfxSyntaxError";
    this.line = position.line;
    this.column = position.column;
    this.offset = position.offset;
  }
}

/**
 * Error thrown when a closing tag matches neither a pending tag nor the name of
 * the innermost open container.
 */
export class OfxCloseMismatchError extends Error {
  /** The tag named by the closing tag. */
  readonly tag: string;
  /** The innermost open container, if any. */
  readonly container: string | undefined;
  /** Offset of the closing tag in the input. */
  readonly offset: number;

  constructor(tag: string, container: string | undefined, offset: number) {
    super(
      container === undefined
        ? `Unexpected closing tag </${tag}>`
        : `Mismatch for </${tag}>, expecting </${container}>`,
    );
    this.name = "OfxCloseMismatchError";
    this.tag = tag;
    this.container = container;
    this.offset = offset;
  }
}

/**
 * Error thrown when containers remain open once the input is exhausted, or the
 * root container cannot be closed.
 */
export class OfxUnbalancedStackError extends Error {
  /** Names of the containers still open, outermost first. */
  readonly openContainers: readonly string[];

  constructor(message: string, openContainers: readonly string[]) {
    super(
      openContainers.length === 0
        ? message
        : `${message}: <${openContainers.join("> <")}>`,
    );
    this.name = "OfxUnbalancedStackError";
    this.openContainers = openContainers;
  }
}

/**
 * Error thrown when the text of a number or boolean leaf cannot be decoded.
 *
 * Datetime leaves never raise it: undecodable dates are kept as text.
 */
export class OfxValueError extends Error {
  /** The leaf tag. */
  readonly element: string;
  /** The text that failed to decode. */
  readonly text: string;
  /** The kind the schema declares for the leaf. */
  readonly kind: LeafKind;

  constructor(element: string, text: string, kind: LeafKind) {
    super(`<${element}> failed to parse '${text}' as a ${kind}`);
    this.name = "OfxValueError";
    this.element = element;
    this.text = text;
    this.kind = kind;
  }
}

/** Error thrown when the root marker (e.g. `<OFX>`) does not occur in the input. */
export class OfxNotDocumentError extends Error {
  /** The marker that was searched for. */
  readonly marker: string;

  constructor(marker: string) {
    super(`Not an OFX document: no ${marker} found`);
    this.name = "OfxNotDocumentError";
    this.marker = marker;
  }
}

/**
 * Error thrown when a schema is malformed, or when it asks the builder to
 * attach a value to a container of the wrong shape.
 */
export class OfxSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OfxSchemaError";
  }
}

// ============================================================================
// Events
// ============================================================================

/** Event emitted for an opening (or self-closing) tag. */
export interface OfxOpenElementEvent {
  /** The event type discriminant. */
  readonly type: "open";
  /** The tag name, as spelled in the source. */
  readonly name: string;
  /** Entity-decoded attribute values. The first value wins on repeats. */
  readonly attributes: Readonly<Record<string, string>>;
  /** Entity-decoded text following the tag, trailing whitespace trimmed. */
  readonly text: string;
  /** Whether this is a self-closing tag (`<FOO/>`). */
  readonly selfClosing: boolean;
  /** Offset of the `<` in the input. */
  readonly offset: number;
}

/**
 * Event emitted for a closing tag. Self-closing tags are followed by a
 * synthetic close event with the same name.
 */
export interface OfxCloseElementEvent {
  /** The event type discriminant. */
  readonly type: "close";
  /** The tag name, without the leading `/`. */
  readonly name: string;
  /** Offset of the `<` in the input. */
  readonly offset: number;
}

/** Discriminated union of the events produced by the tokenizer. */
export type OfxElementEvent = OfxOpenElementEvent | OfxCloseElementEvent;

/** Receiver of tokenizer events. */
export interface OfxEventHandler {
  onOpenElement(event: OfxOpenElementEvent): void;
  onCloseElement(event: OfxCloseElementEvent): void;
}

// ============================================================================
// Schema
// ============================================================================

/**
 * How a closed container's value is attached to its parent.
 *
 * - `suppressed`: no value of its own; children attach to the parent's value.
 * - `merged-object`: an object stored as a named member of the parent.
 * - `array-element`: an object appended to the parent array.
 * - `named-array-element`: `{ name: object }` appended to the parent array.
 * - `array`: an array stored as a named member of the parent.
 */
export type SerializeMode =
  | "suppressed"
  | "merged-object"
  | "array-element"
  | "named-array-element"
  | "array";

/** The value type of a leaf tag. */
export type LeafKind = "string" | "number" | "boolean" | "datetime";

/** Static descriptor of one container element. */
export interface OfxSchemaNode {
  /** How the container's value is attached to its parent. */
  readonly serialize: SerializeMode;
  /** Tag names that open nested containers. */
  readonly children: ReadonlyMap<string, OfxSchemaNode>;
  /** Tag names that carry typed text. */
  readonly leaves: ReadonlyMap<string, LeafKind>;
}

/** A complete schema: the document's root tag and the node describing it. */
export interface OfxSchema {
  /** Tag name of the document root, e.g. `"OFX"`. */
  readonly rootTag: string;
  /** Descriptor of the root container. */
  readonly root: OfxSchemaNode;
}

// ============================================================================
// Output
// ============================================================================

/** A JSON value produced by the converter. */
export type JsonValue = string | number | boolean | JsonObject | JsonArray;

/** A JSON object. */
export interface JsonObject {
  [key: string]: JsonValue;
}

/** A JSON array. */
export type JsonArray = JsonValue[];

// ============================================================================
// Options
// ============================================================================

/** Options for {@linkcode formatDateTime}. */
export interface FormatDateTimeOptions {
  /**
   * If true, whole-hour offsets are written as `±HH` instead of `±HH:MM`.
   *
   * @default {false}
   */
  readonly compactOffset?: boolean;
}

/** Options for {@linkcode tokenize}. */
export interface TokenizeOptions {
  /** A closing tag with this name ends the scan. */
  readonly rootName: string;

  /**
   * Offset at which scanning starts.
   *
   * @default {0}
   */
  readonly start?: number;

  /**
   * If true, syntax errors carry line and column numbers.
   *
   * @default {true}
   */
  readonly trackPosition?: boolean;
}

/** Options for {@linkcode OfxDocumentBuilder}. */
export interface DocumentBuilderOptions extends FormatDateTimeOptions {
  /** Name of the root container. */
  readonly rootName: string;
  /** Receiver of "unhandled element" notices. */
  readonly logger: Logger;
}

/**
 * Options for {@linkcode convert}.
 *
 * @example Usage
 * ```ts
 * import type { ConvertOptions } from "ofx-to-json";
 *
 * const options: ConvertOptions = { quiet: true, compactOffset: true };
 * ```
 */
export interface ConvertOptions extends FormatDateTimeOptions {
  /**
   * The schema to convert with. A bare node is used as the root of a schema
   * whose root tag is {@linkcode ConvertOptions.rootTag}.
   *
   * @default {defaultSchema()}
   */
  readonly schema?: OfxSchema | OfxSchemaNode;

  /**
   * Tag name of the document root. Overrides the schema's root tag.
   *
   * @default {"OFX"}
   */
  readonly rootTag?: string;

  /**
   * Logger receiving diagnostics.
   *
   * @default a pino logger writing to stderr
   */
  readonly logger?: Logger;

  /**
   * If true, no diagnostics are logged. The output is unaffected.
   *
   * @default {false}
   */
  readonly quiet?: boolean;

  /**
   * If true, syntax errors carry line and column numbers.
   *
   * @default {true}
   */
  readonly trackPosition?: boolean;
}
