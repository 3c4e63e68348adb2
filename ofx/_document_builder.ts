// Copyright 2018-2026 the Deno authors. MIT license.

/**
 * Document builder that reconstructs the OFX hierarchy from tokenizer events
 * and folds it into a JSON tree.
 *
 * @module
 */

import type { Logger } from "pino";
import type {
  DocumentBuilderOptions,
  FormatDateTimeOptions,
  JsonArray,
  JsonObject,
  JsonValue,
  LeafKind,
  OfxCloseElementEvent,
  OfxEventHandler,
  OfxOpenElementEvent,
  OfxSchemaNode,
} from "./types.js";
import {
  OfxCloseMismatchError,
  OfxSchemaError,
  OfxUnbalancedStackError,
  OfxValueError,
} from "./types.js";
import { memberKey } from "./_common.js";
import {
  formatDateTime,
  parseBoolean,
  parseDateTime,
  parseNumber,
} from "./_values.js";

/** A leaf or unknown tag seen since its container opened: `[tag, text]`. */
type PendingTag = readonly [tag: string, text: string];

/** One open container on the stack. */
interface Container {
  readonly name: string;
  readonly node: OfxSchemaNode;
  /** Own value, or the enclosing value for suppressed containers. */
  readonly value: JsonObject | JsonArray;
  readonly pending: PendingTag[];
}

function addMember(
  target: JsonObject | JsonArray,
  key: string,
  value: JsonValue,
  container: string,
): void {
  if (Array.isArray(target)) {
    throw new OfxSchemaError(
      `Cannot add member '${key}' to array container <${container}>`,
    );
  }
  target[key] = value;
}

function pushElement(
  target: JsonObject | JsonArray,
  value: JsonValue,
  container: string,
): void {
  if (!Array.isArray(target)) {
    throw new OfxSchemaError(
      `Cannot append to object container <${container}>`,
    );
  }
  target.push(value);
}

/** Decodes a leaf's text according to its declared kind. */
function decodeLeaf(
  tag: string,
  text: string,
  kind: LeafKind,
  options: FormatDateTimeOptions,
): JsonValue {
  switch (kind) {
    case "string":
      return text;
    case "number": {
      const value = parseNumber(text);
      if (value === undefined) throw new OfxValueError(tag, text, kind);
      return value;
    }
    case "boolean": {
      const value = parseBoolean(text);
      if (value === undefined) throw new OfxValueError(tag, text, kind);
      return value;
    }
    case "datetime": {
      const value = parseDateTime(text);
      return value === undefined ? text : formatDateTime(value, options);
    }
  }
}

/**
 * Builds the JSON tree for one document from element events.
 *
 * Implements {@linkcode OfxEventHandler}. The root container is pushed on
 * construction; {@linkcode OfxDocumentBuilder.finish} closes it and returns
 * the result.
 *
 * @example Usage
 * ```ts ignore
 * const builder = new OfxDocumentBuilder(schema.root, { rootName: "OFX", logger });
 * for (const event of tokenize(input, { rootName: "OFX", start })) {
 *   if (event.type === "open") builder.onOpenElement(event);
 *   else builder.onCloseElement(event);
 * }
 * const tree = builder.finish();
 * ```
 */
export class OfxDocumentBuilder implements OfxEventHandler {
  #stack: Container[] = [];
  #document: JsonObject = {};
  #result: JsonObject;
  #logger: Logger;
  #formatOptions: FormatDateTimeOptions;

  constructor(root: OfxSchemaNode, options: DocumentBuilderOptions) {
    this.#logger = options.logger;
    this.#formatOptions = { compactOffset: options.compactOffset ?? false };
    const { value } = this.#push(options.rootName, root);
    if (Array.isArray(value)) {
      throw new OfxSchemaError(
        `Root container <${options.rootName}> cannot be an array`,
      );
    }
    this.#result = value;
  }

  /** Names of the open containers, outermost first. */
  get openContainers(): readonly string[] {
    return this.#stack.map((container) => container.name);
  }

  onOpenElement(event: OfxOpenElementEvent): void {
    const top = this.#stack[this.#stack.length - 1];
    if (top === undefined) {
      throw new OfxUnbalancedStackError(
        `Unexpected <${event.name}> after the root was closed`,
        [],
      );
    }
    const { name, text } = event;

    const child = top.node.children.get(name);
    if (child !== undefined) {
      this.#push(name, child);
      return;
    }

    const kind = top.node.leaves.get(name);
    if (kind !== undefined) {
      addMember(
        top.value,
        memberKey(name),
        decodeLeaf(name, text, kind, this.#formatOptions),
        top.name,
      );
    } else {
      this.#logger.warn(
        { container: top.name, element: name, text },
        "unhandled element",
      );
    }
    top.pending.push([name, text]);
  }

  onCloseElement(event: OfxCloseElementEvent): void {
    const top = this.#stack[this.#stack.length - 1];
    if (top === undefined || !this.#resolveClose(top, event.name)) {
      throw new OfxCloseMismatchError(event.name, top?.name, event.offset);
    }
  }

  /**
   * Closes the root container and returns the document.
   * Should only be called after all events have been processed.
   *
   * @throws {OfxUnbalancedStackError} If containers other than the root are
   * still open, or the root's pending tags do not resolve its close.
   */
  finish(): JsonObject {
    if (this.#stack.length > 1) {
      throw new OfxUnbalancedStackError("Stack not empty", this.openContainers);
    }
    const root = this.#stack[0];
    if (root !== undefined) {
      const open = this.openContainers;
      this.#resolveClose(root, root.name);
      if (this.#stack.length !== 0) {
        this.#stack.length = 0;
        throw new OfxUnbalancedStackError("Root not properly closed", open);
      }
    }
    return this.#result;
  }

  #push(name: string, node: OfxSchemaNode): Container {
    let value: JsonObject | JsonArray;
    switch (node.serialize) {
      case "merged-object":
      case "array-element":
      case "named-array-element":
        value = {};
        break;
      case "array":
        value = [];
        break;
      case "suppressed":
        value = this.#stack[this.#stack.length - 1]?.value ?? this.#document;
        break;
    }
    const container: Container = { name, node, value, pending: [] };
    this.#stack.push(container);
    return container;
  }

  /**
   * Resolves a closing tag against the innermost container.
   *
   * Pending tags are dropped from the most recent backwards until one named
   * `tag` is dropped or none remain. If none remain and `tag` names the
   * container itself, the container is folded into its parent and popped.
   *
   * @returns false if the closing tag matched nothing.
   */
  #resolveClose(container: Container, tag: string): boolean {
    const { pending } = container;
    let found = false;
    while (pending.length > 0 && !found) {
      const entry = pending.pop();
      if (entry?.[0] === tag) found = true;
    }
    if (pending.length === 0 && tag === container.name) {
      this.#stack.pop();
      this.#fold(container);
      return true;
    }
    return found;
  }

  #fold(container: Container): void {
    const parent = this.#stack[this.#stack.length - 1];
    if (parent === undefined) return;

    const { name, value } = container;
    switch (container.node.serialize) {
      case "merged-object":
      case "array":
        addMember(parent.value, memberKey(name), value, parent.name);
        break;
      case "array-element":
        pushElement(parent.value, value, parent.name);
        break;
      case "named-array-element":
        pushElement(parent.value, { [memberKey(name)]: value }, parent.name);
        break;
      case "suppressed":
        break;
    }
  }
}
