// Copyright 2018-2026 the Deno authors. MIT license.

/**
 * Schema model: which tags open containers, which are typed leaves, and how
 * each container is serialized.
 *
 * Schemas are written either in code with {@linkcode schemaNode}, or as a JSON
 * document of named node definitions read by {@linkcode loadSchema}. The
 * bundled OFX table is available from {@linkcode defaultSchema}.
 *
 * @module
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { LeafKind, OfxSchema, OfxSchemaNode, SerializeMode } from "./types.js";
import { OfxSchemaError } from "./types.js";

const SERIALIZE_MODES = [
  "suppressed",
  "merged-object",
  "array-element",
  "named-array-element",
  "array",
] as const satisfies readonly SerializeMode[];

const LEAF_KINDS = [
  "string",
  "number",
  "boolean",
  "datetime",
] as const satisfies readonly LeafKind[];

const nodeDefinitionSchema = z.object({
  serialize: z.enum(SERIALIZE_MODES),
  children: z.record(z.string().min(1)).default({}),
  leaves: z.record(z.enum(LEAF_KINDS)).default({}),
}).strict();

const schemaDocumentSchema = z.object({
  rootTag: z.string().min(1).default("OFX"),
  root: z.string().min(1),
  nodes: z.record(nodeDefinitionSchema),
}).strict();

/** A JSON schema document, as accepted by {@linkcode loadSchema}. */
export type SchemaDocument = z.input<typeof schemaDocumentSchema>;

/** Plain-object description of a node, for {@linkcode schemaNode}. */
export interface SchemaNodeInit {
  /**
   * How the container is attached to its parent.
   *
   * @default {"merged-object"}
   */
  readonly serialize?: SerializeMode;
  /** Child tag name to nested node. */
  readonly children?: Readonly<Record<string, OfxSchemaNode>>;
  /** Leaf tag name to value kind. */
  readonly leaves?: Readonly<Record<string, LeafKind>>;
}

/**
 * Creates a frozen schema node.
 *
 * @example Usage
 * ```ts
 * import { schemaNode } from "ofx-to-json";
 *
 * const status = schemaNode({ leaves: { CODE: "string", SEVERITY: "string" } });
 * const root = schemaNode({
 *   serialize: "suppressed",
 *   children: { STATUS: status },
 * });
 * ```
 *
 * @throws {OfxSchemaError} If an `array` node declares leaves.
 */
export function schemaNode(init: SchemaNodeInit = {}): OfxSchemaNode {
  const serialize = init.serialize ?? "merged-object";
  const leaves = new Map(Object.entries(init.leaves ?? {}));
  if (serialize === "array" && leaves.size > 0) {
    throw new OfxSchemaError(
      `Array node cannot declare leaves: ${[...leaves.keys()].join(", ")}`,
    );
  }
  return Object.freeze({
    serialize,
    children: new Map(Object.entries(init.children ?? {})),
    leaves,
  });
}

/**
 * Validates a JSON schema document and resolves it into a tree of shared,
 * frozen nodes.
 *
 * The document lists node definitions by id; `children` maps a tag to the id
 * of its node, so a node may be referenced from several parents.
 *
 * @example Usage
 * ```ts
 * import { loadSchema } from "ofx-to-json";
 *
 * const schema = loadSchema({
 *   rootTag: "OFX",
 *   root: "main",
 *   nodes: {
 *     main: { serialize: "suppressed", children: { STATUS: "status" } },
 *     status: { serialize: "merged-object", leaves: { CODE: "string" } },
 *   },
 * });
 * schema.root.children.get("STATUS")?.leaves.get("CODE"); // "string"
 * ```
 *
 * @param document The parsed JSON document.
 * @throws {OfxSchemaError} If the document is malformed, references an
 * unknown node, contains a cycle, or has an array root.
 */
export function loadSchema(document: unknown): OfxSchema {
  const parsed = schemaDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new OfxSchemaError(`Invalid schema document: ${issues}`);
  }
  const { rootTag, root, nodes } = parsed.data;

  const resolved = new Map<string, OfxSchemaNode>();
  const visiting = new Set<string>();

  function resolve(id: string, path: readonly string[]): OfxSchemaNode {
    const done = resolved.get(id);
    if (done !== undefined) return done;

    const definition = nodes[id];
    if (definition === undefined) {
      throw new OfxSchemaError(
        `Unknown schema node '${id}' referenced from ${path.join(" > ")}`,
      );
    }
    if (visiting.has(id)) {
      throw new OfxSchemaError(
        `Schema node '${id}' contains itself: ${path.join(" > ")}`,
      );
    }

    visiting.add(id);
    const children: Record<string, OfxSchemaNode> = {};
    for (const [tag, childId] of Object.entries(definition.children)) {
      children[tag] = resolve(childId, [...path, tag]);
    }
    visiting.delete(id);

    const node = schemaNode({
      serialize: definition.serialize,
      children,
      leaves: definition.leaves,
    });
    resolved.set(id, node);
    return node;
  }

  const rootNode = resolve(root, [rootTag]);
  if (rootNode.serialize === "array") {
    throw new OfxSchemaError(`Root node '${root}' cannot be an array`);
  }
  return Object.freeze({ rootTag, root: rootNode });
}

let bundled: OfxSchema | undefined;

/**
 * The bundled OFX schema: signon responses, investment statements (bank
 * transactions, buys, sells, income, positions, balances) and security lists.
 *
 * Loaded from `ofx_schema.json` on first use. The result is immutable, so the
 * same instance is returned on later calls.
 */
export function defaultSchema(): OfxSchema {
  if (bundled === undefined) {
    const url = new URL("./ofx_schema.json", import.meta.url);
    bundled = loadSchema(JSON.parse(readFileSync(url, "utf8")));
  }
  return bundled;
}
