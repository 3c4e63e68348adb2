// Copyright 2018-2026 the Deno authors. MIT license.

/**
 * Command-line front end: `ofx-to-json [-o OUTPUT] [-q] [--encoding ENC] [OFXFILE|-]`.
 *
 * Reads an OFX document from a file or stdin, converts it with the bundled
 * schema and writes the JSON, followed by a newline, to OUTPUT or stdout.
 *
 * @module
 */

import { readFile, writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { pino } from "pino";
import { convert } from "./convert.js";

const EXIT_SUCCESS = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

/** The streams {@linkcode main} reads from and writes to. */
export interface CliIo {
  readonly stdin: AsyncIterable<string | Uint8Array>;
  readonly stdout: { write(chunk: string): unknown };
  readonly stderr: { write(chunk: string): unknown };
}

const USAGE = `Usage: ofx-to-json [-o OUTPUT] [-q] [--encoding ENC] [OFXFILE|-]

Converts an OFX document to JSON. Reads stdin when OFXFILE is "-" or missing.

Options:
  -o, --output OUTPUT  write the JSON to OUTPUT instead of stdout
  -q, --quiet          do not log diagnostics
      --encoding ENC   input encoding (default: utf8)
  -h, --help           show this help
`;

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      output: { type: "string", short: "o" },
      quiet: { type: "boolean", short: "q", default: false },
      encoding: { type: "string", default: "utf8" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });
}

async function readStdin(
  stdin: AsyncIterable<string | Uint8Array>,
  encoding: BufferEncoding,
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(
      typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk),
    );
  }
  return Buffer.concat(chunks).toString(encoding);
}

/**
 * Runs the converter with command-line arguments.
 *
 * @example Usage
 * ```ts ignore
 * import { main } from "./cli.js";
 *
 * process.exitCode = await main(["statement.ofx", "-o", "statement.json"], process);
 * ```
 *
 * @param argv The arguments, without the node and script paths.
 * @param io The standard streams.
 * @returns 0 on success, 1 on failure, 2 on bad usage.
 */
export async function main(
  argv: readonly string[],
  io: CliIo,
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    io.stderr.write(USAGE);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout.write(USAGE);
    return EXIT_SUCCESS;
  }
  if (positionals.length > 1) {
    io.stderr.write(`Too many input files: ${positionals.join(" ")}\n`);
    io.stderr.write(USAGE);
    return EXIT_USAGE;
  }
  const encoding = values.encoding ?? "utf8";
  if (!Buffer.isEncoding(encoding)) {
    io.stderr.write(`Unknown encoding '${encoding}'\n`);
    io.stderr.write(USAGE);
    return EXIT_USAGE;
  }

  const logger = pino(
    { name: "ofx-to-json", level: values.quiet ? "silent" : "info" },
    io.stderr,
  );

  const file = positionals[0] ?? "-";
  let input: string;
  try {
    input = file === "-"
      ? await readStdin(io.stdin, encoding)
      : await readFile(file, { encoding });
  } catch (err) {
    logger.error({ err, file }, "Could not read input.");
    return EXIT_FAILURE;
  }

  let json: string;
  try {
    json = JSON.stringify(convert(input, { logger }), null, 2);
  } catch {
    // convert() has already logged the failure.
    return EXIT_FAILURE;
  }

  if (values.output === undefined) {
    io.stdout.write(`${json}\n`);
    return EXIT_SUCCESS;
  }
  try {
    await writeFile(values.output, `${json}\n`);
  } catch (err) {
    logger.error({ err, file: values.output }, "Could not write output.");
    return EXIT_FAILURE;
  }
  return EXIT_SUCCESS;
}
