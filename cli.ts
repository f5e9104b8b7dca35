#!/usr/bin/env node
/**
 * Array literal CLI - decodes literals and writes NDJSON to stdout.
 *
 * Usage:
 *   node --import tsx cli.ts '{1,2,3}' '{{a,b},{c,d}}'  # decode arguments
 *   printf '{1}\n{2}\n' | node --import tsx cli.ts     # decode stdin lines
 *
 * Environment:
 *   PGARRAY_TYPE  - target type name (default: any)
 *   PGARRAY_DEBUG - 1 enables decoder debug logging
 */

import * as readline from "node:readline";
import { pathToFileURL } from "node:url";
import { getTarget, parseArray } from "./arrays/index.ts";

export interface CliOptions {
  type: string;
  debug: boolean;
}

export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): CliOptions {
  return {
    type: env.PGARRAY_TYPE ?? "any",
    debug: env.PGARRAY_DEBUG === "1",
  };
}

// Convert non-JSON-safe types for serialization
export function toJSON(obj: unknown): unknown {
  if (typeof obj === "bigint") return obj.toString();
  if (typeof obj === "number" && !Number.isFinite(obj)) return String(obj);
  if (obj instanceof Uint8Array) return Buffer.from(obj).toString("base64");
  if (Array.isArray(obj)) return obj.map(toJSON);
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = toJSON(v);
    }
    return result;
  }
  return obj;
}

export interface DecodedLine {
  line: string;
  ok: boolean;
}

/** Decode one literal into its NDJSON result line. */
export function decodeLine(input: string, options: CliOptions): DecodedLine {
  try {
    const value = parseArray(input, getTarget(options.type), { debug: options.debug });
    return { line: JSON.stringify({ input, value: toJSON(value) }), ok: true };
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    return { line: JSON.stringify({ input, error: { name: err.name, message: err.message } }), ok: false };
  }
}

async function main(): Promise<number> {
  const options = optionsFromEnv();
  const inputs = process.argv.slice(2);
  let failed = false;

  const run = (input: string) => {
    const result = decodeLine(input, options);
    console.log(result.line);
    if (!result.ok) failed = true;
  };

  if (inputs.length > 0) {
    for (const input of inputs) run(input);
    return failed ? 1 : 0;
  }

  const rl = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });
  for await (const line of rl) {
    if (line) run(line);
  }
  return failed ? 1 : 0;
}

const invokedDirectly =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    },
  );
}
