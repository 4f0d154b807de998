import { resolve } from "node:path";
import { Command } from "commander";
import { CommandInputError, UsagekitError } from "./errors.js";
import { resolveFormat, type OutputFormat } from "./format.js";
import { DEFAULT_SPEC_FILE } from "../core/constants.js";
import { loadSpecFile } from "../core/spec-file.js";
import type { CommandSet } from "../core/command-set.js";
import type { Result } from "../core/parse-errors.js";
import { SimpleErrorFolder } from "../fold/fold-error.js";

/** Options declared on the root program. */
export interface GlobalOptions {
  spec: string;
  format: OutputFormat;
}

/**
 * Walk up the commander chain to the root program and extract global options.
 */
export function resolveParentOpts(cmd: Command): GlobalOptions {
  let current: Command = cmd;
  while (current.parent) {
    current = current.parent;
  }

  const opts = current.opts();
  const spec: unknown = opts.spec;
  return {
    spec: typeof spec === "string" ? spec : DEFAULT_SPEC_FILE,
    format: resolveFormat({ json: opts.json === true, table: opts.table === true }),
  };
}

/** Load the spec file named by --spec, relative to the working directory. */
export async function loadCommandSet(opts: GlobalOptions): Promise<CommandSet> {
  return loadSpecFile(resolve(process.cwd(), opts.spec));
}

/**
 * Unwrap a parse result, or throw CommandInputError with the folded message.
 */
export function unwrapParse<T>(
  result: Result<T, unknown>,
  folder: SimpleErrorFolder = new SimpleErrorFolder(),
): T {
  if (!result.ok) {
    throw new CommandInputError(folder.fold(result.error));
  }
  return result.value;
}

/**
 * Handle errors uniformly: UsagekitError → stderr + exit with code.
 * Unknown errors → re-throw.
 */
export function handleError(err: unknown): never {
  if (err instanceof UsagekitError) {
    process.stderr.write(`Error: ${err.message}\n`);
    process.exit(err.exitCode);
  }
  throw err;
}
