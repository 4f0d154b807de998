import {
  fail,
  ok,
  type CommandParseError,
  type Result,
} from "./parse-errors.js";
import { TokenStream, type TokenInput } from "./tokens.js";
import type { Converter, Scalar } from "./fields.js";
import type { CommandPath } from "./path.js";
import type {
  CommandEntry,
  CommandSet,
  FieldInfo,
  FieldKind,
} from "./command-set.js";

/** A successfully parsed command. */
export interface ParsedCommand {
  /** Canonical identifier of the matched command. */
  readonly id: string;
  /** Value of every declared argument, keyed by its usage name. */
  readonly args: Readonly<Record<string, ArgumentValue>>;
}

export type ArgumentValue =
  | Scalar
  | readonly Scalar[]
  | ParsedCommand
  | CommandPath
  | undefined;

type FieldResult = Result<ArgumentValue, CommandParseError>;

/**
 * Parse a full token sequence: the command identifier first, then its
 * arguments.
 */
export function parseCommand(
  set: CommandSet,
  tokens: TokenInput,
): Result<ParsedCommand, CommandParseError> {
  const stream = TokenStream.from(tokens);

  const head = stream.next();
  if (head === undefined) return fail<CommandParseError>({ kind: "no-input" });

  const found = set.lookup(head);
  if (!found.ok) {
    return fail<CommandParseError>({ kind: "bad-id", error: found.error });
  }

  return parseArguments(found.value, stream);
}

/**
 * Fill a resolved command's fields from the remaining tokens.
 * One pass over the declared fields; no backtracking.
 */
export function parseArguments(
  command: CommandEntry,
  stream: TokenStream,
): Result<ParsedCommand, CommandParseError> {
  const args: Record<string, ArgumentValue> = {};

  for (const field of command.fields) {
    const value = parseField(command.id, field, stream);
    if (!value.ok) return value;
    args[field.name] = value.value;
  }

  if (command.docs.usage.rest.kind === "none") {
    const extra = stream.next();
    if (extra !== undefined) {
      return fail<CommandParseError>({ kind: "trailing", cmd: command.id, extra });
    }
  }

  return ok(Object.freeze({ id: command.id, args: Object.freeze(args) }));
}

function parseField(
  cmd: string,
  field: FieldInfo,
  stream: TokenStream,
): FieldResult {
  const arg = field.name;

  switch (field.mode) {
    case "required": {
      const token = stream.next();
      if (token === undefined) {
        return fail<CommandParseError>({ kind: "missing-required", cmd, arg });
      }
      return convertWith(cmd, arg, field.kind.convert, token);
    }

    case "optional": {
      const token = stream.next();
      if (token === undefined) return ok(undefined);
      return convertWith(cmd, arg, field.kind.convert, token);
    }

    case "rest-required":
      if (stream.peek() === undefined) {
        return fail<CommandParseError>({ kind: "missing-required", cmd, arg });
      }
      return collectRest(cmd, arg, field.kind, stream);

    case "rest-optional":
      // An optional subcommand still hands the empty stream to the nested
      // set, which reports no-input.
      if (stream.peek() === undefined) {
        if (field.kind.tag === "plain") return ok(Object.freeze([]));
        if (field.kind.tag === "path") return ok(undefined);
      }
      return collectRest(cmd, arg, field.kind, stream);
  }
}

function collectRest(
  cmd: string,
  arg: string,
  kind: FieldKind,
  stream: TokenStream,
): FieldResult {
  switch (kind.tag) {
    case "subcommand": {
      const inner = kind.target.parse(stream);
      if (!inner.ok) {
        return fail<CommandParseError>({ kind: "subcommand", cmd, error: inner.error });
      }
      return inner;
    }

    case "path": {
      const path = kind.target().parsePath(stream);
      if (!path.ok) {
        return fail<CommandParseError>({
          kind: "bad-convert",
          cmd,
          arg,
          cause: path.error,
        });
      }
      return path;
    }

    case "plain": {
      const values: Scalar[] = [];
      for (let token = stream.next(); token !== undefined; token = stream.next()) {
        const value = convertWith(cmd, arg, kind.convert, token);
        if (!value.ok) return value;
        values.push(value.value);
      }
      return ok(Object.freeze(values));
    }
  }
}

function convertWith(
  cmd: string,
  arg: string,
  convert: Converter,
  token: string,
): Result<Scalar, CommandParseError> {
  try {
    return ok(convert(token));
  } catch (cause) {
    return fail<CommandParseError>({ kind: "bad-convert", cmd, arg, cause });
  }
}
