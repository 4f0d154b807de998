import { fail, ok, type PathParseError, type Result } from "./parse-errors.js";
import { TokenStream, type TokenInput } from "./tokens.js";
import type { CommandSet } from "./command-set.js";

/**
 * Address of a command, or of a point inside a subcommand hierarchy.
 * `sub` only ever appears under a command that carries a subcommand; when
 * it is absent there, the path names the subcommand set as a whole.
 */
export interface CommandPath {
  readonly id: string;
  readonly sub?: CommandPath;
}

/** Parse a non-empty path. */
export function parsePath(
  set: CommandSet,
  tokens: TokenInput,
): Result<CommandPath, PathParseError> {
  const stream = TokenStream.from(tokens);
  const head = stream.next();
  if (head === undefined) {
    return fail<PathParseError>({ kind: "incomplete", available: set.names() });
  }
  return parseFrom(set, head, stream);
}

/** Parse a path that may be empty. An empty stream gives undefined. */
export function parsePathOpt(
  set: CommandSet,
  tokens: TokenInput,
): Result<CommandPath | undefined, PathParseError> {
  const stream = TokenStream.from(tokens);
  const head = stream.next();
  if (head === undefined) return ok(undefined);
  return parseFrom(set, head, stream);
}

function parseFrom(
  set: CommandSet,
  head: string,
  stream: TokenStream,
): Result<CommandPath, PathParseError> {
  const found = set.lookup(head);
  if (!found.ok) {
    return fail<PathParseError>({ kind: "bad-path-id", error: found.error });
  }
  const command = found.value;

  if (command.subcommand) {
    const sub = parsePathOpt(command.subcommand, stream);
    if (!sub.ok) return sub;
    return ok(
      sub.value === undefined
        ? pathFromId(command.id)
        : Object.freeze({ id: command.id, sub: sub.value }),
    );
  }

  const extra = stream.next();
  if (extra !== undefined) {
    return fail<PathParseError>({ kind: "trailing-path", extra });
  }
  return ok(pathFromId(command.id));
}

export function pathHead(path: CommandPath): string {
  return path.id;
}

export function pathFromId(id: string): CommandPath {
  return Object.freeze({ id });
}

/** Canonical ids along the path, outermost first. */
export function pathSegments(path: CommandPath): string[] {
  const segments: string[] = [];
  for (let p: CommandPath | undefined = path; p; p = p.sub) {
    segments.push(p.id);
  }
  return segments;
}
