import {
  isCommandParseError,
  isIdParseError,
  isPathParseError,
  type CommandParseError,
  type IdParseError,
  type PathParseError,
} from "../core/parse-errors.js";
import { didYouMean } from "./did-you-mean.js";

/**
 * Turns parse errors into some output value, one hook per error kind.
 *
 * Nested errors are folded inside-out: a bad-convert cause and a failed
 * subcommand's error reach their hooks already folded.
 */
export abstract class ErrorFolder<O> {
  /** Fold any value, dispatching on the parse error category it belongs to. */
  fold(error: unknown): O {
    if (isCommandParseError(error)) return this.foldCommandParse(error);
    if (isIdParseError(error)) return this.foldIdParse(error);
    if (isPathParseError(error)) return this.foldPathParse(error);
    return this.other(error);
  }

  foldIdParse(error: IdParseError): O {
    switch (error.kind) {
      case "no-match":
        return this.noIdMatch(error.given, error.available);
      case "ambiguous":
        return this.ambiguousId(error.candidates, error.given);
    }
  }

  foldPathParse(error: PathParseError): O {
    switch (error.kind) {
      case "incomplete":
        return this.incompletePath(error.available);
      case "bad-path-id":
        return this.badPathId(error.error);
      case "trailing-path":
        return this.trailingPath(error.extra);
    }
  }

  foldCommandParse(error: CommandParseError): O {
    switch (error.kind) {
      case "no-input":
        return this.noInput();
      case "bad-id":
        return this.badId(error.error);
      case "missing-required":
        return this.missingRequired(error.cmd, error.arg);
      case "bad-convert":
        return this.badConvert(error.cmd, error.arg, this.fold(error.cause));
      case "trailing":
        return this.trailing(error.cmd, error.extra);
      case "subcommand":
        return this.subcommand(error.cmd, this.foldCommandParse(error.error));
    }
  }

  badPathId(error: IdParseError): O {
    return this.foldIdParse(error);
  }

  badId(error: IdParseError): O {
    return this.foldIdParse(error);
  }

  abstract noIdMatch(given: string, available: readonly string[]): O;
  abstract ambiguousId(candidates: readonly string[], given: string): O;
  abstract incompletePath(available: readonly string[]): O;
  abstract trailingPath(extra: string): O;
  abstract noInput(): O;
  abstract missingRequired(cmd: string, arg: string): O;
  abstract badConvert(cmd: string, arg: string, inner: O): O;
  abstract trailing(cmd: string, extra: string): O;
  abstract subcommand(cmd: string, inner: O): O;
  /** Anything that is not a parse error, such as a converter's exception. */
  abstract other(error: unknown): O;
}

export interface SimpleErrorFolderOptions {
  /** Offer "did you mean" suggestions for unknown identifiers. Default true. */
  suggestions?: boolean;
}

/** Renders parse errors as one-line English messages. */
export class SimpleErrorFolder extends ErrorFolder<string> {
  private readonly suggestions: boolean;

  constructor(options: SimpleErrorFolderOptions = {}) {
    super();
    this.suggestions = options.suggestions ?? true;
  }

  /** Quote and comma-join a list of identifiers. */
  static formatOptions(options: Iterable<string>): string {
    return [...options].map((opt) => `'${opt}'`).join(", ");
  }

  noIdMatch(given: string, available: readonly string[]): string {
    let message = `Not sure what you mean by ${JSON.stringify(given)}.`;

    const suggested = this.suggestions ? didYouMean(given, available) : [];
    if (suggested.length > 0) {
      message += `  Did you mean: ${SimpleErrorFolder.formatOptions(suggested)}`;
    } else if (available.length > 0) {
      message += `  Available options are: ${SimpleErrorFolder.formatOptions(available)}`;
    }

    return message;
  }

  ambiguousId(candidates: readonly string[], given: string): string {
    return `Not sure what you mean by ${JSON.stringify(given)}.  Could be: ${SimpleErrorFolder.formatOptions(candidates)}`;
  }

  incompletePath(available: readonly string[]): string {
    return `Incomplete command path, expected one of: ${SimpleErrorFolder.formatOptions(available)}`;
  }

  trailingPath(extra: string): string {
    return `Unexpected extra path argument ${JSON.stringify(extra)}`;
  }

  noInput(): string {
    return "No command given";
  }

  missingRequired(cmd: string, arg: string): string {
    return `Missing required argument '${arg}' to command '${cmd}'`;
  }

  badConvert(cmd: string, arg: string, inner: string): string {
    return `Couldn't parse argument '${arg}' of command '${cmd}': ${inner}`;
  }

  trailing(cmd: string, extra: string): string {
    return `Unexpected extra argument ${JSON.stringify(extra)} to '${cmd}'`;
  }

  subcommand(cmd: string, inner: string): string {
    return `Subcommand '${cmd}' failed: ${inner}`;
  }

  other(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
