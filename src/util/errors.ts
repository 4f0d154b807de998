import { EXIT } from "../core/constants.js";

/**
 * Base error class for usagekit.
 * Every UsagekitError carries an exit code so the CLI can exit with the
 * correct status without catching-and-switching on error types.
 *
 * These are thrown errors: spec-load failures and CLI failures. Runtime
 * parse failures are returned as values (see core/parse-errors.ts).
 */
export class UsagekitError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT.SPEC_ERROR) {
    super(message);
    this.name = "UsagekitError";
    this.exitCode = exitCode;
  }
}

/** A command definition could not be built. Fatal at load time. */
export class SpecError extends UsagekitError {
  constructor(message: string) {
    super(message, EXIT.SPEC_ERROR);
    this.name = "SpecError";
  }
}

/** Malformed usage line. */
export class UsageSyntaxError extends SpecError {
  public readonly line: string;

  constructor(message: string, line: string) {
    super(`${message} in usage line ${JSON.stringify(line)}`);
    this.name = "UsageSyntaxError";
    this.line = line;
  }
}

/** Documented argument names disagree with the usage line. */
export class ArgumentDocsError extends SpecError {
  public readonly expected: readonly string[];
  public readonly found: readonly string[];

  constructor(
    message: string,
    expected: readonly string[],
    found: readonly string[],
  ) {
    super(
      `${message} (expected: ${listNames(expected)}; found: ${listNames(found)})`,
    );
    this.name = "ArgumentDocsError";
    this.expected = expected;
    this.found = found;
  }
}

/** Two identifiers in one command set lowercase to the same string. */
export class DuplicateIdentifierError extends SpecError {
  public readonly identifier: string;

  constructor(identifier: string) {
    super(`multiple entries for identifier ${JSON.stringify(identifier)}`);
    this.name = "DuplicateIdentifierError";
    this.identifier = identifier;
  }
}

/** Field options that do not fit the declared arguments. */
export class FieldDefinitionError extends SpecError {
  constructor(command: string, message: string) {
    super(`command '${command}': ${message}`);
    this.name = "FieldDefinitionError";
  }
}

/** Spec file content that is not a valid command set description. */
export class SpecFileError extends SpecError {
  constructor(filePath: string, message: string) {
    super(`Invalid spec file '${filePath}': ${message}`);
    this.name = "SpecFileError";
  }
}

/** Filesystem-level error wrapper. */
export class FilesystemError extends UsagekitError {
  constructor(message: string) {
    super(message, EXIT.FILESYSTEM_ERROR);
    this.name = "FilesystemError";
  }
}

/** Tokens given on the command line did not parse against the spec. */
export class CommandInputError extends UsagekitError {
  constructor(message: string) {
    super(message, EXIT.BAD_INPUT);
    this.name = "CommandInputError";
  }
}

/** A converter rejected a token. */
export class ConversionError extends UsagekitError {
  public readonly token: string;

  constructor(expected: string, token: string) {
    super(`invalid ${expected} ${JSON.stringify(token)}`, EXIT.BAD_INPUT);
    this.name = "ConversionError";
    this.token = token;
  }
}

function listNames(names: readonly string[]): string {
  return names.length === 0 ? "none" : names.join(", ");
}
