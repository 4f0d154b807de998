import { EXIT, type FieldType } from "./constants.js";
import {
  parseCommandDocs,
  parseCommandSetDocs,
  type CommandDocs,
  type CommandSetDocs,
} from "./docs.js";
import {
  CONVERTERS,
  type Converter,
  type FieldMode,
} from "./fields.js";
import {
  commandSetTopic,
  commandTopic,
  type CommandSetTopic,
  type CommandTopic,
  type HelpTopic,
} from "./help.js";
import {
  ok,
  type CommandParseError,
  type IdParseError,
  type PathParseError,
  type Result,
} from "./parse-errors.js";
import { parseCommand, type ParsedCommand } from "./parser.js";
import { parsePath, parsePathOpt, type CommandPath } from "./path.js";
import type { TokenInput } from "./tokens.js";
import { IdTrie, type AmbiguityResolver } from "./trie.js";
import { argumentUsages, type ArgumentUsage } from "./usage.js";
import { FieldDefinitionError, UsagekitError } from "../util/errors.js";

// ─── Definitions ─────────────────────────────────────────────────────

/** Per-argument options, keyed by the argument's usage name. */
export interface FieldOptions {
  /** Converter for each token. Defaults to "string". */
  type?: FieldType | Converter;
  /**
   * Consume the rest argument as a command path into the returned set.
   * A thunk, so a set can address itself (e.g. `help [topic...]`).
   */
  path?: () => CommandSet;
}

export interface CommandDefinition {
  /** Documentation block: usage paragraph, then `# Header` sections. */
  docs: string;
  fields?: Readonly<Record<string, FieldOptions>>;
  /** Delegate the single rest argument to a nested command set. */
  subcommand?: CommandSet;
}

export interface CommandSetDefinition {
  /** Summary paragraphs shown at the top of the set's help page. */
  docs?: string;
  commands: readonly CommandDefinition[];
}

// ─── Compiled form ───────────────────────────────────────────────────

export type PlainKind = { readonly tag: "plain"; readonly convert: Converter };

export type FieldKind =
  | PlainKind
  | { readonly tag: "path"; readonly target: () => CommandSet }
  | { readonly tag: "subcommand"; readonly target: CommandSet };

/** A field bound to one declared argument. Only rest fields take a path or subcommand. */
export type FieldInfo =
  | {
      readonly name: string;
      readonly mode: "required" | "optional";
      readonly kind: PlainKind;
    }
  | {
      readonly name: string;
      readonly mode: "rest-required" | "rest-optional";
      readonly kind: FieldKind;
    };

export interface CommandEntry {
  /** Canonical identifier. */
  readonly id: string;
  readonly docs: CommandDocs;
  readonly fields: readonly FieldInfo[];
  readonly subcommand?: CommandSet;
  readonly topic: CommandTopic;
}

function modeOf(arg: ArgumentUsage): FieldMode {
  if (arg.isRest) return arg.isRequired ? "rest-required" : "rest-optional";
  return arg.isRequired ? "required" : "optional";
}

function resolveConverter(type: FieldType | Converter | undefined): Converter {
  if (type === undefined) return CONVERTERS.string;
  return typeof type === "function" ? type : CONVERTERS[type];
}

/**
 * Validate a definition against its usage line and bind every declared
 * argument to a field. Throws SpecError subclasses.
 */
function compileCommand(definition: CommandDefinition): CommandEntry {
  const docs = parseCommandDocs(definition.docs);
  const id = docs.usage.ids[0];
  const declared = argumentUsages(docs.usage);
  const given: Readonly<Record<string, FieldOptions>> = definition.fields ?? {};
  const options = new Map(Object.entries(given));

  for (const name of options.keys()) {
    if (!declared.some((arg) => arg.name === name)) {
      throw new FieldDefinitionError(
        id,
        `could not locate argument ${JSON.stringify(name)} in usage`,
      );
    }
  }

  const subcommand = definition.subcommand;
  if (subcommand) {
    const [only, ...others] = declared;
    const valid =
      only !== undefined &&
      others.length === 0 &&
      only.isRest &&
      options.get(only.name)?.path === undefined &&
      options.get(only.name)?.type === undefined;
    if (!valid) {
      throw new FieldDefinitionError(
        id,
        "invalid structure for a subcommand, should be a single rest parameter",
      );
    }
  }

  const fields = declared.map((arg): FieldInfo => {
    const opts = options.get(arg.name) ?? {};
    const mode = modeOf(arg);

    if (mode === "required" || mode === "optional") {
      if (opts.path) {
        throw new FieldDefinitionError(
          id,
          `invalid path argument ${JSON.stringify(arg.name)}, should be a rest parameter`,
        );
      }
      return {
        name: arg.name,
        mode,
        kind: { tag: "plain", convert: resolveConverter(opts.type) },
      };
    }

    if (subcommand) {
      return { name: arg.name, mode, kind: { tag: "subcommand", target: subcommand } };
    }
    if (opts.path) {
      if (opts.type !== undefined) {
        throw new FieldDefinitionError(
          id,
          `path argument ${JSON.stringify(arg.name)} cannot declare a type`,
        );
      }
      return { name: arg.name, mode, kind: { tag: "path", target: opts.path } };
    }
    return {
      name: arg.name,
      mode,
      kind: { tag: "plain", convert: resolveConverter(opts.type) },
    };
  });

  return Object.freeze({
    id,
    docs,
    fields: Object.freeze(fields),
    subcommand,
    topic: commandTopic(docs),
  });
}

// ─── Command sets ────────────────────────────────────────────────────

/**
 * An immutable family of commands sharing one identifier space.
 *
 * Construction parses and validates every documentation block and builds
 * the identifier trie; any problem throws a SpecError and no set exists.
 * Afterwards nothing is mutated, so one instance can serve any number of
 * parse calls.
 */
export class CommandSet {
  readonly docs: CommandSetDocs;
  readonly commands: readonly CommandEntry[];
  private readonly trie: IdTrie<CommandEntry>;
  private readonly byId: ReadonlyMap<string, CommandEntry>;
  private readonly byDeclaredId: ReadonlyMap<string, CommandEntry>;
  private readonly rootTopic: CommandSetTopic;

  constructor(definition: CommandSetDefinition) {
    this.docs = parseCommandSetDocs(definition.docs);
    this.commands = Object.freeze(definition.commands.map(compileCommand));
    this.trie = IdTrie.build(
      this.commands.flatMap((command) =>
        command.docs.usage.ids.map((name) => [name, command] as const),
      ),
    );
    this.byId = new Map(this.commands.map((c) => [c.id, c] as const));
    this.byDeclaredId = new Map(
      this.commands.flatMap((c) => c.docs.usage.ids.map((id) => [id, c] as const)),
    );
    this.rootTopic = commandSetTopic(
      this.docs,
      this.commands.map((c) => c.docs.usage),
    );
  }

  /** Every accepted identifier, aliases included, as declared. */
  names(): string[] {
    return this.trie.names();
  }

  /** Resolve a possibly abbreviated identifier to its command. */
  lookup(
    input: string,
    resolve?: AmbiguityResolver<CommandEntry>,
  ): Result<CommandEntry, IdParseError> {
    return this.trie.lookup(input, resolve);
  }

  /** Find a command by canonical identifier. */
  command(id: string): CommandEntry | undefined {
    return this.byId.get(id);
  }

  parse(
    tokens: TokenInput,
  ): Result<ParsedCommand, CommandParseError> {
    return parseCommand(this, tokens);
  }

  parsePath(
    tokens: TokenInput,
  ): Result<CommandPath, PathParseError> {
    return parsePath(this, tokens);
  }

  parsePathOpt(
    tokens: TokenInput,
  ): Result<CommandPath | undefined, PathParseError> {
    return parsePathOpt(this, tokens);
  }

  /**
   * Help topic for a path. Without one, the set's own topic; with one,
   * the topic of the command declaring the head id (alias or canonical), or a nested set's topic when the path
   * continues into a subcommand.
   */
  help(path?: CommandPath): HelpTopic {
    if (path === undefined) return this.rootTopic;

    const command = this.byDeclaredId.get(path.id);
    if (!command) {
      throw new UsagekitError(
        `No command '${path.id}' in this command set`,
        EXIT.BAD_INPUT,
      );
    }

    if (command.subcommand && path.sub) {
      return command.subcommand.help(path.sub);
    }
    return command.topic;
  }

  /** Parse help path tokens and look the topic up. No tokens → root topic. */
  helpFor(
    tokens: TokenInput,
  ): Result<HelpTopic, PathParseError> {
    const path = this.parsePathOpt(tokens);
    if (!path.ok) return path;
    return ok(this.help(path.value));
  }
}

/** Build a command set. Throws SpecError when any definition is invalid. */
export function defineCommandSet(definition: CommandSetDefinition): CommandSet {
  return new CommandSet(definition);
}
