import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { FIELD_TYPES, type FieldType } from "./constants.js";
import {
  defineCommandSet,
  type CommandDefinition,
  type CommandSet,
  type FieldOptions,
} from "./command-set.js";
import { FilesystemError, SpecFileError } from "../util/errors.js";

// ─── Shape checks ────────────────────────────────────────────────────

type YamlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some((type) => type === value);
}

/** Reads one spec document, remembering the file for error messages. */
class SpecReader {
  private root: CommandSet | undefined;

  constructor(private readonly filePath: string) {}

  /** Build the top-level set. Nested sets are built first, bottom-up. */
  readRoot(doc: unknown): CommandSet {
    this.root = this.readSet(doc, "document");
    return this.root;
  }

  private fail(message: string): never {
    throw new SpecFileError(this.filePath, message);
  }

  /** Thunk for `path: true` fields. Only called once parsing is under way. */
  private readonly rootSet = (): CommandSet => {
    if (!this.root) this.fail("path field used before the command set was built");
    return this.root;
  };

  private readSet(raw: unknown, where: string): CommandSet {
    if (!isRecord(raw)) this.fail(`${where} must be a mapping`);

    const summary = raw.summary;
    if (summary !== undefined && summary !== null && typeof summary !== "string") {
      this.fail(`${where}.summary must be a string`);
    }

    const commands = raw.commands;
    if (!Array.isArray(commands)) {
      this.fail(`${where}.commands must be a list`);
    }

    return defineCommandSet({
      docs: typeof summary === "string" ? summary : undefined,
      commands: commands.map((cmd: unknown, i) =>
        this.readCommand(cmd, `${where}.commands[${i}]`),
      ),
    });
  }

  private readCommand(raw: unknown, where: string): CommandDefinition {
    if (!isRecord(raw)) this.fail(`${where} must be a mapping`);

    const docs = raw.docs;
    if (typeof docs !== "string") this.fail(`${where}.docs must be a string`);

    const definition: CommandDefinition = { docs };

    const fields = raw.fields;
    if (fields !== undefined && fields !== null) {
      if (!isRecord(fields)) this.fail(`${where}.fields must be a mapping`);

      const options: Record<string, FieldOptions> = {};
      for (const [name, value] of Object.entries(fields)) {
        options[name] = this.readField(value, `${where}.fields.${name}`);
      }
      definition.fields = options;
    }

    const subcommand = raw.subcommand;
    if (subcommand !== undefined && subcommand !== null) {
      definition.subcommand = this.readSet(subcommand, `${where}.subcommand`);
    }

    return definition;
  }

  private readField(raw: unknown, where: string): FieldOptions {
    // `force:` with no value is a plain string field.
    if (raw === null || raw === undefined) return {};
    if (!isRecord(raw)) this.fail(`${where} must be a mapping`);

    const options: FieldOptions = {};

    const type = raw.type;
    if (type !== undefined) {
      if (!isFieldType(type)) {
        this.fail(`${where}.type must be one of: ${FIELD_TYPES.join(", ")}`);
      }
      options.type = type;
    }

    const path = raw.path;
    if (path !== undefined) {
      if (typeof path !== "boolean") this.fail(`${where}.path must be true or false`);
      if (path) options.path = this.rootSet;
    }

    return options;
  }
}

// ─── Loading ─────────────────────────────────────────────────────────

/**
 * Build a command set from YAML source.
 * Throws SpecFileError for malformed YAML or shape, and any SpecError the
 * command definitions raise.
 */
export function parseSpecSource(source: string, filePath: string): CommandSet {
  let doc: unknown;
  try {
    doc = YAML.parse(source);
  } catch (err) {
    throw new SpecFileError(
      filePath,
      err instanceof Error ? err.message : String(err),
    );
  }

  return new SpecReader(filePath).readRoot(doc);
}

/** Read and build a spec file. */
export async function loadSpecFile(filePath: string): Promise<CommandSet> {
  let source: string;
  try {
    source = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new FilesystemError(
      `Cannot read spec file '${filePath}': ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseSpecSource(source, filePath);
}
