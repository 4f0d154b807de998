import { encode } from "@toon-format/toon";
import type { ParsedCommand, ArgumentValue } from "../core/parser.js";
import type { Scalar } from "../core/fields.js";
import { pathSegments, type CommandPath } from "../core/path.js";
import type { HelpTopic } from "../core/help.js";
import { SimpleHelpFolder } from "../fold/fold-help.js";

// ─── Output format enum ─────────────────────────────────────────────

export type OutputFormat = "toon" | "json" | "table";

/**
 * Determine the output format from CLI flags.
 * Priority: --json > --table > default (toon).
 */
export function resolveFormat(opts: {
  json?: boolean;
  table?: boolean;
}): OutputFormat {
  if (opts.json) return "json";
  if (opts.table) return "table";
  return "toon";
}

function serialize(value: unknown, format: "json" | "toon"): string {
  return format === "json" ? JSON.stringify(value, null, 2) : encode(value);
}

// ─── Parsed command serialization ────────────────────────────────────

type PlainValue =
  | string
  | number
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };

function isScalarList(value: ArgumentValue): value is readonly Scalar[] {
  return Array.isArray(value);
}

function isParsedCommand(value: ParsedCommand | CommandPath): value is ParsedCommand {
  return "args" in value;
}

/**
 * Serialize a parsed command to a plain object (for JSON/TOON output).
 * Omitted optionals become null; paths become their id segments.
 */
export function parsedToObject(parsed: ParsedCommand): {
  [key: string]: PlainValue;
} {
  const args: { [key: string]: PlainValue } = {};
  for (const [name, value] of Object.entries(parsed.args)) {
    args[name] = valueToPlain(value);
  }
  return { command: parsed.id, args };
}

function valueToPlain(value: ArgumentValue): PlainValue {
  if (value === undefined) return null;
  if (typeof value !== "object") return value;
  if (isScalarList(value)) return [...value];
  if (isParsedCommand(value)) return parsedToObject(value);
  return { path: pathSegments(value) };
}

// ─── Parsed command formatting ───────────────────────────────────────

export function formatParsed(
  parsed: ParsedCommand,
  format: OutputFormat,
): string {
  switch (format) {
    case "json":
    case "toon":
      return serialize(parsedToObject(parsed), format);
    case "table":
      return renderParsedText(parsed, "").join("\n");
  }
}

function renderParsedText(parsed: ParsedCommand, indent: string): string[] {
  const lines = [`${indent}command: ${parsed.id}`];

  for (const [name, value] of Object.entries(parsed.args)) {
    const label = `${indent}  ${name}:`;

    if (value === undefined) {
      lines.push(`${label} -`);
    } else if (typeof value !== "object") {
      lines.push(`${label} ${String(value)}`);
    } else if (isScalarList(value)) {
      lines.push(`${label} [${value.map(String).join(", ")}]`);
    } else if (isParsedCommand(value)) {
      lines.push(label, ...renderParsedText(value, `${indent}    `));
    } else {
      lines.push(`${label} ${pathSegments(value).join(" → ")}`);
    }
  }

  return lines;
}

// ─── Help formatting ─────────────────────────────────────────────────

/** TOON/JSON carry the help model itself; table renders it as text. */
export function formatHelp(topic: HelpTopic, format: OutputFormat): string {
  switch (format) {
    case "json":
    case "toon":
      return serialize(topic, format);
    case "table":
      return new SimpleHelpFolder().foldTopic(topic);
  }
}

// ─── Token list formatting ───────────────────────────────────────────

export function formatTokens(tokens: string[], format: OutputFormat): string {
  switch (format) {
    case "json":
    case "toon":
      return serialize(tokens, format);
    case "table":
      return tokens.map((t, i) => `  ${i}: ${t}`).join("\n");
  }
}

// ─── Spec check formatting ───────────────────────────────────────────

export interface CheckSummary {
  file: string;
  /** Commands directly in the top-level set. */
  commands: number;
  /** Commands in every nested subcommand set. */
  nested_commands: number;
  identifiers: string[];
  time_ms: number;
}

export function formatCheckSummary(
  summary: CheckSummary,
  format: OutputFormat,
): string {
  switch (format) {
    case "json":
    case "toon":
      return serialize(summary, format);
    case "table":
      return [
        `✓ ${summary.file} loaded`,
        `✓ ${summary.commands} command(s)`,
        `✓ ${summary.nested_commands} subcommand(s)`,
        `✓ identifiers: ${summary.identifiers.join(", ")}`,
        `\nTotal: ${(summary.time_ms / 1000).toFixed(2)}s`,
      ].join("\n");
  }
}
