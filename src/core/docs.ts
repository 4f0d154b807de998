import {
  ARGUMENT_HEADERS,
  EXAMPLE_HEADERS,
  SUMMARY_HEADERS,
} from "./constants.js";
import { parseUsageParagraph, type CommandUsage } from "./usage.js";
import { ArgumentDocsError, SpecError } from "../util/errors.js";

// ─── Types ───────────────────────────────────────────────────────────

export interface ArgumentDoc {
  readonly name: string;
  readonly isRequired: boolean;
  readonly description: string;
}

/** Long-form documentation shown in a command's help topic. */
export interface CommandDesc {
  readonly summary?: string;
  /** One entry per declared argument, in usage order. */
  readonly args: readonly ArgumentDoc[];
  /** Raw example text, newlines preserved. */
  readonly examples?: string;
}

export interface CommandDocs extends CommandDesc {
  readonly usage: CommandUsage;
}

export interface CommandSetDocs {
  readonly summary?: string;
}

// ─── Paragraph helpers ───────────────────────────────────────────────

const HEADER_RE = /^\s*#\s*(\S+)\s*$/;
const ARGUMENT_RE = /^\s*([^\n\s](?:[^:\n]*[^:\n\s])?)\s*:[ \t]*/gm;
const LINE_RE = /\s*\n\s*/g;

/**
 * Split a documentation block into paragraphs of raw lines.
 * Any run of blank lines separates two paragraphs.
 */
export function splitParagraphs(text: string): string[][] {
  const paragraphs: string[][] = [];
  let current: string[] = [];

  for (const line of text.replace(/\r\n?/g, "\n").split("\n")) {
    if (line.trim().length === 0) {
      if (current.length > 0) {
        paragraphs.push(current);
        current = [];
      }
      continue;
    }
    current.push(line);
  }

  if (current.length > 0) paragraphs.push(current);
  return paragraphs;
}

/** Collapse a multi-line string onto one line. */
export function relaxLines(text: string): string {
  return text.trim().replace(LINE_RE, " ");
}

// ─── Argument section ────────────────────────────────────────────────

function expectedArguments(
  usage: CommandUsage,
): Array<{ name: string; isRequired: boolean }> {
  const expected = [
    ...usage.required.map((name) => ({ name, isRequired: true })),
    ...usage.optional.map((name) => ({ name, isRequired: false })),
  ];
  if (usage.rest.kind !== "none") {
    expected.push({
      name: usage.rest.name,
      isRequired: usage.rest.kind === "required",
    });
  }
  return expected;
}

/**
 * Parse the body of an arguments section into ArgumentDocs.
 *
 * Each entry starts on its own line as `name: text`; the text runs until
 * the next entry. The documented names must match the usage exactly.
 */
export function parseArgumentLines(
  usage: CommandUsage,
  body: string,
): ArgumentDoc[] {
  const expected = expectedArguments(usage);
  const expectedNames = expected.map((e) => e.name);

  const matches = [...body.matchAll(ARGUMENT_RE)];
  const descriptions = new Map<string, string>();

  matches.forEach((match, i) => {
    const name = match[1];
    const start = (match.index ?? 0) + match[0].length;
    const next = matches[i + 1];
    const end = next?.index ?? body.length;

    if (descriptions.has(name)) {
      throw new ArgumentDocsError(
        `duplicate argument description ${JSON.stringify(name)}`,
        expectedNames,
        matches.map((m) => m[1]),
      );
    }
    descriptions.set(name, relaxLines(body.slice(start, end)));
  });

  if (body.trim().length > 0 && descriptions.size === 0) {
    throw new SpecError("unexpected argument description format");
  }

  const foundNames = [...descriptions.keys()];

  for (const { name } of expected) {
    if (!descriptions.has(name)) {
      throw new ArgumentDocsError(
        `missing documentation for argument ${JSON.stringify(name)}`,
        expectedNames,
        foundNames,
      );
    }
  }

  const extra = foundNames.find((name) => !expectedNames.includes(name));
  if (extra !== undefined) {
    throw new ArgumentDocsError(
      `documentation for undeclared argument ${JSON.stringify(extra)}`,
      expectedNames,
      foundNames,
    );
  }

  return expected.map(({ name, isRequired }) =>
    Object.freeze({
      name,
      isRequired,
      description: descriptions.get(name) ?? "",
    }),
  );
}

// ─── Documentation blocks ────────────────────────────────────────────

type SectionName = "summary" | "arguments" | "examples";

const SECTIONS = new Map<string, SectionName>([
  ...SUMMARY_HEADERS.map((h) => [h, "summary"] as const),
  ...ARGUMENT_HEADERS.map((h) => [h, "arguments"] as const),
  ...EXAMPLE_HEADERS.map((h) => [h, "examples"] as const),
]);

function sectionFor(header: string): SectionName | undefined {
  return SECTIONS.get(header.toLowerCase());
}

/**
 * Parse a command's documentation block into CommandDocs.
 * Throws a SpecError subclass on any malformed or inconsistent section.
 */
export function parseCommandDocs(text: string | undefined): CommandDocs {
  if (text === undefined || text.trim().length === 0) {
    throw new SpecError("missing documentation for command");
  }

  const [usageParagraph, ...paragraphs] = splitParagraphs(text);
  const usage = parseUsageParagraph(usageParagraph);

  let summary: string | undefined;
  let args: ArgumentDoc[] | undefined;
  let examples: string | undefined;

  for (const [headerLine, ...bodyLines] of paragraphs) {
    const header = HEADER_RE.exec(headerLine);
    if (!header) {
      throw new SpecError(
        `paragraph missing header: ${JSON.stringify(headerLine.trim())}`,
      );
    }

    const body = bodyLines.join("\n");

    switch (sectionFor(header[1])) {
      case "summary":
        if (summary !== undefined) {
          throw new SpecError("multiple summary sections found");
        }
        summary = relaxLines(body);
        break;
      case "arguments":
        if (args !== undefined) {
          throw new SpecError("multiple arguments sections found");
        }
        args = parseArgumentLines(usage, body);
        break;
      case "examples":
        if (examples !== undefined) {
          throw new SpecError("multiple examples sections found");
        }
        examples = body.trimEnd();
        break;
      case undefined:
        break;
    }
  }

  if (usage.desc.trim().length === 0) {
    throw new SpecError("missing command description");
  }

  return Object.freeze({
    usage,
    summary,
    args: Object.freeze(args ?? parseArgumentLines(usage, "")),
    examples,
  });
}

/**
 * Parse a command set's documentation. Absent docs are allowed and give
 * an empty summary.
 */
export function parseCommandSetDocs(text: string | undefined): CommandSetDocs {
  const summary = splitParagraphs(text ?? "")
    .map((lines) => relaxLines(lines.join("\n")))
    .join("\n")
    .trim();

  return Object.freeze({
    summary: summary.length > 0 ? summary : undefined,
  });
}
