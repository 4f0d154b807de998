import { UsageSyntaxError } from "../util/errors.js";

// ─── Types ───────────────────────────────────────────────────────────

/** The terminal argument that swallows every remaining token. */
export type RestArg =
  | { readonly kind: "none" }
  | { readonly kind: "optional"; readonly name: string }
  | { readonly kind: "required"; readonly name: string };

/** Parsed form of a usage line such as `(push|p) <branch> [remote]`. */
export interface CommandUsage {
  /** Non-empty. The first entry is canonical, the rest are aliases. */
  readonly ids: readonly string[];
  readonly required: readonly string[];
  readonly optional: readonly string[];
  readonly rest: RestArg;
  /** Short description following the usage tokens. */
  readonly desc: string;
}

/** One argument as it appears in a rendered usage line. */
export interface ArgumentUsage {
  readonly name: string;
  readonly isRequired: boolean;
  readonly isRest: boolean;
}

// ─── Grammar ─────────────────────────────────────────────────────────

const COMMAND_IDS_RE = /^\s*(?:([^(\s]\S*)|\(\s*([^)]*)\))/;
const PIPE_RE = /\s*\|\s*/;
// Names longer than two characters may not carry a period in their last
// three characters, so `<name...>` never matches as a plain argument.
const REQUIRED_ARG_RE = /^\s*<([^>]{0,2}|[^>]*[^>.]{3})>/;
const OPTIONAL_ARG_RE = /^\s*\[([^\]]{0,2}|[^\]]*[^\].]{3})\]/;
const REST_ARG_RE = /^\s*(?:<([^>]+)\.\.\.>|\[([^\]]+)\.\.\.\])/;
const TRAILING_RE = /\S/;

const BACKTICK_USAGE_RE = /^\s*`([^`]*)`:?/;

/**
 * Parse the usage tokens of a command into a CommandUsage.
 * `tokens` holds only the usage span; `desc` is the text that followed it.
 * Throws UsageSyntaxError on malformed input.
 */
export function parseUsageTokens(tokens: string, desc: string): CommandUsage {
  let input = tokens;

  const idsMatch = COMMAND_IDS_RE.exec(input);
  if (!idsMatch) {
    throw new UsageSyntaxError(
      "invalid command ID specifier, expected e.g. 'foo' or '(foo|bar)'",
      tokens,
    );
  }

  const ids =
    idsMatch[2] !== undefined
      ? idsMatch[2].trim().split(PIPE_RE)
      : [idsMatch[1]];
  if (ids.some((id) => id.length === 0)) {
    throw new UsageSyntaxError(
      "invalid command ID specifier, expected e.g. 'foo' or '(foo|bar)'",
      tokens,
    );
  }
  input = input.slice(idsMatch[0].length);

  const required: string[] = [];
  for (let m = REQUIRED_ARG_RE.exec(input); m; m = REQUIRED_ARG_RE.exec(input)) {
    required.push(m[1]);
    input = input.slice(m[0].length);
  }

  const optional: string[] = [];
  for (let m = OPTIONAL_ARG_RE.exec(input); m; m = OPTIONAL_ARG_RE.exec(input)) {
    optional.push(m[1]);
    input = input.slice(m[0].length);
  }

  let rest: RestArg = { kind: "none" };
  const restMatch = REST_ARG_RE.exec(input);
  if (restMatch) {
    rest =
      restMatch[2] !== undefined
        ? { kind: "optional", name: restMatch[2] }
        : { kind: "required", name: restMatch[1] };
    input = input.slice(restMatch[0].length);
  }

  if (TRAILING_RE.test(input)) {
    throw new UsageSyntaxError(
      `trailing string ${JSON.stringify(input)}`,
      tokens,
    );
  }

  return Object.freeze({
    ids: Object.freeze(ids),
    required: Object.freeze(required),
    optional: Object.freeze(optional),
    rest: Object.freeze(rest),
    desc,
  });
}

/**
 * Parse the opening paragraph of a documentation block.
 *
 * Two layouts are accepted:
 *   `push <branch> [remote]`: Push a branch.
 *   push <branch> [remote]
 *   Push a branch.
 *
 * In the first, the usage sits between backticks (an optional colon may
 * follow) and the rest of the paragraph is the description. In the second,
 * the first line is the usage and the remaining lines are the description.
 */
export function parseUsageParagraph(lines: readonly string[]): CommandUsage {
  const paragraph = lines.map((l) => l.trim()).filter(Boolean);
  const joined = paragraph.join(" ");

  const backtick = BACKTICK_USAGE_RE.exec(joined);
  if (backtick) {
    return parseUsageTokens(
      backtick[1],
      joined.slice(backtick[0].length).trim(),
    );
  }

  const [first = "", ...rest] = paragraph;
  return parseUsageTokens(first, rest.join(" "));
}

// ─── Derived views ───────────────────────────────────────────────────

/** Every declared argument in order: required, optional, then rest. */
export function argumentUsages(usage: CommandUsage): ArgumentUsage[] {
  const args: ArgumentUsage[] = [
    ...usage.required.map((name) => ({
      name,
      isRequired: true,
      isRest: false,
    })),
    ...usage.optional.map((name) => ({
      name,
      isRequired: false,
      isRest: false,
    })),
  ];

  switch (usage.rest.kind) {
    case "none":
      break;
    case "optional":
      args.push({ name: usage.rest.name, isRequired: false, isRest: true });
      break;
    case "required":
      args.push({ name: usage.rest.name, isRequired: true, isRest: true });
      break;
  }

  return args;
}
