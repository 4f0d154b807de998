// ─── Result ──────────────────────────────────────────────────────────

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

// ─── Identifier errors ───────────────────────────────────────────────

export type IdParseError =
  | {
      readonly kind: "no-match";
      readonly given: string;
      readonly available: readonly string[];
    }
  | {
      readonly kind: "ambiguous";
      readonly candidates: readonly string[];
      readonly given: string;
    };

// ─── Path errors ─────────────────────────────────────────────────────

export type PathParseError =
  | { readonly kind: "incomplete"; readonly available: readonly string[] }
  | { readonly kind: "bad-path-id"; readonly error: IdParseError }
  | { readonly kind: "trailing-path"; readonly extra: string };

// ─── Command errors ──────────────────────────────────────────────────

export type CommandParseError =
  | { readonly kind: "no-input" }
  | { readonly kind: "bad-id"; readonly error: IdParseError }
  | {
      readonly kind: "missing-required";
      readonly cmd: string;
      readonly arg: string;
    }
  | {
      readonly kind: "bad-convert";
      readonly cmd: string;
      readonly arg: string;
      /** Whatever the converter threw, or a PathParseError for path fields. */
      readonly cause: unknown;
    }
  | { readonly kind: "trailing"; readonly cmd: string; readonly extra: string }
  | {
      readonly kind: "subcommand";
      readonly cmd: string;
      readonly error: CommandParseError;
    };

export type ParseError = IdParseError | PathParseError | CommandParseError;

const ID_KINDS: ReadonlySet<string> = new Set(["no-match", "ambiguous"]);
const PATH_KINDS: ReadonlySet<string> = new Set([
  "incomplete",
  "bad-path-id",
  "trailing-path",
]);
const COMMAND_KINDS: ReadonlySet<string> = new Set([
  "no-input",
  "bad-id",
  "missing-required",
  "bad-convert",
  "trailing",
  "subcommand",
]);

function kindOf(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || value instanceof Error) {
    return undefined;
  }
  const kind: unknown = Reflect.get(value, "kind");
  return typeof kind === "string" ? kind : undefined;
}

export function isIdParseError(value: unknown): value is IdParseError {
  const kind = kindOf(value);
  return kind !== undefined && ID_KINDS.has(kind);
}

export function isPathParseError(value: unknown): value is PathParseError {
  const kind = kindOf(value);
  return kind !== undefined && PATH_KINDS.has(kind);
}

export function isCommandParseError(
  value: unknown,
): value is CommandParseError {
  const kind = kindOf(value);
  return kind !== undefined && COMMAND_KINDS.has(kind);
}
