import { fail, ok, type IdParseError, type Result } from "./parse-errors.js";
import { DuplicateIdentifierError } from "../util/errors.js";

/**
 * Decides an ambiguous lookup. Returns the payload to resolve to, or
 * undefined to report the lookup as ambiguous.
 */
export type AmbiguityResolver<T> = (
  candidates: ReadonlyArray<readonly [name: string, payload: T]>,
) => T | undefined;

interface TrieNode {
  /** Entry index terminating exactly at this node, if any. */
  terminal?: number;
  children: Map<string, TrieNode>;
  /** Entry indices reachable from this node. Filled in once after insertion. */
  entries: readonly number[];
}

/**
 * Resolves when every candidate carries the same payload, which is the case
 * for aliases of a single command.
 */
export function resolveIdentical<T>(
  candidates: ReadonlyArray<readonly [string, T]>,
): T | undefined {
  const [first, ...rest] = candidates;
  if (first === undefined) return undefined;
  return rest.every(([, payload]) => payload === first[1])
    ? first[1]
    : undefined;
}

/**
 * Case-insensitive prefix automaton over command identifiers.
 *
 * Any prefix that leads to a single payload resolves to it, so users may
 * abbreviate commands as far as they stay unique. An identifier that is
 * itself a prefix of another one still resolves exactly when typed in full.
 *
 * Built once; lookups never mutate it.
 */
export class IdTrie<T> {
  private readonly entries: ReadonlyArray<readonly [string, T]>;
  private readonly root: TrieNode;

  private constructor(entries: Array<readonly [string, T]>, root: TrieNode) {
    this.entries = Object.freeze(entries);
    this.root = root;
  }

  /**
   * Build a trie from `(identifier, payload)` pairs.
   * Throws DuplicateIdentifierError when two identifiers lowercase to the
   * same string.
   */
  static build<T>(pairs: Iterable<readonly [string, T]>): IdTrie<T> {
    const entries: Array<readonly [string, T]> = [];
    const root = emptyNode();

    for (const [name, payload] of pairs) {
      const index = entries.length;
      entries.push([name, payload]);

      let node = root;
      for (const ch of name.toLowerCase()) {
        let child = node.children.get(ch);
        if (!child) {
          child = emptyNode();
          node.children.set(ch, child);
        }
        node = child;
      }

      if (node.terminal !== undefined) {
        throw new DuplicateIdentifierError(name.toLowerCase());
      }
      node.terminal = index;
    }

    collectEntries(root);
    return new IdTrie(entries, root);
  }

  /** Every identifier as declared, in insertion order. */
  names(): string[] {
    return this.entries.map(([name]) => name);
  }

  /**
   * Look up a possibly abbreviated identifier.
   * Matching is case-insensitive.
   */
  lookup(
    input: string,
    resolve: AmbiguityResolver<T> = resolveIdentical,
  ): Result<T, IdParseError> {
    let node = this.root;

    for (const ch of input.toLowerCase()) {
      const child = node.children.get(ch);
      if (!child) return fail(this.noMatch(input));
      node = child;
    }

    const candidates = node.entries.map((i) => this.entries[i]);
    const [only, ...others] = candidates;

    if (only === undefined) return fail(this.noMatch(input));
    if (others.length === 0) return ok(only[1]);

    const resolved = resolve(candidates);
    if (resolved !== undefined) return ok(resolved);

    return fail<IdParseError>({
      kind: "ambiguous",
      candidates: candidates.map(([name]) => name),
      given: input,
    });
  }

  private noMatch(input: string): IdParseError {
    return { kind: "no-match", given: input, available: this.names() };
  }
}

function emptyNode(): TrieNode {
  return { children: new Map(), entries: [] };
}

function collectEntries(node: TrieNode): readonly number[] {
  const below: number[] = [];
  for (const child of node.children.values()) {
    below.push(...collectEntries(child));
  }

  // An exact identifier shadows every longer one beneath it.
  node.entries = Object.freeze(
    node.terminal !== undefined ? [node.terminal] : below,
  );
  return node.entries;
}
