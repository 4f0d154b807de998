// ─── Token stream ────────────────────────────────────────────────────

/**
 * Tokens accepted by the parse entry points. A generator or other lazy
 * source goes through `TokenStream.from` first; a bare string is not a
 * token list.
 */
export type TokenInput = readonly string[] | TokenStream;

/**
 * Forward-only cursor over string tokens with one token of lookahead.
 * Fused: once it has reported exhaustion it keeps doing so, even if the
 * underlying iterator would yield again.
 */
export class TokenStream {
  private readonly iterator: Iterator<string>;
  private lookahead: string | undefined;
  private hasLookahead = false;
  private done = false;

  private constructor(iterator: Iterator<string>) {
    this.iterator = iterator;
  }

  /** Wrap an iterable. Passing a TokenStream returns it unchanged. */
  static from(tokens: Iterable<string> | TokenStream): TokenStream {
    if (tokens instanceof TokenStream) return tokens;
    return new TokenStream(tokens[Symbol.iterator]());
  }

  next(): string | undefined {
    if (this.hasLookahead) {
      this.hasLookahead = false;
      return this.lookahead;
    }
    return this.pull();
  }

  peek(): string | undefined {
    if (!this.hasLookahead) {
      this.lookahead = this.pull();
      this.hasLookahead = true;
    }
    return this.lookahead;
  }

  /** Drain every remaining token. */
  rest(): string[] {
    const tokens: string[] = [];
    for (let t = this.next(); t !== undefined; t = this.next()) {
      tokens.push(t);
    }
    return tokens;
  }

  private pull(): string | undefined {
    if (this.done) return undefined;
    const step = this.iterator.next();
    if (step.done) {
      this.done = true;
      return undefined;
    }
    return step.value;
  }
}

// ─── Raw-string tokenizer ────────────────────────────────────────────

const TOKEN_RE = /\s*(?:([^'"\s]\S*)|'([^']*)'|"((?:[^"\\]|\\.)*)")/g;
const ESCAPE_RE = /\\(.)/g;

/**
 * Split a command line into tokens.
 *
 * Whitespace separates tokens. Single quotes are literal; double quotes
 * honour backslash escapes. A quote that never closes is not a quoted
 * token, and the characters after it are matched as bare tokens.
 */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];

  for (const match of line.matchAll(TOKEN_RE)) {
    const [, bare, single, double] = match;
    if (double !== undefined) {
      tokens.push(double.replace(ESCAPE_RE, "$1"));
    } else if (single !== undefined) {
      tokens.push(single);
    } else if (bare !== undefined) {
      tokens.push(bare);
    }
  }

  return tokens;
}
