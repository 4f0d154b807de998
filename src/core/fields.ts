import {
  FALSE_TOKENS,
  TRUE_TOKENS,
  type FieldType,
} from "./constants.js";
import { ConversionError } from "../util/errors.js";

export type Scalar = string | number | boolean;

/** Turns one token into a field value. Signals failure by throwing. */
export type Converter = (token: string) => Scalar;

export type FieldMode =
  | "required"
  | "optional"
  | "rest-required"
  | "rest-optional";

// ─── Converters ──────────────────────────────────────────────────────

const INTEGER_RE = /^[+-]?\d+$/;
const TRUE_SET: ReadonlySet<string> = new Set(TRUE_TOKENS);
const FALSE_SET: ReadonlySet<string> = new Set(FALSE_TOKENS);

export const CONVERTERS: Readonly<Record<FieldType, Converter>> = {
  string: (token) => token,

  integer: (token) => {
    if (!INTEGER_RE.test(token)) {
      throw new ConversionError("integer", token);
    }
    const value = Number.parseInt(token, 10);
    if (!Number.isSafeInteger(value)) {
      throw new ConversionError("integer", token);
    }
    return value;
  },

  number: (token) => {
    const value = token.trim().length > 0 ? Number(token) : Number.NaN;
    if (!Number.isFinite(value)) {
      throw new ConversionError("number", token);
    }
    return value;
  },

  boolean: (token) => {
    const lower = token.toLowerCase();
    if (TRUE_SET.has(lower)) return true;
    if (FALSE_SET.has(lower)) return false;
    throw new ConversionError("boolean", token);
  },
};
