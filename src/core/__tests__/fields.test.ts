import { describe, it, expect } from "vitest";
import { CONVERTERS } from "../fields.js";
import { ConversionError } from "../../util/errors.js";

describe("CONVERTERS", () => {
  it("passes strings through", () => {
    expect(CONVERTERS.string(" as is ")).toBe(" as is ");
  });

  it("parses signed integers", () => {
    expect(CONVERTERS.integer("+5")).toBe(5);
    expect(CONVERTERS.integer("-3")).toBe(-3);
  });

  it("rejects non-integers", () => {
    expect(() => CONVERTERS.integer("1.5")).toThrow('invalid integer "1.5"');
    expect(() => CONVERTERS.integer("")).toThrow(ConversionError);
  });

  it("rejects integers past the safe range", () => {
    expect(CONVERTERS.integer("9007199254740991")).toBe(9007199254740991);
    expect(() => CONVERTERS.integer("9007199254740993")).toThrow(
      'invalid integer "9007199254740993"',
    );
    expect(() => CONVERTERS.integer("-9007199254740992")).toThrow(ConversionError);
  });

  it("parses finite numbers", () => {
    expect(CONVERTERS.number("1e3")).toBe(1000);
    expect(CONVERTERS.number("-0.25")).toBe(-0.25);
  });

  it("rejects blank and infinite numbers", () => {
    expect(() => CONVERTERS.number("  ")).toThrow('invalid number "  "');
    expect(() => CONVERTERS.number("Infinity")).toThrow(ConversionError);
    expect(() => CONVERTERS.number("abc")).toThrow(ConversionError);
  });

  it("parses booleans case-insensitively", () => {
    expect(CONVERTERS.boolean("YES")).toBe(true);
    expect(CONVERTERS.boolean("1")).toBe(true);
    expect(CONVERTERS.boolean("off")).toBe(false);
    expect(() => CONVERTERS.boolean("maybe")).toThrow('invalid boolean "maybe"');
  });

  it("tags conversion errors as bad input", () => {
    try {
      CONVERTERS.integer("x");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConversionError);
      if (err instanceof ConversionError) {
        expect(err.exitCode).toBe(3);
        expect(err.token).toBe("x");
      }
    }
  });
});
