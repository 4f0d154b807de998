import { describe, it, expect } from "vitest";
import {
  argumentUsages,
  parseUsageParagraph,
  parseUsageTokens,
} from "../usage.js";
import { UsageSyntaxError } from "../../util/errors.js";

describe("parseUsageTokens", () => {
  it("parses ids, required, optional and rest arguments", () => {
    const usage = parseUsageTokens(
      "(push|p) <branch> [remote] [refspecs...]",
      "Push a branch.",
    );

    expect(usage).toEqual({
      ids: ["push", "p"],
      required: ["branch"],
      optional: ["remote"],
      rest: { kind: "optional", name: "refspecs" },
      desc: "Push a branch.",
    });
  });

  it("accepts a bare id with no arguments", () => {
    const usage = parseUsageTokens("status", "");
    expect(usage.ids).toEqual(["status"]);
    expect(usage.rest).toEqual({ kind: "none" });
  });

  it("trims whitespace around piped aliases", () => {
    expect(parseUsageTokens("( foo | bar )", "").ids).toEqual(["foo", "bar"]);
  });

  it("reads a required rest argument", () => {
    expect(parseUsageTokens("run <args...>", "").rest).toEqual({
      kind: "required",
      name: "args",
    });
  });

  it("accepts names of one or two characters", () => {
    const usage = parseUsageTokens("mv <a> <ab> [c]", "");
    expect(usage.required).toEqual(["a", "ab"]);
    expect(usage.optional).toEqual(["c"]);
  });

  it("rejects a period near the end of a longer name", () => {
    expect(() => parseUsageTokens("foo <a.b>", "")).toThrow(
      'trailing string " <a.b>" in usage line "foo <a.b>"',
    );
  });

  it("rejects a required argument after an optional one", () => {
    expect(() => parseUsageTokens("foo [x] <y>", "")).toThrow(
      'trailing string " <y>"',
    );
  });

  it("rejects anything after the rest argument", () => {
    expect(() => parseUsageTokens("foo <a> <b...> [c]", "")).toThrow(
      'trailing string " [c]"',
    );
  });

  it("rejects an empty alias", () => {
    expect(() => parseUsageTokens("(foo|)", "")).toThrow(UsageSyntaxError);
  });

  it("rejects a missing command id", () => {
    expect(() => parseUsageTokens("", "")).toThrow(
      "invalid command ID specifier",
    );
  });

  it("returns a frozen value", () => {
    const usage = parseUsageTokens("foo <a>", "");
    expect(Object.isFrozen(usage)).toBe(true);
    expect(Object.isFrozen(usage.required)).toBe(true);
  });
});

describe("parseUsageParagraph", () => {
  it("takes the usage from between backticks", () => {
    const usage = parseUsageParagraph(["`push <branch>`: Push", "  it now."]);
    expect(usage.ids).toEqual(["push"]);
    expect(usage.required).toEqual(["branch"]);
    expect(usage.desc).toBe("Push it now.");
  });

  it("takes the first line as the usage without backticks", () => {
    const usage = parseUsageParagraph(["push <branch>", "Push it", "now."]);
    expect(usage.required).toEqual(["branch"]);
    expect(usage.desc).toBe("Push it now.");
  });
});

describe("argumentUsages", () => {
  it("lists arguments in declared order with their flags", () => {
    const usage = parseUsageTokens("cp <src> [dst] <more...>", "");
    expect(argumentUsages(usage)).toEqual([
      { name: "src", isRequired: true, isRest: false },
      { name: "dst", isRequired: false, isRest: false },
      { name: "more", isRequired: true, isRest: true },
    ]);
  });
});
