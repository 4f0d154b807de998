import { describe, it, expect } from "vitest";
import {
  parseArgumentLines,
  parseCommandDocs,
  parseCommandSetDocs,
  splitParagraphs,
} from "../docs.js";
import { parseUsageTokens } from "../usage.js";
import { ArgumentDocsError, SpecError } from "../../util/errors.js";
import { PUSH_DOCS } from "./fixtures.js";

describe("splitParagraphs", () => {
  it("treats a run of blank lines as one separator", () => {
    expect(splitParagraphs("a\nb\n\n\n  \nc\r\n\r\nd")).toEqual([
      ["a", "b"],
      ["c"],
      ["d"],
    ]);
  });
});

describe("parseCommandDocs", () => {
  it("parses every section of a full block", () => {
    const docs = parseCommandDocs(PUSH_DOCS);

    expect(docs.usage.ids).toEqual(["push", "p"]);
    expect(docs.usage.desc).toBe("Push a branch.");
    expect(docs.summary).toBe("Pushes the named branch.");
    expect(docs.args).toEqual([
      { name: "branch", isRequired: true, description: "Branch to push." },
      { name: "remote", isRequired: false, description: "Remote to push to." },
      { name: "refspecs", isRequired: false, description: "Extra refspecs." },
    ]);
    expect(docs.examples).toBe("push main origin");
  });

  it("accepts alternative section names and ignores unknown ones", () => {
    const docs = parseCommandDocs(
      "`foo <a>` Foo.\n\n# Description\nLong\ntext.\n\n# Parameters\na: The a.\n\n# Notes\nignored",
    );
    expect(docs.summary).toBe("Long text.");
    expect(docs.args).toEqual([
      { name: "a", isRequired: true, description: "The a." },
    ]);
  });

  it("leaves absent sections undefined", () => {
    const docs = parseCommandDocs("`status` Show status.");
    expect(docs.summary).toBeUndefined();
    expect(docs.examples).toBeUndefined();
    expect(docs.args).toEqual([]);
  });

  it("rejects missing documentation", () => {
    expect(() => parseCommandDocs(undefined)).toThrow(
      "missing documentation for command",
    );
    expect(() => parseCommandDocs("  \n")).toThrow(SpecError);
  });

  it("rejects a command without a description", () => {
    expect(() => parseCommandDocs("`foo`")).toThrow(
      "missing command description",
    );
  });

  it("rejects a paragraph without a header", () => {
    expect(() => parseCommandDocs("`foo` Foo.\n\nno header here")).toThrow(
      'paragraph missing header: "no header here"',
    );
  });

  it("rejects repeated sections, including synonyms", () => {
    expect(() =>
      parseCommandDocs("`foo` Foo.\n\n# Summary\nOne.\n\n# Overview\nTwo."),
    ).toThrow("multiple summary sections found");
  });

  it("requires docs for every declared argument", () => {
    expect(() => parseCommandDocs("`foo <a>` Foo.")).toThrow(
      'missing documentation for argument "a" (expected: a; found: none)',
    );
  });
});

describe("parseArgumentLines", () => {
  const usage = parseUsageTokens("foo <a> [b]", "");

  it("joins continuation lines", () => {
    const args = parseArgumentLines(
      usage,
      "a: first line\n  continues here\nb: second",
    );
    expect(args.map((arg) => arg.description)).toEqual([
      "first line continues here",
      "second",
    ]);
  });

  it("returns entries in usage order", () => {
    const args = parseArgumentLines(usage, "b: B.\na: A.");
    expect(args.map((arg) => arg.name)).toEqual(["a", "b"]);
  });

  it("rejects an undeclared argument", () => {
    expect(() => parseArgumentLines(usage, "a: A.\nb: B.\nc: C.")).toThrow(
      'documentation for undeclared argument "c" (expected: a, b; found: a, b, c)',
    );
  });

  it("rejects a duplicate entry", () => {
    expect(() => parseArgumentLines(usage, "a: A.\na: again.")).toThrow(
      ArgumentDocsError,
    );
  });

  it("rejects a body with no entries", () => {
    expect(() => parseArgumentLines(usage, "just text")).toThrow(
      "unexpected argument description format",
    );
  });
});

describe("parseCommandSetDocs", () => {
  it("relaxes each paragraph onto one line", () => {
    expect(parseCommandSetDocs("Line one\nline two\n\nPara two")).toEqual({
      summary: "Line one line two\nPara two",
    });
  });

  it("allows absent docs", () => {
    expect(parseCommandSetDocs(undefined).summary).toBeUndefined();
  });
});
