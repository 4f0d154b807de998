import { describe, it, expect } from "vitest";
import { IdTrie } from "../trie.js";
import { DuplicateIdentifierError } from "../../util/errors.js";

function trie(): IdTrie<number> {
  return IdTrie.build([
    ["remove", 1],
    ["rem-all", 1],
    ["rename", 2],
    ["list", 3],
    ["listing", 4],
  ]);
}

describe("IdTrie", () => {
  it("resolves exact identifiers case-insensitively", () => {
    expect(trie().lookup("RENAME")).toEqual({ ok: true, value: 2 });
  });

  it("resolves unique prefixes", () => {
    expect(trie().lookup("ren")).toEqual({ ok: true, value: 2 });
  });

  it("lets an exact identifier shadow longer ones", () => {
    expect(trie().lookup("list")).toEqual({ ok: true, value: 3 });
    expect(trie().lookup("lis")).toEqual({ ok: true, value: 3 });
    expect(trie().lookup("listi")).toEqual({ ok: true, value: 4 });
  });

  it("resolves an ambiguous prefix when every candidate is the same", () => {
    expect(trie().lookup("rem")).toEqual({ ok: true, value: 1 });
  });

  it("reports an ambiguous prefix with the declared names", () => {
    expect(trie().lookup("re")).toEqual({
      ok: false,
      error: {
        kind: "ambiguous",
        candidates: ["remove", "rem-all", "rename"],
        given: "re",
      },
    });
  });

  it("accepts a custom ambiguity resolver", () => {
    const first = trie().lookup("re", (candidates) => candidates[0]?.[1]);
    expect(first).toEqual({ ok: true, value: 1 });
  });

  it("reports no match with every identifier", () => {
    expect(trie().lookup("x")).toEqual({
      ok: false,
      error: {
        kind: "no-match",
        given: "x",
        available: ["remove", "rem-all", "rename", "list", "listing"],
      },
    });
  });

  it("reports the empty string as ambiguous over everything", () => {
    const result = trie().lookup("");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("ambiguous");
  });

  it("rejects identifiers that collide once lowercased", () => {
    expect(() =>
      IdTrie.build([
        ["Push", 1],
        ["push", 2],
      ]),
    ).toThrow(DuplicateIdentifierError);
    expect(() =>
      IdTrie.build([
        ["Push", 1],
        ["push", 2],
      ]),
    ).toThrow('multiple entries for identifier "push"');
  });
});
