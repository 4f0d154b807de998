import { describe, it, expect } from "vitest";
import {
  formatCheckSummary,
  formatHelp,
  formatParsed,
  formatTokens,
  parsedToObject,
  resolveFormat,
} from "../format.js";
import { gitSet } from "../../core/__tests__/fixtures.js";
import type { ParsedCommand } from "../../core/parser.js";

function parsed(tokens: string[]): ParsedCommand {
  const result = gitSet().parse(tokens);
  if (!result.ok) throw new Error(`expected ${tokens.join(" ")} to parse`);
  return result.value;
}

describe("resolveFormat", () => {
  it("prefers json, then table, then toon", () => {
    expect(resolveFormat({ json: true, table: true })).toBe("json");
    expect(resolveFormat({ table: true })).toBe("table");
    expect(resolveFormat({})).toBe("toon");
  });
});

describe("parsedToObject", () => {
  it("turns omitted optionals into null", () => {
    expect(parsedToObject(parsed(["push", "main"]))).toEqual({
      command: "push",
      args: { branch: "main", remote: null, refspecs: [] },
    });
  });

  it("nests subcommands and flattens paths", () => {
    expect(parsedToObject(parsed(["remote", "add", "up", "u"]))).toEqual({
      command: "remote",
      args: { cmd: { command: "add", args: { name: "up", url: "u" } } },
    });
    expect(parsedToObject(parsed(["help", "remote", "add"]))).toEqual({
      command: "help",
      args: { topic: { path: ["remote", "add"] } },
    });
  });
});

describe("formatParsed", () => {
  it("renders indented text for the table format", () => {
    expect(formatParsed(parsed(["push", "main"]), "table")).toBe(
      "command: push\n  branch: main\n  remote: -\n  refspecs: []",
    );
    expect(formatParsed(parsed(["remote", "add", "up", "u"]), "table")).toBe(
      "command: remote\n  cmd:\n    command: add\n      name: up\n      url: u",
    );
    expect(formatParsed(parsed(["help", "remote", "add"]), "table")).toBe(
      "command: help\n  topic: remote → add",
    );
  });

  it("renders JSON", () => {
    expect(JSON.parse(formatParsed(parsed(["count", "3"]), "json"))).toEqual({
      command: "count",
      args: { n: 3, step: null },
    });
  });
});

describe("formatHelp", () => {
  it("renders help text for the table format", () => {
    expect(formatHelp(gitSet().help({ id: "status" }), "table")).toBe(
      "USAGE: status\nShow the working tree status.",
    );
  });

  it("carries the topic model in JSON", () => {
    const topic = JSON.parse(formatHelp(gitSet().help({ id: "status" }), "json"));
    expect(topic.kind).toBe("command");
    expect(topic.usage.ids).toEqual(["status"]);
  });
});

describe("formatTokens", () => {
  it("numbers tokens for the table format", () => {
    expect(formatTokens(["a", "b c"], "table")).toBe("  0: a\n  1: b c");
    expect(formatTokens(["a"], "json")).toBe('[\n  "a"\n]');
  });
});

describe("formatCheckSummary", () => {
  it("renders a checklist for the table format", () => {
    expect(
      formatCheckSummary(
        {
          file: "usagekit.yaml",
          commands: 6,
          nested_commands: 3,
          identifiers: ["push", "p"],
          time_ms: 1500,
        },
        "table",
      ),
    ).toBe(
      [
        "✓ usagekit.yaml loaded",
        "✓ 6 command(s)",
        "✓ 3 subcommand(s)",
        "✓ identifiers: push, p",
        "",
        "Total: 1.50s",
      ].join("\n"),
    );
  });
});
