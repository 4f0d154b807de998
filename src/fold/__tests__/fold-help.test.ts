import { describe, it, expect } from "vitest";
import { HelpFolder, SimpleHelpFolder } from "../fold-help.js";
import { defineCommandSet } from "../../core/command-set.js";
import { gitSet, remoteSet } from "../../core/__tests__/fixtures.js";

describe("SimpleHelpFolder", () => {
  const folder = new SimpleHelpFolder();

  it("renders a full command page", () => {
    expect(folder.foldTopic(gitSet().help({ id: "push" }))).toBe(
      [
        "USAGE: (push|p) <branch> [remote] [refspecs...]",
        "Push a branch.",
        "",
        "SUMMARY",
        "Pushes the named branch.",
        "",
        "ARGUMENTS",
        "  branch: Branch to push.",
        "  remote (optional): Remote to push to.",
        "  refspecs (optional): Extra refspecs.",
        "",
        "EXAMPLES",
        "",
        "push main origin",
      ].join("\n"),
    );
  });

  it("renders a bare command page", () => {
    expect(folder.foldTopic(gitSet().help({ id: "status" }))).toBe(
      "USAGE: status\nShow the working tree status.",
    );
  });

  it("renders a command list", () => {
    expect(folder.foldTopic(remoteSet().help())).toBe(
      [
        "Remote management.",
        "",
        "COMMANDS",
        "  (add|a) <name> <url>: Add a remote.",
        "  remove <name>: Remove a remote.",
        "  list: List remotes.",
      ].join("\n"),
    );
  });

  it("omits the summary of a set without docs", () => {
    const set = defineCommandSet({
      commands: [{ docs: "`run <args...>` Run it.\n\n# Arguments\nargs: Arguments." }],
    });
    expect(folder.foldTopic(set.help())).toBe("COMMANDS\n  run <args...>: Run it.");
  });

  it("parenthesises ids that would not read as one word", () => {
    expect(SimpleHelpFolder.formatIds(["status"])).toBe("status");
    expect(SimpleHelpFolder.formatIds(["push", "p"])).toBe("(push|p)");
    expect(SimpleHelpFolder.formatIds([""])).toBe("()");
    expect(SimpleHelpFolder.formatIds(["two words"])).toBe("(two words)");
  });
});

/** Counts the pieces of a topic instead of rendering them. */
class CountingFolder extends HelpFolder<number> {
  commandTopic(usage: number, desc: number): number {
    return usage + desc;
  }
  commandSetTopic(_summary: string | undefined, commands: number[]): number {
    return commands.reduce((a, b) => a + b, 0);
  }
  argumentUsage(): number {
    return 1;
  }
  commandUsage(_ids: readonly string[], args: number[]): number {
    return 1 + args.reduce((a, b) => a + b, 0);
  }
  argumentDoc(): number {
    return 1;
  }
  commandDesc(
    _summary: string | undefined,
    args: number[],
    examples: string | undefined,
  ): number {
    return args.length + (examples === undefined ? 0 : 1);
  }
}

describe("HelpFolder", () => {
  it("hands every hook its children already folded", () => {
    // usage 1 + 3 args, desc 3 arg docs + examples
    expect(new CountingFolder().foldTopic(gitSet().help({ id: "push" }))).toBe(8);
    // (1 + 2) + (1 + 1) + 1
    expect(new CountingFolder().foldTopic(remoteSet().help())).toBe(6);
  });
});
