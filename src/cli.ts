#!/usr/bin/env node
import { Command } from "commander";
import { DEFAULT_SPEC_FILE } from "./core/constants.js";
import { makeParseCommand } from "./commands/parse.js";
import { makeHelpCommand } from "./commands/help.js";
import { makeCheckCommand } from "./commands/check.js";
import { makeTokenizeCommand } from "./commands/tokenize.js";

const program = new Command();

program
  .name("usagekit")
  .version("1.0.0")
  .description("Documentation-driven command parser CLI v1.0")
  .option(
    "-s, --spec <path>",
    "Path to the spec file",
    DEFAULT_SPEC_FILE,
  )
  .option("--json", "Output as JSON (pretty-printed)")
  .option("--table", "Output as human-readable text (for terminal use)")
  .helpCommand(false)
  .addHelpText(
    "after",
    `
PURPOSE:
  A command's documentation is its grammar. Each command is described by a
  doc block whose first paragraph is a usage line; the parser, the help
  pages and the error messages are all derived from those blocks, so they
  cannot drift apart.

DOC BLOCKS:
  \`(push|p) <branch> [remote] [refspecs...]\` Push a branch.

  # Summary
  Pushes the named branch to a remote.

  # Arguments
  branch: Branch to push.
  remote: Remote to push to.
  refspecs: Extra refspecs.

  # Examples
  push main origin

  Usage line:   command id, or (id|alias|...), then <required> arguments,
                then [optional] arguments, then at most one <rest...> or
                [rest...] argument. The backticks may be left out, in
                which case the first line is the usage and the rest of the
                paragraph is the description.
  Sections:     # Summary (or Description, Overview)
                # Arguments (or Parameters): one "name: text" per argument,
                  exactly the arguments of the usage line
                # Examples

SPEC FILE (YAML, default ./${DEFAULT_SPEC_FILE}):
  summary: Text shown above the command list.
  commands:
    - docs: |
        \`count <n>\` Count to n.
        ...
      fields:
        n: { type: integer }     # string | integer | number | boolean
    - docs: |
        \`help [topic...]\` Show help.
        ...
      fields:
        topic: { path: true }    # a command path into this spec
    - docs: |
        \`remote <cmd...>\` Manage remotes.
        ...
      subcommand:                # a nested set with the same shape
        commands: [...]

PARSING:
  Identifiers match case-insensitively and may be abbreviated while the
  prefix stays unique. An identifier that is a prefix of another still
  matches exactly when typed in full. Arguments fill in declared order with
  no backtracking; extra tokens are an error unless a rest argument takes
  them.

OUTPUT FORMATS:
  Default (no flag): TOON, Token-Oriented Object Notation.
  --json:  Standard JSON. For scripts and programmatic parsing.
  --table: Human-readable text. For terminal viewing.

EXIT CODES:
  0  Success
  1  Spec error (bad usage line, bad doc block, duplicate identifier, ...)
  2  Filesystem error (spec file missing or unreadable)
  3  Bad input (tokens that do not parse against the spec)

COMMANDS:
  parse      Parse tokens (or a raw --input line) into a command.
  help       Show a command's documentation, or the command list.
  check      Load the spec file and report problems.
  tokenize   Split a raw line into tokens. Works without a spec file.

Run 'usagekit <command> --help' for full flag syntax and more examples.
`,
  );

program.addCommand(makeParseCommand());
program.addCommand(makeHelpCommand());
program.addCommand(makeCheckCommand());
program.addCommand(makeTokenizeCommand());

await program.parseAsync();
