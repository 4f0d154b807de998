import { Command } from "commander";
import { tokenize } from "../core/tokens.js";
import { SimpleErrorFolder } from "../fold/fold-error.js";
import { formatParsed } from "../util/format.js";
import { CommandInputError } from "../util/errors.js";
import {
  handleError,
  loadCommandSet,
  resolveParentOpts,
  unwrapParse,
} from "../util/cli-helpers.js";

interface ParseOptions {
  input?: string;
  suggestions: boolean;
}

export function makeParseCommand(): Command {
  const cmd = new Command("parse");

  cmd
    .description("Parse a command line against the spec file")
    .argument("[tokens...]", "Tokens of the command line, already split")
    .option("-i, --input <line>", "Raw command line, split with shell-like quoting")
    .option("--no-suggestions", "Do not offer \"did you mean\" suggestions")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Resolves the first token to a command (abbreviations allowed while they
  stay unique), then fills the command's arguments from the remaining
  tokens in declared order: required, optional, then the rest argument.
  A rest argument bound to a subcommand hands every remaining token to the
  nested command set.

OUTPUT:
  Default (TOON): { command, args: { <name>: value } }
  Omitted optional arguments are null. Path arguments are { path: [...] }.
  --table: indented "name: value" lines.

  On failure nothing is printed to stdout; the reason goes to stderr and
  the exit code is 3.

EXAMPLES:
  $ usagekit parse push main origin
  $ usagekit parse --input 'remote add upstream "git@example.test:repo"'
  $ usagekit --spec tools.yaml parse dep staging --table
`,
    );

  cmd.action(async (tokens: string[], opts: ParseOptions) => {
    try {
      const parentOpts = resolveParentOpts(cmd);

      if (opts.input !== undefined && tokens.length > 0) {
        throw new CommandInputError("Pass either tokens or --input, not both");
      }

      const set = await loadCommandSet(parentOpts);
      const input = opts.input !== undefined ? tokenize(opts.input) : tokens;
      const folder = new SimpleErrorFolder({ suggestions: opts.suggestions });
      const parsed = unwrapParse(set.parse(input), folder);

      process.stdout.write(formatParsed(parsed, parentOpts.format) + "\n");
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
