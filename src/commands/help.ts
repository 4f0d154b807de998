import { Command } from "commander";
import { formatHelp } from "../util/format.js";
import {
  handleError,
  loadCommandSet,
  resolveParentOpts,
  unwrapParse,
} from "../util/cli-helpers.js";

export function makeHelpCommand(): Command {
  const cmd = new Command("help");

  cmd
    .description("Show the documentation of a command, or of the whole set")
    .argument("[path...]", "Command path, e.g. 'remote add'")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  With no path, lists every command in the spec file with its one-line
  description. With a path, shows that command's usage line, summary,
  arguments and examples. A path that ends on a command carrying a
  subcommand set lists the nested commands instead.

  Identifiers in the path may be abbreviated like in 'parse'.

OUTPUT:
  --table renders man-page style text (USAGE, SUMMARY, ARGUMENTS, EXAMPLES,
  COMMANDS). TOON and JSON carry the structured help topic.

EXAMPLES:
  $ usagekit help --table
  $ usagekit help remote add --table
  $ usagekit help rem --json
`,
    );

  cmd.action(async (path: string[]) => {
    try {
      const parentOpts = resolveParentOpts(cmd);
      const set = await loadCommandSet(parentOpts);
      const topic = unwrapParse(set.helpFor(path));

      process.stdout.write(formatHelp(topic, parentOpts.format) + "\n");
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
