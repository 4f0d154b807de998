import { Command } from "commander";
import type { CommandSet } from "../core/command-set.js";
import { formatCheckSummary } from "../util/format.js";
import {
  handleError,
  loadCommandSet,
  resolveParentOpts,
} from "../util/cli-helpers.js";

/** Count the commands of every subcommand set below `set`. */
export function countNestedCommands(set: CommandSet): number {
  let count = 0;
  for (const command of set.commands) {
    if (command.subcommand) {
      count +=
        command.subcommand.commands.length +
        countNestedCommands(command.subcommand);
    }
  }
  return count;
}

export function makeCheckCommand(): Command {
  const cmd = new Command("check");

  cmd
    .description("Load the spec file and report whether it is valid")
    .addHelpText(
      "after",
      `
WHAT THIS DOES:
  Builds every command set in the spec file, running all load-time checks:
  usage line syntax, documentation sections, argument docs matching the
  usage line, duplicate identifiers, and field options. The first problem
  found is reported and the exit code is 1.

OUTPUT:
  Default (TOON): { file, commands, nested_commands, identifiers, time_ms }
  --table:
    ✓ usagekit.yaml loaded
    ✓ 4 command(s)
    ✓ 2 subcommand(s)

EXAMPLES:
  $ usagekit check
  $ usagekit --spec tools.yaml check --table
`,
    );

  cmd.action(async () => {
    try {
      const parentOpts = resolveParentOpts(cmd);
      const startTime = Date.now();
      const set = await loadCommandSet(parentOpts);

      const summary = {
        file: parentOpts.spec,
        commands: set.commands.length,
        nested_commands: countNestedCommands(set),
        identifiers: set.names(),
        time_ms: Date.now() - startTime,
      };

      process.stdout.write(
        formatCheckSummary(summary, parentOpts.format) + "\n",
      );
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
