import { Command } from "commander";
import { tokenize } from "../core/tokens.js";
import { formatTokens } from "../util/format.js";
import { handleError, resolveParentOpts } from "../util/cli-helpers.js";

export function makeTokenizeCommand(): Command {
  const cmd = new Command("tokenize");

  cmd
    .description("Split a raw command line into tokens")
    .argument("<line>", "The line to split (quote it for your shell)")
    .addHelpText(
      "after",
      `
RULES:
  Whitespace separates tokens. 'single quotes' keep their content as is.
  "double quotes" allow backslash escapes. A quote that never closes is
  read as part of a bare token. No spec file is needed.

EXAMPLES:
  $ usagekit tokenize 'say "hello world" twice'
  $ usagekit tokenize "it's" --json
`,
    );

  cmd.action((line: string) => {
    try {
      const parentOpts = resolveParentOpts(cmd);
      process.stdout.write(formatTokens(tokenize(line), parentOpts.format) + "\n");
    } catch (err) {
      handleError(err);
    }
  });

  return cmd;
}
