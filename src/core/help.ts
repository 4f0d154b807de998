import type { CommandDesc, CommandDocs, CommandSetDocs } from "./docs.js";
import type { CommandUsage } from "./usage.js";

/** A renderable help page. Built once per command set and never mutated. */
export type HelpTopic = CommandTopic | CommandSetTopic;

export interface CommandTopic {
  readonly kind: "command";
  readonly usage: CommandUsage;
  readonly desc: CommandDesc;
}

export interface CommandSetTopic {
  readonly kind: "command-set";
  readonly summary?: string;
  /** Usage of every direct command, in declared order. */
  readonly commands: readonly CommandUsage[];
}

export function commandTopic(docs: CommandDocs): CommandTopic {
  return Object.freeze({
    kind: "command",
    usage: docs.usage,
    desc: Object.freeze({
      summary: docs.summary,
      args: docs.args,
      examples: docs.examples,
    }),
  });
}

export function commandSetTopic(
  docs: CommandSetDocs,
  commands: readonly CommandUsage[],
): CommandSetTopic {
  return Object.freeze({
    kind: "command-set",
    summary: docs.summary,
    commands: Object.freeze([...commands]),
  });
}
