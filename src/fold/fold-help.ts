import type { ArgumentDoc, CommandDesc } from "../core/docs.js";
import type { HelpTopic } from "../core/help.js";
import {
  argumentUsages,
  type ArgumentUsage,
  type CommandUsage,
} from "../core/usage.js";

/**
 * Turns help topics into some output value.
 *
 * The fold* methods walk the model and hand each piece to a hook with its
 * children already folded; subclasses only implement the hooks.
 */
export abstract class HelpFolder<O> {
  foldTopic(topic: HelpTopic): O {
    switch (topic.kind) {
      case "command":
        return this.commandTopic(
          this.foldCommandUsage(topic.usage, true),
          this.foldCommandDesc(topic.desc),
        );
      case "command-set":
        return this.commandSetTopic(
          topic.summary,
          topic.commands.map((usage) => this.foldCommandUsage(usage, false)),
        );
    }
  }

  /** `long` asks for the full form shown on a command's own page. */
  foldCommandUsage(usage: CommandUsage, long: boolean): O {
    return this.commandUsage(
      usage.ids,
      argumentUsages(usage).map((arg) => this.foldArgumentUsage(arg)),
      usage.desc,
      long,
    );
  }

  foldArgumentUsage(arg: ArgumentUsage): O {
    return this.argumentUsage(arg.name, arg.isRequired, arg.isRest);
  }

  foldArgumentDoc(doc: ArgumentDoc): O {
    return this.argumentDoc(doc.name, doc.isRequired, doc.description);
  }

  foldCommandDesc(desc: CommandDesc): O {
    return this.commandDesc(
      desc.summary,
      desc.args.map((doc) => this.foldArgumentDoc(doc)),
      desc.examples,
    );
  }

  abstract commandTopic(usage: O, desc: O): O;
  abstract commandSetTopic(summary: string | undefined, commands: O[]): O;
  abstract argumentUsage(name: string, isRequired: boolean, isRest: boolean): O;
  abstract commandUsage(
    ids: readonly string[],
    args: O[],
    desc: string,
    long: boolean,
  ): O;
  abstract argumentDoc(name: string, isRequired: boolean, description: string): O;
  abstract commandDesc(
    summary: string | undefined,
    args: O[],
    examples: string | undefined,
  ): O;
}

const WHITESPACE_RE = /\s/;

/** Renders help topics as plain multi-line text in the style of man pages. */
export class SimpleHelpFolder extends HelpFolder<string> {
  /** `foo`, or `(foo|f)` for aliases and ids that would not read as one word. */
  static formatIds(ids: readonly string[]): string {
    const [only, ...others] = ids;
    const paren =
      only === undefined ||
      others.length > 0 ||
      only.length === 0 ||
      WHITESPACE_RE.test(only);

    const joined = ids.join("|");
    return paren ? `(${joined})` : joined;
  }

  commandTopic(usage: string, desc: string): string {
    const gap = usage.length > 0 && desc.length > 0 ? "\n\n" : "";
    return `${usage}${gap}${desc}`;
  }

  commandSetTopic(summary: string | undefined, commands: string[]): string {
    let text = summary ?? "";

    if (commands.length > 0) {
      if (text.length > 0) text += "\n\n";
      text += "COMMANDS";
      for (const cmd of commands) text += `\n  ${cmd}`;
    }

    return text;
  }

  argumentUsage(name: string, isRequired: boolean, isRest: boolean): string {
    const body = isRest ? `${name}...` : name;
    return isRequired ? `<${body}>` : `[${body}]`;
  }

  commandUsage(
    ids: readonly string[],
    args: string[],
    desc: string,
    long: boolean,
  ): string {
    const line = [SimpleHelpFolder.formatIds(ids), ...args].join(" ");
    return long ? `USAGE: ${line}\n${desc}` : `${line}: ${desc}`;
  }

  argumentDoc(name: string, isRequired: boolean, description: string): string {
    return `${name}${isRequired ? "" : " (optional)"}: ${description}`;
  }

  commandDesc(
    summary: string | undefined,
    args: string[],
    examples: string | undefined,
  ): string {
    const sections: string[] = [];

    if (summary !== undefined) sections.push(`SUMMARY\n${summary}`);
    if (args.length > 0) {
      sections.push(["ARGUMENTS", ...args.map((arg) => `  ${arg}`)].join("\n"));
    }
    if (examples !== undefined) sections.push(`EXAMPLES\n\n${examples}`);

    return sections.join("\n\n");
  }
}
