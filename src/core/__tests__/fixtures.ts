import { CommandSet, defineCommandSet } from "../command-set.js";

export const PUSH_DOCS = [
  "`(push|p) <branch> [remote] [refspecs...]` Push a branch.",
  "",
  "# Summary",
  "Pushes the named branch.",
  "",
  "# Arguments",
  "branch: Branch to push.",
  "remote: Remote to push to.",
  "refspecs: Extra refspecs.",
  "",
  "# Examples",
  "push main origin",
].join("\n");

export function remoteSet(): CommandSet {
  return defineCommandSet({
    docs: "Remote management.",
    commands: [
      {
        docs: [
          "`(add|a) <name> <url>` Add a remote.",
          "",
          "# Arguments",
          "name: Name of the remote.",
          "url: Where it lives.",
        ].join("\n"),
      },
      {
        docs: [
          "`remove <name>` Remove a remote.",
          "",
          "# Arguments",
          "name: Name of the remote.",
        ].join("\n"),
      },
      { docs: "`list` List remotes." },
    ],
  });
}

/**
 * A small version-control style command set: aliases, optional and rest
 * arguments, typed fields, a nested subcommand set and a help path.
 */
export function gitSet(): CommandSet {
  const set: CommandSet = defineCommandSet({
    docs: "Toy version control.",
    commands: [
      { docs: PUSH_DOCS },
      {
        docs: [
          "`pull [remote]` Fetch and merge.",
          "",
          "# Arguments",
          "remote: Remote to pull from.",
        ].join("\n"),
      },
      {
        docs: [
          "`count <n> [step]` Count to n.",
          "",
          "# Arguments",
          "n: Where to stop.",
          "step: Increment.",
        ].join("\n"),
        fields: { n: { type: "integer" }, step: { type: "number" } },
      },
      {
        docs: [
          "`remote <cmd...>` Manage remotes.",
          "",
          "# Arguments",
          "cmd: Remote command.",
        ].join("\n"),
        subcommand: remoteSet(),
      },
      {
        docs: [
          "`help [topic...]` Show help.",
          "",
          "# Arguments",
          "topic: Command to describe.",
        ].join("\n"),
        fields: { topic: { path: () => set } },
      },
      { docs: "`status` Show the working tree status." },
    ],
  });
  return set;
}
