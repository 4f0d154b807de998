/**
 * Core constants for usagekit.
 *
 * DOCUMENTATION BLOCK LAYOUT:
 *   `(deploy|dep) <target> [region] [flags...]` Deploy a build.
 *
 *   # Summary
 *   Longer, line-wrapped description of the command.
 *
 *   # Arguments
 *   target: Environment to deploy into.
 *   region: Region override.
 *   flags: Extra flags handed to the deployer.
 *
 *   # Examples
 *   deploy staging eu-west-1
 *
 * The first paragraph is the usage line plus the short description. Every
 * later paragraph opens with a `# Header` line naming its section.
 */

/** Section headers that fill `CommandDocs.summary`. */
export const SUMMARY_HEADERS = ["description", "overview", "summary"] as const;

/** Section headers holding `name: text` argument entries. */
export const ARGUMENT_HEADERS = ["arguments", "parameters"] as const;

/** Section headers holding raw example text. */
export const EXAMPLE_HEADERS = ["examples"] as const;

/** Minimum similarity for a "did you mean" suggestion to be shown. */
export const SUGGESTION_THRESHOLD = 0.3;

/** Spec file read by the CLI when --spec is not given. */
export const DEFAULT_SPEC_FILE = "usagekit.yaml";

/** Field types accepted in spec files. */
export const FIELD_TYPES = ["string", "integer", "number", "boolean"] as const;
export type FieldType = (typeof FIELD_TYPES)[number];

/** Tokens accepted by the boolean converter. */
export const TRUE_TOKENS = ["true", "yes", "on", "1"] as const;
export const FALSE_TOKENS = ["false", "no", "off", "0"] as const;

/** Exit codes for the CLI. */
export const EXIT = {
  SUCCESS: 0,
  SPEC_ERROR: 1,
  FILESYSTEM_ERROR: 2,
  BAD_INPUT: 3,
} as const;
