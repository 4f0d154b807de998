export {
  CommandSet,
  defineCommandSet,
  type CommandDefinition,
  type CommandEntry,
  type CommandSetDefinition,
  type FieldInfo,
  type FieldKind,
  type FieldOptions,
} from "./core/command-set.js";
export { CONVERTERS, type Converter, type FieldMode, type Scalar } from "./core/fields.js";
export type { ArgumentValue, ParsedCommand } from "./core/parser.js";
export {
  pathFromId,
  pathHead,
  pathSegments,
  type CommandPath,
} from "./core/path.js";
export type { CommandSetTopic, CommandTopic, HelpTopic } from "./core/help.js";
export type {
  ArgumentDoc,
  CommandDesc,
  CommandDocs,
  CommandSetDocs,
} from "./core/docs.js";
export type { ArgumentUsage, CommandUsage, RestArg } from "./core/usage.js";
export {
  fail,
  isCommandParseError,
  isIdParseError,
  isPathParseError,
  ok,
  type CommandParseError,
  type IdParseError,
  type ParseError,
  type PathParseError,
  type Result,
} from "./core/parse-errors.js";
export { IdTrie, resolveIdentical, type AmbiguityResolver } from "./core/trie.js";
export { TokenStream, tokenize, type TokenInput } from "./core/tokens.js";
export { loadSpecFile, parseSpecSource } from "./core/spec-file.js";
export { didYouMean } from "./fold/did-you-mean.js";
export {
  ErrorFolder,
  SimpleErrorFolder,
  type SimpleErrorFolderOptions,
} from "./fold/fold-error.js";
export { HelpFolder, SimpleHelpFolder } from "./fold/fold-help.js";
export {
  ArgumentDocsError,
  CommandInputError,
  ConversionError,
  DuplicateIdentifierError,
  FieldDefinitionError,
  FilesystemError,
  SpecError,
  SpecFileError,
  UsageSyntaxError,
  UsagekitError,
} from "./util/errors.js";
