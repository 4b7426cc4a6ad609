export {
  defaultProgramOptions,
  type ProgramOptions,
} from "./core/config/options";
export type {
  DuplicateFlagError,
  FlagError,
  FlagErrorCode,
  HelpRequestedError,
  InvalidDefaultError,
  InvalidFlagNameError,
  InvalidValueError,
  MissingRequiredFlagError,
  MissingValueError,
  ParseError,
  RegistrationError,
  RetrievalError,
  ScanError,
  TypeMismatchError,
  UnknownFlagError,
  UnknownFlagNameError,
} from "./core/errors";
export { formatFlagError } from "./core/errors";
export {
  type CoercionFailure,
  type CoercionFailureReason,
  formatValue,
  parseToken,
  toTypedValue,
} from "./core/flags/coerce";
export {
  type FlagKind,
  type FlagValueOf,
  flagKinds,
  type IntegerKind,
  integerKinds,
  isFlagKind,
  type TypedValue,
  type TypedValueOf,
} from "./core/flags/kinds";
export type {
  FlagSchemaEntry,
  OptionalFlagSchemaEntry,
  RequiredFlagSchemaEntry,
} from "./core/flags/schema";
export { createProgram, type ProgramBuilder } from "./core/program/builder";
export { renderHelpText } from "./core/program/help";
export type { Program, ProgramMetadata } from "./core/program/types";
export type { FlagValueEntry, FlagValues } from "./core/program/values";
export { type Err, err, type Ok, ok, type Result } from "./core/result";
