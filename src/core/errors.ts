import type { CoercionFailureReason } from "./flags/coerce";
import type { FlagKind } from "./flags/kinds";

export type DuplicateFlagError = { code: "duplicate-flag"; name: string };
export type InvalidDefaultError = {
  code: "invalid-default";
  name: string;
  kind: FlagKind;
};
export type InvalidFlagNameError = { code: "invalid-flag-name"; name: string };

export type RegistrationError =
  | DuplicateFlagError
  | InvalidDefaultError
  | InvalidFlagNameError;

export type UnknownFlagError = {
  code: "unknown-flag";
  name: string;
  token: string;
};
export type MissingValueError = { code: "missing-value"; name: string };
export type InvalidValueError = {
  code: "invalid-value";
  name: string;
  text: string;
  expected: FlagKind;
  reason: CoercionFailureReason;
};
export type HelpRequestedError = { code: "help-requested" };

/** Raised while walking the tokens; the first one stops the scan. */
export type ScanError =
  | UnknownFlagError
  | MissingValueError
  | InvalidValueError
  | DuplicateFlagError
  | HelpRequestedError;

export type MissingRequiredFlagError = {
  code: "missing-required-flag";
  names: string[];
};

export type ParseError = ScanError | MissingRequiredFlagError;

export type UnknownFlagNameError = { code: "unknown-flag-name"; name: string };
export type TypeMismatchError = {
  code: "type-mismatch";
  name: string;
  expected: FlagKind;
  actual: FlagKind;
};

export type RetrievalError = UnknownFlagNameError | TypeMismatchError;

export type FlagError = RegistrationError | ParseError | RetrievalError;

export type FlagErrorCode = FlagError["code"];

export function formatFlagError(error: FlagError, prefix = "--"): string {
  switch (error.code) {
    case "duplicate-flag":
      return `Duplicate flag ${prefix}${error.name}`;
    case "invalid-default":
      return `Default value for ${prefix}${error.name} is not a valid ${error.kind}`;
    case "invalid-flag-name":
      return `Invalid flag name "${error.name}"`;
    case "unknown-flag":
      return `Unknown flag ${error.token}`;
    case "missing-value":
      return `Missing value for ${prefix}${error.name}`;
    case "invalid-value":
      return error.reason === "out-of-range"
        ? `Invalid value for ${prefix}${error.name}: "${error.text}" is out of range for ${error.expected}`
        : `Invalid value for ${prefix}${error.name}: "${error.text}" is not a valid ${error.expected}`;
    case "help-requested":
      return "Help requested";
    case "missing-required-flag":
      return `Missing required ${error.names.length === 1 ? "flag" : "flags"}: ${error.names
        .map((name) => `${prefix}${name}`)
        .join(", ")}`;
    case "unknown-flag-name":
      return `No flag is registered with name "${error.name}"`;
    case "type-mismatch":
      return `Flag "${error.name}" holds a ${error.actual} value, not ${error.expected}`;
    default:
      return "Unknown error";
  }
}
