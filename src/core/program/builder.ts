import {
  type ProgramOptions,
  resolveProgramOptions,
} from "../config/options";
import type { RegistrationError } from "../errors";
import { toTypedValue } from "../flags/coerce";
import type { FlagKind, FlagValueOf } from "../flags/kinds";
import type {
  FlagSchemaEntry,
  OptionalFlagSchemaEntry,
  RequiredFlagSchemaEntry,
} from "../flags/schema";
import { err, ok, type Result } from "../result";
import { renderHelpText } from "./help";
import { parseTokens } from "./parse";
import type { Program, ProgramMetadata } from "./types";

export type ProgramBuilder = {
  /** First registration error, or null while every flag so far is valid. */
  readonly error: RegistrationError | null;
  withRequiredFlag(
    name: string,
    kind: FlagKind,
    description: string
  ): ProgramBuilder;
  withOptionalFlag<K extends FlagKind>(
    name: string,
    kind: K,
    defaultValue: FlagValueOf<K>,
    description: string
  ): ProgramBuilder;
  build(): Result<Program, RegistrationError>;
};

const whitespaceRegex = /\s/;

/**
 * Starts a program declaration. Each registration is checked as it is made;
 * once one fails, later registrations are ignored and `build()` reports it.
 *
 * ```ts
 * const program = createProgram("An HTTP server")
 *   .withRequiredFlag("port", "u16", "Port number")
 *   .withOptionalFlag("use-tls", "switch", false, "Serve over TLS")
 *   .build();
 * ```
 */
export function createProgram(
  description: string,
  options: Partial<ProgramOptions> = {}
): ProgramBuilder {
  const resolvedOptions = resolveProgramOptions(options);
  const entries: FlagSchemaEntry[] = [];
  let firstError: RegistrationError | null = null;

  function register(
    create: () => Result<FlagSchemaEntry, RegistrationError>
  ): ProgramBuilder {
    if (firstError !== null) {
      return builder;
    }
    const created = create();
    if (created.ok) {
      entries.push(created.value);
    } else {
      firstError = created.error;
    }
    return builder;
  }

  function checkName(name: string): RegistrationError | null {
    if (!isValidFlagName(name, resolvedOptions.prefix)) {
      return { code: "invalid-flag-name", name };
    }
    if (entries.some((entry) => entry.name === name)) {
      return { code: "duplicate-flag", name };
    }
    return null;
  }

  function withRequiredFlag(
    name: string,
    kind: FlagKind,
    flagDescription: string
  ): ProgramBuilder {
    return register(() => {
      const nameError = checkName(name);
      if (nameError) {
        return err(nameError);
      }
      const entry: RequiredFlagSchemaEntry = {
        name,
        kind,
        required: true,
        description: flagDescription,
      };
      return ok(entry);
    });
  }

  function withOptionalFlag<K extends FlagKind>(
    name: string,
    kind: K,
    defaultValue: FlagValueOf<K>,
    flagDescription: string
  ): ProgramBuilder {
    return register(() => {
      const nameError = checkName(name);
      if (nameError) {
        return err(nameError);
      }
      const typedDefault = toTypedValue(kind, defaultValue);
      if (typedDefault === null) {
        return err({ code: "invalid-default", name, kind });
      }
      const entry: OptionalFlagSchemaEntry = {
        name,
        kind,
        required: false,
        defaultValue: Object.freeze(typedDefault),
        description: flagDescription,
      };
      return ok(entry);
    });
  }

  function build(): Result<Program, RegistrationError> {
    if (firstError !== null) {
      return err(firstError);
    }

    const metadata: ProgramMetadata = Object.freeze({
      description,
      entries: Object.freeze(
        entries.map((entry) => Object.freeze({ ...entry }))
      ),
      options: resolvedOptions,
    });

    return ok(
      Object.freeze({
        metadata,
        parse: (tokens: readonly string[]) => parseTokens(metadata, tokens),
        helpText: () => renderHelpText(metadata),
      })
    );
  }

  const builder: ProgramBuilder = {
    get error() {
      return firstError;
    },
    withRequiredFlag,
    withOptionalFlag,
    build,
  };

  return builder;
}

function isValidFlagName(name: string, prefix: string): boolean {
  if (name.length === 0 || whitespaceRegex.test(name) || name.includes("=")) {
    return false;
  }
  return prefix.length === 0 || !name.startsWith(prefix);
}
