import type { ParseError, ScanError } from "../errors";
import { parseToken } from "../flags/coerce";
import type { TypedValue } from "../flags/kinds";
import type { FlagSchemaEntry } from "../flags/schema";
import { err, ok, type Result } from "../result";
import type { ProgramMetadata } from "./types";
import { createFlagValues, type FlagValueEntry, type FlagValues } from "./values";

type FlagToken = {
  name: string;
  inlineValue?: string;
};

type ReadValue = {
  typed: TypedValue;
  // Index of the next token to scan.
  next: number;
};

/**
 * Walks `tokens` left to right against the registered flags.
 *
 * Scan errors stop at the first offending token. Missing required flags are
 * only checked once every token has been read, and are reported together.
 */
export function parseTokens(
  metadata: ProgramMetadata,
  tokens: readonly string[]
): Result<FlagValues, ParseError> {
  const { prefix, helpFlag, inlineValues } = metadata.options;
  const entriesByName = new Map<string, FlagSchemaEntry>(
    metadata.entries.map((entry) => [entry.name, entry])
  );
  const supplied = new Map<string, TypedValue>();

  let index = 0;
  while (index < tokens.length) {
    const token = tokens[index];
    const flag = splitFlagToken(token, prefix, inlineValues);
    if (flag === null) {
      return err({ code: "unknown-flag", name: token, token });
    }

    const entry = entriesByName.get(flag.name);
    if (!entry) {
      if (flag.name === helpFlag && flag.inlineValue === undefined) {
        return err({ code: "help-requested" });
      }
      return err({ code: "unknown-flag", name: flag.name, token });
    }

    const read = readValue(entry, flag, tokens, index + 1);
    if (!read.ok) {
      return read;
    }
    if (supplied.has(entry.name)) {
      return err({ code: "duplicate-flag", name: entry.name });
    }
    supplied.set(entry.name, read.value.typed);
    index = read.value.next;
  }

  const missing: string[] = [];
  const values: FlagValueEntry[] = [];
  for (const entry of metadata.entries) {
    const typed = supplied.get(entry.name);
    if (typed) {
      values.push([entry.name, typed]);
      continue;
    }
    if (entry.required) {
      missing.push(entry.name);
      continue;
    }
    values.push([entry.name, entry.defaultValue]);
  }

  if (missing.length > 0) {
    return err({ code: "missing-required-flag", names: missing });
  }

  return ok(createFlagValues(values));
}

function splitFlagToken(
  token: string,
  prefix: string,
  inlineValues: boolean
): FlagToken | null {
  if (!token.startsWith(prefix)) {
    return null;
  }

  const body = token.slice(prefix.length);
  if (inlineValues) {
    const separator = body.indexOf("=");
    if (separator > 0) {
      return {
        name: body.slice(0, separator),
        inlineValue: body.slice(separator + 1),
      };
    }
  }
  return { name: body };
}

function readValue(
  entry: FlagSchemaEntry,
  flag: FlagToken,
  tokens: readonly string[],
  next: number
): Result<ReadValue, ScanError> {
  let text = flag.inlineValue;
  let after = next;

  if (text === undefined) {
    if (entry.kind === "switch") {
      return ok({ typed: { kind: "switch", value: true }, next });
    }
    // The following token is taken as-is, even if it looks like a flag.
    text = tokens[next];
    if (text === undefined) {
      return err({ code: "missing-value", name: entry.name });
    }
    after = next + 1;
  }

  const coerced = parseToken(entry.kind, text);
  if (!coerced.ok) {
    return err({
      code: "invalid-value",
      name: entry.name,
      text,
      expected: entry.kind,
      reason: coerced.error.reason,
    });
  }
  return ok({ typed: coerced.value, next: after });
}
