import type { ProgramOptions } from "../config/options";
import type { ParseError } from "../errors";
import type { FlagSchemaEntry } from "../flags/schema";
import type { Result } from "../result";
import type { FlagValues } from "./values";

export type ProgramMetadata = {
  readonly description: string;
  /** Registration order; help lines follow it. */
  readonly entries: readonly FlagSchemaEntry[];
  readonly options: Readonly<ProgramOptions>;
};

/**
 * A finalized program. It has no registration methods, so flags cannot be
 * added once parsing is possible.
 */
export type Program = {
  readonly metadata: ProgramMetadata;
  parse(tokens: readonly string[]): Result<FlagValues, ParseError>;
  helpText(): string;
};
