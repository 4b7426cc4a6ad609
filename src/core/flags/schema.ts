import type { FlagKind, TypedValue } from "./kinds";

type FlagSchemaEntryBase = {
  name: string;
  kind: FlagKind;
  description: string;
};

export type RequiredFlagSchemaEntry = FlagSchemaEntryBase & {
  required: true;
};

export type OptionalFlagSchemaEntry = FlagSchemaEntryBase & {
  required: false;
  // Always carries the same kind as the entry.
  defaultValue: TypedValue;
};

export type FlagSchemaEntry = RequiredFlagSchemaEntry | OptionalFlagSchemaEntry;
