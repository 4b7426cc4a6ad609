import { formatValue } from "../flags/coerce";
import type { FlagSchemaEntry } from "../flags/schema";
import type { ProgramMetadata } from "./types";

type HelpRow = {
  name: string;
  type: string;
  marker: string;
  description: string;
};

export function renderHelpText(metadata: ProgramMetadata): string {
  const rows = metadata.entries.map((entry) =>
    toHelpRow(entry, metadata.options.prefix)
  );
  if (rows.length === 0) {
    return `\n${metadata.description}\n\n(no args)\n`;
  }

  const nameWidth = widest(rows.map((row) => row.name));
  const typeWidth = widest(rows.map((row) => row.type));
  const markerWidth = widest(rows.map((row) => row.marker));

  const lines = rows.map(
    (row) =>
      `\t${row.name.padEnd(nameWidth)} ${row.type.padEnd(typeWidth)} ${row.marker.padEnd(markerWidth)}: ${row.description}`
  );

  return `\n${metadata.description}\n\n${lines.join("\n")}\n`;
}

function toHelpRow(entry: FlagSchemaEntry, prefix: string): HelpRow {
  return {
    name: `${prefix}${entry.name}`,
    type: `<${entry.kind}>`,
    marker: entry.required
      ? "(required)"
      : `(default: ${formatValue(entry.defaultValue)})`,
    description: entry.description,
  };
}

function widest(values: readonly string[]): number {
  return values.reduce((width, value) => Math.max(width, value.length), 0);
}
