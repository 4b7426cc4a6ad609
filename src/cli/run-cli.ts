import { type FlagError, formatFlagError } from "../core/errors";
import { formatValue } from "../core/flags/coerce";
import type { Program } from "../core/program/types";
import type { FlagValues } from "../core/program/values";
import { createServerProgram, readServerConfig } from "./server-program";
import { type CliUi, createClackUi } from "./ui/clack-ui";

export type RunCliOptions = {
  argv: readonly string[];
  ui?: CliUi;
};

const CLI_NAME = "typed-flags-demo";

/**
 * Parses `argv` (as found in `process.argv`) against the demo server program
 * and reports the outcome. Returns the process exit code.
 */
export function runCli(options: RunCliOptions): number {
  const ui = options.ui ?? createClackUi();
  const args = options.argv.slice(2);

  try {
    const built = createServerProgram();
    if (!built.ok) {
      ui.printError(`error: ${formatFlagError(built.error)}`);
      return 1;
    }
    const program = built.value;

    const parsed = program.parse(args);
    if (!parsed.ok) {
      if (parsed.error.code === "help-requested") {
        ui.print(program.helpText());
        return 0;
      }
      return reportFailure(ui, program, parsed.error);
    }

    const config = readServerConfig(parsed.value);
    if (!config.ok) {
      return reportFailure(ui, program, config.error);
    }

    const { host, port, useTls, workers } = config.value;
    ui.intro(CLI_NAME);
    ui.note(
      formatResolvedFlags(parsed.value, program.metadata.options.prefix),
      "Resolved flags"
    );
    ui.outro(
      `Ready to serve ${useTls ? "https" : "http"}://${host}:${port} with ${workers} workers`
    );
    return 0;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    ui.printError(`error: ${message}`);
    return 1;
  }
}

export function formatResolvedFlags(
  values: FlagValues,
  prefix: string
): string {
  const rows = values
    .entries()
    .map(([name, typed]) => ({
      label: `${prefix}${name}`,
      value: formatValue(typed),
    }));
  const width = rows.reduce((max, row) => Math.max(max, row.label.length), 0);
  return rows.map((row) => `${row.label.padEnd(width)} = ${row.value}`).join("\n");
}

function reportFailure(ui: CliUi, program: Program, error: FlagError): number {
  ui.printError(
    `error: ${formatFlagError(error, program.metadata.options.prefix)}`
  );
  ui.printError(program.helpText());
  return 1;
}
