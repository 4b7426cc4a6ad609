export type ProgramOptions = {
  /** Marks a token as a flag name, e.g. `--port`. */
  prefix: string;
  /**
   * Name that makes `parse` report `help-requested` when it is not
   * registered as a flag. `null` turns this off.
   */
  helpFlag: string | null;
  /** Accept `--name=value` as well as `--name value`. */
  inlineValues: boolean;
};

export const defaultProgramOptions: Readonly<ProgramOptions> = Object.freeze({
  prefix: "--",
  helpFlag: "help",
  inlineValues: true,
});

export function resolveProgramOptions(
  overrides: Partial<ProgramOptions> = {}
): Readonly<ProgramOptions> {
  return Object.freeze({
    prefix: overrides.prefix ?? defaultProgramOptions.prefix,
    helpFlag:
      overrides.helpFlag === undefined
        ? defaultProgramOptions.helpFlag
        : overrides.helpFlag,
    inlineValues: overrides.inlineValues ?? defaultProgramOptions.inlineValues,
  });
}
