import type { RegistrationError } from "../src/core/errors";
import type { Program } from "../src/core/program/types";
import type { Result } from "../src/core/result";

export function unwrapProgram(
  built: Result<Program, RegistrationError>
): Program {
  if (!built.ok) {
    throw new Error(`Unexpected registration error: ${built.error.code}`);
  }
  return built.value;
}
