import type { RegistrationError, RetrievalError } from "../core/errors";
import { createProgram } from "../core/program/builder";
import type { Program } from "../core/program/types";
import type { FlagValues } from "../core/program/values";
import { ok, type Result } from "../core/result";

export type ServerConfig = {
  port: number;
  host: string;
  useTls: boolean;
  workers: number;
};

export function createServerProgram(): Result<Program, RegistrationError> {
  return createProgram("An HTTP server")
    .withRequiredFlag("port", "u16", "Port number")
    .withOptionalFlag("host", "string", "127.0.0.1", "Address to bind")
    .withOptionalFlag("use-tls", "switch", false, "Serve over TLS")
    .withOptionalFlag("workers", "u8", 4, "Worker count")
    .build();
}

export function readServerConfig(
  values: FlagValues
): Result<ServerConfig, RetrievalError> {
  const port = values.get("port", "u16");
  if (!port.ok) {
    return port;
  }
  const host = values.get("host", "string");
  if (!host.ok) {
    return host;
  }
  const useTls = values.get("use-tls", "switch");
  if (!useTls.ok) {
    return useTls;
  }
  const workers = values.get("workers", "u8");
  if (!workers.ok) {
    return workers;
  }

  return ok({
    port: port.value,
    host: host.value,
    useTls: useTls.value,
    workers: workers.value,
  });
}
