import { expect, test } from "vitest";

import { createProgram } from "../src/core/program/builder";

test("build keeps registration order and the required/default split", () => {
  const built = createProgram("An HTTP server")
    .withRequiredFlag("port", "u16", "Port number")
    .withOptionalFlag("use-tls", "bool", false, "TLS PLS?")
    .withRequiredFlag("host", "string", "Host name")
    .build();

  expect(built.ok).toBe(true);
  if (!built.ok) {
    return;
  }
  const { entries, description, options } = built.value.metadata;
  expect(description).toBe("An HTTP server");
  expect(entries).toEqual([
    { name: "port", kind: "u16", required: true, description: "Port number" },
    {
      name: "use-tls",
      kind: "bool",
      required: false,
      defaultValue: { kind: "bool", value: false },
      description: "TLS PLS?",
    },
    { name: "host", kind: "string", required: true, description: "Host name" },
  ]);
  expect(options).toEqual({ prefix: "--", helpFlag: "help", inlineValues: true });
});

test("build fails with duplicate-flag whichever registration repeats", () => {
  const requiredFirst = createProgram("x")
    .withRequiredFlag("port", "u16", "")
    .withOptionalFlag("port", "string", "a", "")
    .build();
  const optionalFirst = createProgram("x")
    .withOptionalFlag("port", "string", "a", "")
    .withRequiredFlag("port", "u16", "")
    .build();

  expect(requiredFirst).toEqual({
    ok: false,
    error: { code: "duplicate-flag", name: "port" },
  });
  expect(optionalFirst).toEqual({
    ok: false,
    error: { code: "duplicate-flag", name: "port" },
  });
});

test("registration errors are recorded as soon as they happen", () => {
  const builder = createProgram("x").withRequiredFlag("a", "string", "");
  expect(builder.error).toBeNull();

  builder.withRequiredFlag("a", "u8", "");
  expect(builder.error).toEqual({ code: "duplicate-flag", name: "a" });

  builder.withRequiredFlag("", "u8", "");
  expect(builder.error).toEqual({ code: "duplicate-flag", name: "a" });
});

test("optional flags with a default that does not fit fail with invalid-default", () => {
  expect(
    createProgram("x").withOptionalFlag("workers", "u8", 300, "").build()
  ).toEqual({
    ok: false,
    error: { code: "invalid-default", name: "workers", kind: "u8" },
  });
  expect(
    createProgram("x").withOptionalFlag("ratio", "f64", Number.NaN, "").build()
  ).toEqual({
    ok: false,
    error: { code: "invalid-default", name: "ratio", kind: "f64" },
  });
});

test("flag names must be usable as tokens", () => {
  for (const name of ["", "--port", "two words", "a=b"]) {
    expect(createProgram("x").withRequiredFlag(name, "u8", "").error).toEqual({
      code: "invalid-flag-name",
      name,
    });
  }
  expect(
    createProgram("x", { prefix: "-" }).withRequiredFlag("-v", "switch", "")
      .error
  ).toEqual({ code: "invalid-flag-name", name: "-v" });
});

test("finalized metadata is frozen and unaffected by later registrations", () => {
  const builder = createProgram("x").withRequiredFlag("port", "u16", "");
  const built = builder.build();
  builder.withRequiredFlag("extra", "string", "");

  expect(built.ok).toBe(true);
  if (!built.ok) {
    return;
  }
  expect(Object.isFrozen(built.value.metadata)).toBe(true);
  expect(Object.isFrozen(built.value.metadata.entries)).toBe(true);
  expect(built.value.metadata.entries.map((entry) => entry.name)).toEqual([
    "port",
  ]);
});
