import { expect, test } from "vitest";

import { formatFlagError } from "../src/core/errors";

test("formatFlagError names every missing required flag", () => {
  expect(
    formatFlagError({
      code: "missing-required-flag",
      names: ["port", "host"],
    })
  ).toBe("Missing required flags: --port, --host");
  expect(
    formatFlagError({ code: "missing-required-flag", names: ["port"] })
  ).toBe("Missing required flag: --port");
});

test("formatFlagError describes rejected values", () => {
  expect(
    formatFlagError({
      code: "invalid-value",
      name: "port",
      text: "notanumber",
      expected: "u16",
      reason: "not-a-number",
    })
  ).toBe('Invalid value for --port: "notanumber" is not a valid u16');
  expect(
    formatFlagError({
      code: "invalid-value",
      name: "port",
      text: "70000",
      expected: "u16",
      reason: "out-of-range",
    })
  ).toBe('Invalid value for --port: "70000" is out of range for u16');
});

test("formatFlagError covers scan and retrieval errors", () => {
  expect(
    formatFlagError({ code: "unknown-flag", name: "bogus", token: "--bogus" })
  ).toBe("Unknown flag --bogus");
  expect(formatFlagError({ code: "duplicate-flag", name: "port" })).toBe(
    "Duplicate flag --port"
  );
  expect(formatFlagError({ code: "missing-value", name: "port" }, "/")).toBe(
    "Missing value for /port"
  );
  expect(
    formatFlagError({
      code: "type-mismatch",
      name: "port",
      expected: "string",
      actual: "u16",
    })
  ).toBe('Flag "port" holds a u16 value, not string');
  expect(
    formatFlagError({ code: "invalid-default", name: "workers", kind: "u8" })
  ).toBe("Default value for --workers is not a valid u8");
});
